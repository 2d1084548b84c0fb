import * as dotenv from 'dotenv';
import * as fs from 'fs';
import { Inject, Injectable, Logger, Optional } from '@nestjs/common';
import { plainToClass } from 'class-transformer';
import { validateSync } from 'class-validator';
import { DatabaseConfig } from './database-config';
import { InvalidConfigurationException } from '../common/exceptions/invalid-configuration.exception';

export const CONFIG_OPTIONS = 'CONFIG_OPTIONS';

export interface ConfigServiceOptions {
  /** Defaults to `.env.production` when NODE_ENV is production, `.env.development` otherwise. */
  envFilePath?: string;
  env?: NodeJS.ProcessEnv;
}

function isMissingFile(error: unknown): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === 'ENOENT'
  );
}

@Injectable()
export class ConfigService {
  private readonly logger = new Logger(ConfigService.name);
  private readonly envConfig: Record<string, string>;

  constructor(
    @Optional()
    @Inject(CONFIG_OPTIONS)
    options: ConfigServiceOptions = {},
  ) {
    const env = options.env ?? process.env;
    const envFile =
      options.envFilePath ??
      (env.NODE_ENV === 'production' ? '.env.production' : '.env.development');

    let fileConfig: Record<string, string> = {};
    try {
      fileConfig = dotenv.parse(fs.readFileSync(envFile));
    } catch (err) {
      if (!isMissingFile(err)) {
        throw err;
      }
      this.logger.debug(`No ${envFile} found, using process environment only`);
    }

    // exported variables win over the file
    const processConfig = Object.fromEntries(
      Object.entries(env).filter(
        (entry): entry is [string, string] => entry[1] !== undefined,
      ),
    );
    this.envConfig = { ...fileConfig, ...processConfig };
  }

  get(key: string): string {
    const value = this.envConfig[key];
    if (value === undefined) {
      throw new InvalidConfigurationException(
        `Configuration error: Missing required environment variable ${key}`,
      );
    }
    return value;
  }

  getOptional(key: string, fallback: string): string {
    return this.envConfig[key] ?? fallback;
  }

  getDatabaseConfig(): DatabaseConfig {
    const config = plainToClass(DatabaseConfig, {
      host: this.get('DB_HOST'),
      port: this.get('DB_PORT'),
      username: this.get('DB_USERNAME'),
      password: this.get('DB_PASSWORD'),
      database: this.get('DB_DATABASE'),
    });

    const errors = validateSync(config);
    if (errors.length > 0) {
      const messages = errors.flatMap((error) =>
        Object.values(error.constraints ?? {}),
      );
      throw new InvalidConfigurationException(
        `Invalid database configuration: ${messages.join('; ')}`,
      );
    }

    return config;
  }
}
