import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { ConfigService } from './config.service';
import { InvalidConfigurationException } from '../common/exceptions/invalid-configuration.exception';

const MISSING_FILE = path.join(os.tmpdir(), 'students-crud-missing', '.env.test');

const databaseEnv = {
  DB_HOST: 'db.internal',
  DB_PORT: '6543',
  DB_USERNAME: 'students_app',
  DB_PASSWORD: 'test-secret',
  DB_DATABASE: 'students_test',
};

describe('ConfigService', () => {
  it('builds a typed database config from the environment', () => {
    const service = new ConfigService({ envFilePath: MISSING_FILE, env: databaseEnv });

    expect(service.getDatabaseConfig()).toEqual({
      host: 'db.internal',
      port: 6543,
      username: 'students_app',
      password: 'test-secret',
      database: 'students_test',
    });
  });

  it('reads the env file and lets exported variables override it', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'students-config-'));
    const envFilePath = path.join(dir, '.env.development');
    fs.writeFileSync(envFilePath, 'DB_HOST=file-host\nDB_PORT=5432\n');

    try {
      const service = new ConfigService({ envFilePath, env: { DB_HOST: 'env-host' } });

      expect(service.get('DB_HOST')).toBe('env-host');
      expect(service.get('DB_PORT')).toBe('5432');
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it('throws on a missing required key', () => {
    const service = new ConfigService({ envFilePath: MISSING_FILE, env: {} });

    expect(() => service.get('DB_HOST')).toThrow(
      'Configuration error: Missing required environment variable DB_HOST',
    );
  });

  it('falls back for optional keys', () => {
    const service = new ConfigService({ envFilePath: MISSING_FILE, env: { LOG_LEVEL: 'debug' } });

    expect(service.getOptional('LOG_LEVEL', 'warn')).toBe('debug');
    expect(service.getOptional('NODE_ENV', 'development')).toBe('development');
  });

  it('rejects a port that is not a number', () => {
    const service = new ConfigService({
      envFilePath: MISSING_FILE,
      env: { ...databaseEnv, DB_PORT: 'abc' },
    });

    expect(() => service.getDatabaseConfig()).toThrow(InvalidConfigurationException);
    expect(() => service.getDatabaseConfig()).toThrow(/port must be an integer number/);
  });

  it('allows an empty password', () => {
    const service = new ConfigService({
      envFilePath: MISSING_FILE,
      env: { ...databaseEnv, DB_PASSWORD: '' },
    });

    expect(service.getDatabaseConfig().password).toBe('');
  });
});
