import { Logger as NestLogger } from '@nestjs/common';
import { Logger } from 'typeorm';

/** Routes TypeORM's output through Nest, so `LOG_LEVEL` decides what is printed. */
export class QueryLogger implements Logger {
  private readonly logger = new NestLogger('TypeORM');

  logQuery(query: string, parameters?: unknown[]): void {
    this.logger.debug(`query: ${query}${formatParameters(parameters)}`);
  }

  logQueryError(error: string | Error, query: string, parameters?: unknown[]): void {
    const message = typeof error === 'string' ? error : error.message;
    this.logger.debug(`query failed: ${query}${formatParameters(parameters)} -- ${message}`);
  }

  logQuerySlow(time: number, query: string, parameters?: unknown[]): void {
    this.logger.warn(`query is slow (${time} ms): ${query}${formatParameters(parameters)}`);
  }

  logSchemaBuild(message: string): void {
    this.logger.debug(message);
  }

  logMigration(message: string): void {
    this.logger.log(message);
  }

  log(level: 'log' | 'info' | 'warn', message: unknown): void {
    if (level === 'warn') {
      this.logger.warn(String(message));
    } else {
      this.logger.debug(String(message));
    }
  }
}

function formatParameters(parameters?: unknown[]): string {
  return parameters && parameters.length > 0 ? ` -- parameters: ${JSON.stringify(parameters)}` : '';
}
