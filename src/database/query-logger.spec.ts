import * as os from 'os';
import * as path from 'path';
import { Logger } from '@nestjs/common';
import { ConfigService } from '../config/config.service';
import { buildDataSourceOptions } from './database.options';
import { QueryLogger } from './query-logger';

describe('QueryLogger', () => {
  let debug: jest.SpyInstance;
  let warn: jest.SpyInstance;
  let consoleLog: jest.SpyInstance;

  beforeEach(() => {
    debug = jest.spyOn(Logger.prototype, 'debug').mockImplementation(() => undefined);
    warn = jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);
    consoleLog = jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('is the logger of the data source options', () => {
    const configService = new ConfigService({
      envFilePath: path.join(os.tmpdir(), 'students-crud-missing', '.env.test'),
      env: {
        DB_HOST: 'localhost',
        DB_PORT: '5432',
        DB_USERNAME: 'postgres',
        DB_PASSWORD: 'test-secret',
        DB_DATABASE: 'students_test',
      },
    });

    const options = buildDataSourceOptions(configService);

    expect(options.logger).toBeInstanceOf(QueryLogger);
    expect(options.logging).toBeUndefined();
  });

  it('writes queries at debug level and never to the console', () => {
    new QueryLogger().logQuery('SELECT "Student"."student_id" FROM "students"');

    expect(debug).toHaveBeenCalledWith('query: SELECT "Student"."student_id" FROM "students"');
    expect(consoleLog).not.toHaveBeenCalled();
  });

  it('includes the parameters of a failed query', () => {
    new QueryLogger().logQueryError(
      'duplicate key value violates unique constraint "UQ_students_email"',
      'INSERT INTO "students"',
      ['ada@example.com'],
    );

    expect(debug).toHaveBeenCalledWith(
      'query failed: INSERT INTO "students" -- parameters: ["ada@example.com"] -- duplicate key value violates unique constraint "UQ_students_email"',
    );
  });

  it('keeps TypeORM warnings at warn level', () => {
    const logger = new QueryLogger();
    logger.log('warn', 'pool is draining');
    logger.log('info', 'connected');

    expect(warn).toHaveBeenCalledWith('pool is draining');
    expect(debug).toHaveBeenCalledWith('connected');
  });
});
