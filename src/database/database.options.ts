import { PostgresConnectionOptions } from 'typeorm/driver/postgres/PostgresConnectionOptions';
import { ConfigService } from '../config/config.service';
import { Student } from '../student/entities/student.entity';
import { QueryLogger } from './query-logger';

export function buildDataSourceOptions(configService: ConfigService): PostgresConnectionOptions {
  const database = configService.getDatabaseConfig();

  return {
    type: 'postgres',
    host: database.host,
    port: database.port,
    username: database.username,
    password: database.password,
    database: database.database,
    entities: [Student],
    synchronize: false,
    logger: new QueryLogger(),
    // one operator, one statement at a time
    poolSize: 1,
  };
}
