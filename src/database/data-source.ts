// src/database/data-source.ts
import { DataSource } from 'typeorm';
import { ConfigService } from '../config/config.service';
import { buildDataSourceOptions } from './database.options';
import { CreateStudentsTable1760000000000 } from '../migrations/1760000000000-CreateStudentsTable';

const configService = new ConfigService();

export default new DataSource({
  ...buildDataSourceOptions(configService),
  migrations: [CreateStudentsTable1760000000000],
});
