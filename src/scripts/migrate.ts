import 'reflect-metadata';
import { Logger } from '@nestjs/common';
import dataSource from '../database/data-source';

const logger = new Logger('Migrate');

async function main() {
  logger.log('Initializing data source...');
  await dataSource.initialize();
  try {
    const applied = await dataSource.runMigrations({ transaction: 'each' });
    if (applied.length === 0) {
      logger.log('Schema is up to date');
      return;
    }
    applied.forEach((migration) => logger.log(`Applied ${migration.name}`));
  } finally {
    await dataSource.destroy();
  }
}

main().catch((error) => {
  logger.error('Migration failed', error instanceof Error ? error.stack : String(error));
  process.exitCode = 1;
});
