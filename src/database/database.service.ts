import { Injectable, Logger } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { DataSource, EntityManager, QueryRunner } from 'typeorm';
import { ConnectionException } from '../common/exceptions/students.exceptions';
import { describeException } from '../common/exceptions/exception.utils';

/**
 * Hands out one dedicated connection per operation. Callers never hold a
 * connection across operations: `withConnection` and `withTransaction`
 * release it on every exit path.
 */
@Injectable()
export class DatabaseService {
  private readonly logger = new Logger(DatabaseService.name);

  constructor(
    @InjectDataSource()
    private readonly dataSource: DataSource,
  ) {}

  async openConnection(): Promise<QueryRunner> {
    try {
      if (!this.dataSource.isInitialized) {
        await this.dataSource.initialize();
      }
    } catch (error) {
      throw new ConnectionException(describeException(error), error);
    }

    const queryRunner = this.dataSource.createQueryRunner();
    try {
      await queryRunner.connect();
    } catch (error) {
      await queryRunner.release();
      throw new ConnectionException(describeException(error), error);
    }
    return queryRunner;
  }

  async withConnection<T>(work: (queryRunner: QueryRunner) => Promise<T>): Promise<T> {
    const queryRunner = await this.openConnection();
    try {
      return await work(queryRunner);
    } finally {
      await queryRunner.release();
    }
  }

  /**
   * Commits only when `work` resolves. A rejection (including a mutation
   * that matched no row) rolls back and is rethrown.
   */
  async withTransaction<T>(work: (manager: EntityManager) => Promise<T>): Promise<T> {
    return this.withConnection(async (queryRunner) => {
      await queryRunner.startTransaction();
      try {
        const result = await work(queryRunner.manager);
        await queryRunner.commitTransaction();
        return result;
      } catch (error) {
        if (queryRunner.isTransactionActive) {
          await queryRunner.rollbackTransaction();
        }
        this.logger.debug(`Rolled back: ${describeException(error)}`);
        throw error;
      }
    });
  }

  async verifyConnection(): Promise<void> {
    await this.withConnection(async (queryRunner) => {
      try {
        await queryRunner.query('SELECT 1');
      } catch (error) {
        throw new ConnectionException(describeException(error), error);
      }
    });
    this.logger.log('Database connection verified');
  }
}
