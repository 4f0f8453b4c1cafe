import { DataSource, EntityManager } from 'typeorm';
import { Logger } from '@nestjs/common';

const logger = new Logger('TransactionHelper');

/**
 * Runs a unit of work on a dedicated query runner so that every statement
 * issued through the given entity manager commits or rolls back together.
 */
export class TransactionHelper {
  static async runInTransaction<T>(
    dataSource: DataSource,
    operationCallback: (entityManager: EntityManager) => Promise<T>,
  ): Promise<T> {
    const queryRunner = dataSource.createQueryRunner();

    await queryRunner.connect();
    await queryRunner.startTransaction();

    try {
      const result = await operationCallback(queryRunner.manager);
      await queryRunner.commitTransaction();
      return result;
    } catch (err) {
      logger.error(
        `Transaction failed: ${err instanceof Error ? err.message : String(err)}`,
      );
      await queryRunner.rollbackTransaction();
      throw err;
    } finally {
      await queryRunner.release();
    }
  }
}
