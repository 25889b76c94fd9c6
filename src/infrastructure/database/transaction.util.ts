import { DataSource, EntityManager, QueryRunner } from 'typeorm';

export type IsolationLevel = 'READ COMMITTED' | 'REPEATABLE READ' | 'SERIALIZABLE';

export interface TransactionOptions {
  isolationLevel?: IsolationLevel;
  /** Bounds every row-lock wait inside the transaction (`SET LOCAL lock_timeout`). */
  lockTimeoutMs?: number;
}

export async function executeInTransaction<T>(
  dataSource: DataSource,
  fn: (manager: EntityManager) => Promise<T>,
  options: TransactionOptions = {},
): Promise<T> {
  const { isolationLevel = 'READ COMMITTED', lockTimeoutMs } = options;

  const queryRunner: QueryRunner = dataSource.createQueryRunner();

  try {
    await queryRunner.connect();
    await queryRunner.startTransaction(isolationLevel);

    try {
      if (lockTimeoutMs !== undefined) {
        await setLockTimeout(queryRunner.manager, lockTimeoutMs);
      }
      const result = await fn(queryRunner.manager);
      await queryRunner.commitTransaction();
      return result;
    } catch (error) {
      await queryRunner.rollbackTransaction();
      throw error;
    }
  } finally {
    await queryRunner.release();
  }
}

export async function setLockTimeout(manager: EntityManager, timeoutMs: number): Promise<void> {
  const bounded = Math.max(0, Math.floor(timeoutMs));
  await manager.query(`SET LOCAL lock_timeout = ${bounded}`);
}
