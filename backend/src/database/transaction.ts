/**
 * Scoped transaction helper
 */

import { DatabaseConnection, TransactionError } from './types';

/**
 * Run `work` inside a transaction on `connection`. Commits when `work`
 * resolves; rolls back on any other exit, including a failed commit.
 */
export async function withTransaction<T>(
  connection: DatabaseConnection,
  work: (connection: DatabaseConnection) => Promise<T>
): Promise<T> {
  await connection.beginTransaction();

  try {
    const result = await work(connection);
    await connection.commit();
    return result;
  } catch (error) {
    try {
      await connection.rollback();
    } catch (rollbackError) {
      throw new TransactionError(
        `Rollback failed: ${errorMessage(rollbackError)}`,
        error,
        rollbackError instanceof Error ? rollbackError : undefined
      );
    }
    throw error;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
