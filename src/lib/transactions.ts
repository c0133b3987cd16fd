import { DataSource, EntityManager } from 'typeorm';
import { translateStoreError } from './errors';

/**
 * Runs `work` in one store transaction. Anything thrown rolls the whole unit
 * back; store integrity failures come out as ConflictError/ValidationError.
 */
export async function runInTransaction<T>(
  dataSource: DataSource,
  conflictMessage: string,
  work: (manager: EntityManager) => Promise<T>
): Promise<T> {
  try {
    return await dataSource.transaction(work);
  } catch (error) {
    throw translateStoreError(error, conflictMessage);
  }
}
