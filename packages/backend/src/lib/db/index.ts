import pg from 'pg';
import { createMemoryContext } from './memory-context.js';
import { createPgContext } from './pg-context.js';
import type { DataContext } from './types.js';

export type {
  DataContext,
  UserDelegate,
  UserWhereUnique,
  WorkItemDelegate,
  WorkItemFindManyArgs,
  WorkItemOrderBy,
  WorkItemUpdateData,
  WorkItemWhere,
} from './types.js';
export { createMemoryContext } from './memory-context.js';
export { createPgContext } from './pg-context.js';

/**
 * PostgreSQL when a connection string is given, otherwise the in-memory store.
 */
export function createDataContext(databaseUrl: string | null): DataContext {
  if (!databaseUrl) {
    return createMemoryContext();
  }

  const pool = new pg.Pool({ connectionString: databaseUrl });
  return createPgContext(pool);
}
