export { createDb, getDb, closeDb, sql, schema } from './client';
export type { Database, Transaction, DbOptions, DbHandle } from './client';
export * from './schema';
