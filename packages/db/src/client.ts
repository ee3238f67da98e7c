import { drizzle } from 'drizzle-orm/postgres-js';
import type { PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import { sql } from 'drizzle-orm';
import postgres from 'postgres';
import * as schema from './schema';

export type Database = PostgresJsDatabase<typeof schema>;

/** Handle passed to `db.transaction` callbacks. */
export type Transaction = Parameters<Parameters<Database['transaction']>[0]>[0];

export interface DbOptions {
  connectionString?: string;
  poolMax?: number;
  prepare?: boolean;
}

export interface DbHandle {
  db: Database;
  client: postgres.Sql;
}

let handle: DbHandle | null = null;

export function createDb(options: DbOptions = {}): DbHandle {
  const connectionString = options.connectionString ?? process.env.DATABASE_URL;
  if (!connectionString) {
    throw new Error('DATABASE_URL environment variable is required');
  }
  // The dispatcher holds one connection for the length of a cycle; writers
  // share the rest. Keep the pool small unless told otherwise.
  const client = postgres(connectionString, {
    max: options.poolMax ?? parseInt(process.env.DB_POOL_MAX || '5', 10),
    prepare: options.prepare ?? process.env.DB_PREPARE_STATEMENTS === 'true',
    idle_timeout: 20,
    max_lifetime: 300,
    connect_timeout: 10,
    onnotice: (notice) => {
      console.warn(`[pg-notice] ${notice.severity}: ${notice.message}`);
    },
  });
  return { db: drizzle(client, { schema }), client };
}

/** Process-wide database, created lazily from DATABASE_URL. */
export function getDb(): Database {
  if (!handle) {
    handle = createDb();
  }
  return handle.db;
}

/**
 * End a pool. Without an argument, closes the one `getDb` created; pass the
 * handle from `createDb` to close that one instead.
 */
export async function closeDb(target: DbHandle | null = handle): Promise<void> {
  if (!target) return;
  if (target === handle) handle = null;
  await target.client.end({ timeout: 5 });
}

export { sql, schema };
