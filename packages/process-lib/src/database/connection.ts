import { neon } from '@neondatabase/serverless';
import type { PgDatabase, PgQueryResultHKT } from 'drizzle-orm/pg-core';
import { drizzle } from 'drizzle-orm/neon-http';

/** Any drizzle Postgres database; production runs on neon-http. */
export type Database = PgDatabase<PgQueryResultHKT>;

let dbInstance: Database | null = null;

export function getDb(url: string): Database {
  if (!dbInstance) {
    dbInstance = drizzle(neon(url));
  }
  return dbInstance;
}
