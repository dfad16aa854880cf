// apps/backend/src/db/client.ts
// Lazy postgres.js pool + drizzle instance. Nothing connects until getDb() is first called.

import { drizzle, type PostgresJsDatabase } from 'drizzle-orm/postgres-js'
import postgres from 'postgres'
import { getConfig } from '../lib/config.js'
import * as schema from './schema.js'

export type Database = PostgresJsDatabase<typeof schema>

let _db: Database | null = null
let _sql: postgres.Sql | null = null

export function getDb(): Database {
  if (_db) return _db

  const config = getConfig()
  if (!config.databaseUrl) {
    throw new Error('DATABASE_URL environment variable is not set. Please set it in your .env file or environment.')
  }

  _sql = postgres(config.databaseUrl, {
    max: config.dbPoolMax,
    idle_timeout: 20,
    connect_timeout: 10,
    onnotice: () => {},
    connection: { application_name: 'fieldcraft' },
  })
  _db = drizzle(_sql, { schema })

  if (config.trace) {
    console.log(`[db] pool initialized: max=${config.dbPoolMax}`)
  }
  return _db
}

export async function closeDb(): Promise<void> {
  if (!_sql) return
  const sql = _sql
  _sql = null
  _db = null
  await sql.end({ timeout: 5 })
}
