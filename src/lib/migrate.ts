/**
 * SQL migration runner.
 * Applies db/migrations/*.sql in filename order and records each in _migrations.
 */

import fs from 'fs'
import path from 'path'
import type { Db } from './db'

export const MIGRATIONS_DIR = path.resolve(process.cwd(), 'db/migrations')

export type Migration = { name: string; sql: string }

export function loadMigrations(dir = MIGRATIONS_DIR): Migration[] {
  return fs
    .readdirSync(dir)
    .filter(file => file.endsWith('.sql'))
    .sort()
    .map(name => ({ name, sql: fs.readFileSync(path.join(dir, name), 'utf8') }))
}

export function pendingMigrations(all: Migration[], applied: Iterable<string>): Migration[] {
  const done = new Set(applied)
  return all.filter(m => !done.has(m.name))
}

async function ensureMigrationsTable(db: Db) {
  await db.query(`
    CREATE TABLE IF NOT EXISTS _migrations (
      name TEXT PRIMARY KEY,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `)
}

export async function appliedMigrations(db: Db): Promise<string[]> {
  await ensureMigrationsTable(db)
  const rows = await db.query<{ name: string }>('SELECT name FROM _migrations ORDER BY name')
  return rows.map(r => r.name)
}

/**
 * Apply every pending migration, each in its own transaction.
 * Returns the names applied.
 */
export async function runMigrations(db: Db, migrations = loadMigrations()): Promise<string[]> {
  const pending = pendingMigrations(migrations, await appliedMigrations(db))

  for (const migration of pending) {
    await db.transaction(async tx => {
      await tx.query(migration.sql)
      await tx.query('INSERT INTO _migrations (name) VALUES ($1)', [migration.name])
    })
    console.log(`[migrate] Applied ${migration.name}`)
  }

  return pending.map(m => m.name)
}
