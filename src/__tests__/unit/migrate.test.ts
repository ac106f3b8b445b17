import { describe, it, expect } from 'vitest'
import { loadMigrations, pendingMigrations, runMigrations } from '@/lib/migrate'
import { createMockDb } from '../helpers/mock-db'

describe('loadMigrations', () => {
  it('reads the SQL files in filename order', () => {
    expect(loadMigrations().map(m => m.name)).toEqual([
      '001_users_and_roles.sql',
      '002_initiatives.sql',
      '003_zones.sql',
      '004_inventory.sql',
      '005_donations.sql',
      '006_email_jobs.sql',
    ])
  })
})

describe('pendingMigrations', () => {
  it('skips migrations already applied', () => {
    const all = [{ name: 'a.sql', sql: '' }, { name: 'b.sql', sql: '' }]
    expect(pendingMigrations(all, ['a.sql'])).toEqual([{ name: 'b.sql', sql: '' }])
  })
})

describe('runMigrations', () => {
  it('applies pending migrations and records them', async () => {
    const { db, calls, callsMatching } = createMockDb([
      [/SELECT name FROM _migrations/, [{ name: '001_a.sql' }]],
    ])
    const migrations = [
      { name: '001_a.sql', sql: 'CREATE TABLE a (id INT)' },
      { name: '002_b.sql', sql: 'CREATE TABLE b (id INT)' },
    ]

    const applied = await runMigrations(db, migrations)

    expect(applied).toEqual(['002_b.sql'])
    expect(calls.some(c => c.text === 'CREATE TABLE a (id INT)')).toBe(false)
    expect(calls.some(c => c.text === 'CREATE TABLE b (id INT)')).toBe(true)
    expect(callsMatching(/INSERT INTO _migrations/)[0].params).toEqual(['002_b.sql'])
  })
})
