import { Pool, type PoolClient, type QueryResultRow } from 'pg'
import { getConfig } from './config'

/**
 * Storage seam for domain code. Route handlers pass `db`; tests pass a mock.
 */
export interface Db {
  query<R extends QueryResultRow = QueryResultRow>(text: string, params?: unknown[]): Promise<R[]>
  /** Run `fn` inside BEGIN/COMMIT. Rolls back and rethrows on error. */
  transaction<T>(fn: (tx: Db) => Promise<T>): Promise<T>
}

const globalForDb = globalThis as unknown as {
  pool: Pool | undefined
}

export function getPool(): Pool {
  if (!globalForDb.pool) {
    globalForDb.pool = new Pool({
      connectionString: getConfig().databaseUrl,
      max: 5,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 5000,
    })
    globalForDb.pool.on('error', err => {
      console.error('[db] Idle client error:', err)
    })
  }
  return globalForDb.pool
}

function clientDb(client: PoolClient): Db {
  const tx: Db = {
    async query<R extends QueryResultRow = QueryResultRow>(text: string, params: unknown[] = []) {
      const result = await client.query<R>(text, params)
      return result.rows
    },
    // Already inside a transaction
    transaction: fn => fn(tx),
  }
  return tx
}

export const db: Db = {
  async query<R extends QueryResultRow = QueryResultRow>(text: string, params: unknown[] = []) {
    const result = await getPool().query<R>(text, params)
    return result.rows
  },
  async transaction(fn) {
    const client = await getPool().connect()
    try {
      await client.query('BEGIN')
      const result = await fn(clientDb(client))
      await client.query('COMMIT')
      return result
    } catch (error) {
      await client.query('ROLLBACK')
      throw error
    } finally {
      client.release()
    }
  },
}

export async function closePool() {
  if (globalForDb.pool) {
    await globalForDb.pool.end()
    globalForDb.pool = undefined
  }
}

export default db
