import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { connect, withRetry, parseConnectionString, type DbConnection } from '../src/index.js'

describe('parseConnectionString', () => {
  it('strips the sqlite: prefix', () => {
    expect(parseConnectionString('sqlite::memory:')).toBe(':memory:')
    expect(parseConnectionString('sqlite:data/market_hours.db')).toBe('data/market_hours.db')
  })

  it('accepts bare .db paths and rejects other urls', () => {
    expect(parseConnectionString('data/market_hours.db')).toBe('data/market_hours.db')
    expect(() => parseConnectionString('postgresql://localhost/db')).toThrow(/Unsupported database URL/)
  })
})

describe('SqliteConnection', () => {
  let db: DbConnection

  beforeEach(async () => {
    db = await connect('sqlite::memory:')
    await db.exec('CREATE TABLE t (id INTEGER PRIMARY KEY, v TEXT NOT NULL)')
  })

  afterEach(async () => {
    await db.close()
  })

  it('runs parameterized statements and queries', async () => {
    await db.exec('INSERT INTO t (v) VALUES (?)', ['a'])
    await db.exec('INSERT INTO t (v) VALUES (?)', ['b'])

    const rows = await db.query<{ v: string }>('SELECT v FROM t ORDER BY id')
    expect(rows.map((r) => r.v)).toEqual(['a', 'b'])
  })

  it('rolls back a failed transaction', async () => {
    await expect(
      db.transaction(async (tx) => {
        await tx.exec('INSERT INTO t (v) VALUES (?)', ['kept?'])
        throw new Error('boom')
      })
    ).rejects.toThrow('boom')

    const rows = await db.query('SELECT * FROM t')
    expect(rows).toHaveLength(0)
  })

  it('joins nested transactions into the outer one', async () => {
    await db.transaction(async (tx) => {
      await tx.exec('INSERT INTO t (v) VALUES (?)', ['outer'])
      await tx.transaction(async (inner) => {
        await inner.exec('INSERT INTO t (v) VALUES (?)', ['inner'])
      })
    })

    const rows = await db.query<{ n: number }>('SELECT COUNT(*) AS n FROM t')
    expect(rows[0]?.n).toBe(2)
  })
})

describe('withRetry', () => {
  it('retries SQLITE_BUSY and then succeeds', async () => {
    let calls = 0
    const result = await withRetry(
      async () => {
        calls++
        if (calls < 3) throw new Error('SQLITE_BUSY: database is locked')
        return 'ok'
      },
      { retry: { initialDelayMs: 1, jitterPercent: 0 } },
      'test'
    )

    expect(result).toBe('ok')
    expect(calls).toBe(3)
  })

  it('does not retry other errors', async () => {
    let calls = 0
    await expect(
      withRetry(
        async () => {
          calls++
          throw new Error('no such table: x')
        },
        {},
        'test'
      )
    ).rejects.toThrow('no such table')
    expect(calls).toBe(1)
  })
})
