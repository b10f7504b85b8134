/**
 * Durable calendar store with an atomically published in-memory snapshot.
 *
 * The tables are the source of truth across restarts; queries never touch
 * them. Each successful commit reloads the tables into a new frozen
 * CalendarSnapshot and publishes it with a single reference assignment, so a
 * reader sees either the whole previous calendar or the whole new one.
 */

import { StoreError, isCalendarError } from '@market-hours/contracts'
import type { EarlyCloseOverride, Holiday, RefreshRecord, YearRange } from '@market-hours/contracts'
import type { DbConnection, Logger } from '@market-hours/db-simple'
import { EMPTY_SNAPSHOT, createSnapshot } from '@market-hours/sessions-calendar'
import type { CalendarSnapshot } from '@market-hours/sessions-calendar'
import {
  toEarlyClose,
  toHoliday,
  toRefreshRecord,
  type EarlyCloseRow,
  type HolidayRow,
  type RefreshRecordRow,
} from './rows.js'
import { DEFAULT_SCHEMA_DIR, applySchema } from './schema.js'

const LAST_COMMITTED_KEY = 'last_committed_at'

export interface CalendarStoreOptions {
  logger?: Logger
  /** Directory of numbered schema steps (defaults to the bundled ones) */
  schemaDir?: string
}

/**
 * Listener invoked after a new snapshot has been published.
 */
export type SnapshotListener = (snapshot: CalendarSnapshot) => void

/**
 * Calendar store for holidays, early closes and refresh history.
 *
 * Example:
 * ```typescript
 * const store = new CalendarStore(await connect('sqlite:data/market_hours.db'))
 * await store.init()
 *
 * await store.replaceRange({ startYear: 2025, endYear: 2026 }, holidays, earlyCloses)
 * classify(new Date(), store.getSnapshot())
 * ```
 */
export class CalendarStore {
  private db: DbConnection
  private logger?: Logger
  private schemaDir: string
  private current: CalendarSnapshot = EMPTY_SNAPSHOT
  private listeners: SnapshotListener[] = []

  constructor(db: DbConnection, options: CalendarStoreOptions = {}) {
    this.db = db
    this.logger = options.logger
    this.schemaDir = options.schemaDir ?? DEFAULT_SCHEMA_DIR
  }

  /**
   * Bring the schema up to date and publish whatever calendar is already stored.
   *
   * @throws StoreError if the schema cannot be created or read
   */
  async init(): Promise<void> {
    try {
      await applySchema(this.db, this.schemaDir, this.logger)
    } catch (error) {
      throw new StoreError(`Failed to initialize calendar tables: ${String(error)}`, { operation: 'init' })
    }
    this.publish(await this.load())
  }

  /**
   * Currently published snapshot. Never blocks, never touches the database.
   */
  getSnapshot(): CalendarSnapshot {
    return this.current
  }

  /**
   * Subscribe to snapshot publications.
   *
   * @returns Unsubscribe function
   */
  onPublish(listener: SnapshotListener): () => void {
    this.listeners.push(listener)
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener)
    }
  }

  /**
   * Replace every holiday and early close inside `range` and reload the
   * calendar in one transaction, then publish the reloaded snapshot.
   *
   * Rows outside the range are kept. On failure the transaction is rolled
   * back and the published snapshot is left as it was. A resolved promise
   * means the new calendar is both committed and published.
   *
   * @throws StoreError on any database failure
   */
  async replaceRange(
    range: YearRange,
    holidays: readonly Holiday[],
    earlyCloses: readonly EarlyCloseOverride[],
    committedAt: string = new Date().toISOString()
  ): Promise<CalendarSnapshot> {
    const from = `${range.startYear}-01-01`
    const to = `${range.endYear}-12-31`

    let next: CalendarSnapshot
    try {
      next = await this.db.transaction(async (tx) => {
        await tx.exec('DELETE FROM holidays WHERE date BETWEEN ? AND ?', [from, to])
        await tx.exec('DELETE FROM early_closes WHERE date BETWEEN ? AND ?', [from, to])

        for (const holiday of holidays) {
          await tx.exec('INSERT INTO holidays (date, name, closure_kind) VALUES (?, ?, ?)', [
            holiday.date,
            holiday.name,
            holiday.closureKind,
          ])
        }

        for (const override of earlyCloses) {
          await tx.exec('INSERT INTO early_closes (date, close_time) VALUES (?, ?)', [
            override.date,
            override.closeTime,
          ])
        }

        await tx.exec(
          `INSERT INTO calendar_meta (key, value) VALUES (?, ?)
           ON CONFLICT(key) DO UPDATE SET value = excluded.value`,
          [LAST_COMMITTED_KEY, committedAt]
        )

        return this.load(tx)
      })
    } catch (error) {
      throw new StoreError(`Failed to commit calendar for ${range.startYear}-${range.endYear}: ${String(error)}`, {
        operation: 'replaceRange',
        range,
      })
    }

    this.publish(next)

    this.logger?.info('Calendar snapshot published', {
      range,
      holidays: next.holidays.size,
      earlyCloses: next.earlyCloses.size,
      committedAt: next.committedAt,
    })

    return next
  }

  /**
   * Append a refresh audit entry.
   *
   * @returns The record with its assigned id
   */
  async appendRefreshRecord(record: RefreshRecord): Promise<RefreshRecord> {
    try {
      const id = await this.db.transaction(async (tx) => {
        await tx.exec(
          `INSERT INTO refresh_records
             (run_at, status, records_ingested, error, error_kind, source, start_year, end_year)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
          [
            record.runAt,
            record.status,
            record.recordsIngested,
            record.error ?? null,
            record.errorKind ?? null,
            record.source,
            record.yearRange.startYear,
            record.yearRange.endYear,
          ]
        )
        const rows = await tx.query<{ id: number }>('SELECT last_insert_rowid() AS id')
        return rows[0]?.id
      })
      return { ...record, id }
    } catch (error) {
      throw new StoreError(`Failed to append refresh record: ${String(error)}`, { operation: 'appendRefreshRecord' })
    }
  }

  async getLastRefresh(): Promise<RefreshRecord | null> {
    const [row] = await this.selectRecords('SELECT * FROM refresh_records ORDER BY id DESC LIMIT 1')
    return row ?? null
  }

  /**
   * Most recent SUCCESS record: the version of the calendar being served.
   */
  async getLastSuccessfulRefresh(): Promise<RefreshRecord | null> {
    const [row] = await this.selectRecords(
      "SELECT * FROM refresh_records WHERE status = 'SUCCESS' ORDER BY id DESC LIMIT 1"
    )
    return row ?? null
  }

  /**
   * Refresh history, newest first.
   */
  async listRefreshRecords(limit = 20): Promise<RefreshRecord[]> {
    return this.selectRecords('SELECT * FROM refresh_records ORDER BY id DESC LIMIT ?', [limit])
  }

  private async selectRecords(sql: string, params: unknown[] = []): Promise<RefreshRecord[]> {
    try {
      const rows = await this.db.query<RefreshRecordRow>(sql, params)
      return rows.map(toRefreshRecord)
    } catch (error) {
      if (isCalendarError(error)) throw error
      throw new StoreError(`Failed to read refresh records: ${String(error)}`, { operation: 'readRefreshRecords' })
    }
  }

  private async load(db: DbConnection = this.db): Promise<CalendarSnapshot> {
    try {
      const holidayRows = await db.query<HolidayRow>('SELECT date, name, closure_kind FROM holidays')
      const earlyCloseRows = await db.query<EarlyCloseRow>('SELECT date, close_time FROM early_closes')
      const metaRows = await db.query<{ value: string }>('SELECT value FROM calendar_meta WHERE key = ?', [
        LAST_COMMITTED_KEY,
      ])

      return createSnapshot(holidayRows.map(toHoliday), earlyCloseRows.map(toEarlyClose), metaRows[0]?.value ?? null)
    } catch (error) {
      if (isCalendarError(error)) throw error
      throw new StoreError(`Failed to load calendar: ${String(error)}`, { operation: 'load' })
    }
  }

  private publish(snapshot: CalendarSnapshot): void {
    this.current = snapshot
    for (const listener of this.listeners) {
      try {
        listener(snapshot)
      } catch (error) {
        this.logger?.error('Snapshot listener failed', { error: String(error) })
      }
    }
  }
}
