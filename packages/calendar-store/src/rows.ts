/**
 * Row types and row <-> domain mapping for the calendar tables
 */

import { StoreError } from '@market-hours/contracts'
import type {
  ClosureKind,
  EarlyCloseOverride,
  Holiday,
  RefreshErrorKind,
  RefreshRecord,
  RefreshStatus,
} from '@market-hours/contracts'

export interface HolidayRow {
  date: string
  name: string
  closure_kind: string
}

export interface EarlyCloseRow {
  date: string
  close_time: string
}

export interface RefreshRecordRow {
  id: number
  run_at: string
  status: string
  records_ingested: number
  error: string | null
  error_kind: string | null
  source: string
  start_year: number
  end_year: number
}

const CLOSURE_KINDS: readonly ClosureKind[] = ['FULL_CLOSURE', 'EARLY_CLOSE']
const REFRESH_STATUSES: readonly RefreshStatus[] = ['SUCCESS', 'FAILURE']
const ERROR_KINDS: readonly RefreshErrorKind[] = ['ACQUISITION', 'PARSE', 'VALIDATION', 'STORE', 'UNKNOWN']

function oneOf<T extends string>(allowed: readonly T[], value: string, column: string): T {
  const match = allowed.find((candidate) => candidate === value)
  if (match === undefined) {
    throw new StoreError(`Unexpected ${column} value in database: ${value}`, { operation: 'read', column, value })
  }
  return match
}

export function toHoliday(row: HolidayRow): Holiday {
  return {
    date: row.date,
    name: row.name,
    closureKind: oneOf(CLOSURE_KINDS, row.closure_kind, 'closure_kind'),
  }
}

export function toEarlyClose(row: EarlyCloseRow): EarlyCloseOverride {
  return { date: row.date, closeTime: row.close_time }
}

export function toRefreshRecord(row: RefreshRecordRow): RefreshRecord {
  const record: RefreshRecord = {
    id: row.id,
    runAt: row.run_at,
    status: oneOf(REFRESH_STATUSES, row.status, 'status'),
    recordsIngested: row.records_ingested,
    source: row.source,
    yearRange: { startYear: row.start_year, endYear: row.end_year },
  }
  if (row.error !== null) record.error = row.error
  if (row.error_kind !== null) record.errorKind = oneOf(ERROR_KINDS, row.error_kind, 'error_kind')
  return record
}
