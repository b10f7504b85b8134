/**
 * @market-hours/calendar-store
 *
 * Durable holiday/early-close tables, refresh audit log and the published
 * calendar snapshot
 */

export { CalendarStore } from './calendarStore.js'
export type { CalendarStoreOptions, SnapshotListener } from './calendarStore.js'
export { DEFAULT_SCHEMA_DIR, applySchema, getSchemaVersion, readSchemaSteps } from './schema.js'
export type { SchemaStep } from './schema.js'
