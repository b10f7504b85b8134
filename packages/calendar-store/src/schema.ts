/**
 * Versioned calendar schema.
 *
 * Schema steps live in `schema/NNN_<name>.sql`, numbered 1..n without gaps.
 * The version in place is SQLite's `user_version` pragma, so there is no
 * bookkeeping table. Pending steps and the version bump commit together.
 */

import fs from 'node:fs'
import path from 'node:path'
import { fileURLToPath } from 'node:url'
import type { DbConnection, Logger } from '@market-hours/db-simple'

export const DEFAULT_SCHEMA_DIR = fileURLToPath(new URL('../schema', import.meta.url))

const STEP_FILE = /^(\d{3})_[a-z0-9_-]+\.sql$/

export interface SchemaStep {
  version: number
  file: string
  sql: string
}

/**
 * Read the schema steps of `dir` in version order.
 *
 * @throws Error when the directory is missing or empty, or versions skip a number
 */
export function readSchemaSteps(dir: string): SchemaStep[] {
  const steps: SchemaStep[] = []
  for (const file of fs.readdirSync(dir)) {
    const version = STEP_FILE.exec(file)?.[1]
    if (version === undefined) continue
    steps.push({ version: Number(version), file, sql: fs.readFileSync(path.join(dir, file), 'utf-8') })
  }

  if (steps.length === 0) {
    throw new Error(`No schema steps in ${dir}`)
  }

  steps.sort((a, b) => a.version - b.version)
  steps.forEach((step, i) => {
    if (step.version !== i + 1) {
      throw new Error(`Schema step ${step.file} should be version ${i + 1}`)
    }
  })
  return steps
}

export async function getSchemaVersion(db: DbConnection): Promise<number> {
  const [row] = await db.query<{ user_version: number }>('PRAGMA user_version')
  return row?.user_version ?? 0
}

/**
 * Bring the database up to the newest schema version in `dir`.
 *
 * @returns The version now in place
 * @throws Error when the database is newer than the steps on disk
 */
export async function applySchema(db: DbConnection, dir: string = DEFAULT_SCHEMA_DIR, logger?: Logger): Promise<number> {
  const steps = readSchemaSteps(dir)
  const target = steps.length
  const current = await getSchemaVersion(db)

  if (current > target) {
    throw new Error(`Database schema version ${current} is newer than the ${target} known steps`)
  }

  const pending = steps.slice(current)
  if (pending.length === 0) {
    return current
  }

  await db.transaction(async (tx) => {
    for (const step of pending) {
      await tx.exec(step.sql)
    }
    // pragmas take no bound parameters
    await tx.exec(`PRAGMA user_version = ${target}`)
  })

  logger?.info('Calendar schema upgraded', { from: current, to: target, steps: pending.map((s) => s.file) })
  return target
}
