/**
 * SQLite snapshot store
 *
 * Stores one snapshot per database file. The database is written under a
 * temporary name and renamed into place, so an interrupted save leaves the
 * previous snapshot intact.
 */

import Database from 'better-sqlite3'
import { promises as fs } from 'fs'
import { randomUUID } from 'crypto'
import { dirname } from 'path'
import type { SnapshotStore } from './types.js'
import type { SnapshotDocument } from './schemas.js'
import { PersistenceError, getErrorMessage } from '../errors/index.js'
import { createLogger } from '../utils/logger.js'

const log = createLogger('SqliteSnapshotStore')

const SCHEMA = `
  CREATE TABLE snapshot_meta (
    key TEXT PRIMARY KEY,
    value TEXT NOT NULL
  );
  CREATE TABLE call_records (
    seq INTEGER PRIMARY KEY,
    timestamp INTEGER NOT NULL,
    api_key TEXT NOT NULL,
    operation TEXT NOT NULL
  );
  CREATE TABLE call_totals (
    api_key TEXT NOT NULL,
    operation TEXT NOT NULL,
    count INTEGER NOT NULL,
    PRIMARY KEY (api_key, operation)
  );
  CREATE TABLE quota_limits (
    api_key TEXT PRIMARY KEY,
    calls_60s INTEGER,
    calls_24h INTEGER,
    total_cap INTEGER
  );
`

interface RecordRow {
  timestamp: number
  api_key: string
  operation: string
}

interface TotalRow {
  api_key: string
  operation: string
  count: number
}

interface QuotaRow {
  api_key: string
  calls_60s: number | null
  calls_24h: number | null
  total_cap: number | null
}

export class SqliteSnapshotStore implements SnapshotStore {
  readonly extension = 'db'

  async write(path: string, document: SnapshotDocument): Promise<void> {
    // Unique per write: concurrent saves to one path each build their own database
    const tempPath = `${path}.tmp.${process.pid}.${randomUUID()}`
    try {
      await fs.mkdir(dirname(path), { recursive: true })

      const db = new Database(tempPath)
      try {
        db.exec(SCHEMA)
        const insertMeta = db.prepare('INSERT INTO snapshot_meta (key, value) VALUES (?, ?)')
        const insertRecord = db.prepare(
          'INSERT INTO call_records (timestamp, api_key, operation) VALUES (?, ?, ?)'
        )
        const insertTotal = db.prepare(
          'INSERT INTO call_totals (api_key, operation, count) VALUES (?, ?, ?)'
        )
        const insertQuota = db.prepare(
          'INSERT INTO quota_limits (api_key, calls_60s, calls_24h, total_cap) VALUES (?, ?, ?, ?)'
        )

        db.transaction(() => {
          insertMeta.run('format', document.format)
          insertMeta.run('version', document.version)
          insertMeta.run('savedAt', document.savedAt)
          for (const r of document.records) {
            insertRecord.run(r.timestamp, r.apiKey, r.operation)
          }
          for (const t of document.totals) {
            insertTotal.run(t.apiKey, t.operation, t.count)
          }
          for (const q of document.quotas) {
            insertQuota.run(q.apiKey, q.calls60s ?? null, q.calls24h ?? null, q.totalCap ?? null)
          }
        })()
      } finally {
        db.close()
      }

      await fs.rename(tempPath, path)
    } catch (error) {
      await fs.rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
        log.debug(`Could not remove ${tempPath}: ${getErrorMessage(cleanupError)}`)
      })
      throw new PersistenceError(`Failed to write snapshot: ${getErrorMessage(error)}`, {
        path,
        cause: error,
      })
    }
  }

  async read(path: string): Promise<unknown> {
    let db: Database.Database
    try {
      db = new Database(path, { readonly: true, fileMustExist: true })
    } catch (error) {
      throw new PersistenceError(`Failed to open snapshot: ${getErrorMessage(error)}`, {
        path,
        cause: error,
      })
    }

    try {
      const meta = db.prepare<[string], { value: string }>(
        'SELECT value FROM snapshot_meta WHERE key = ?'
      )
      const records = db
        .prepare<[], RecordRow>(
          'SELECT timestamp, api_key, operation FROM call_records ORDER BY seq'
        )
        .all()
      const totals = db
        .prepare<[], TotalRow>('SELECT api_key, operation, count FROM call_totals')
        .all()
      const quotas = db
        .prepare<[], QuotaRow>(
          'SELECT api_key, calls_60s, calls_24h, total_cap FROM quota_limits ORDER BY api_key'
        )
        .all()

      return {
        format: meta.get('format')?.value,
        version: meta.get('version')?.value,
        savedAt: meta.get('savedAt')?.value,
        records: records.map((r) => ({
          timestamp: r.timestamp,
          apiKey: r.api_key,
          operation: r.operation,
        })),
        totals: totals.map((t) => ({ apiKey: t.api_key, operation: t.operation, count: t.count })),
        quotas: quotas.map((q) => ({
          apiKey: q.api_key,
          calls60s: q.calls_60s ?? undefined,
          calls24h: q.calls_24h ?? undefined,
          totalCap: q.total_cap ?? undefined,
        })),
      }
    } catch (error) {
      throw new PersistenceError(`Failed to read snapshot: ${getErrorMessage(error)}`, {
        path,
        cause: error,
      })
    } finally {
      db.close()
    }
  }
}
