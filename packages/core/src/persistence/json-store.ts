/**
 * JSON file snapshot store
 */

import { promises as fs } from 'fs'
import { randomUUID } from 'crypto'
import { dirname } from 'path'
import type { SnapshotStore } from './types.js'
import type { SnapshotDocument } from './schemas.js'
import { PersistenceError, getErrorMessage } from '../errors/index.js'
import { createLogger } from '../utils/logger.js'

const log = createLogger('JsonFileSnapshotStore')

export class JsonFileSnapshotStore implements SnapshotStore {
  readonly extension = 'json'

  async write(path: string, document: SnapshotDocument): Promise<void> {
    // Write to a temp file unique to this write, then rename so readers never see a partial file
    const tempPath = `${path}.tmp.${process.pid}.${randomUUID()}`
    try {
      await fs.mkdir(dirname(path), { recursive: true })
      await fs.writeFile(tempPath, JSON.stringify(document, null, 2), 'utf-8')
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
    let content: string
    try {
      content = await fs.readFile(path, 'utf-8')
    } catch (error) {
      const missing = (error as NodeJS.ErrnoException).code === 'ENOENT'
      throw new PersistenceError(
        missing ? `Snapshot not found: ${path}` : `Failed to read snapshot: ${getErrorMessage(error)}`,
        { path, cause: error }
      )
    }

    try {
      return JSON.parse(content)
    } catch (error) {
      throw new PersistenceError(`Snapshot is not valid JSON: ${getErrorMessage(error)}`, {
        path,
        cause: error,
      })
    }
  }
}
