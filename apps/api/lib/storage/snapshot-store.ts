/**
 * Snapshot Store
 *
 * Local durable storage for databases: one `{name}.json` document per
 * database in the snapshot directory. Writes go to a temp file first and are
 * renamed into place so a reader never sees a partial snapshot.
 */

import { randomUUID } from 'node:crypto'
import { mkdir, readFile, readdir, rename, rm, stat, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import {
  type DatabaseName,
  type SnapshotDocument,
  snapshotDocumentSchema,
  validateDatabaseName,
} from '@tabula/core'
import {
  DatabaseNotFoundError,
  InvalidDatabaseNameError,
  InvalidSnapshotError,
  NameConflictError,
} from '../errors'

const SNAPSHOT_EXTENSION = '.json'

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT'
}

/**
 * Validate an untrusted snapshot document, reporting the first issue.
 */
export function parseSnapshotDocument(value: unknown): SnapshotDocument {
  const parsed = snapshotDocumentSchema.safeParse(value)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    throw new InvalidSnapshotError(
      issue ? `${issue.path.join('.') || 'document'}: ${issue.message}` : 'malformed document',
    )
  }
  return parsed.data
}

export class SnapshotStore {
  readonly dir: string

  constructor(dir: string) {
    this.dir = dir
  }

  /**
   * Reject names that are not a single safe path segment.
   */
  assertName(name: DatabaseName): void {
    const result = validateDatabaseName(name)
    if (!result.ok) {
      throw new InvalidDatabaseNameError(name, result.message)
    }
  }

  pathFor(name: DatabaseName): string {
    this.assertName(name)
    return join(this.dir, `${name}${SNAPSHOT_EXTENSION}`)
  }

  async exists(name: DatabaseName): Promise<boolean> {
    try {
      const info = await stat(this.pathFor(name))
      return info.isFile()
    } catch (err) {
      if (isNotFound(err)) return false
      throw err
    }
  }

  /**
   * Raw snapshot bytes as uploaded to the remote store, or undefined when the
   * database has no local snapshot.
   */
  async serializeSnapshot(name: DatabaseName): Promise<Buffer | undefined> {
    try {
      return await readFile(this.pathFor(name))
    } catch (err) {
      if (isNotFound(err)) return undefined
      throw err
    }
  }

  async read(name: DatabaseName): Promise<SnapshotDocument | undefined> {
    const bytes = await this.serializeSnapshot(name)
    if (!bytes) return undefined
    return snapshotDocumentSchema.parse(JSON.parse(bytes.toString('utf-8')))
  }

  async write(name: DatabaseName, document: SnapshotDocument): Promise<void> {
    const target = this.pathFor(name)
    await mkdir(this.dir, { recursive: true })

    const tmp = join(this.dir, `.${name}${SNAPSHOT_EXTENSION}.${randomUUID()}.tmp`)
    const body = `${JSON.stringify({ ...document, name }, null, 2)}\n`
    try {
      await writeFile(tmp, body, { encoding: 'utf-8', mode: 0o600 })
      await rename(tmp, target)
    } catch (err) {
      await rm(tmp, { force: true })
      throw err
    }
  }

  /**
   * Delete the local snapshot. Returns false if there was none.
   */
  async delete(name: DatabaseName): Promise<boolean> {
    try {
      await rm(this.pathFor(name))
      return true
    } catch (err) {
      if (isNotFound(err)) return false
      throw err
    }
  }

  /**
   * Move a snapshot to a new name, rewriting its embedded name.
   */
  async rename(oldName: DatabaseName, newName: DatabaseName): Promise<void> {
    if (await this.exists(newName)) {
      throw new NameConflictError(newName)
    }

    const document = await this.read(oldName)
    if (!document) {
      throw new DatabaseNotFoundError(oldName)
    }

    await this.write(newName, { ...document, name: newName })
    await rm(this.pathFor(oldName), { force: true })
  }

  /**
   * Names of every database with a local snapshot, sorted.
   */
  async listDatabaseNames(): Promise<DatabaseName[]> {
    let entries: string[]
    try {
      entries = await readdir(this.dir)
    } catch (err) {
      if (isNotFound(err)) return []
      throw err
    }

    return entries
      .filter((entry) => entry.endsWith(SNAPSHOT_EXTENSION) && !entry.startsWith('.'))
      .map((entry) => entry.slice(0, -SNAPSHOT_EXTENSION.length))
      .filter((name) => validateDatabaseName(name).ok)
      .sort()
  }
}
