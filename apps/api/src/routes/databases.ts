/**
 * Databases Controller
 *
 * Local snapshots: list, read, write, rename and delete. Rename and delete
 * of an enrolled database go through the sync coordinator so sync state
 * moves with the snapshot.
 */

import { Elysia, t } from 'elysia'
import { DatabaseNotFoundError, NameConflictError } from '../../lib/errors'
import { type SnapshotStore, parseSnapshotDocument } from '../../lib/storage'
import type { SyncCoordinator } from '../../lib/sync'

export interface DatabasesControllerDeps {
  coordinator: SyncCoordinator
  snapshots: SnapshotStore
}

export function databasesController(deps: DatabasesControllerDeps) {
  const { coordinator, snapshots } = deps

  return new Elysia({ prefix: '/api/v1' })
    .get('/databases', () => coordinator.list())

    .get(
      '/databases/:name',
      async ({ params }) => {
        const document = await snapshots.read(params.name)
        if (!document) {
          throw new DatabaseNotFoundError(params.name)
        }
        return document
      },
      { params: t.Object({ name: t.String() }) },
    )

    .put(
      '/databases/:name',
      async ({ params, body }) => {
        const document = parseSnapshotDocument(body)
        await snapshots.write(params.name, document)
        return { name: params.name, tables: document.tables.length }
      },
      {
        params: t.Object({ name: t.String() }),
        body: t.Unknown(),
      },
    )

    .delete(
      '/databases/:name',
      async ({ params }) => {
        await coordinator.deleteAll(params.name)
        return { success: true }
      },
      { params: t.Object({ name: t.String() }) },
    )

    .post(
      '/databases/:name/rename',
      async ({ params, body }) => {
        const { name } = params
        const { newName } = body

        if (coordinator.isEnrolled(name)) {
          await coordinator.rename(name, newName)
        } else {
          if (coordinator.isEnrolled(newName)) {
            throw new NameConflictError(newName)
          }
          await snapshots.rename(name, newName)
        }

        return { name: newName, enrolled: coordinator.isEnrolled(newName) }
      },
      {
        params: t.Object({ name: t.String() }),
        body: t.Object({ newName: t.String({ minLength: 1 }) }),
      },
    )
}
