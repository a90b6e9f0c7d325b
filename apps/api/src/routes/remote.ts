/**
 * Remote Controller
 *
 * Uploaded copies in the remote store, and restoring one as a local snapshot.
 */

import { Elysia, t } from 'elysia'
import type { RemoteBackups } from '../../lib/remote'

export interface RemoteControllerDeps {
  backups: RemoteBackups
}

export function remoteController(deps: RemoteControllerDeps) {
  const { backups } = deps

  return new Elysia({ prefix: '/api/v1' })
    .get('/remote', async () => {
      const objects = await backups.list()
      return objects.map((object) => ({
        name: object.name,
        size: object.size,
        modifiedAt: object.modifiedAt?.toISOString(),
      }))
    })

    .post(
      '/databases/:name/restore',
      async ({ params, body }) => {
        const document = await backups.restore(params.name, body.source)
        return { name: params.name, tables: document.tables.length }
      },
      {
        params: t.Object({ name: t.String() }),
        body: t.Object({ source: t.Optional(t.String({ minLength: 1 })) }),
      },
    )
}
