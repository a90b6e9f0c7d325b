/**
 * Sync Controller
 *
 * Enrollment of a database for periodic upload.
 */

import { Elysia, t } from 'elysia'
import type { CredentialStore } from '../../lib/auth'
import { AuthenticationRequiredError } from '../../lib/errors'
import type { SyncCoordinator } from '../../lib/sync'

export interface SyncControllerDeps {
  coordinator: SyncCoordinator
  credentials: CredentialStore
}

export function syncController(deps: SyncControllerDeps) {
  const { coordinator, credentials } = deps

  return new Elysia({ prefix: '/api/v1' })
    .get('/databases/:name/sync', ({ params }) => coordinator.status(params.name), {
      params: t.Object({ name: t.String() }),
    })

    .post(
      '/databases/:name/sync',
      async ({ params, set }) => {
        if (!(await credentials.get())) {
          throw new AuthenticationRequiredError()
        }

        const token = await coordinator.enroll(params.name)
        set.status = 201
        return { database: params.name, token }
      },
      { params: t.Object({ name: t.String() }) },
    )

    .delete(
      '/databases/:name/sync',
      ({ params }) => {
        coordinator.unenroll(params.name)
        return { success: true }
      },
      { params: t.Object({ name: t.String() }) },
    )
}
