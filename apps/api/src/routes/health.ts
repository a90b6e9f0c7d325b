/**
 * Health Controller
 */

import { Elysia } from 'elysia'
import type { SyncScheduler } from '../../lib/sync'

export interface HealthControllerDeps {
  scheduler: SyncScheduler
}

export function healthController(deps: HealthControllerDeps) {
  const { scheduler } = deps

  return new Elysia({ prefix: '/api/v1' }).get('/health', () => ({
    status: 'ok',
    timestamp: new Date().toISOString(),
    syncLoops: scheduler.size,
  }))
}
