/**
 * Metrics Route
 *
 * Prometheus scrape endpoint, outside the API prefix.
 */

import { Elysia } from 'elysia'
import { registry } from '../../lib/metrics'

export function metricsController() {
  return new Elysia().get('/metrics', async ({ set }) => {
    set.headers['content-type'] = registry.contentType
    return registry.metrics()
  })
}
