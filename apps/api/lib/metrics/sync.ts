/**
 * Sync Metrics
 *
 * Metrics for the per-database upload loops.
 */

import { Counter, Gauge, Histogram } from 'prom-client'
import { registry } from './registry'

// Uploads are bounded by the remote timeout (20s by default)
const uploadBuckets = [0.05, 0.1, 0.25, 0.5, 1, 2.5, 5, 10, 20]

export const syncTicksTotal = new Counter({
  name: 'tabula_sync_ticks_total',
  help: 'Scheduler ticks by outcome',
  labelNames: ['outcome'],
  registers: [registry],
})

export const syncUploadDuration = new Histogram({
  name: 'tabula_sync_upload_duration_seconds',
  help: 'Snapshot upload duration',
  buckets: uploadBuckets,
  registers: [registry],
})

export const syncBytesUploadedTotal = new Counter({
  name: 'tabula_sync_bytes_uploaded_total',
  help: 'Cumulative snapshot bytes uploaded',
  registers: [registry],
})

export const syncLoopsActive = new Gauge({
  name: 'tabula_sync_loops_active',
  help: 'Upload loops running in this process',
  registers: [registry],
})

export const syncLeaseContentionTotal = new Counter({
  name: 'tabula_sync_lease_contention_total',
  help: 'Lease acquisitions that found the lease already held',
  labelNames: ['operation'],
  registers: [registry],
})

export const syncErrorsTotal = new Counter({
  name: 'tabula_sync_errors_total',
  help: 'Swallowed tick failures by type',
  labelNames: ['error_type'],
  registers: [registry],
})

/**
 * Classify sync error for error_type label.
 */
export function classifySyncError(error: unknown): string {
  if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
    return 'timeout'
  }
  const msg = error instanceof Error ? error.message : String(error)
  const lower = msg.toLowerCase()

  if (lower.includes('timeout') || lower.includes('timed out')) return 'timeout'
  if (lower.includes('401') || lower.includes('403') || lower.includes('permission')) {
    return 'permission_denied'
  }
  if (lower.includes('network') || lower.includes('fetch failed') || lower.includes('econn')) {
    return 'network_error'
  }
  if (lower.includes('enoent') || lower.includes('eacces')) return 'local_io'
  return 'unknown'
}
