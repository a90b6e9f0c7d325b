/**
 * Prometheus Metrics Module
 *
 * Central registry and exports for all Tabula metrics.
 * Follows Prometheus naming conventions with tabula_ prefix.
 */

export { registry, startTime, systemInfo } from './registry'

export * from './sync'
export * from './http'
