/**
 * Structured Logger
 *
 * Creates a pino-based logger shared across all services. Services derive
 * their own child with `logger.child({ component })`.
 */

import pino from 'pino'

export type Logger = pino.Logger

export function createLogger(level = 'info'): Logger {
  return pino({ level })
}
