import { node } from '@elysiajs/node'
import { formatDuration } from '@tabula/core'
import { closeDatabase, initDatabase } from '@tabula/db'
import { config } from '../lib/config'
import { createLogger } from '../lib/logger'
import { App } from './app'

const logger = createLogger(config.logLevel)

logger.info(
  {
    api: `${config.apiHost}:${config.apiPort}`,
    database: config.dbPath,
    snapshots: config.snapshotDir,
    syncInterval: formatDuration(config.sync.intervalMs),
    leaseTtl: formatDuration(config.sync.leaseTtlMs),
    oauthConfigured: Boolean(config.oauth.clientId),
  },
  'Starting Tabula API server',
)

// Initialize SQLite database with WAL mode
const db = initDatabase({ path: config.dbPath })

const app = new App({ db, config, logger, serverOptions: { adapter: node() } })

// Resume loops for databases enrolled before the restart
const { resumed } = app.start()
logger.info({ resumed }, 'Sync loops resumed')

app.server.listen({ hostname: config.apiHost, port: config.apiPort })
logger.info(`Tabula API server listening on ${config.apiHost}:${config.apiPort}`)

// Graceful shutdown - enrollment and snapshots survive for the next start
let shuttingDown = false

async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return
  shuttingDown = true

  logger.info({ signal }, 'Shutting down')
  await app.server.stop()
  app.shutdown()
  closeDatabase(db)
  process.exit(0)
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((err) => {
      logger.error({ err }, 'Shutdown failed')
      process.exit(1)
    })
  })
}
