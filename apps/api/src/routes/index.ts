/**
 * Route Controllers
 *
 * Export all Elysia route controllers for composing the API server.
 */

export { authController, type AuthControllerDeps } from './auth'
export { databasesController, type DatabasesControllerDeps } from './databases'
export { healthController, type HealthControllerDeps } from './health'
export { metricsController } from './metrics'
export { oauthCallbackController, type OAuthCallbackControllerDeps } from './oauth-callback'
export { remoteController, type RemoteControllerDeps } from './remote'
export { syncController, type SyncControllerDeps } from './sync'
