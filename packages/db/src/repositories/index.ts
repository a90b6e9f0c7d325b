export {
  CoordinationRepository,
  type CoordinationEntry,
  type SetOptions,
} from './coordination.repository'
export {
  PendingAuthorizationRepository,
  type AuthorizationOutcome,
  type NewPendingAuthorization,
  type PendingAuthorization,
} from './pending-authorization.repository'
