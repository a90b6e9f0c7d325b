export {
  ACCESS_TOKEN_KEY,
  CredentialStore,
  TOKEN_EXPIRY_KEY,
  TOKEN_EXPIRY_SKEW_MS,
  type CredentialStoreOptions,
} from './credential-store'
export { DeviceAuthorizationFlow, SLOW_DOWN_INCREMENT_SECONDS } from './device-flow'
export {
  CALLBACK_PATH,
  LoopbackAuthorizationFlow,
  type CallbackParams,
  type CallbackResult,
  type LoopbackFlowOptions,
} from './loopback-flow'
