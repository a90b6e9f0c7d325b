// Core types - shared across all packages
export * from './types'

// Schemas for validation
export * from './schemas/database'
export * from './schemas/duration'

// Case conversion utilities (snake_case ↔ camelCase)
export * from './case-convert'

// Identity provider client - used by the API and the CLI
export * from './oauth/client'
