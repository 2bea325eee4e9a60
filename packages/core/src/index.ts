/**
 * Core Package
 *
 * Logging and environment configuration shared across the workspace
 */

// Export environment loading
export * from './env'
// Export logger
export * from './logger'
