/**
 * Centralized Type Definitions for the accumulator machine
 *
 * Single source of truth for the interfaces, constants and error types shared
 * by the machine, the CLI and their tests.
 */

// Error types
export * from './errors'
// Machine types
export * from './machine'
// Safe result helpers
export * from './safe'
