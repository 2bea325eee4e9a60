/**
 * Machine Configuration Constants
 *
 * Centralized configuration for the accumulator machine runtime
 */

// Integer configuration: every cell and the accumulator are signed 64-bit
export const INTEGER_CONFIG = {
  BITS: 64,
  MIN: -(2n ** 63n),
  MAX: 2n ** 63n - 1n,
} as const

// Cursor configuration
export const CURSOR_CONFIG = {
  NEXT: 1n, // distance requested by every non-jump instruction
  START: 0, // cursor position when a run begins
} as const

// Decoder configuration
export const DECODER_CONFIG = {
  COMMENT_PREFIX: '#',
  ARGUMENT_PATTERN: /^[+-]?\d+$/,
} as const
