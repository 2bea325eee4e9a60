import { INTEGER_CONFIG } from './config'

/**
 * Wrap an arbitrary bigint to the signed 64-bit range (two's complement)
 */
export function wrap(value: bigint): bigint {
  return BigInt.asIntN(INTEGER_CONFIG.BITS, value)
}

export function isInRange(value: bigint): boolean {
  return value >= INTEGER_CONFIG.MIN && value <= INTEGER_CONFIG.MAX
}

/**
 * Signed division truncating toward zero. MIN / -1 wraps back to MIN.
 * Callers must reject a zero divisor first.
 */
export function divide(dividend: bigint, divisor: bigint): bigint {
  return wrap(dividend / divisor)
}
