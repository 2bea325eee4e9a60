/**
 * Validation utilities for CLI arguments
 */

import { isInRange } from '@accuvm/machine'
import { type Safe, safeError, safeResult } from '@accuvm/types'
import * as _ from 'radash'
import { z } from 'zod'

const DECIMAL_INTEGER = /^[+-]?\d+$/
const DECIMAL_COUNT = /^\d+$/

const cellSchema = z
  .union([
    // JSON numbers are exact only within the safe integer range
    z
      .number()
      .int({ message: 'must be an integer' })
      .safe({ message: 'is outside the safe integer range; give it as a decimal string' }),
    z.string().trim().regex(DECIMAL_INTEGER, {
      message: 'must be a decimal integer',
    }),
  ])
  .transform((value, ctx) => {
    const cell = BigInt(value)
    if (!isInRange(cell)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: 'must fit in a signed 64-bit integer',
      })
      return z.NEVER
    }
    return cell
  })

export const memorySchema = z.array(cellSchema)

/**
 * Step budget as given on the command line or in ACCUVM_MAX_STEPS
 */
export const maxStepsSchema = z
  .string()
  .trim()
  .regex(DECIMAL_COUNT, { message: 'must be a non-negative decimal integer' })
  .transform((text) => Number(text))
  .pipe(z.number().safe({ message: 'is too large' }))

/**
 * Render zod issues as a single line, prefixed with the offending position
 */
export function describeIssues(label: string, error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const position = issue.path.length > 0 ? `[${issue.path.join('.')}]` : ''
      return `${label}${position} ${issue.message}`
    })
    .join('; ')
}

/**
 * Parse a comma-separated list of integers, e.g. "1,-2, 3".
 * An empty string yields empty memory.
 */
export function parseMemoryList(text: string): Safe<bigint[]> {
  const values = text.trim() === '' ? [] : text.split(',')
  const parsed = memorySchema.safeParse(values)
  if (!parsed.success) {
    return safeError(new Error(describeIssues('memory', parsed.error)))
  }
  return safeResult(parsed.data)
}

/**
 * Parse a JSON array of integers, given as numbers or decimal strings
 */
export function parseMemoryJson(text: string): Safe<bigint[]> {
  const [jsonError, json] = _.try((): unknown => JSON.parse(text))()
  if (jsonError) {
    return safeError(new Error(`memory file is not valid JSON: ${jsonError.message}`))
  }

  const parsed = memorySchema.safeParse(json)
  if (!parsed.success) {
    return safeError(new Error(describeIssues('memory', parsed.error)))
  }
  return safeResult(parsed.data)
}

export function parseMaxSteps(text: string): Safe<number> {
  const parsed = maxStepsSchema.safeParse(text)
  if (!parsed.success) {
    return safeError(new Error(describeIssues('max-steps', parsed.error)))
  }
  return safeResult(parsed.data)
}
