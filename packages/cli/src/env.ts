import {
  createEnvSchema,
  loadEnvVariables,
  parseEnvVariables,
} from '@accuvm/core'
import { type Safe, safeError, safeResult } from '@accuvm/types'
import type { z } from 'zod'
import { maxStepsSchema } from './utils/validation'

export const cliEnvSchema = createEnvSchema({
  // Default step budget for `accuvm run` when --max-steps is not given
  ACCUVM_MAX_STEPS: maxStepsSchema.optional(),
})

export type CliEnv = z.infer<typeof cliEnvSchema>

function toCliEnv(result: Safe<CliEnv, z.ZodError>): Safe<CliEnv> {
  const [error, env] = result
  if (error) {
    const issues = error.issues
      .map((issue) => `${issue.path.join('.')} ${issue.message}`)
      .join('; ')
    return safeError(new Error(`Invalid environment: ${issues}`))
  }
  return safeResult(env)
}

/**
 * Validate an environment record without touching .env files
 */
export function parseCliEnv(
  source: Record<string, string | undefined>,
): Safe<CliEnv> {
  return toCliEnv(parseEnvVariables(cliEnvSchema, source))
}

export function loadCliEnv(envPath?: string): Safe<CliEnv> {
  return toCliEnv(loadEnvVariables(cliEnvSchema, envPath))
}
