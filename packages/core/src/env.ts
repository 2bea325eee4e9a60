import { type Safe, safeError, safeResult } from '@accuvm/types'
import { config as dotenvConfig } from 'dotenv'
import { z } from 'zod'

// Base environment schema with common variables
export const baseEnvSchema = z.object({
  NODE_ENV: z
    .enum(['development', 'production', 'test'])
    .default('development'),
  LOG_LEVEL: z
    .enum(['trace', 'debug', 'info', 'warn', 'error'])
    .default('info'),
})

export type BaseEnv = z.infer<typeof baseEnvSchema>

/**
 * Load and validate environment variables
 * @param schema - Zod schema to validate against
 * @param envPath - Optional path to .env file
 * @returns Validated environment variables, or the validation error
 */
export function loadEnvVariables<T extends z.ZodTypeAny>(
  schema: T,
  envPath?: string,
): Safe<z.infer<T>, z.ZodError> {
  // Load environment variables from .env file
  dotenvConfig({ path: envPath })

  return parseEnvVariables(schema, process.env)
}

/**
 * Validate an already-populated environment record against a schema
 */
export function parseEnvVariables<T extends z.ZodTypeAny>(
  schema: T,
  source: Record<string, string | undefined>,
): Safe<z.infer<T>, z.ZodError> {
  const parsed = schema.safeParse(source)
  if (!parsed.success) {
    return safeError(parsed.error)
  }
  return safeResult(parsed.data)
}

/**
 * Create a complete environment schema by extending the base schema
 */
export function createEnvSchema<T extends z.ZodRawShape>(additionalSchema: T) {
  return baseEnvSchema.extend(additionalSchema)
}
