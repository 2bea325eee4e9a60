import { describe, expect, it } from 'vitest'
import { z } from 'zod'
import { baseEnvSchema, createEnvSchema, parseEnvVariables } from '../env'

describe('Environment configuration', () => {
  it('should apply defaults for the base variables', () => {
    expect(parseEnvVariables(baseEnvSchema, {})).toEqual([
      undefined,
      { NODE_ENV: 'development', LOG_LEVEL: 'info' },
    ])
  })

  it('should return an unknown log level as a validation error', () => {
    const [error, env] = parseEnvVariables(baseEnvSchema, {
      LOG_LEVEL: 'verbose',
    })

    expect(env).toBeUndefined()
    expect(error).toBeInstanceOf(z.ZodError)
    expect(error?.issues[0]?.path).toEqual(['LOG_LEVEL'])
  })

  it('should extend the base schema', () => {
    const schema = createEnvSchema({
      MAX_ITEMS: z.coerce.number().int().positive().optional(),
    })

    expect(
      parseEnvVariables(schema, { NODE_ENV: 'test', MAX_ITEMS: '12' }),
    ).toEqual([undefined, { NODE_ENV: 'test', LOG_LEVEL: 'info', MAX_ITEMS: 12 }])
    expect(parseEnvVariables(schema, {})[1]?.MAX_ITEMS).toBeUndefined()
  })
})
