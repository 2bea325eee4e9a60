import { describe, expect, it } from 'vitest'
import { parseCliEnv } from '../env'

describe('CLI environment', () => {
  it('should read the default step budget', () => {
    expect(parseCliEnv({ ACCUVM_MAX_STEPS: '0', HOME: '/tmp' })).toEqual([
      undefined,
      { NODE_ENV: 'development', LOG_LEVEL: 'info', ACCUVM_MAX_STEPS: 0 },
    ])
  })

  it('should leave the step budget unset when absent', () => {
    const [, env] = parseCliEnv({})

    expect(env?.ACCUVM_MAX_STEPS).toBeUndefined()
  })

  it('should validate the step budget like --max-steps', () => {
    const [error] = parseCliEnv({ ACCUVM_MAX_STEPS: '0x10' })

    expect(error?.message).toBe(
      'Invalid environment: ACCUVM_MAX_STEPS must be a non-negative decimal integer',
    )
  })

  it('should name an invalid log level', () => {
    const [error] = parseCliEnv({ LOG_LEVEL: 'loud' })

    expect(error?.message.startsWith('Invalid environment: LOG_LEVEL ')).toBe(
      true,
    )
  })
})
