import { describe, expect, it } from 'vitest'
import { LoggerProvider } from '../logger'

describe('LoggerProvider', () => {
  it('should apply the requested level on init', () => {
    const provider = new LoggerProvider()

    expect(provider.hasBeenInitializedValue).toBe(false)

    provider.init('warn')

    expect(provider.hasBeenInitializedValue).toBe(true)
    expect(provider.level).toBe('warn')
  })
})
