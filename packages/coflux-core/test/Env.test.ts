import { afterEach, describe, it, expect, vi } from 'vitest'
import * as Env from '../src/Env.js'

describe('Env', () => {
  afterEach(() => {
    vi.unstubAllEnvs()
  })

  it('reads NODE_ENV at call time', () => {
    vi.stubEnv('NODE_ENV', 'production')
    expect(Env.getNodeEnv()).toBe('production')
    expect(Env.isDevEnv()).toBe(false)

    vi.stubEnv('NODE_ENV', 'test')
    expect(Env.isDevEnv()).toBe(true)
  })
})
