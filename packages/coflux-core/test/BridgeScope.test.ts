import { describe } from 'vitest'
import { it, expect } from '@effect/vitest'
import { Effect, Exit, Fiber } from 'effect'
import * as BridgeScope from '../src/BridgeScope.js'
import { BridgeScopeError } from '../src/Errors.js'

describe('BridgeScope', () => {
  it.effect('tracks live fibers and forgets them once they exit', () =>
    Effect.gen(function* () {
      const scope = BridgeScope.make({ label: 'tracking' })
      const fiber = scope.fork(Effect.never, 'unconfined')
      expect(scope.size()).toBe(1)

      yield* Fiber.interrupt(fiber)
      expect(scope.size()).toBe(0)
      expect(scope.isClosed()).toBe(false)
    }),
  )

  it.effect('close() interrupts every fiber and marks the scope closed', () =>
    Effect.gen(function* () {
      const scope = BridgeScope.make()
      const a = scope.fork(Effect.never, 'unconfined')
      const b = scope.fork(Effect.never, 'default')

      yield* Effect.promise(() => scope.close())

      expect(Exit.isInterrupted(yield* Fiber.await(a))).toBe(true)
      expect(Exit.isInterrupted(yield* Fiber.await(b))).toBe(true)
      expect(scope.isClosed()).toBe(true)
      expect(scope.label).toBe('anonymous')
    }),
  )

  it.effect('refuses forks after close', () =>
    Effect.gen(function* () {
      const scope = BridgeScope.make({ label: 'done' })
      yield* Effect.promise(() => scope.close())

      const error = (() => {
        try {
          scope.fork(Effect.void, 'unconfined')
          return undefined
        } catch (e) {
          return e
        }
      })()
      expect(error).toBeInstanceOf(BridgeScopeError)
      expect(error).toMatchObject({ code: 'bridge_scope::closed', label: 'done' })
    }),
  )

  it('the global scope cannot be closed', async () => {
    await expect(BridgeScope.global.close()).rejects.toMatchObject({
      _tag: 'BridgeScopeError',
      code: 'bridge_scope::global_close',
    })
    expect(BridgeScope.global.isClosed()).toBe(false)
  })

  it.effect('layer provides a scope that is closed with the layer', () =>
    Effect.gen(function* () {
      const { scope, fiber } = yield* Effect.gen(function* () {
        const scope = yield* BridgeScope.BridgeScopeTag
        const fiber = scope.fork(Effect.never, 'unconfined')
        return { scope, fiber }
      }).pipe(Effect.provide(BridgeScope.layer({ label: 'layered' })))

      expect(scope.label).toBe('layered')
      expect(scope.isClosed()).toBe(true)
      expect(Exit.isInterrupted(yield* Fiber.await(fiber))).toBe(true)
    }),
  )
})
