import { Cause, Effect, Exit, Fiber, Option } from 'effect'
import * as Dispatch from './dispatch.js'

export const DeferredTypeId: unique symbol = Symbol.for('@coflux/core/Deferred')
export type DeferredTypeId = typeof DeferredTypeId

/**
 * A single eventual result backed by a running fiber.
 *
 * - Settles once; the outcome is cached and every `await()` observes the same value or failure.
 * - `await()` rejects with the original failure (no FiberFailure wrapper).
 */
export interface Deferred<A, E = unknown> {
  readonly [DeferredTypeId]: DeferredTypeId
  readonly fiber: Fiber.RuntimeFiber<A, E>
  readonly awaitEffect: Effect.Effect<A, E>
  readonly await: () => Promise<A>
  readonly isCompleted: () => boolean
  readonly cancel: () => Promise<void>
}

export const isDeferred = (u: unknown): u is Deferred<unknown, unknown> =>
  typeof u === 'object' && u !== null && DeferredTypeId in u

export const settle = <A, E>(exit: Exit.Exit<A, E>): Promise<A> =>
  Exit.isSuccess(exit) ? Promise.resolve(exit.value) : Promise.reject(Cause.squash(exit.cause))

export const fromFiber = <A, E>(fiber: Fiber.RuntimeFiber<A, E>): Deferred<A, E> => {
  const awaitEffect = Fiber.join(fiber)
  return {
    [DeferredTypeId]: DeferredTypeId,
    fiber,
    awaitEffect,
    await: () => Effect.runPromise(Fiber.await(fiber)).then(settle),
    isCompleted: () => Option.isSome(Effect.runSync(fiber.poll)),
    cancel: () => Effect.runPromise(Fiber.interrupt(fiber)).then(() => undefined),
  }
}

/**
 * Wraps an already-running promise. The promise is observed right away, so a rejection
 * is held by the handle instead of surfacing as an unhandled rejection.
 */
export const fromPromise = <A>(promise: PromiseLike<A>, dispatch: Dispatch.Dispatch = 'unconfined'): Deferred<A> =>
  fromFiber(
    Dispatch.runFork(
      Effect.tryPromise({
        try: () => promise,
        catch: (error) => error,
      }),
      dispatch,
    ),
  )
