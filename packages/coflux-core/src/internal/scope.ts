import { Context, Effect, Fiber, Layer, Option } from 'effect'
import * as Dispatch from './dispatch.js'
import { BridgeScopeError } from './errors.js'

/**
 * Owns the eager background work started by the bridge (e.g. singleToDeferred).
 * Closing a scope interrupts every fiber still running in it.
 */
export interface BridgeScope {
  readonly label: string
  readonly fork: <A, E>(effect: Effect.Effect<A, E>, dispatch: Dispatch.Dispatch) => Fiber.RuntimeFiber<A, E>
  readonly close: () => Promise<void>
  readonly isClosed: () => boolean
  /** Number of fibers forked into this scope that have not exited yet. */
  readonly size: () => number
}

export class BridgeScopeTag extends Context.Tag('@coflux/core/BridgeScope')<BridgeScopeTag, BridgeScope>() {}

const makeScope = (label: string, onClose: (interruptAll: () => Promise<void>) => Promise<void>): BridgeScope => {
  const fibers = new Set<Fiber.RuntimeFiber<unknown, unknown>>()
  let closed = false

  const fork: BridgeScope['fork'] = (effect, dispatch) => {
    if (closed) {
      throw new BridgeScopeError('bridge_scope::closed', label)
    }
    const fiber = Dispatch.runFork(effect, dispatch)
    // Under unconfined dispatch a synchronous effect has already exited here; addObserver still fires.
    fibers.add(fiber)
    fiber.addObserver(() => {
      fibers.delete(fiber)
    })
    return fiber
  }

  const interruptAll = (): Promise<void> => {
    closed = true
    const running = Array.from(fibers)
    fibers.clear()
    return Effect.runPromise(Fiber.interruptAll(running))
  }

  return {
    label,
    fork,
    close: () => onClose(interruptAll),
    isClosed: () => closed,
    size: () => fibers.size,
  }
}

export const make = (options?: { readonly label?: string }): BridgeScope =>
  makeScope(options?.label ?? 'anonymous', (interruptAll) => interruptAll())

/**
 * Process-wide scope: used only when a caller supplies no scope. Never closed.
 */
export const global: BridgeScope = makeScope('global', () =>
  Promise.reject(new BridgeScopeError('bridge_scope::global_close', 'global')),
)

/**
 * Provides a fresh BridgeScope that is closed when the surrounding Layer scope closes.
 */
export const layer = (options?: { readonly label?: string }): Layer.Layer<BridgeScopeTag> =>
  Layer.scoped(
    BridgeScopeTag,
    Effect.acquireRelease(
      Effect.sync(() => make(options)),
      (scope) => Effect.promise(() => scope.close()),
    ),
  )

/** The BridgeScope provided through BridgeScopeTag, else `global`. */
export const current: Effect.Effect<BridgeScope> = Effect.map(
  Effect.serviceOption(BridgeScopeTag),
  Option.getOrElse(() => global),
)
