import * as Internal from './internal/deferred.js'

export type Deferred<A, E = unknown> = Internal.Deferred<A, E>

export const TypeId = Internal.DeferredTypeId

export const isDeferred = Internal.isDeferred

export const fromFiber = Internal.fromFiber

/**
 * Wraps a promise that is already running.
 * The promise is observed immediately, so a rejection stays inside the handle until awaited.
 */
export const fromPromise = Internal.fromPromise
