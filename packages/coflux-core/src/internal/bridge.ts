import { Effect, Option, Stream } from 'effect'
import { shiftArguments } from './args.js'
import * as Config from './config.js'
import * as Deferred from './deferred.js'
import * as Dispatch from './dispatch.js'
import { SequenceTypeError, SuspendingFunctionNotFoundError, unwrapInvocationTarget } from './errors.js'
import { getSuspendingFunction, type MethodHandle, type SuspendingFunction } from './reflection.js'
import * as Scope from './scope.js'
import { isAsyncIterable, toStream } from './sequence.js'

/** Lazily subscribed; emits at most one element. */
export type Single<A, E = never> = Stream.Stream<A, E>

/** Emits zero or more elements. */
export type Multi<A, E = never> = Stream.Stream<A, E>

/** Common contract of every invocation result: empty, single-valued or multi-valued. */
export type Publisher = Stream.Stream<unknown, unknown>

export interface DeferredToSingleOptions {
  /** Overrides BridgeConfig.dispatch for this stream. */
  readonly dispatch?: Dispatch.Dispatch
}

export interface SingleToDeferredOptions {
  /** Lifetime owner of the eager task. Defaults to BridgeScope.global. */
  readonly scope?: Scope.BridgeScope
  readonly dispatch?: Dispatch.Dispatch
}

const withDispatch = <A, E>(effect: Effect.Effect<A, E>, override: Dispatch.Dispatch | undefined): Single<A, E> =>
  Stream.unwrap(
    Effect.map(Config.load, (config) => Stream.fromEffect(Dispatch.apply(effect, override ?? config.dispatch))),
  )

const awaitPromise = <A>(promise: PromiseLike<A>): Effect.Effect<A, unknown> =>
  Effect.tryPromise({
    try: () => promise,
    catch: (error) => error,
  })

export function deferredToSingle<A, E>(source: Deferred.Deferred<A, E>, options?: DeferredToSingleOptions): Single<A, E>
export function deferredToSingle<A>(source: PromiseLike<A>, options?: DeferredToSingleOptions): Single<A, unknown>
export function deferredToSingle<A, E>(
  source: Deferred.Deferred<A, E> | PromiseLike<A>,
  options?: DeferredToSingleOptions,
): Single<A, unknown> {
  // Nothing touches `source` until the stream runs.
  const awaitSource: Effect.Effect<A, unknown> = Deferred.isDeferred(source) ? source.awaitEffect : awaitPromise(source)
  return withDispatch(awaitSource, options?.dispatch)
}

/**
 * Starts consuming `source` immediately and caches its first element (or null when empty).
 * The task runs whether or not the handle is ever awaited; closing `options.scope` interrupts it.
 */
export const singleToDeferred = <A, E>(
  source: Single<A, E>,
  options?: SingleToDeferredOptions,
): Deferred.Deferred<A | null, E> => {
  const scope = options?.scope ?? Scope.global
  const fiber = scope.fork(Effect.map(Stream.runHead(source), Option.getOrNull), options?.dispatch ?? 'unconfined')
  return Deferred.fromFiber(fiber)
}

/**
 * Effect form of singleToDeferred for code running inside a fiber.
 * Without `options.scope` the task joins the scope provided by BridgeScope.layer (else `global`);
 * without `options.dispatch` it follows BridgeConfig.
 */
export const forkToDeferred = <A, E>(
  source: Single<A, E>,
  options?: SingleToDeferredOptions,
): Effect.Effect<Deferred.Deferred<A | null, E>> =>
  Effect.gen(function* () {
    const scope = options?.scope ?? (yield* Scope.current)
    const config = yield* Config.load
    return singleToDeferred(source, { scope, dispatch: options?.dispatch ?? config.dispatch })
  })

export const sequenceToMulti = <A>(source: AsyncIterable<A>): Multi<A, unknown> => toStream(source)

const isPresent = (value: unknown): boolean => value !== undefined && value !== null

// Links the caller's own signal (passed in the continuation slot) to the invocation signal.
const callWithSignals = (
  fn: SuspendingFunction,
  callArgs: ReadonlyArray<unknown>,
  signal: AbortSignal,
  callerSignal: AbortSignal | undefined,
): Promise<unknown> => {
  if (!callerSignal) {
    return fn.callSuspend(callArgs, signal)
  }
  const controller = new AbortController()
  const abortFrom = (source: AbortSignal) => () => controller.abort(source.reason)
  const onSignal = abortFrom(signal)
  const onCaller = abortFrom(callerSignal)
  if (callerSignal.aborted) {
    controller.abort(callerSignal.reason)
  } else {
    signal.addEventListener('abort', onSignal, { once: true })
    callerSignal.addEventListener('abort', onCaller, { once: true })
  }
  return fn.callSuspend(callArgs, controller.signal).finally(() => {
    signal.removeEventListener('abort', onSignal)
    callerSignal.removeEventListener('abort', onCaller)
  })
}

const flattenSequence = (fn: SuspendingFunction, single: Single<unknown, unknown>): Publisher =>
  Stream.flatMap(single, (value) =>
    isAsyncIterable(value) ? toStream(value) : Stream.fail(new SequenceTypeError(fn.name, value)),
  )

/**
 * Invokes a registered suspending function and adapts its result:
 * - `returns: 'unit'` (or an undefined/null result): empty stream;
 * - `returns: 'sequence'`: the returned AsyncIterable flattened into a multi-valued stream;
 * - otherwise: a single-valued stream.
 *
 * `args` are the declared parameters followed by one continuation slot, which is never passed through.
 * An AbortSignal in that slot is linked to the invocation.
 *
 * Throws SuspendingFunctionNotFoundError synchronously when `method` is not registered.
 */
export const invokeSuspendingFunction = (method: MethodHandle, target: unknown, ...args: Array<unknown>): Publisher => {
  const fn = getSuspendingFunction(method)
  if (!fn) {
    throw new SuspendingFunctionNotFoundError(method.name)
  }
  if (method.isAccessible() && !fn.isAccessible()) {
    fn.setAccessible(true)
  }

  const callArgs = shiftArguments(target, args)
  const slot = args.length > 0 ? args[args.length - 1] : undefined
  const callerSignal = slot instanceof AbortSignal ? slot : undefined

  const call = Effect.tryPromise({
    try: (signal) => callWithSignals(fn, callArgs, signal, callerSignal),
    catch: unwrapInvocationTarget,
  })

  const single: Single<unknown, unknown> = Stream.unwrap(
    Effect.map(Config.load, (config) => {
      const traced = config.traceInvocations
        ? Effect.zipRight(Effect.logDebug(`[coflux] invoke ${fn.name}`), call)
        : call
      return Stream.fromEffect(
        Dispatch.apply(traced, config.dispatch).pipe(
          Effect.annotateLogs({ function: fn.name, returns: fn.returns }),
        ),
      )
    }),
  ).pipe(Stream.filter(isPresent))

  switch (fn.returns) {
    case 'unit':
      return Stream.drain(single)
    case 'sequence':
      return flattenSequence(fn, single)
    case 'value':
      return single
  }
}
