// Coroutines: conversions between native async values (Promise / async function / AsyncIterable)
// and Effect streams, plus the dynamic invoker for registered suspending functions.

export type {
  Single,
  Multi,
  Publisher,
  DeferredToSingleOptions,
  SingleToDeferredOptions,
} from './internal/bridge.js'

export {
  deferredToSingle,
  singleToDeferred,
  forkToDeferred,
  sequenceToMulti,
  invokeSuspendingFunction,
} from './internal/bridge.js'

export { shiftArguments } from './internal/args.js'

export { isAsyncIterable } from './internal/sequence.js'
