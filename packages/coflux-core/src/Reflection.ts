// Reflection: the table of suspending functions the invoker can dispatch to.
// Implementations are registered ahead of time; nothing is discovered at call time.

export type {
  AnyFunction,
  ReturnClassifier,
  SuspendingFunctionOptions,
  Visibility,
} from './internal/reflection.js'

export {
  MethodHandle,
  SuspendingFunction,
  getSuspendingFunction,
  method,
  methodOf,
  registerSuspending,
  unregisterSuspending,
} from './internal/reflection.js'
