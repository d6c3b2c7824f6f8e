export {
  BridgeScopeError,
  IllegalCallableAccessError,
  InvocationTargetError,
  SequenceTypeError,
  SuspendingFunctionNotFoundError,
  isInvocationTargetError,
  unwrapInvocationTarget,
} from './internal/errors.js'

export type { BridgeErrorTag, BridgeScopeErrorCode } from './internal/errors.js'
