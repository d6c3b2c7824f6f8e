export type BridgeErrorTag =
  | 'SuspendingFunctionNotFound'
  | 'IllegalCallableAccess'
  | 'InvocationTarget'
  | 'BridgeScopeError'
  | 'SequenceTypeError'

const summarizeCause = (cause: unknown): { name?: string; message?: string } => {
  if (cause instanceof Error) {
    return { name: cause.name, message: cause.message }
  }
  return { message: typeof cause === 'string' ? cause : undefined }
}

abstract class BridgeErrorBase extends Error {
  abstract readonly _tag: BridgeErrorTag
  readonly hint?: string

  protected constructor(params: { readonly message: string; readonly hint?: string }) {
    super(params.message)
    this.hint = params.hint
  }

  toJSON(): Record<string, unknown> {
    return {
      _tag: this._tag,
      name: this.name,
      message: this.message,
      hint: this.hint,
    }
  }
}

/**
 * The method handle has no entry in the suspending function table.
 * Thrown synchronously by the invoker: it means the wrong method was passed in.
 */
export class SuspendingFunctionNotFoundError extends BridgeErrorBase {
  readonly _tag = 'SuspendingFunctionNotFound' as const
  readonly methodName: string

  constructor(methodName: string) {
    super({
      message: `[coflux] No suspending function registered for method "${methodName}"`,
      hint: 'Register the implementation with Reflection.registerSuspending(impl, { returns }) before invoking it.',
    })
    this.name = 'SuspendingFunctionNotFoundError'
    this.methodName = methodName
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), methodName: this.methodName }
  }
}

export class IllegalCallableAccessError extends BridgeErrorBase {
  readonly _tag = 'IllegalCallableAccess' as const
  readonly functionName: string

  constructor(functionName: string) {
    super({
      message: `[coflux] Suspending function "${functionName}" is private and not accessible`,
      hint: 'Call setAccessible(true) on the method handle (or on the suspending function) first.',
    })
    this.name = 'IllegalCallableAccessError'
    this.functionName = functionName
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), functionName: this.functionName }
  }
}

/**
 * Wraps whatever the invoked implementation threw or rejected with.
 * The original failure is kept as-is on `targetError`.
 */
export class InvocationTargetError extends BridgeErrorBase {
  readonly _tag = 'InvocationTarget' as const
  readonly functionName: string
  readonly targetError: unknown

  constructor(functionName: string, targetError: unknown) {
    super({ message: `[coflux] Suspending function "${functionName}" failed` })
    this.name = 'InvocationTargetError'
    this.functionName = functionName
    this.targetError = targetError
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), functionName: this.functionName, targetError: summarizeCause(this.targetError) }
  }
}

export const isInvocationTargetError = (u: unknown): u is InvocationTargetError => u instanceof InvocationTargetError

export const unwrapInvocationTarget = (error: unknown): unknown =>
  isInvocationTargetError(error) ? error.targetError : error

export type BridgeScopeErrorCode = 'bridge_scope::closed' | 'bridge_scope::global_close'

export class BridgeScopeError extends BridgeErrorBase {
  readonly _tag = 'BridgeScopeError' as const
  readonly code: BridgeScopeErrorCode
  readonly label: string

  constructor(code: BridgeScopeErrorCode, label: string) {
    super(
      code === 'bridge_scope::closed'
        ? {
            message: `[coflux] BridgeScope "${label}" is closed`,
            hint: 'Fork into a live scope, or create a new one with BridgeScope.make().',
          }
        : {
            message: '[coflux] The global BridgeScope lives as long as the process and cannot be closed',
            hint: 'Pass an explicit scope ({ scope: BridgeScope.make() }) to control the lifetime of eager work.',
          },
    )
    this.name = 'BridgeScopeError'
    this.code = code
    this.label = label
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), code: this.code, label: this.label }
  }
}

export class SequenceTypeError extends BridgeErrorBase {
  readonly _tag = 'SequenceTypeError' as const
  readonly functionName: string

  constructor(functionName: string, value: unknown) {
    super({
      message: `[coflux] Suspending function "${functionName}" is declared to return a sequence but produced ${describe(value)}`,
      hint: "Return an AsyncIterable (e.g. an async generator), or register the function with returns: 'value'.",
    })
    this.name = 'SequenceTypeError'
    this.functionName = functionName
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), functionName: this.functionName }
  }
}

const describe = (value: unknown): string => {
  if (value === null) return 'null'
  if (Array.isArray(value)) return 'an array'
  return typeof value === 'object' ? 'a non-iterable object' : `a ${typeof value}`
}
