import { isDevEnv } from './env.js'
import { IllegalCallableAccessError, InvocationTargetError } from './errors.js'

// Any function value. Parameters are `never` so every signature is assignable; calls go through Reflect.apply.
export type AnyFunction = (...args: never[]) => unknown

/** Declared return-type classifier of a suspending function. */
export type ReturnClassifier = 'value' | 'unit' | 'sequence'

export type Visibility = 'public' | 'private'

export interface SuspendingFunctionOptions {
  readonly name?: string
  readonly returns?: ReturnClassifier
  readonly visibility?: Visibility
}

/**
 * Higher-level view of a registered suspending function.
 *
 * The implementation is called with the receiver as `this`, the declared parameters,
 * and the continuation (an AbortSignal) as its final argument.
 */
export class SuspendingFunction {
  readonly name: string
  readonly returns: ReturnClassifier
  readonly visibility: Visibility
  readonly implementation: AnyFunction
  private accessible: boolean

  constructor(implementation: AnyFunction, options?: SuspendingFunctionOptions) {
    this.implementation = implementation
    this.name = options?.name ?? (implementation.name || 'anonymous')
    this.returns = options?.returns ?? 'value'
    this.visibility = options?.visibility ?? 'public'
    this.accessible = this.visibility === 'public'
  }

  isAccessible(): boolean {
    return this.accessible
  }

  setAccessible(flag: boolean): void {
    this.accessible = flag || this.visibility === 'public'
  }

  /**
   * `args[0]` is the receiver. Failures of the implementation itself (sync throw or rejection)
   * reject with InvocationTargetError; access violations reject unwrapped.
   */
  callSuspend(args: ReadonlyArray<unknown>, continuation: AbortSignal): Promise<unknown> {
    if (!this.accessible) {
      return Promise.reject(new IllegalCallableAccessError(this.name))
    }
    const [receiver, ...params] = args
    const wrap = (error: unknown): never => {
      throw new InvocationTargetError(this.name, error)
    }
    try {
      const result: unknown = Reflect.apply(this.implementation, receiver, [...params, continuation])
      return Promise.resolve(result).catch(wrap)
    } catch (error) {
      return Promise.reject(new InvocationTargetError(this.name, error))
    }
  }
}

/**
 * Reflective-level handle of a method. Starts inaccessible, like a freshly looked-up method;
 * framework code opens it with setAccessible(true) before dispatching.
 */
export class MethodHandle {
  readonly name: string
  readonly implementation: AnyFunction
  private accessible = false

  constructor(implementation: AnyFunction, name?: string) {
    this.implementation = implementation
    this.name = name ?? (implementation.name || 'anonymous')
  }

  isAccessible(): boolean {
    return this.accessible
  }

  setAccessible(flag: boolean): void {
    this.accessible = flag
  }
}

const isFunction = (u: unknown): u is AnyFunction => typeof u === 'function'

// implementation -> suspending view
const table = new WeakMap<AnyFunction, SuspendingFunction>()

export const registerSuspending = <F extends AnyFunction>(implementation: F, options?: SuspendingFunctionOptions): F => {
  if (isDevEnv() && table.has(implementation)) {
    // eslint-disable-next-line no-console
    console.debug(
      `[coflux] Suspending function "${options?.name ?? implementation.name}" registered twice; the last registration wins.`,
    )
  }
  table.set(implementation, new SuspendingFunction(implementation, options))
  return implementation
}

export const unregisterSuspending = (implementation: AnyFunction): boolean => table.delete(implementation)

export const getSuspendingFunction = (method: MethodHandle): SuspendingFunction | undefined =>
  table.get(method.implementation)

/**
 * Looks up `owner[name]` (typically a class prototype) and returns its method handle.
 */
export const method = (owner: object, name: string): MethodHandle => {
  const implementation: unknown = Reflect.get(owner, name)
  if (!isFunction(implementation)) {
    throw new TypeError(`[coflux] "${name}" is not a method of the given owner`)
  }
  return new MethodHandle(implementation, name)
}

export const methodOf = (implementation: AnyFunction, name?: string): MethodHandle =>
  new MethodHandle(implementation, name)
