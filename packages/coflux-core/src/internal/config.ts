import { Config, Context, Effect, Layer, Option } from 'effect'
import type { Dispatch } from './dispatch.js'

export interface BridgeConfigShape {
  /** Execution policy used when a bridged stream is subscribed. */
  readonly dispatch: Dispatch
  /** Emit one `Effect.logDebug` line per suspending invocation. */
  readonly traceInvocations: boolean
}

export class BridgeConfigTag extends Context.Tag('@coflux/core/BridgeConfig')<BridgeConfigTag, BridgeConfigShape>() {}

export const DEFAULT_CONFIG: BridgeConfigShape = {
  dispatch: 'unconfined',
  traceInvocations: false,
}

const BridgeConfigFromProvider = {
  dispatch: Config.literal('unconfined', 'default')('coflux.dispatch').pipe(Config.withDefault(DEFAULT_CONFIG.dispatch)),
  traceInvocations: Config.boolean('coflux.trace_invocations').pipe(
    Config.withDefault(DEFAULT_CONFIG.traceInvocations),
  ),
}

/**
 * Resolves the effective config:
 * 1) BridgeConfigTag, when a Layer provided one;
 * 2) otherwise the current ConfigProvider (`coflux.dispatch`, `coflux.trace_invocations`);
 * 3) otherwise DEFAULT_CONFIG.
 *
 * A malformed provider value is a defect, not a typed failure of the bridged stream.
 */
export const load: Effect.Effect<BridgeConfigShape> = Effect.gen(function* () {
  const override = yield* Effect.serviceOption(BridgeConfigTag)
  if (Option.isSome(override)) {
    return override.value
  }
  const dispatch = yield* BridgeConfigFromProvider.dispatch
  const traceInvocations = yield* BridgeConfigFromProvider.traceInvocations
  return { dispatch, traceInvocations }
}).pipe(Effect.orDie)

/**
 * Overlays a partial config on top of the current one:
 * - if Env already contains BridgeConfigTag, merge on top of it;
 * - otherwise DEFAULT_CONFIG is the base.
 */
export const replace = (config: Partial<BridgeConfigShape>): Layer.Layer<BridgeConfigTag> =>
  Layer.effect(
    BridgeConfigTag,
    Effect.gen(function* () {
      const current = yield* Effect.serviceOption(BridgeConfigTag)
      const base = Option.isSome(current) ? current.value : DEFAULT_CONFIG
      return {
        ...base,
        ...config,
      }
    }),
  )
