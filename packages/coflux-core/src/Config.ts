import type { Effect, Layer } from 'effect'
import * as Internal from './internal/config.js'

export type BridgeConfigShape = Internal.BridgeConfigShape

export const BridgeConfigTag = Internal.BridgeConfigTag

export const DEFAULT_CONFIG: BridgeConfigShape = Internal.DEFAULT_CONFIG

// Effect-native config helper: callers inject overrides via Layer, or set
// `coflux.dispatch` / `coflux.trace_invocations` on the ConfigProvider.
export const BridgeConfig: {
  readonly tag: typeof Internal.BridgeConfigTag
  readonly load: Effect.Effect<BridgeConfigShape>
  readonly replace: (config: Partial<BridgeConfigShape>) => Layer.Layer<Internal.BridgeConfigTag>
} = {
  tag: Internal.BridgeConfigTag,
  load: Internal.load,
  replace: Internal.replace,
}
