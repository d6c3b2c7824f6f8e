export type { BridgeScope } from './internal/scope.js'

export { BridgeScopeTag, current, global, layer, make } from './internal/scope.js'
