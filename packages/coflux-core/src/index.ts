// Public barrel for @coflux/core
//   import * as Coflux from "@coflux/core"

// Conversions and the suspending-call invoker
export * as Coroutines from './Coroutines.js'
export * from './Coroutines.js'

// Single eventual result handle
export * as Deferred from './Deferred.js'

// Execution policy and lifetime of eager work
export * as Dispatch from './Dispatch.js'
export * as BridgeScope from './BridgeScope.js'

// Suspending function table
export * as Reflection from './Reflection.js'

// Config / Env / Errors
export * as Config from './Config.js'
export * as Env from './Env.js'
export * from './Errors.js'
