// Environment probe behind the dev-only diagnostics of Reflection.registerSuspending
// (re-registering an implementation prints a console.debug line outside production).

import * as Internal from './internal/env.js'

export const getNodeEnv = (): string | undefined => Internal.getNodeEnv()

export const isDevEnv = (): boolean => Internal.isDevEnv()
