// Dispatch: explicit execution policy for bridged work.
// - unconfined: continuations run inline on whichever stack resumes them (no extra scheduling hop);
// - default: Effect's default scheduler.

export type { Dispatch } from './internal/dispatch.js'

export { apply, runFork, runtime, unconfinedScheduler } from './internal/dispatch.js'
