import { Effect, Runtime, Scheduler } from 'effect'
import type { Fiber } from 'effect'

export type Dispatch = 'unconfined' | 'default'

const pending: Array<() => void> = []
let draining = false

// Trampoline: the outermost call runs its task inline, then drains whatever was scheduled meanwhile.
// Nested schedules are queued, so a fiber that yields or resumes repeatedly never grows the stack.
const runInline = (task: () => void): void => {
  if (draining) {
    pending.push(task)
    return
  }
  draining = true
  try {
    task()
    let next = pending.shift()
    while (next !== undefined) {
      next()
      next = pending.shift()
    }
  } finally {
    draining = false
  }
}

/**
 * Runs every task on whichever call stack resumes the fiber
 * (a promise callback, an iterator step, the caller of runFork), and never asks a fiber to yield.
 * A task scheduled while another one is running starts right after it, on the same stack.
 */
export const unconfinedScheduler: Scheduler.Scheduler = Scheduler.make(runInline, () => false)

export const apply = <A, E, R>(effect: Effect.Effect<A, E, R>, dispatch: Dispatch): Effect.Effect<A, E, R> =>
  dispatch === 'unconfined' ? Effect.withScheduler(effect, unconfinedScheduler) : effect

// The runtime is captured inside withScheduler so forked fibers start on the unconfined scheduler
// instead of hopping through the default one first.
const unconfinedRuntime: Runtime.Runtime<never> = Effect.runSync(apply(Effect.runtime<never>(), 'unconfined'))

export const runtime = (dispatch: Dispatch): Runtime.Runtime<never> =>
  dispatch === 'unconfined' ? unconfinedRuntime : Runtime.defaultRuntime

export const runFork = <A, E>(effect: Effect.Effect<A, E>, dispatch: Dispatch): Fiber.RuntimeFiber<A, E> =>
  Runtime.runFork(runtime(dispatch))(apply(effect, dispatch))
