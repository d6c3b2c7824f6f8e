/**
 * Reshapes caller arguments for callSuspend: the receiver goes first and the caller's
 * last slot (reserved for the continuation) is dropped, so the length is unchanged.
 *
 * `args.length >= 1` is the caller's responsibility; for an empty list the result is `[receiver]`.
 */
export const shiftArguments = (receiver: unknown, args: ReadonlyArray<unknown>): Array<unknown> => [
  receiver,
  ...args.slice(0, args.length - 1),
]
