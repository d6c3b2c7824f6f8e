import { Stream } from 'effect'

export const isAsyncIterable = (u: unknown): u is AsyncIterable<unknown> =>
  typeof u === 'object' && u !== null && Symbol.asyncIterator in u && typeof Reflect.get(u, Symbol.asyncIterator) === 'function'

// Iterator failures surface unchanged; interrupting the stream calls the iterator's return().
export const toStream = <A>(source: AsyncIterable<A>): Stream.Stream<A, unknown> =>
  Stream.fromAsyncIterable(source, (error) => error)
