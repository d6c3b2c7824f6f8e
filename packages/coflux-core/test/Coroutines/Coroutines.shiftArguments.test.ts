import { describe, it, expect } from 'vitest'
import { shiftArguments } from '../../src/Coroutines.js'

describe('Coroutines.shiftArguments', () => {
  const continuation = Symbol('continuation')

  it('puts the receiver first and drops the continuation slot', () => {
    const receiver = { id: 'greeter' }
    expect(shiftArguments(receiver, ['Bob', 42, continuation])).toEqual([receiver, 'Bob', 42])
  })

  it('keeps the length of the argument list', () => {
    const args = ['a', 'b', 'c', continuation]
    expect(shiftArguments('r', args)).toHaveLength(args.length)
  })

  it('returns only the receiver when the continuation is the only slot', () => {
    expect(shiftArguments('r', [continuation])).toEqual(['r'])
  })

  it('does not mutate the caller list', () => {
    const args = ['Bob', continuation]
    shiftArguments('r', args)
    expect(args).toEqual(['Bob', continuation])
  })

  it('returns only the receiver for an empty list', () => {
    expect(shiftArguments('r', [])).toEqual(['r'])
  })
})
