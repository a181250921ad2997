import { describe, expect, it } from 'vitest'
import {
  DivisionByZeroError,
  InvalidWordError,
  UnknownWordError,
  UnterminatedError,
  isStackError,
} from '../src/errors'
import { UserQuit } from '../src/eval/quit'
import { captureSession, thrownBy } from './helpers'

describe('eval errors', () => {
  it('reports unknown words', () => {
    const { session } = captureSession()
    expect(thrownBy(() => session.eval('1 foo'))).toMatchObject({
      kind: 'UnknownWord',
      word: 'foo',
      span: { start: 2, end: 5 },
    })
  })

  it('keeps the effects of tokens before the failure', () => {
    const { session } = captureSession()
    expect(() => session.eval('1 2 + foo 4')).toThrow(UnknownWordError)
    expect(session.stack).toEqual([3])
  })

  it('reports spans relative to the untrimmed line', () => {
    const { session } = captureSession()
    expect(thrownBy(() => session.eval('  1 foo'))).toMatchObject({ span: { start: 4, end: 7 } })
  })

  it('reports failures inside a definition at the calling word', () => {
    const { session } = captureSession()
    session.eval(': boom 0 / ;')
    const error = thrownBy(() => session.eval('1 boom'))
    expect(error).toBeInstanceOf(DivisionByZeroError)
    expect(error).toMatchObject({ span: { start: 2, end: 6 } })
    expect(session.stack).toEqual([1, 0])
  })

  it.each([':', ': foo', ': foo 1'])('reports "%s" as unterminated', (line) => {
    const { session } = captureSession()
    expect(() => session.eval(line)).toThrow(UnterminatedError)
    expect(session.words()).toEqual([])
  })

  it('runs nothing from a line that fails to compile', () => {
    const { session } = captureSession()
    expect(() => session.eval('1 2 : foo')).toThrow(UnterminatedError)
    expect(session.stack).toEqual([])
  })

  it('rejects numeric definition names', () => {
    const { session } = captureSession()
    expect(() => session.eval(': 1 2 ;')).toThrow(InvalidWordError)
  })

  it('does nothing for blank lines', () => {
    const { session, printed } = captureSession()
    session.eval('7')
    expect(session.eval('')).toBeUndefined()
    expect(session.eval('   \t ')).toBeUndefined()
    expect(session.stack).toEqual([7])
    expect(printed()).toBe('')
  })

  it('names errors after their kind', () => {
    const error = new UnknownWordError('x')
    expect(error.name).toBe('UnknownWordError')
    expect(error.kind).toBe('UnknownWord')
    expect(error.message).toBe('Unknown word: x')
    expect(error.span).toBeUndefined()
  })

  it('tells stack errors apart from the quit signal', () => {
    expect(isStackError(new DivisionByZeroError())).toBe(true)
    expect(isStackError(new UserQuit())).toBe(false)
    expect(isStackError(new Error('other'))).toBe(false)
  })
})
