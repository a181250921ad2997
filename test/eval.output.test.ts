import { describe, expect, it } from 'vitest'
import { InvalidOperandError, LimitError, StackUnderflowError } from '../src/errors'
import { captureSession } from './helpers'

const printedBy = (...lines: string[]) => {
  const { session, printed } = captureSession()
  for (const line of lines) {
    session.eval(line)
  }
  return { printed: printed(), stack: session.stack }
}

describe('eval output', () => {
  it('emits characters by code', () => {
    expect(printedBy('72 emit 105 emit')).toEqual({ printed: 'Hi', stack: [] })
  })

  it('truncates the code for emit', () => {
    expect(printedBy('65.9 emit').printed).toBe('A')
  })

  it.each(['-1 emit', '128 emit', 'nan emit', 'inf emit'])(
    'rejects "%s" and keeps the code on the stack',
    (line) => {
      const { session, printed } = captureSession()
      expect(() => session.eval(line)).toThrow(InvalidOperandError)
      expect(session.stack).toHaveLength(1)
      expect(printed()).toBe('')
    }
  )

  it('writes newlines and spaces', () => {
    expect(printedBy('cr').printed).toBe('\n')
    expect(printedBy('space').printed).toBe(' ')
    expect(printedBy('3 spaces').printed).toBe('   ')
  })

  it('writes no spaces for a count below one', () => {
    expect(printedBy('-2 spaces')).toEqual({ printed: '', stack: [] })
    expect(printedBy('0 spaces').printed).toBe('')
  })

  it.each(['inf spaces', '1e12 spaces'])('rejects "%s" past the spaces limit', (line) => {
    const { session, printed } = captureSession()
    session.eval('7')
    expect(() => session.eval(line)).toThrow(LimitError)
    expect(session.stack).toEqual([7, line.startsWith('inf') ? Number.POSITIVE_INFINITY : 1e12])
    expect(printed()).toBe('')
  })

  it('rejects a nan count for spaces', () => {
    const { session } = captureSession()
    expect(() => session.eval('nan spaces')).toThrow(InvalidOperandError)
    expect(session.stack).toEqual([Number.NaN])
  })

  it('writes spaces up to the limit', () => {
    expect(printedBy('65536 spaces').printed).toHaveLength(65_536)
  })

  it('displays and removes the top value', () => {
    expect(printedBy('1 42 .')).toEqual({ printed: '42 ', stack: [1] })
    expect(printedBy('1.5 .').printed).toBe('1.5 ')
    expect(printedBy('-0 .').printed).toBe('0 ')
  })

  it('shows the whole stack without changing it', () => {
    expect(printedBy('1 2.5 .s')).toEqual({ printed: '<2> 1 2.5 ', stack: [1, 2.5] })
    expect(printedBy('.s').printed).toBe('<0> ')
  })

  it('writes output in token order', () => {
    expect(printedBy('1 . space 2 . cr').printed).toBe('1  2 \n')
  })

  it('produces no value from printing builtins', () => {
    const { session } = captureSession()
    expect(session.eval('5 .')).toBeUndefined()
    expect(session.eval('.s')).toBeUndefined()
  })

  it.each(['emit', 'spaces', '.'])('needs an operand for %s', (word) => {
    const { session, printed } = captureSession()
    expect(() => session.eval(word)).toThrow(StackUnderflowError)
    expect(printed()).toBe('')
  })
})
