import { describe, expect, it } from 'vitest'
import { LimitError } from '../src/errors'
import { resolveLimits } from '../src/limits'
import { captureSession } from './helpers'

describe('eval limits', () => {
  it('applies defaults', () => {
    expect(resolveLimits()).toEqual({ maxSteps: 1_000_000, maxDepth: 1_000, maxStack: 10_000 })
    expect(resolveLimits({ maxStack: 5 })).toEqual({
      maxSteps: 1_000_000,
      maxDepth: 1_000,
      maxStack: 5,
    })
  })

  it('enforces maxStack', () => {
    const { session } = captureSession({ limits: { maxStack: 2 } })
    expect(() => session.eval('1 2 3')).toThrow(LimitError)
    expect(session.stack).toEqual([1, 2])
  })

  it('pushes nothing when a multi-value push would pass maxStack', () => {
    const { session } = captureSession({ limits: { maxStack: 3 } })
    expect(() => session.eval('1 2 2dup')).toThrow(LimitError)
    expect(session.stack).toEqual([1, 2])
  })

  it('enforces maxSteps per call', () => {
    const { session } = captureSession({ limits: { maxSteps: 3 } })
    session.eval('1 2 3')
    expect(() => session.eval('4 5 6 7')).toThrow(LimitError)
    expect(session.stack).toEqual([1, 2, 3, 4, 5, 6])
  })

  it('counts tokens inside definition bodies as steps', () => {
    const { session } = captureSession({ limits: { maxSteps: 4 } })
    session.eval(': three 1 2 3 ;')
    expect(() => session.eval('0 three')).toThrow(LimitError)
    expect(session.stack).toEqual([0, 1, 2])
  })

  it('enforces maxDepth', () => {
    const { session } = captureSession({ limits: { maxDepth: 1 } })
    session.eval(': pair 1 2 ;')
    session.eval(': quad pair pair ;')
    session.eval('pair')
    expect(session.stack).toEqual([1, 2])
    expect(() => session.eval('quad')).toThrow(LimitError)
    expect(session.stack).toEqual([1, 2])
  })
})
