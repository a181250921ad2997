import { Session, type SessionOptions } from '../src/session'

/**
 * A session whose printed output is collected instead of written to stdout.
 */
export const captureSession = (options: Omit<SessionOptions, 'output'> = {}) => {
  let printed = ''
  const session = new Session({
    ...options,
    output: {
      write: (text) => {
        printed += text
      },
    },
  })
  return { session, printed: () => printed }
}

export const evalLines = (...lines: string[]): Session => {
  const { session } = captureSession()
  for (const line of lines) {
    session.eval(line)
  }
  return session
}

/**
 * Returns whatever `fn` throws; fails the test if it returns normally.
 */
export const thrownBy = (fn: () => unknown): unknown => {
  try {
    fn()
  } catch (error) {
    return error
  }
  throw new Error('Expected function to throw')
}
