/**
 * Control signal raised by `bye` and `quit` to end the session.
 * Not a {@link StackError}: the console driver stops its loop instead of reporting it.
 */
export class UserQuit extends Error {
  constructor() {
    super('Quit requested')
    this.name = 'UserQuit'
    Object.setPrototypeOf(this, UserQuit.prototype)
  }
}
