import debug from 'debug'

/** Root namespace shared by every netloom debugger */
const DEBUG_NAMESPACE = 'netloom'

/**
 * Debugger wraps the `debug` package with one namespace per module and
 * lazily created sub-namespaces for severities such as `warn` and `error`.
 *
 * Enable output with `DEBUG=netloom:*` (or `DEBUG=netloom:*:error`).
 *
 * @example
 * const debug = new Debugger('resolver')
 * debug.log('Resolving topology lab1')      // netloom:resolver
 * debug.log('warn', 'Unused interface entry') // netloom:resolver:warn
 */
export class Debugger {
  private readonly debuggers = new Map<string, debug.Debugger>()

  constructor (private readonly module: string) {
    this.debuggers.set('default', debug(`${DEBUG_NAMESPACE}:${module}`))
  }

  log (message: string): void
  log (subDebug: string, message: string): void
  log (first: string, second?: string): void {
    if (second === undefined) {
      this.channel('default')(first)
      return
    }
    this.channel(first)(second)
  }

  private channel (subDebug: string): debug.Debugger {
    let instance = this.debuggers.get(subDebug)
    if (!instance) {
      instance = debug(`${DEBUG_NAMESPACE}:${this.module}:${subDebug}`)
      this.debuggers.set(subDebug, instance)
    }
    return instance
  }
}
