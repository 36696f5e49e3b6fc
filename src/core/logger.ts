const PREFIX = '[transcriptic]'

let verbose = false

export const logger = {
  setVerbose(enabled: boolean): void {
    verbose = enabled
  },

  get isVerbose(): boolean {
    return verbose
  },

  debug(message: string, ...args: unknown[]): void {
    if (!verbose) return
    console.error(PREFIX, message, ...args)
  },

  warn(message: string, ...args: unknown[]): void {
    console.warn(PREFIX, message, ...args)
  },

  error(message: string, ...args: unknown[]): void {
    console.error(PREFIX, message, ...args)
  },
}
