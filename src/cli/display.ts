import pc from 'picocolors'

export interface DisplayErrorOptions {
  /** Print the stack trace below the message */
  stack?: boolean
}

/**
 * Display an error
 */
export function displayError(error: Error, options: DisplayErrorOptions = {}): void {
  console.error()
  console.error(pc.bold(pc.red(error.name)))
  console.error(pc.red(error.message))

  if (options.stack && error.stack) {
    console.error(pc.dim(error.stack))
  }
}
