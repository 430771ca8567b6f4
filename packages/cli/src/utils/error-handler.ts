import { ConfigValidationError } from '@portalkeep/config'
import { red, yellow } from 'colorette'

/**
 * CLI error with exit code
 */
export class CLIError extends Error {
  constructor(
    message: string,
    public exitCode: number = 1
  ) {
    super(message)
    this.name = 'CLIError'
  }
}

/**
 * Format error for console output
 */
export function formatError(error: Error): string {
  if (error instanceof ConfigValidationError) {
    const lines = [red(`❌ ${error.message}:`), '']

    for (const issue of error.zodError.issues) {
      const path = issue.path.join('.')
      lines.push(`${red('  •')} ${path || '(root)'}: ${issue.message}`)
    }

    return lines.join('\n')
  }

  if (error instanceof CLIError) {
    return `${red('❌')} ${error.message}`
  }

  return `${red('❌ Unexpected error:')} ${error.message}`
}

/**
 * Exit code for an error that reached the top of a command
 */
export function exitCodeFor(error: Error): number {
  return error instanceof CLIError ? error.exitCode : 1
}

function handleWarning(warning: Error): void {
  if (process.env.PORTALKEEP_VERBOSE === 'true') {
    console.warn(`${yellow('⚠️  Warning:')} ${warning.message}`)
  }
}

function handleUncaughtException(error: Error): void {
  console.error(`\n${formatError(error)}`)

  if (process.env.PORTALKEEP_VERBOSE === 'true' && error.stack) {
    console.error('\nStack trace:')
    console.error(error.stack)
  }

  process.exit(1)
}

function handleUnhandledRejection(reason: unknown): void {
  handleUncaughtException(reason instanceof Error ? reason : new Error(String(reason)))
}

/**
 * Setup global error handling
 * Signals are left to the run command, which logs sessions out before exiting.
 */
export function setupErrorHandling(): void {
  process.on('warning', handleWarning)
  process.on('uncaughtException', handleUncaughtException)
  process.on('unhandledRejection', handleUnhandledRejection)
}
