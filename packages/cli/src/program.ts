import { existsSync, readFileSync } from 'node:fs'
import { dirname, join } from 'node:path'
import { fileURLToPath } from 'node:url'
import { Command } from 'commander'
import { createConfigCommand } from './commands/config.js'
import { createRunCommand } from './commands/run.js'

export { CLIError, formatError, exitCodeFor, setupErrorHandling } from './utils/error-handler.js'

/**
 * Version of the nearest package.json above this module (source or build output)
 */
export function readPackageVersion(from = dirname(fileURLToPath(import.meta.url))): string {
  let dir = from
  for (;;) {
    const candidate = join(dir, 'package.json')
    if (existsSync(candidate)) {
      const info: unknown = JSON.parse(readFileSync(candidate, 'utf-8'))
      if (typeof info === 'object' && info !== null && 'version' in info && typeof info.version === 'string') {
        return info.version
      }
    }

    const parent = dirname(dir)
    if (parent === dir) return '0.0.0'
    dir = parent
  }
}

/**
 * Create main program
 */
export function createProgram(version = readPackageVersion()): Command {
  const program = new Command()

  program
    .name('portalkeep')
    .description('Keep captive-portal sessions alive')
    .version(version)
    .option('-v, --verbose', 'Enable verbose output')
    .option('--json', 'Output in JSON format')

  program.addCommand(createRunCommand())
  program.addCommand(createConfigCommand())

  // Global options handling
  program.hook('preAction', thisCommand => {
    const opts = thisCommand.optsWithGlobals()

    if (opts.verbose) {
      process.env.PORTALKEEP_VERBOSE = 'true'
    }

    if (opts.json) {
      process.env.PORTALKEEP_JSON_OUTPUT = 'true'
    }
  })

  return program
}
