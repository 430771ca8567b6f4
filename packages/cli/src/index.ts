#!/usr/bin/env node

import { toError } from '@portalkeep/core'
import { createProgram } from './program.js'
import { exitCodeFor, formatError, setupErrorHandling } from './utils/error-handler.js'

// Setup error handling first
setupErrorHandling()

const program = createProgram()

if (!process.argv.slice(2).length) {
  program.outputHelp()
} else {
  try {
    await program.parseAsync()
  } catch (error) {
    const err = toError(error)
    console.error(formatError(err))
    process.exitCode = exitCodeFor(err)
  }
}
