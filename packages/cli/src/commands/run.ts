import { type AccountConfig, type PortalKeepConfig, loadConfig } from '@portalkeep/config'
import {
  CipherRegistry,
  LogLevel,
  SessionEngine,
  type SessionEngineOptions,
  parseLogLevel,
} from '@portalkeep/core'
import { cyan, yellow } from 'colorette'
import { Command } from 'commander'
import { CLIError } from '../utils/error-handler.js'

export interface RunCommandOptions {
  config?: string
  cwd?: string
}

export interface RunSessionsOptions {
  /** Aborting logs every session out and lets `runSessions` resolve */
  signal: AbortSignal
  verbose?: boolean
  transportFactory?: SessionEngineOptions['transportFactory']
}

/**
 * Map one configured account onto session engine options
 */
export function toEngineOptions(
  config: PortalKeepConfig,
  account: AccountConfig,
  ciphers: CipherRegistry,
  verbose = false
): SessionEngineOptions {
  return {
    account: { ...account },
    probeUrl: config.probe.url,
    proxy: config.network.proxy,
    requestTimeout: config.network.requestTimeout,
    logoutTimeout: config.network.logoutTimeout,
    defaultHeartbeatInterval: config.heartbeat.defaultInterval,
    ciphers,
    loggerConfig: {
      level: verbose ? LogLevel.DEBUG : (parseLogLevel(config.logging.level) ?? LogLevel.INFO),
      format: config.logging.format,
    },
  }
}

/**
 * Create one engine per account and run them side by side until the signal aborts
 */
export async function runSessions(config: PortalKeepConfig, options: RunSessionsOptions): Promise<void> {
  if (config.accounts.length === 0) {
    throw new CLIError('No accounts configured. Run `portalkeep config init` to create a configuration', 1)
  }

  const ciphers = CipherRegistry.fromKeys(config.ciphers)
  const engines: SessionEngine[] = []

  for (const [index, account] of config.accounts.entries()) {
    const created = SessionEngine.create({
      ...toEngineOptions(config, account, ciphers, options.verbose),
      transportFactory: options.transportFactory,
    })

    if (!created.ok) {
      await Promise.all(engines.map(engine => engine.dispose()))
      throw new CLIError(`accounts[${index}]: ${created.error.message}`, 1)
    }
    engines.push(created.value)
  }

  await Promise.all(engines.map(engine => engine.start(options.signal)))
}

/**
 * Handle run command
 */
export async function handleRun(options: RunCommandOptions = {}): Promise<void> {
  const result = await loadConfig({ searchFrom: options.cwd, configPath: options.config })

  if (result.filepath) {
    console.log(`📋 Using configuration: ${cyan(result.filepath)}`)
  }
  for (const warning of result.warnings) {
    console.warn(`${yellow('⚠️')}  ${warning}`)
  }

  const controller = new AbortController()
  const shutdown = (signal: NodeJS.Signals) => {
    console.log(`\n👋 ${signal} received, logging out...`)
    controller.abort()
  }

  process.once('SIGINT', shutdown)
  process.once('SIGTERM', shutdown)
  try {
    await runSessions(result.config, {
      signal: controller.signal,
      verbose: process.env.PORTALKEEP_VERBOSE === 'true',
    })
  } finally {
    process.off('SIGINT', shutdown)
    process.off('SIGTERM', shutdown)
  }
}

/**
 * Create run command
 */
export function createRunCommand(): Command {
  return new Command('run')
    .description('Keep every configured account online until interrupted')
    .option('-c, --config <path>', 'Configuration file to use')
    .action((options: RunCommandOptions) => handleRun(options))
}
