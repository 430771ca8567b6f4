import { existsSync, writeFileSync } from 'node:fs'
import { resolve } from 'node:path'
import {
  type ConfigSearchResult,
  ConfigValidationError,
  type PortalKeepConfig,
  diagnoseConfig,
  formatDiagnostics,
  generateConfigTemplate,
  loadConfig,
} from '@portalkeep/config'
import { cyan, green, yellow } from 'colorette'
import { Command } from 'commander'
import { CLIError } from '../utils/error-handler.js'

export const DEFAULT_CONFIG_FILE = 'portalkeep.config.jsonc'

const REDACTED = '[REDACTED]'

export interface ConfigCommandOptions {
  /** Explicit configuration file */
  config?: string
  /** Directory to search from and write into (defaults to cwd) */
  cwd?: string
}

const isJsonOutput = () => process.env.PORTALKEEP_JSON_OUTPUT === 'true'

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value)

/**
 * Output result based on JSON flag
 */
function outputResult(data: unknown, message?: string): void {
  if (isJsonOutput()) {
    console.log(JSON.stringify(data, null, 2))
  } else if (message) {
    console.log(message)
  }
}

/**
 * Copy of the configuration with credentials and key material masked
 */
export function redactConfig(config: PortalKeepConfig): PortalKeepConfig {
  return {
    ...config,
    accounts: config.accounts.map(account => ({ ...account, password: REDACTED })),
    ciphers: Object.fromEntries(
      Object.entries(config.ciphers).map(([algoId, spec]) => [
        algoId,
        { ...spec, key: REDACTED, ...(spec.iv !== undefined && { iv: REDACTED }) },
      ] as const)
    ),
  }
}

/**
 * Handle validate command
 */
export async function handleValidate(options: ConfigCommandOptions = {}): Promise<void> {
  let result: ConfigSearchResult
  try {
    result = await loadConfig({ searchFrom: options.cwd, configPath: options.config })
  } catch (error) {
    if (!(error instanceof ConfigValidationError)) throw error

    const report = diagnoseConfig(undefined, error)
    outputResult({ valid: false, issues: report.issues }, formatDiagnostics(report))
    throw new CLIError(error.message, 1)
  }

  const report = diagnoseConfig(result.config)

  if (isJsonOutput()) {
    outputResult({
      valid: !report.hasErrors,
      issues: report.issues,
      warnings: result.warnings,
      configPath: result.filepath,
    })
  } else {
    if (result.filepath) {
      console.log(`📋 Checking configuration: ${cyan(result.filepath)}`)
    } else {
      console.log('📋 Checking default configuration (no config file found)')
    }

    for (const warning of result.warnings) {
      console.log(`${yellow('⚠️')}  ${warning}`)
    }

    console.log(formatDiagnostics(report))
  }

  if (report.hasErrors) {
    throw new CLIError('Configuration validation failed', 1)
  }

  if (report.issues.length > 0 && !isJsonOutput()) {
    console.log(`\n${green('✅')} Configuration is valid`)
  }
}

/**
 * Handle init command
 */
export async function handleInit(options: { force?: boolean; cwd?: string } = {}): Promise<void> {
  const configPath = resolve(options.cwd ?? process.cwd(), DEFAULT_CONFIG_FILE)

  if (existsSync(configPath) && !options.force) {
    throw new CLIError(`Configuration file already exists: ${configPath}\nUse --force to overwrite`, 1)
  }

  writeFileSync(configPath, generateConfigTemplate())

  outputResult(
    { configPath, created: true },
    `${green('✅')} Created configuration file: ${cyan(configPath)}`
  )
}

/**
 * Handle show command
 */
export async function handleShow(path?: string, options: ConfigCommandOptions = {}): Promise<void> {
  const result = await loadConfig({ searchFrom: options.cwd, configPath: options.config })
  const config = redactConfig(result.config)

  if (!path) {
    outputResult(config, JSON.stringify(config, null, 2))
    return
  }

  let current: unknown = config
  for (const part of path.split('.')) {
    if (isRecord(current) && part in current) {
      current = current[part]
    } else if (Array.isArray(current) && /^\d+$/.test(part) && Number(part) < current.length) {
      current = current[Number(part)]
    } else {
      throw new CLIError(`Configuration path not found: ${path}`, 1)
    }
  }

  outputResult({ path, value: current }, JSON.stringify(current, null, 2))
}

/**
 * Create config command
 */
export function createConfigCommand(): Command {
  const configCommand = new Command('config').description('Manage portalkeep configuration')

  configCommand
    .command('validate')
    .description('Validate configuration file')
    .option('-c, --config <path>', 'Configuration file to validate')
    .action((options: ConfigCommandOptions) => handleValidate(options))

  configCommand
    .command('init')
    .description('Create a new configuration file')
    .option('-f, --force', 'Overwrite existing configuration file')
    .action((options: { force?: boolean }) => handleInit(options))

  configCommand
    .command('show [path]')
    .description('Show the effective configuration with secrets masked')
    .option('-c, --config <path>', 'Configuration file to read')
    .action((path: string | undefined, options: ConfigCommandOptions) => handleShow(path, options))

  configCommand.addHelpText(
    'after',
    `
Examples:
  portalkeep config init                  Create new configuration file
  portalkeep config validate              Validate current configuration
  portalkeep config show                  Show entire configuration
  portalkeep config show accounts.0       Show the first account
`
  )

  return configCommand
}
