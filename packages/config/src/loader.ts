import { existsSync } from 'node:fs'
import { join, resolve } from 'node:path'
import { cosmiconfig } from 'cosmiconfig'
import { config as loadDotenv } from 'dotenv'
import { type ParseError, parse as parseJsonc, printParseErrorCode } from 'jsonc-parser'
import { ZodError } from 'zod'
import { type PortalKeepConfig, PortalKeepConfigSchema } from './schema.js'

export const MODULE_NAME = 'portalkeep'

export const SEARCH_PLACES = [
  'portalkeep.config.json',
  'portalkeep.config.jsonc',
  '.portalkeeprc',
  '.portalkeeprc.json',
  '.portalkeeprc.jsonc',
  'package.json',
]

/**
 * Configuration validation error
 */
export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public zodError: ZodError
  ) {
    super(message)
    this.name = 'ConfigValidationError'
  }
}

/**
 * Configuration loader options
 */
export interface LoadConfigOptions {
  /** Search directory (defaults to cwd) */
  searchFrom?: string
  /** Load this file instead of searching */
  configPath?: string
  /** Load .env files (defaults to true) */
  loadEnv?: boolean
}

/**
 * Configuration search result
 */
export interface ConfigSearchResult {
  config: PortalKeepConfig
  filepath: string | null
  isEmpty: boolean
  /** Non-fatal problems found while loading, e.g. unresolved variables */
  warnings: string[]
}

/**
 * Load environment variables from .env files
 */
function loadEnvironment(searchDir: string): void {
  const envFiles = ['.env.local', '.env']

  for (const envFile of envFiles) {
    const envPath = join(searchDir, envFile)
    if (existsSync(envPath)) {
      loadDotenv({ path: envPath })
    }
  }
}

const PLACEHOLDER = /\$\{([^}]+)\}/g
const WHOLE_PLACEHOLDER = /^\$\{[^}]+\}$/
const INTEGER = /^-?\d+$/

/**
 * Expand environment variables in a string
 * Supports ${VAR_NAME} and ${VAR_NAME:default_value} syntax. A string that is a
 * single placeholder expanding to an integer becomes a number.
 */
export function expandEnvironmentVariables(str: string, warnings: string[] = []): string | number {
  const expanded = str.replace(PLACEHOLDER, (match, varExp: string) => {
    const separator = varExp.indexOf(':')
    const varName = (separator === -1 ? varExp : varExp.slice(0, separator)).trim()
    const defaultValue = separator === -1 ? undefined : varExp.slice(separator + 1).trim()
    const envValue = process.env[varName]

    if (envValue !== undefined) {
      return envValue
    }

    if (defaultValue !== undefined) {
      return defaultValue
    }

    // Variable not found and no default - keep original
    warnings.push(`Environment variable ${varName} not found, keeping placeholder: ${match}`)
    return match
  })

  if (WHOLE_PLACEHOLDER.test(str) && INTEGER.test(expanded)) {
    return Number(expanded)
  }
  return expanded
}

/**
 * Recursively expand environment variables in configuration object
 */
function expandConfigVariables(value: unknown, warnings: string[]): unknown {
  if (typeof value === 'string') {
    return expandEnvironmentVariables(value, warnings)
  }

  if (Array.isArray(value)) {
    return value.map(item => expandConfigVariables(item, warnings))
  }

  if (value && typeof value === 'object') {
    const expanded: Record<string, unknown> = {}
    for (const [key, item] of Object.entries(value)) {
      expanded[key] = expandConfigVariables(item, warnings)
    }
    return expanded
  }

  return value
}

/**
 * Parse JSONC (JSON with comments) content
 */
export function parseJsoncContent(content: string, filepath: string): unknown {
  const parseErrors: ParseError[] = []
  const result: unknown = parseJsonc(content, parseErrors, {
    allowTrailingComma: true,
    disallowComments: false,
  })

  if (parseErrors.length > 0) {
    throw new Error(
      `JSONC parse errors in ${filepath}: ${parseErrors.map(e => printParseErrorCode(e.error)).join(', ')}`
    )
  }

  return result
}

/**
 * Custom file loader for cosmiconfig that supports JSONC
 */
function jsoncLoader(filepath: string, content: string): unknown {
  return parseJsoncContent(content, filepath)
}

/**
 * Get default configuration
 */
export function getDefaultConfig(): PortalKeepConfig {
  return PortalKeepConfigSchema.parse({})
}

/**
 * Validate configuration against schema
 */
export function validateConfig(config: unknown, filepath?: string | null): PortalKeepConfig {
  try {
    return PortalKeepConfigSchema.parse(config)
  } catch (error) {
    if (error instanceof ZodError) {
      throw new ConfigValidationError(
        `Configuration validation failed${filepath ? ` in ${filepath}` : ''}`,
        error
      )
    }
    throw error
  }
}

/**
 * Load and parse portalkeep configuration
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<ConfigSearchResult> {
  const { searchFrom = process.cwd(), configPath, loadEnv = true } = options

  // Load environment variables first
  if (loadEnv) {
    loadEnvironment(searchFrom)
  }

  const explorer = cosmiconfig(MODULE_NAME, {
    searchPlaces: SEARCH_PLACES,
    loaders: {
      '.json': jsoncLoader,
      '.jsonc': jsoncLoader,
      noExt: jsoncLoader,
    },
  })

  let searchResult: Awaited<ReturnType<typeof explorer.search>>
  try {
    searchResult = configPath
      ? await explorer.load(resolve(searchFrom, configPath))
      : await explorer.search(searchFrom)
  } catch (error) {
    throw new Error(`Failed to load configuration: ${error instanceof Error ? error.message : error}`)
  }

  const warnings: string[] = []
  const userConfig: unknown = searchResult?.config ?? {}
  const filepath = searchResult?.filepath ?? null

  const expandedConfig = expandConfigVariables(userConfig, warnings)

  return {
    config: validateConfig(expandedConfig, filepath),
    filepath,
    isEmpty: !searchResult,
    warnings,
  }
}
