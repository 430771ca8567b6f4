import type { ZodError, ZodIssue } from 'zod'
import type { ConfigValidationError } from './loader.js'
import type { CipherKeyConfig, PortalKeepConfig } from './schema.js'

/**
 * Diagnostic issue severity
 */
export type DiagnosticSeverity = 'error' | 'warning' | 'info'

/**
 * Configuration diagnostic issue
 */
export interface DiagnosticIssue {
  severity: DiagnosticSeverity
  path: string
  message: string
  suggestion?: string
}

/**
 * Diagnostic report
 */
export interface DiagnosticReport {
  issues: DiagnosticIssue[]
  hasErrors: boolean
  hasWarnings: boolean
}

const KEY_BYTES: Record<CipherKeyConfig['type'], number> = {
  'aes-128-cbc': 16,
  'aes-256-cbc': 32,
  'aes-256-gcm': 32,
}

/**
 * Convert Zod error to diagnostic issues
 */
function zodErrorToDiagnostics(zodError: ZodError): DiagnosticIssue[] {
  return zodError.issues.map((issue: ZodIssue): DiagnosticIssue => {
    const path = issue.path.join('.')

    switch (issue.code) {
      case 'invalid_type':
        return {
          severity: 'error',
          path,
          message: `Expected ${issue.expected}, but received ${issue.received}`,
          suggestion: `Change the value to a ${issue.expected}`,
        }

      case 'invalid_string':
        if (issue.validation === 'url') {
          return {
            severity: 'error',
            path,
            message: 'Invalid URL format',
            suggestion: 'Provide a valid URL starting with http:// or https://',
          }
        }
        return {
          severity: 'error',
          path,
          message: `Invalid string: ${issue.message}`,
        }

      case 'invalid_enum_value':
        return {
          severity: 'error',
          path,
          message: `Invalid value. Expected one of: ${issue.options.join(', ')}`,
          suggestion: `Use one of the valid options: ${issue.options.join(', ')}`,
        }

      case 'unrecognized_keys':
        return {
          severity: 'error',
          path,
          message: `Unknown configuration keys: ${issue.keys.join(', ')}`,
          suggestion: 'Remove unknown keys or check for typos',
        }

      case 'too_small':
        return {
          severity: 'error',
          path,
          message: `Value is too small. Minimum: ${issue.minimum}`,
          suggestion: `Increase the value to at least ${issue.minimum}`,
        }

      default:
        return {
          severity: 'error',
          path,
          message: issue.message,
        }
    }
  })
}

/**
 * Checks the schema cannot express
 */
function performSemanticValidation(config: PortalKeepConfig): DiagnosticIssue[] {
  const issues: DiagnosticIssue[] = []

  if (config.accounts.length === 0) {
    issues.push({
      severity: 'error',
      path: 'accounts',
      message: 'No accounts configured',
      suggestion: 'Add at least one account with username and password',
    })
  }

  const boundInterfaces = new Map<string, number>()

  config.accounts.forEach((account, index) => {
    const accountPath = `accounts[${index}]`

    if (!account.username || !account.password) {
      issues.push({
        severity: 'error',
        path: accountPath,
        message: 'Username and password must not be empty',
        suggestion: 'Provide credentials or use environment variables like ${PORTAL_PASSWORD}',
      })
    }

    const iface = account.bindInterface ?? ''
    const previous = boundInterfaces.get(iface)
    if (previous !== undefined) {
      issues.push({
        severity: 'warning',
        path: `${accountPath}.bindInterface`,
        message: `Shares ${iface ? `interface ${iface}` : 'the default interface'} with accounts[${previous}]`,
        suggestion: 'Give each account its own bindInterface',
      })
    } else {
      boundInterfaces.set(iface, index)
    }

    if (account.checkInterval <= 0) {
      issues.push({
        severity: 'info',
        path: `${accountPath}.checkInterval`,
        message: 'Non-positive check interval, the default of 10000 ms applies',
      })
    }

    if (account.retryInterval < 0) {
      issues.push({
        severity: 'info',
        path: `${accountPath}.retryInterval`,
        message: 'Negative retry interval: a failed probe is not retried',
      })
    }
  })

  for (const [algoId, spec] of Object.entries(config.ciphers)) {
    const cipherPath = `ciphers.${algoId}`
    const keyBytes = spec.key.length / 2
    if (keyBytes !== KEY_BYTES[spec.type]) {
      issues.push({
        severity: 'error',
        path: `${cipherPath}.key`,
        message: `${spec.type} needs a ${KEY_BYTES[spec.type]}-byte key, got ${keyBytes}`,
      })
    }
    if (spec.type !== 'aes-256-gcm' && (spec.iv ?? '').length !== 32) {
      issues.push({
        severity: 'error',
        path: `${cipherPath}.iv`,
        message: `${spec.type} needs a 16-byte iv`,
      })
    }
  }

  if (config.probe.url.startsWith('https://')) {
    issues.push({
      severity: 'warning',
      path: 'probe.url',
      message: 'Captive portals usually intercept plain HTTP only',
      suggestion: 'Use an http:// probe endpoint',
    })
  }

  return issues
}

/**
 * Run configuration diagnostics
 */
export function diagnoseConfig(
  config: PortalKeepConfig | undefined,
  validationError?: ConfigValidationError
): DiagnosticReport {
  const issues: DiagnosticIssue[] = []

  if (validationError) {
    issues.push(...zodErrorToDiagnostics(validationError.zodError))
  }

  if (config) {
    issues.push(...performSemanticValidation(config))
  }

  return {
    issues,
    hasErrors: issues.some(issue => issue.severity === 'error'),
    hasWarnings: issues.some(issue => issue.severity === 'warning'),
  }
}

const SECTION_TITLES: Record<DiagnosticSeverity, string> = {
  error: '❌ %d Error(s):',
  warning: '⚠️  %d Warning(s):',
  info: 'ℹ️  %d Info:',
}

/**
 * Format diagnostic issues for console output
 */
export function formatDiagnostics(report: DiagnosticReport): string {
  if (report.issues.length === 0) {
    return '✅ Configuration is valid'
  }

  const lines: string[] = []

  for (const severity of ['error', 'warning', 'info'] as const) {
    const group = report.issues.filter(issue => issue.severity === severity)
    if (group.length === 0) continue

    lines.push('', SECTION_TITLES[severity].replace('%d', String(group.length)))
    for (const issue of group) {
      lines.push(`   ${issue.path}: ${issue.message}`)
      if (issue.suggestion) {
        lines.push(`      💡 ${issue.suggestion}`)
      }
    }
  }

  return lines.join('\n')
}
