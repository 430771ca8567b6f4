// Export schemas and types
export * from './schema.js'

// Export configuration loader
export {
  loadConfig,
  validateConfig,
  getDefaultConfig,
  expandEnvironmentVariables,
  parseJsoncContent,
  ConfigValidationError,
  MODULE_NAME,
  SEARCH_PLACES,
  type LoadConfigOptions,
  type ConfigSearchResult,
} from './loader.js'

// Export configuration template
export { generateConfigTemplate } from './template.js'

// Export diagnostic tools
export {
  diagnoseConfig,
  formatDiagnostics,
  type DiagnosticSeverity,
  type DiagnosticIssue,
  type DiagnosticReport,
} from './doctor.js'
