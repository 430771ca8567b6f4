export * from './session/index.js'
export * from './cipher/index.js'
export * from './codec/index.js'
export * from './transport/index.js'
export { Ticker, DISABLED, MAX_TIMER_DELAY_MS, type TickerPeriod } from './scheduling/ticker.js'
export { generateClientId, generateRunId, isValidClientId } from './identity/secure-id.js'
export {
  PortalKeepError,
  ConfigError,
  TransportError,
  UnexpectedStatusError,
  MalformedResponseError,
  StateDocumentError,
  AuthenticationError,
  CipherError,
  Result,
  toError,
} from './types/error.types.js'
export {
  createLogger,
  createDefaultLogger,
  createSessionLogger,
  parseLogLevel,
  DEFAULT_LOGGER_CONFIG,
  BIND_INTERFACE_SENTINEL,
  LogLevel,
  type Logger,
  type LoggerConfig,
  type LogLevelName,
} from './logger/index.js'
