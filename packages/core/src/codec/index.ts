export {
  buildStateDocument,
  formatLocalTime,
  parseStateDocument,
  parseStateResponse,
  serializeAuthRequest,
  serializeStateDocument,
  type Credentials,
  type SessionIdentity,
  type StateDocument,
  type StateResponse,
} from './state-document.js'
export {
  parseAuthResponse,
  parsePortalConfig,
  parseTicketResponse,
  type AuthResponse,
  type PortalConfig,
  type TicketResponse,
} from './portal-documents.js'
export { buildDocument, readDocument, XML_DECLARATION } from './xml.js'
