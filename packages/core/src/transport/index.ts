export type { HttpResponse, HttpTransportOptions, ProbeTransport, RequestOptions } from './types.js'
export {
  HttpTransport,
  createDispatcher,
  createHttpTransport,
  planDispatcher,
  DEFAULT_USER_AGENT,
  type DispatcherPlan,
} from './http-transport.js'
export {
  defaultInterface,
  localHostname,
  resolveInterface,
  ZERO_MAC_ADDRESS,
  type InterfaceAddress,
  type InterfaceTable,
} from './interfaces.js'
