export { runBridge, readEnvelopes, ResponseWriter, type BridgeOptions, type Forwarder } from "./bridge.js";
export {
  ConfigError,
  endpointProblem,
  endpointUrl,
  loadConfig,
  type BridgeConfig,
  type Endpoint,
} from "./config.js";
export {
  bonjourBrowse,
  createBonjourBrowse,
  pickAddress,
  discoverEndpoint,
  DiscoveryError,
  type BrowseFn,
  type DiscoveredService,
  type DiscoveryListener,
  type ServiceBrowser,
} from "./discovery.js";
export { mapFailure, parseEnvelope, TRANSPORT_ERROR_CODE, type Envelope, type ErrorEnvelope, type Failure } from "./envelope.js";
export { parseEventStream, RequestForwarder, REQUEST_TIMEOUT_MS, type Outcome } from "./forwarder.js";
export { createLogger, type Logger, type LogLevel } from "./log.js";
export { resolveEndpoint, startProxy, type ProxyDeps } from "./proxy.js";
export { SESSION_HEADER, SessionTracker, type SessionState } from "./session.js";
