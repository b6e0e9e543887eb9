/**
 * wsbridge
 *
 * Bridge WebSocket clients to a raw TCP service, optionally serving a static
 * client bundle from the same port.
 */

// Server
export {
  BridgeServer,
  DEFAULT_SUBPROTOCOL,
  resolveBridgeServerOptions,
  wantsUpgrade,
  type BridgeServerOptions,
  type ResolvedBridgeServerOptions,
  type BridgeServerAddress,
  type TlsMaterial,
} from "./bridge-server";

// Relay
export {
  RelaySession,
  DEFAULT_READ_CHUNK_BYTES,
  DEFAULT_MAX_BUFFERED_BYTES,
  type RelaySessionOptions,
  type RelayState,
} from "./relay";
export { dialTcp, type DialOptions } from "./tcp-dialer";
export { SessionGate } from "./session-gate";

// Static files
export {
  createStaticFileHandler,
  type StaticFileHandler,
  type StaticFileOptions,
} from "./static-files";

// Policy and addresses
export {
  DEFAULT_ORIGIN_POLICY,
  describeOriginPolicy,
  isOriginAllowed,
  normalizeOrigin,
  type OriginPolicy,
} from "./origin-policy";
export { parseHostPort, formatHost, formatHostPort, dialHost, type HostPort } from "./address";

// Errors
export {
  BridgeError,
  StartupConfigError,
  ListenError,
  UpgradeError,
  DialError,
  RelayIOError,
  ProtocolViolationError,
  type BridgeErrorCode,
  type RelayDirection,
} from "./errors";

// Debug helpers
export {
  ALL_DEBUG_FLAGS,
  createDebugLog,
  formatDebugLine,
  parseDebugEnv,
  type DebugFlag,
  type DebugConfig,
  type DebugLogFn,
} from "./debug";
