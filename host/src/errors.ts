export type BridgeErrorCode =
  | "startup_config"
  | "listen"
  | "upgrade"
  | "dial"
  | "relay_io"
  | "protocol_violation";

export class BridgeError extends Error {
  readonly code: BridgeErrorCode;

  constructor(code: BridgeErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "BridgeError";
    this.code = code;
  }
}

/** Missing or malformed startup arguments; the process never starts serving */
export class StartupConfigError extends BridgeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("startup_config", message, options);
    this.name = "StartupConfigError";
  }
}

/** The listener could not bind or stopped serving */
export class ListenError extends BridgeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("listen", message, options);
    this.name = "ListenError";
  }
}

export class UpgradeError extends BridgeError {
  status: number;

  constructor(message: string, status = 400, options?: { cause?: unknown }) {
    super("upgrade", message, options);
    this.name = "UpgradeError";
    this.status = status;
  }
}

export class DialError extends BridgeError {
  target: string;

  constructor(target: string, message: string, options?: { cause?: unknown }) {
    super("dial", message, options);
    this.name = "DialError";
    this.target = target;
  }
}

export type RelayDirection = "tcp->ws" | "ws->tcp";

export class RelayIOError extends BridgeError {
  direction: RelayDirection;

  constructor(direction: RelayDirection, message: string, options?: { cause?: unknown }) {
    super("relay_io", message, options);
    this.name = "RelayIOError";
    this.direction = direction;
  }
}

/** A peer sent something the relay does not forward (e.g. a text frame) */
export class ProtocolViolationError extends BridgeError {
  constructor(message: string) {
    super("protocol_violation", message);
    this.name = "ProtocolViolationError";
  }
}

export function errorMessage(err: unknown) {
  return err instanceof Error ? err.message : String(err);
}
