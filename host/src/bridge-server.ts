import http from "http";
import https from "https";
import net from "net";
import type { Duplex } from "stream";
import { EventEmitter } from "events";

import { WebSocketServer, WebSocket, type VerifyClientCallbackAsync } from "ws";

import { formatHost, formatHostPort, parseHostPort, type HostPort } from "./address";
import {
  createDebugLog,
  defaultDebugLog,
  resolveDebugFlags,
  type DebugConfig,
  type DebugFlag,
  type DebugLogFn,
} from "./debug";
import {
  BridgeError,
  ListenError,
  ProtocolViolationError,
  RelayIOError,
  StartupConfigError,
  UpgradeError,
  errorMessage,
} from "./errors";
import { DEFAULT_ORIGIN_POLICY, isOriginAllowed, type OriginPolicy } from "./origin-policy";
import { DEFAULT_MAX_BUFFERED_BYTES, DEFAULT_READ_CHUNK_BYTES, RelaySession } from "./relay";
import { SessionGate } from "./session-gate";
import { createStaticFileHandler, type StaticFileHandler } from "./static-files";
import { dialTcp } from "./tcp-dialer";

/** Subprotocol that binary WebSocket-to-TCP clients such as noVNC offer */
export const DEFAULT_SUBPROTOCOL = "binary";
const DEFAULT_HOST = "127.0.0.1";
const DEFAULT_PORT = 8080;
const STOP_TIMEOUT_MS = 1000;

function resolveEnvNumber(name: string, fallback: number | undefined) {
  const raw = process.env[name];
  if (!raw) return fallback;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed) || parsed <= 0) return fallback;
  return parsed;
}

export type TlsMaterial = {
  cert: string | Buffer;
  key: string | Buffer;
};

export type BridgeServerOptions = {
  /** Listen host; empty string binds every interface */
  host?: string;
  port?: number;
  /** TCP service every session is bridged to (`host:port` or parsed) */
  target: string | HostPort;
  /** Admit a single session, then stop and emit `done` */
  runOnce?: boolean;
  /** Serve static files from this directory for non-upgrade requests */
  webDir?: string;
  tls?: TlsMaterial;
  originPolicy?: OriginPolicy;
  subprotocol?: string;
  readChunkBytes?: number;
  maxBufferedBytes?: number;
  dialTimeoutMs?: number;
  debug?: DebugConfig;
  debugLog?: DebugLogFn;
};

export type ResolvedBridgeServerOptions = {
  host: string;
  port: number;
  target: HostPort;
  runOnce: boolean;
  webDir?: string;
  tls?: TlsMaterial;
  originPolicy: OriginPolicy;
  subprotocol: string;
  readChunkBytes: number;
  maxBufferedBytes: number;
  dialTimeoutMs?: number;
  debugFlags: ReadonlySet<DebugFlag>;
  debugLog: DebugLogFn;
};

export type BridgeServerAddress = {
  host: string;
  port: number;
  url: string;
};

export function resolveBridgeServerOptions(options: BridgeServerOptions): ResolvedBridgeServerOptions {
  const target =
    typeof options.target === "string" ? parseHostPort(options.target, "target address") : options.target;
  if (target.port === 0) {
    throw new StartupConfigError(`target address ${formatHostPort(target)} needs a port`);
  }

  const port = options.port ?? DEFAULT_PORT;
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new StartupConfigError(`invalid listen port ${port}`);
  }

  const subprotocol = options.subprotocol ?? DEFAULT_SUBPROTOCOL;
  if (!/^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/.test(subprotocol)) {
    throw new StartupConfigError(`invalid subprotocol ${JSON.stringify(subprotocol)}`);
  }

  const readChunkBytes = positiveInteger(
    "readChunkBytes",
    options.readChunkBytes ??
      resolveEnvNumber("WSBRIDGE_READ_CHUNK_BYTES", DEFAULT_READ_CHUNK_BYTES) ??
      DEFAULT_READ_CHUNK_BYTES
  );
  const maxBufferedBytes = positiveInteger("maxBufferedBytes", options.maxBufferedBytes ?? DEFAULT_MAX_BUFFERED_BYTES);

  return {
    host: options.host ?? DEFAULT_HOST,
    port,
    target,
    runOnce: options.runOnce ?? false,
    webDir: options.webDir || undefined,
    tls: options.tls,
    originPolicy: options.originPolicy ?? DEFAULT_ORIGIN_POLICY,
    subprotocol,
    readChunkBytes,
    maxBufferedBytes,
    dialTimeoutMs: options.dialTimeoutMs ?? resolveEnvNumber("WSBRIDGE_DIAL_TIMEOUT_MS", undefined),
    debugFlags: resolveDebugFlags(options.debug),
    debugLog: options.debugLog ?? defaultDebugLog,
  };
}

function positiveInteger(name: string, value: number) {
  if (!Number.isInteger(value) || value < 1) {
    throw new StartupConfigError(`invalid ${name} ${value}`);
  }
  return value;
}

/** Whether the `Connection` header asks for a protocol upgrade */
export function wantsUpgrade(headers: http.IncomingHttpHeaders) {
  const connection = headers.connection;
  return typeof connection === "string" && connection.toLowerCase().includes("upgrade");
}

/**
 * HTTP(S) listener that bridges every WebSocket connection to a new TCP
 * connection to the configured target, optionally serving static files for
 * plain requests on the same port.
 *
 * Events:
 * - `log` (message): warnings and errors, one line each
 * - `error` (err): per-session failures; already mirrored to `log`
 * - `session` (session): a relay session started
 * - `done`: run-once mode finished its session and the listener is closed
 */
export class BridgeServer extends EventEmitter {
  private readonly options: ResolvedBridgeServerOptions;
  private readonly gate: SessionGate;
  private readonly staticHandler: StaticFileHandler | null;
  private readonly wss: WebSocketServer;
  private readonly debug: DebugLogFn;
  private server: http.Server | null = null;
  private sessions = new Set<RelaySession>();
  private startPromise: Promise<BridgeServerAddress> | null = null;
  private stopPromise: Promise<void> | null = null;
  private address: BridgeServerAddress | null = null;
  private nextSessionId = 1;

  constructor(options: BridgeServerOptions) {
    super();
    this.on("error", (err) => {
      this.emit("log", `[error] ${errorMessage(err)}`);
    });

    this.options = resolveBridgeServerOptions(options);
    this.debug = createDebugLog(this.options.debugFlags, this.options.debugLog);
    this.gate = new SessionGate(this.options.runOnce);
    this.staticHandler = this.options.webDir
      ? createStaticFileHandler(this.options.webDir, { debugLog: this.debug })
      : null;

    const subprotocol = this.options.subprotocol;
    const verifyClient: VerifyClientCallbackAsync = (info, done) => {
      if (!isOriginAllowed(this.options.originPolicy, info.req.headers)) {
        this.emit("error", new UpgradeError(`Error upgrading to WebSocket: origin ${info.origin} not allowed`, 403));
        done(false, 403, "Forbidden");
        return;
      }
      done(true);
    };
    this.wss = new WebSocketServer({
      noServer: true,
      handleProtocols: (protocols) => (protocols.has(subprotocol) ? subprotocol : false),
      verifyClient,
    });

    // With a listener attached, ws leaves the failed handshake's socket to us.
    this.wss.on("wsClientError", (err, socket) => {
      this.emit("error", new UpgradeError(`Error upgrading to WebSocket: ${err.message}`, 400, { cause: err }));
      rejectUpgrade(socket, 400, err.message);
    });
  }

  getOptions(): Readonly<ResolvedBridgeServerOptions> {
    return this.options;
  }

  getAddress() {
    return this.address;
  }

  getUrl() {
    return this.address?.url ?? null;
  }

  getSessions(): ReadonlySet<RelaySession> {
    return this.sessions;
  }

  async start(): Promise<BridgeServerAddress> {
    if (this.startPromise) return this.startPromise;

    this.startPromise = this.startInternal().finally(() => {
      this.startPromise = null;
    });

    return this.startPromise;
  }

  async stop(): Promise<void> {
    if (this.stopPromise) return this.stopPromise;

    this.stopPromise = this.stopInternal().finally(() => {
      this.stopPromise = null;
    });

    return this.stopPromise;
  }

  private async startInternal(): Promise<BridgeServerAddress> {
    if (this.server && this.address) {
      return this.address;
    }

    const tls = this.options.tls;
    const server: http.Server = tls
      ? https.createServer({ cert: tls.cert, key: tls.key })
      : http.createServer();
    this.server = server;

    server.on("request", (req, res) => this.handleRequest(req, res));
    server.on("upgrade", (req, socket, head) => this.handleUpgrade(req, socket, head));

    const address = await new Promise<BridgeServerAddress>((resolve, reject) => {
      const handleError = (err: Error) => {
        cleanup();
        this.server = null;
        const label = formatHostPort({ host: this.options.host, port: this.options.port });
        reject(new ListenError(`listen ${label}: ${err.message}`, { cause: err }));
      };

      const handleListening = () => {
        cleanup();
        const resolved = resolveAddress(this.options.host, server.address(), Boolean(tls));
        this.address = resolved;
        resolve(resolved);
      };

      const cleanup = () => {
        server.off("error", handleError);
        server.off("listening", handleListening);
      };

      server.once("error", handleError);
      server.once("listening", handleListening);
      server.listen(this.options.port, this.options.host || undefined);
    });

    server.on("error", (err) => {
      this.emit("error", new ListenError(`server error: ${err.message}`, { cause: err }));
    });

    return address;
  }

  private async stopInternal() {
    for (const session of this.sessions) {
      session.terminate();
    }

    const server = this.server;
    if (server) {
      await new Promise<void>((resolve) => {
        let finished = false;
        const finish = () => {
          if (finished) return;
          finished = true;
          clearTimeout(timeout);
          resolve();
        };

        const timeout = setTimeout(() => {
          finish();
        }, STOP_TIMEOUT_MS);

        server.close(() => finish());
        server.closeAllConnections();
      });
    }
    this.server = null;
    this.address = null;
  }

  private handleRequest(req: http.IncomingMessage, res: http.ServerResponse) {
    if (this.gate.isRefusing()) {
      this.debug("http", `refusing ${req.method} ${req.url}: run-once session already admitted`);
      req.socket.destroy();
      return;
    }

    const staticHandler = this.staticHandler;
    if (staticHandler && !wantsUpgrade(req.headers)) {
      this.debug("http", `serving file ${req.url}`);
      void staticHandler(req, res);
      return;
    }

    // Everything else is an upgrade attempt, and a plain request can't complete one.
    if (!this.gate.tryAdmit()) {
      req.socket.destroy();
      return;
    }
    const message = "the client is not using the websocket protocol";
    this.emit("error", new UpgradeError(`Error upgrading to WebSocket: ${message}`, 400));
    res.writeHead(400, {
      "content-type": "text/plain; charset=utf-8",
      "sec-websocket-version": "13",
      connection: "close",
    });
    res.end("Bad Request\n", () => this.finishAttempt());
  }

  private handleUpgrade(req: http.IncomingMessage, socket: Duplex, head: Buffer) {
    if (!this.gate.tryAdmit()) {
      this.debug("http", `refusing upgrade ${req.url}: run-once session already admitted`);
      socket.destroy();
      return;
    }

    this.runSession(req, socket, head)
      .catch((err) => {
        this.emit("error", err instanceof Error ? err : new Error(String(err)));
      })
      .finally(() => this.finishAttempt());
  }

  private async runSession(req: http.IncomingMessage, socket: Duplex, head: Buffer) {
    const ws = await this.upgrade(req, socket, head);
    if (!ws) return;

    const remoteAddress = formatRemote(req.socket);
    const id = this.nextSessionId++;
    this.debug("session", `received connection ${id} from ${remoteAddress}`);

    // Hold inbound messages until the relay is listening.
    ws.pause();
    const onEarlyError = (err: Error) => {
      this.emit("error", new RelayIOError("ws->tcp", `WebSocket read error: ${err.message}`, { cause: err }));
    };
    ws.on("error", onEarlyError);

    let tcp: net.Socket;
    try {
      tcp = await dialTcp(this.options.target, { timeoutMs: this.options.dialTimeoutMs });
    } catch (err) {
      this.emit("error", err instanceof Error ? err : new Error(String(err)));
      await closeWebSocket(ws, 1011);
      return;
    }

    ws.off("error", onEarlyError);
    if (ws.readyState !== WebSocket.OPEN) {
      this.debug("session", `client ${remoteAddress} went away before the target answered`);
      tcp.destroy();
      return;
    }

    this.debug("session", `connected ${remoteAddress} to ${formatHostPort(this.options.target)}`);
    const session = new RelaySession(ws, tcp, {
      id,
      remoteAddress,
      readChunkBytes: this.options.readChunkBytes,
      maxBufferedBytes: this.options.maxBufferedBytes,
      debugLog: this.debug,
    });
    session.onError = (err) => this.reportSessionError(err);

    this.sessions.add(session);
    this.emit("session", session);
    session.start();
    try {
      await session.done;
    } finally {
      this.sessions.delete(session);
    }
  }

  private upgrade(req: http.IncomingMessage, socket: Duplex, head: Buffer): Promise<WebSocket | null> {
    return new Promise<WebSocket | null>((resolve) => {
      // A rejected handshake ends with the socket closed and no callback.
      const onClose = () => resolve(null);
      socket.once("close", onClose);
      this.wss.handleUpgrade(req, socket, head, (ws) => {
        socket.off("close", onClose);
        resolve(ws);
      });
    });
  }

  private finishAttempt() {
    if (!this.options.runOnce) return;
    this.stop().then(
      () => this.emit("done"),
      (err) => this.emit("error", err instanceof Error ? err : new Error(String(err)))
    );
  }

  private reportSessionError(err: BridgeError) {
    if (err instanceof ProtocolViolationError) {
      this.emit("log", `[warn] ${err.message}`);
      return;
    }
    this.emit("error", err);
  }
}

function rejectUpgrade(socket: Duplex, status: number, message: string) {
  const statusText = status === 400 ? "Bad Request" : "Error";
  const body = `${message}\n`;
  socket.end(
    [
      `HTTP/1.1 ${status} ${statusText}`,
      "Content-Type: text/plain; charset=utf-8",
      `Content-Length: ${Buffer.byteLength(body)}`,
      "Sec-WebSocket-Version: 13",
      "Connection: close",
      "\r\n",
    ].join("\r\n") + body
  );
  socket.once("finish", () => socket.destroy());
}

function closeWebSocket(ws: WebSocket, code: number): Promise<void> {
  return new Promise<void>((resolve) => {
    if (ws.readyState === WebSocket.CLOSED) {
      resolve();
      return;
    }
    ws.once("close", () => resolve());
    if (ws.isPaused) ws.resume();
    ws.close(code);
  });
}

function formatRemote(socket: net.Socket) {
  const host = socket.remoteAddress;
  if (!host) return "unknown";
  return `${formatHost(host)}:${socket.remotePort ?? 0}`;
}

function resolveAddress(
  host: string,
  address: net.AddressInfo | string | null,
  secure: boolean
): BridgeServerAddress {
  const scheme = secure ? "wss" : "ws";
  if (!address || typeof address === "string") {
    return {
      host,
      port: 0,
      url: `${scheme}://${formatHost(host)}`,
    };
  }

  const resolvedHost = host || address.address;
  return {
    host: resolvedHost,
    port: address.port,
    url: `${scheme}://${formatHost(resolvedHost)}:${address.port}`,
  };
}
