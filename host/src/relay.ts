import net from "net";
import { EventEmitter } from "events";

import { WebSocket, type RawData } from "ws";

import type { DebugLogFn } from "./debug";
import {
  BridgeError,
  ProtocolViolationError,
  RelayIOError,
  errorMessage,
  type RelayDirection,
} from "./errors";

export const DEFAULT_READ_CHUNK_BYTES = 64 * 1024;
export const DEFAULT_MAX_BUFFERED_BYTES = 4 * 1024 * 1024;
const TCP_CLOSE_TIMEOUT_MS = 1000;

const CLOSE_NORMAL = 1000;
const CLOSE_GOING_AWAY = 1001;
const CLOSE_NO_STATUS = 1005;
const CLOSE_INTERNAL_ERROR = 1011;

export type RelayState = "established" | "relaying" | "tearing-down" | "closed";

export type RelaySessionOptions = {
  id: number;
  /** Client address, used in log lines */
  remoteAddress?: string;
  readChunkBytes?: number;
  /** Pause TCP reads while the WebSocket send buffer holds more than this */
  maxBufferedBytes?: number;
  debugLog?: DebugLogFn;
};

type TeardownReason = {
  code: number;
  /** Drop both connections without a close handshake or flush */
  force?: boolean;
};

/**
 * One bridged connection: an upgraded WebSocket plus the TCP socket dialed
 * for it.
 *
 * Bytes from TCP go out as binary messages; binary messages go to TCP
 * verbatim. Whichever side ends first tears both down, and `done` resolves
 * once both sockets have reported `close`.
 */
export class RelaySession extends EventEmitter {
  readonly id: number;
  readonly remoteAddress: string;
  readonly done: Promise<void>;

  onError?: (error: BridgeError) => void;

  private readonly readChunkBytes: number;
  private readonly maxBufferedBytes: number;
  private readonly debugLog: DebugLogFn | null;
  private state: RelayState = "established";
  private wsClosed = false;
  private tcpClosed = false;
  private errorReported = false;
  private pausedForWsBackpressure = false;
  private pausedForTcpBackpressure = false;
  private tcpCloseTimer: NodeJS.Timeout | null = null;
  private resolveDone: () => void = () => {};

  constructor(
    private readonly ws: WebSocket,
    private readonly tcp: net.Socket,
    options: RelaySessionOptions
  ) {
    super();
    this.id = options.id;
    this.remoteAddress = options.remoteAddress ?? "unknown";
    this.readChunkBytes = Math.max(1, options.readChunkBytes ?? DEFAULT_READ_CHUNK_BYTES);
    this.maxBufferedBytes = options.maxBufferedBytes ?? DEFAULT_MAX_BUFFERED_BYTES;
    this.debugLog = options.debugLog ?? null;
    this.done = new Promise<void>((resolve) => {
      this.resolveDone = resolve;
    });
  }

  getState() {
    return this.state;
  }

  start() {
    if (this.state !== "established") return;
    this.setState("relaying");

    this.tcp.on("data", (chunk: Buffer) => this.forwardToWs(chunk));
    this.tcp.on("end", () => {
      this.log("relay", "target closed the connection");
      this.teardown({ code: CLOSE_NORMAL });
    });
    this.tcp.on("error", (err) => {
      this.fail("tcp->ws", `TCP read error: ${errorMessage(err)}`, err);
    });
    this.tcp.on("close", () => {
      this.tcpClosed = true;
      this.clearTcpCloseTimer();
      this.teardown({ code: CLOSE_NORMAL });
      this.maybeFinish();
    });

    this.ws.on("message", (data, isBinary) => this.forwardToTcp(data, isBinary));
    this.ws.on("error", (err) => {
      this.fail("ws->tcp", `WebSocket read error: ${errorMessage(err)}`, err);
    });
    this.ws.on("close", (code) => {
      this.wsClosed = true;
      if (code === CLOSE_NORMAL || code === CLOSE_GOING_AWAY || code === CLOSE_NO_STATUS) {
        this.log("relay", `client closed the connection (code ${code})`);
        this.teardown({ code: CLOSE_NORMAL });
      } else {
        const message = `WebSocket closed abnormally (code ${code})`;
        this.fail("ws->tcp", message, new Error(message));
      }
      this.maybeFinish();
    });

    // The server pauses the socket between upgrade and dial so no message is lost.
    if (this.ws.isPaused) {
      this.ws.resume();
    }
  }

  /** Drop both connections immediately (used on server shutdown) */
  terminate() {
    if (this.state === "established") {
      this.setState("relaying");
    }
    this.teardown({ code: CLOSE_GOING_AWAY, force: true });
  }

  private forwardToWs(chunk: Buffer) {
    if (this.state !== "relaying") return;
    if (chunk.length === 0) return;

    for (let offset = 0; offset < chunk.length; offset += this.readChunkBytes) {
      const slice = chunk.subarray(offset, offset + this.readChunkBytes);
      this.sendBinary(slice);
    }

    if (!this.pausedForWsBackpressure && this.ws.bufferedAmount > this.maxBufferedBytes) {
      this.pausedForWsBackpressure = true;
      this.tcp.pause();
    }
  }

  private sendBinary(data: Buffer) {
    if (this.ws.readyState !== WebSocket.OPEN) return;
    this.ws.send(data, { binary: true }, (err) => {
      if (err) {
        this.fail("tcp->ws", `WebSocket write error: ${errorMessage(err)}`, err);
        return;
      }
      if (this.pausedForWsBackpressure && this.ws.bufferedAmount <= this.maxBufferedBytes) {
        this.pausedForWsBackpressure = false;
        if (this.state === "relaying") this.tcp.resume();
      }
    });
  }

  private forwardToTcp(data: RawData, isBinary: boolean) {
    if (this.state !== "relaying") return;

    if (!isBinary) {
      this.onError?.(
        new ProtocolViolationError(`non-binary message received from ${this.remoteAddress}`)
      );
      return;
    }

    const payload = toBuffer(data);
    if (payload.length === 0 || !this.tcp.writable) return;

    const flushed = this.tcp.write(payload, (err) => {
      if (err) {
        this.fail("ws->tcp", `TCP write error: ${errorMessage(err)}`, err);
      }
    });

    if (!flushed && !this.pausedForTcpBackpressure) {
      this.pausedForTcpBackpressure = true;
      this.ws.pause();
      this.tcp.once("drain", () => {
        this.pausedForTcpBackpressure = false;
        if (this.state === "relaying") this.ws.resume();
      });
    }
  }

  private fail(direction: RelayDirection, message: string, cause: unknown) {
    // Errors that follow teardown are side effects of closing, not new failures.
    if (!this.errorReported && this.state === "relaying") {
      this.errorReported = true;
      this.onError?.(new RelayIOError(direction, message, { cause }));
    }
    this.teardown({ code: CLOSE_INTERNAL_ERROR });
  }

  private teardown(reason: TeardownReason) {
    if (this.state === "tearing-down" || this.state === "closed") {
      if (reason.force) this.destroyBoth();
      return;
    }
    this.setState("tearing-down");
    this.log("session", `session ${this.id} tearing down (code ${reason.code})`);

    if (reason.force) {
      this.destroyBoth();
      return;
    }

    if (!this.tcpClosed) {
      this.tcpCloseTimer = setTimeout(() => {
        this.tcpCloseTimer = null;
        this.tcp.destroy();
      }, TCP_CLOSE_TIMEOUT_MS);
      this.tcpCloseTimer.unref();
      this.tcp.end(() => {
        this.tcp.destroy();
      });
    }

    if (this.ws.readyState === WebSocket.OPEN) {
      // Let the client's close frame be read even if we paused for backpressure.
      if (this.ws.isPaused) this.ws.resume();
      this.ws.close(reason.code);
    } else if (this.ws.readyState === WebSocket.CONNECTING) {
      this.ws.terminate();
    }
  }

  private destroyBoth() {
    this.clearTcpCloseTimer();
    this.tcp.destroy();
    this.ws.terminate();
  }

  private clearTcpCloseTimer() {
    if (!this.tcpCloseTimer) return;
    clearTimeout(this.tcpCloseTimer);
    this.tcpCloseTimer = null;
  }

  private maybeFinish() {
    if (!this.wsClosed || !this.tcpClosed || this.state === "closed") return;
    this.setState("closed");
    this.log("session", `session ${this.id} closed (${this.remoteAddress})`);
    this.resolveDone();
  }

  private setState(state: RelayState) {
    this.state = state;
    this.emit("state", state);
  }

  private log(component: "relay" | "session", message: string) {
    this.debugLog?.(component, message);
  }
}

function toBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}
