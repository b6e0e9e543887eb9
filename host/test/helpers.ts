import http from "node:http";
import net from "node:net";
import { once } from "node:events";

import { WebSocket, type ClientOptions, type RawData } from "ws";

export async function withTimeout<T>(promise: Promise<T>, ms = 5000): Promise<T> {
  let timer: NodeJS.Timeout | null = null;
  const timeout = new Promise<T>((_, reject) => {
    timer = setTimeout(() => {
      reject(new Error("timeout waiting for response"));
    }, ms);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}

export function portOf(address: net.AddressInfo | string | null): number {
  if (!address || typeof address === "string") {
    throw new Error("server is not listening on a TCP port");
  }
  return address.port;
}

export type TargetServer = {
  port: number;
  connections: net.Socket[];
  nextConnection(): Promise<net.Socket>;
  close(): Promise<void>;
};

/** In-process TCP service standing in for the bridged target */
export async function startTarget(): Promise<TargetServer> {
  const connections: net.Socket[] = [];
  const pending: net.Socket[] = [];
  const waiters: Array<(socket: net.Socket) => void> = [];

  const server = net.createServer((socket) => {
    connections.push(socket);
    socket.on("error", () => {
      // reset by the bridge during teardown
    });
    const waiter = waiters.shift();
    if (waiter) {
      waiter(socket);
    } else {
      pending.push(socket);
    }
  });
  server.listen(0, "127.0.0.1");
  await once(server, "listening");

  return {
    port: portOf(server.address()),
    connections,
    nextConnection() {
      const socket = pending.shift();
      if (socket) return Promise.resolve(socket);
      return new Promise<net.Socket>((resolve) => waiters.push(resolve));
    },
    close() {
      for (const socket of connections) socket.destroy();
      return new Promise<void>((resolve) => server.close(() => resolve()));
    },
  };
}

/** A port nothing listens on (bound once, then released) */
export async function unusedPort(): Promise<number> {
  const server = net.createServer();
  server.listen(0, "127.0.0.1");
  await once(server, "listening");
  const port = portOf(server.address());
  await new Promise<void>((resolve) => server.close(() => resolve()));
  return port;
}

/** Accumulate bytes from `socket` until at least `length` arrived */
/** Poll until something accepts TCP connections on `port` */
export async function waitForListening(port: number, attempts = 100): Promise<void> {
  for (let attempt = 0; attempt < attempts; attempt++) {
    const accepted = await new Promise<boolean>((resolve) => {
      const socket = net.connect({ host: "127.0.0.1", port });
      socket.once("connect", () => {
        socket.destroy();
        resolve(true);
      });
      socket.once("error", () => resolve(false));
    });
    if (accepted) return;
    await new Promise((resolve) => setTimeout(resolve, 100));
  }
  throw new Error(`nothing listening on port ${port}`);
}

export function readBytes(socket: net.Socket, length: number): Promise<Buffer> {
  return new Promise<Buffer>((resolve, reject) => {
    const chunks: Buffer[] = [];
    let total = 0;
    const onData = (chunk: Buffer) => {
      chunks.push(chunk);
      total += chunk.length;
      if (total >= length) {
        cleanup();
        resolve(Buffer.concat(chunks));
      }
    };
    const onClose = () => {
      cleanup();
      reject(new Error(`socket closed after ${total} of ${length} bytes`));
    };
    const cleanup = () => {
      socket.off("data", onData);
      socket.off("close", onClose);
    };
    socket.on("data", onData);
    socket.on("close", onClose);
  });
}

export function waitForClose(socket: net.Socket): Promise<void> {
  if (socket.destroyed) return Promise.resolve();
  return new Promise<void>((resolve) => socket.once("close", () => resolve()));
}

export type ReceivedMessage = { data: Buffer; isBinary: boolean };

export type TestClient = {
  ws: WebSocket;
  messages: ReceivedMessage[];
  /** Wait until the binary payloads received so far add up to `length` bytes */
  waitForBytes(length: number): Promise<Buffer>;
  closed: Promise<number>;
};

function toBuffer(data: RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

export function trackClient(ws: WebSocket): TestClient {
  const messages: ReceivedMessage[] = [];
  let listeners: Array<() => void> = [];

  ws.on("message", (data, isBinary) => {
    messages.push({ data: toBuffer(data), isBinary });
    for (const listener of listeners) listener();
  });

  const closed = new Promise<number>((resolve) => {
    ws.once("close", (code) => resolve(code));
  });

  const received = () => Buffer.concat(messages.map((message) => message.data));

  return {
    ws,
    messages,
    closed,
    waitForBytes(length) {
      return new Promise<Buffer>((resolve) => {
        const check = () => {
          const bytes = received();
          if (bytes.length >= length) {
            listeners = listeners.filter((listener) => listener !== check);
            resolve(bytes);
          }
        };
        listeners.push(check);
        check();
      });
    },
  };
}

/** Open a client and resolve once the handshake completed */
export async function connectClient(
  url: string,
  protocols: string[] = [],
  options: ClientOptions = {}
): Promise<TestClient> {
  const ws = new WebSocket(url, protocols, options);
  const client = trackClient(ws);
  await new Promise<void>((resolve, reject) => {
    ws.once("open", () => resolve());
    ws.once("error", reject);
  });
  ws.on("error", () => {
    // surfaced through `closed`
  });
  return client;
}

/**
 * Attempt a handshake and report how it ended, without throwing.
 */
export function tryConnect(url: string, options: ClientOptions = {}): Promise<"open" | Error> {
  const ws = new WebSocket(url, options);
  return new Promise((resolve) => {
    ws.once("open", () => {
      ws.terminate();
      resolve("open");
    });
    ws.once("error", (err) => resolve(err));
  });
}

export type HttpResult = {
  status: number;
  headers: http.IncomingHttpHeaders;
  body: string;
};

export function httpRequest(
  port: number,
  path: string,
  options: { method?: string; headers?: http.OutgoingHttpHeaders } = {}
): Promise<HttpResult> {
  return new Promise<HttpResult>((resolve, reject) => {
    const req = http.request(
      { host: "127.0.0.1", port, path, method: options.method ?? "GET", headers: options.headers },
      (res) => {
        const chunks: Buffer[] = [];
        res.on("data", (chunk: Buffer) => chunks.push(chunk));
        res.on("end", () => {
          resolve({
            status: res.statusCode ?? 0,
            headers: res.headers,
            body: Buffer.concat(chunks).toString("utf8"),
          });
        });
        res.on("error", reject);
      }
    );
    req.on("error", reject);
    req.end();
  });
}

/** Send raw request bytes and collect everything until the server closes */
export function rawRequest(port: number, request: string): Promise<string> {
  return new Promise<string>((resolve, reject) => {
    const socket = net.connect({ host: "127.0.0.1", port });
    const chunks: Buffer[] = [];
    socket.on("data", (chunk) => chunks.push(chunk));
    socket.on("error", reject);
    socket.on("close", () => resolve(Buffer.concat(chunks).toString("utf8")));
    socket.on("connect", () => socket.write(request));
  });
}
