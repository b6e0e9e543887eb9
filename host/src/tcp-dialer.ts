import net from "net";

import { dialHost, formatHostPort, type HostPort } from "./address";
import { DialError, errorMessage } from "./errors";

export type DialOptions = {
  /** Abort the connect after this many ms; unset or <= 0 waits for the OS */
  timeoutMs?: number;
};

/**
 * Open one TCP connection to `target`.
 *
 * Resolves once the socket is connected; rejects with {@link DialError}
 * otherwise. The returned socket has no error listener attached.
 */
export function dialTcp(target: HostPort, options: DialOptions = {}): Promise<net.Socket> {
  const label = formatHostPort(target);
  const timeoutMs = options.timeoutMs ?? 0;

  return new Promise<net.Socket>((resolve, reject) => {
    const socket = net.connect({ host: dialHost(target), port: target.port });
    let settled = false;
    let timer: NodeJS.Timeout | null = null;

    const cleanup = () => {
      if (timer) {
        clearTimeout(timer);
        timer = null;
      }
      socket.off("error", onError);
      socket.off("connect", onConnect);
    };

    const settleReject = (err: DialError) => {
      if (settled) return;
      settled = true;
      cleanup();
      socket.destroy();
      reject(err);
    };

    const onError = (err: Error) => {
      settleReject(
        new DialError(label, `Error connecting to target ${label}: ${errorMessage(err)}`, { cause: err })
      );
    };

    const onConnect = () => {
      if (settled) return;
      settled = true;
      cleanup();
      socket.setNoDelay(true);
      resolve(socket);
    };

    if (Number.isFinite(timeoutMs) && timeoutMs > 0) {
      timer = setTimeout(() => {
        settleReject(
          new DialError(label, `Error connecting to target ${label}: timeout after ${timeoutMs}ms`)
        );
      }, timeoutMs);
    }

    socket.once("error", onError);
    socket.once("connect", onConnect);
  });
}
