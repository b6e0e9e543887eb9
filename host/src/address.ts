import net from "net";

import { StartupConfigError } from "./errors";

export type HostPort = {
  /** Empty string means "unspecified" (all interfaces for listen, localhost for dial) */
  host: string;
  port: number;
};

/**
 * Parse a `host:port`, `:port` or `[v6]:port` address.
 */
export function parseHostPort(value: string, field = "address"): HostPort {
  const raw = value.trim();
  if (!raw) {
    throw new StartupConfigError(`${field} is empty`);
  }

  let host: string;
  let portPart: string;

  if (raw.startsWith("[")) {
    const end = raw.indexOf("]");
    if (end === -1 || raw[end + 1] !== ":") {
      throw new StartupConfigError(`invalid ${field} ${JSON.stringify(value)} (expected [HOST]:PORT)`);
    }
    host = raw.slice(1, end);
    portPart = raw.slice(end + 2);
    if (!net.isIPv6(host)) {
      throw new StartupConfigError(`invalid ${field} ${JSON.stringify(value)} (bracketed host must be IPv6)`);
    }
  } else {
    const colon = raw.lastIndexOf(":");
    if (colon === -1) {
      throw new StartupConfigError(`invalid ${field} ${JSON.stringify(value)} (missing port)`);
    }
    host = raw.slice(0, colon);
    portPart = raw.slice(colon + 1);
    if (host.includes(":")) {
      throw new StartupConfigError(`invalid ${field} ${JSON.stringify(value)} (IPv6 hosts need [brackets])`);
    }
  }

  if (!/^\d+$/.test(portPart)) {
    throw new StartupConfigError(`invalid ${field} ${JSON.stringify(value)} (bad port)`);
  }
  const port = Number(portPart);
  if (port > 65535) {
    throw new StartupConfigError(`invalid ${field} ${JSON.stringify(value)} (port out of range)`);
  }

  return { host, port };
}

export function formatHost(host: string) {
  return host.includes(":") ? `[${host}]` : host;
}

export function formatHostPort(address: HostPort) {
  return `${formatHost(address.host)}:${address.port}`;
}

/** Host to dial when the target leaves it unspecified */
export function dialHost(address: HostPort) {
  return address.host || "localhost";
}
