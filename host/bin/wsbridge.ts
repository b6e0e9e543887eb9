#!/usr/bin/env node
import fs from "fs";

import { parseHostPort } from "../src/address";
import { BridgeServer, DEFAULT_SUBPROTOCOL, type BridgeServerOptions } from "../src/bridge-server";
import { formatDebugLine, stripTrailingNewline } from "../src/debug";
import { StartupConfigError, errorMessage } from "../src/errors";
import { describeOriginPolicy, type OriginPolicy } from "../src/origin-policy";

const USAGE_LINE = "Usage: wsbridge [options] <listen_addr> <target_addr>";

export type CliArgs = {
  help: boolean;
  verbose: boolean;
  runOnce: boolean;
  dev: boolean;
  origins: string[];
  cert?: string;
  key?: string;
  webDir?: string;
  subprotocol?: string;
  positionals: string[];
};

const VALUE_FLAGS = new Set(["cert", "key", "web", "origin", "subprotocol"]);

function parseBool(name: string, value: string): boolean {
  if (value === "true" || value === "1") return true;
  if (value === "false" || value === "0") return false;
  throw new StartupConfigError(`invalid boolean value ${JSON.stringify(value)} for -${name}`);
}

export function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = {
    help: false,
    verbose: false,
    runOnce: false,
    dev: false,
    origins: [],
    positionals: [],
  };

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (arg === "--") {
      args.positionals.push(...argv.slice(i + 1));
      break;
    }
    if (!arg.startsWith("-") || arg === "-") {
      args.positionals.push(arg);
      continue;
    }

    // Accept -flag, --flag, -flag=value and -flag value.
    const body = arg.replace(/^--?/, "");
    const eq = body.indexOf("=");
    const name = eq === -1 ? body : body.slice(0, eq);
    let inline = eq === -1 ? undefined : body.slice(eq + 1);

    let value = "";
    if (VALUE_FLAGS.has(name)) {
      if (inline === undefined) {
        const next = argv[i + 1];
        if (next === undefined) {
          throw new StartupConfigError(`flag needs an argument: -${name}`);
        }
        i += 1;
        inline = next;
      }
      value = inline;
    }

    switch (name) {
      case "h":
      case "help":
        args.help = inline === undefined ? true : parseBool(name, inline);
        break;
      case "v":
        args.verbose = inline === undefined ? true : parseBool(name, inline);
        break;
      case "run-once":
        args.runOnce = inline === undefined ? true : parseBool(name, inline);
        break;
      case "dev":
        args.dev = inline === undefined ? true : parseBool(name, inline);
        break;
      case "cert":
        args.cert = value;
        break;
      case "key":
        args.key = value;
        break;
      case "web":
        args.webDir = value;
        break;
      case "origin":
        args.origins.push(value);
        break;
      case "subprotocol":
        args.subprotocol = value;
        break;
      default:
        throw new StartupConfigError(`flag provided but not defined: -${name}`);
    }
  }

  return args;
}

export function usage() {
  console.log(USAGE_LINE);
  console.log();
  console.log("Bridge WebSocket clients on LISTEN_ADDR to the TCP service at TARGET_ADDR.");
  console.log("Addresses are HOST:PORT, :PORT or [IPV6]:PORT.");
  console.log();
  console.log("Options:");
  console.log("  -h                 Print help");
  console.log("  -v                 Enable verbose logging");
  console.log("  -cert PATH         SSL certificate file");
  console.log("  -key PATH          SSL private key file");
  console.log("  -web DIR           Serve files from DIR");
  console.log("  -run-once          Handle a single WebSocket connection and exit");
  console.log("  -origin ORIGIN     Allow browser ORIGIN (can repeat; default same origin)");
  console.log("  -dev               Development mode: accept any origin");
  console.log(`  -subprotocol NAME  WebSocket subprotocol (default ${DEFAULT_SUBPROTOCOL})`);
  console.log();
  console.log("Environment:");
  console.log("  WSBRIDGE_DEBUG             Debug components: http,session,relay or all");
  console.log("  WSBRIDGE_DIAL_TIMEOUT_MS   Abort target connects after this many ms");
  console.log("  WSBRIDGE_READ_CHUNK_BYTES  Largest binary message sent to the client");
}

export function resolveOriginPolicy(args: Pick<CliArgs, "dev" | "origins">): OriginPolicy {
  if (args.dev) return "any";
  if (args.origins.length > 0) return [...args.origins];
  return "same-origin";
}

export type CliPlan = {
  listen: string;
  target: string;
  options: BridgeServerOptions;
  warnings: string[];
};

/**
 * Turn parsed arguments into server options, reading TLS files if both
 * `-cert` and `-key` were given.
 */
export function buildServerOptions(
  args: CliArgs,
  readFile: (path: string) => Buffer = (path) => fs.readFileSync(path)
): CliPlan {
  if (args.positionals.length < 2) {
    throw new StartupConfigError(USAGE_LINE);
  }
  if (args.positionals.length > 2) {
    throw new StartupConfigError(`unexpected argument ${JSON.stringify(args.positionals[2])}\n${USAGE_LINE}`);
  }

  const [listen, target] = args.positionals;
  const listenAddress = parseHostPort(listen, "listen address");
  const targetAddress = parseHostPort(target, "target address");
  const warnings: string[] = [];

  let tls: BridgeServerOptions["tls"];
  if (args.cert && args.key) {
    tls = {
      cert: readTlsFile(readFile, args.cert, "certificate"),
      key: readTlsFile(readFile, args.key, "private key"),
    };
  } else if (args.cert || args.key) {
    warnings.push("both -cert and -key are required for TLS; serving plain HTTP");
  }

  if (args.dev && args.origins.length > 0) {
    warnings.push("-dev accepts any origin; -origin values are ignored");
  }

  return {
    listen,
    target,
    warnings,
    options: {
      host: listenAddress.host,
      port: listenAddress.port,
      target: targetAddress,
      runOnce: args.runOnce,
      webDir: args.webDir,
      tls,
      originPolicy: resolveOriginPolicy(args),
      subprotocol: args.subprotocol,
      debug: args.verbose ? true : undefined,
    },
  };
}

function readTlsFile(readFile: (path: string) => Buffer, path: string, what: string) {
  try {
    return readFile(path);
  } catch (err) {
    throw new StartupConfigError(`cannot read SSL ${what} ${path}: ${errorMessage(err)}`, { cause: err });
  }
}

function pad(n: number) {
  return n.toString().padStart(2, "0");
}

export function formatTimestamp(date: Date) {
  return (
    `${date.getFullYear()}/${pad(date.getMonth() + 1)}/${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export function formatLog(message: string, date = new Date()) {
  return `${formatTimestamp(date)} ${stripTrailingNewline(message)}\n`;
}

function log(message: string) {
  process.stdout.write(formatLog(message));
}

function fatal(message: string): never {
  log(message);
  process.exit(1);
}

export function describeSettings(plan: CliPlan) {
  const { options } = plan;
  const lines = [
    "WebSocket server settings:",
    ` - Listen on ${plan.listen}`,
    options.tls ? " - SSL/TLS support" : " - No SSL/TLS support (no cert file)",
    ` - Proxying to ${plan.target}`,
  ];
  if (options.webDir) lines.push(` - Web server. Web root: ${options.webDir}`);
  if (options.runOnce) lines.push(" - Run once: exit after the first connection");
  lines.push(` - Allowed origins: ${describeOriginPolicy(options.originPolicy ?? "same-origin")}`);
  return lines.join("\n");
}

export async function runWsBridge(argv: string[] = process.argv.slice(2)) {
  let args: CliArgs;
  try {
    args = parseArgs(argv);
  } catch (err) {
    console.error(errorMessage(err));
    usage();
    process.exit(1);
  }

  if (args.help) {
    usage();
    return;
  }

  let plan: CliPlan;
  try {
    plan = buildServerOptions(args);
  } catch (err) {
    fatal(errorMessage(err));
  }

  for (const warning of plan.warnings) {
    log(`[warn] ${warning}`);
  }

  const server = new BridgeServer({
    ...plan.options,
    debugLog: (component, message) => log(formatDebugLine(component, message)),
  });

  server.on("log", (message: string) => {
    log(message);
  });

  server.on("done", () => {
    log("Run once! Exiting...");
    process.exit(0);
  });

  log(describeSettings(plan));
  const scheme = plan.options.tls ? "wss://" : "ws://";
  const kind = plan.options.tls ? "secure WebSocket server" : "WebSocket server";
  log(`Starting ${kind} (${scheme}) on ${plan.listen}`);

  try {
    await server.start();
  } catch (err) {
    fatal(errorMessage(err));
  }

  const shutdown = async () => {
    await server.stop();
    process.exit(0);
  };

  process.on("SIGINT", () => {
    void shutdown();
  });

  process.on("SIGTERM", () => {
    void shutdown();
  });
}

if (require.main === module) {
  runWsBridge().catch((err) => {
    fatal(errorMessage(err));
  });
}
