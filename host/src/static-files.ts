import path from "path";
import type { IncomingMessage, ServerResponse } from "http";

import finalhandler from "finalhandler";
import serveStatic from "serve-static";

import type { DebugLogFn } from "./debug";
import { errorMessage } from "./errors";

export type StaticFileHandler = (req: IncomingMessage, res: ServerResponse) => Promise<void>;

export type StaticFileOptions = {
  debugLog?: DebugLogFn;
};

/**
 * Serve files below `rootDir` with `serve-static`.
 *
 * Directories answer with their `index.html`; a directory path without a
 * trailing slash redirects to the slashed form. Errors (missing files,
 * traversal attempts, non GET/HEAD methods) end in `finalhandler`'s plain
 * status pages. The promise settles once the response is closed.
 */
export function createStaticFileHandler(
  rootDir: string,
  options: StaticFileOptions = {}
): StaticFileHandler {
  const serve = serveStatic(path.resolve(rootDir), {
    index: ["index.html"],
    redirect: true,
    fallthrough: false,
  });

  return (req, res) =>
    new Promise<void>((resolve) => {
      res.once("close", () => resolve());

      const done = finalhandler(req, res, {
        env: "production",
        onerror: (err: unknown) => {
          options.debugLog?.("http", `${req.method} ${req.url}: ${errorMessage(err)}`);
        },
      });

      serve(req, res, (err?: unknown) => {
        done(err);
      });
    });
}
