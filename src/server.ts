import { createServer, type IncomingMessage, type Server, type ServerResponse } from "node:http";
import type { AddressInfo } from "node:net";
import { defaultHandlerDeps, handleRequest, textResponse, type HandlerDeps } from "./handler.js";
import type { Logger, ServerConfig, SvgResponse } from "./types.js";

export interface SvgServerOptions {
  /** Receives one line per request. Omit to stay silent. */
  log?: (line: string) => void;
  logger?: Logger;
  /** Replaces the resolver and file reader; `logger` above takes precedence over `deps.logger`. */
  deps?: HandlerDeps;
}

export function createSvgServer(config: ServerConfig, options: SvgServerOptions = {}): Server {
  const deps: HandlerDeps = {
    ...(options.deps ?? defaultHandlerDeps),
    logger: options.logger ?? options.deps?.logger
  };

  return createServer((req, res) => {
    respond(req, res, config, deps)
      .then((status) => {
        options.log?.(`${req.method ?? "GET"} ${req.url ?? "/"} -> ${status}`);
      })
      .catch((error: unknown) => {
        const message = error instanceof Error ? error.message : String(error);
        deps.logger?.error(`Request ${req.url ?? "/"} failed: ${message}`);
        if (!res.headersSent) {
          writeResponse(res, textResponse(500, "Internal Server Error"));
        } else {
          res.destroy();
        }
      });
  });
}

async function respond(
  req: IncomingMessage,
  res: ServerResponse,
  config: ServerConfig,
  deps: HandlerDeps
): Promise<number> {
  const requestPath = getRequestPath(req.url);
  const response =
    requestPath === null
      ? textResponse(400, "Bad Request")
      : await handleRequest(req.method ?? "GET", requestPath, config, deps);
  writeResponse(res, response);
  return response.status;
}

/**
 * Extracts the decoded path component of a request target.
 * Returns null for targets that are not origin-form or fail to decode.
 */
export function getRequestPath(rawUrl: string | undefined): string | null {
  if (rawUrl === undefined) {
    return "/";
  }

  const end = rawUrl.search(/[?#]/);
  const encodedPath = end === -1 ? rawUrl : rawUrl.slice(0, end);
  if (!encodedPath.startsWith("/")) {
    return null;
  }

  try {
    return decodeURIComponent(encodedPath);
  } catch {
    return null;
  }
}

function writeResponse(res: ServerResponse, response: SvgResponse): void {
  res.writeHead(response.status, {
    ...response.headers,
    "content-length": String(Buffer.byteLength(response.body))
  });
  res.end(response.body);
}

export function listen(server: Server, port: number, host: string): Promise<AddressInfo> {
  return new Promise((resolvePromise, reject) => {
    server.once("error", reject);
    server.listen(port, host, () => {
      server.off("error", reject);
      const address = server.address();
      if (!address || typeof address === "string") {
        reject(new Error("Failed to start SVG server"));
        return;
      }
      resolvePromise(address);
    });
  });
}

export function close(server: Server): Promise<void> {
  return new Promise((resolvePromise, reject) => {
    server.close((error) => {
      if (error) {
        reject(error);
        return;
      }
      resolvePromise();
    });
    server.closeIdleConnections();
  });
}
