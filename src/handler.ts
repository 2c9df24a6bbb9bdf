import { readFile } from "node:fs/promises";
import { resolveRequestPath } from "./resolver.js";
import type { Logger, Resolution, ServerConfig, SvgResponse } from "./types.js";

export const SVG_CONTENT_TYPE = "image/svg+xml";
export const REDIRECT_STATUS = 307;

const TEXT_CONTENT_TYPE = "text/plain; charset=utf-8";

export interface HandlerDeps {
  resolve: (requestPath: string, config: ServerConfig) => Promise<Resolution>;
  readFile: (filePath: string) => Promise<Buffer>;
  logger?: Logger;
}

export const defaultHandlerDeps: HandlerDeps = {
  resolve: resolveRequestPath,
  readFile: (filePath) => readFile(filePath)
};

export async function handleRequest(
  method: string,
  requestPath: string,
  config: ServerConfig,
  deps: HandlerDeps = defaultHandlerDeps
): Promise<SvgResponse> {
  if (method !== "GET") {
    return { status: 405, headers: { allow: "GET" }, body: "" };
  }

  const resolution = await deps.resolve(requestPath, config);

  switch (resolution.kind) {
    case "redirect":
      return { status: REDIRECT_STATUS, headers: { location: resolution.to }, body: "" };
    case "not_found":
      return textResponse(404, "Not Found");
    case "serve": {
      try {
        const body = await deps.readFile(resolution.filePath);
        return { status: 200, headers: { "content-type": SVG_CONTENT_TYPE }, body };
      } catch (error) {
        // The file can disappear between resolve and read.
        const message = error instanceof Error ? error.message : String(error);
        deps.logger?.error(`Failed to read ${resolution.filePath}: ${message}`);
        return textResponse(500, "Internal Server Error");
      }
    }
    default: {
      const neverResolution: never = resolution;
      throw new Error(`Unsupported resolution: ${JSON.stringify(neverResolution)}`);
    }
  }
}

export function textResponse(status: number, text: string): SvgResponse {
  return { status, headers: { "content-type": TEXT_CONTENT_TYPE }, body: text };
}
