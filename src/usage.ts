import type { AddressInfo } from "node:net";
import type { ServerConfig } from "./types.js";

export const USAGE_GUIDE = `How to use svgserve:
  GET /                   redirects to the index route (--index)
  GET /<name>.svg         serves <name>.svg from the SVG folder as image/svg+xml
  GET /<dir>/<name>.svg   serves files from subdirectories of the SVG folder
Directories are never listed and paths outside the SVG folder always answer 404.`;

export function formatStartupBanner(config: ServerConfig, address: AddressInfo): string {
  const host = address.address.includes(":") ? `[${address.address}]` : address.address;
  return [
    `Serving ${config.rootDir}`,
    `Server started at http://${host}:${address.port} (/ -> ${config.indexRoute})`
  ].join("\n");
}
