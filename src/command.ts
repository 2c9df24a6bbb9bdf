import { Command } from "commander";
import {
  DEFAULT_BIND_ADDRESS,
  DEFAULT_INDEX_ROUTE,
  DEFAULT_PORT,
  DEFAULT_ROOT_DIR,
  type ServerConfigInput
} from "./config.js";
import { USAGE_GUIDE } from "./usage.js";

export interface ServeCommandInput {
  config: ServerConfigInput;
  quiet: boolean;
}

export type ServeAction = (input: ServeCommandInput) => Promise<void>;

export function createProgram(run: ServeAction): Command {
  const program = new Command();
  program
    .name("svgserve")
    .description("Serve a directory of SVG files over HTTP")
    .version("0.1.0")
    .argument("[path]", "Path to a directory containing the SVG files to be served", DEFAULT_ROOT_DIR)
    .option("-b, --bind <address>", "Bind address to listen on", DEFAULT_BIND_ADDRESS)
    .option("-p, --port <port>", "Port to listen on", String(DEFAULT_PORT))
    .option("-i, --index <route>", "Route to redirect / to", DEFAULT_INDEX_ROUTE)
    .option("--quiet", "Do not log one line per request", false)
    .addHelpText("after", `\n${USAGE_GUIDE}`)
    .action(async (path: string, options: Record<string, string | boolean>) => {
      await run(toServeInput(path, options));
    });
  return program;
}

export function toServeInput(path: string | undefined, options: Record<string, string | boolean>): ServeCommandInput {
  return {
    config: {
      bindAddress: toStringOption(options.bind, DEFAULT_BIND_ADDRESS),
      port: toStringOption(options.port, String(DEFAULT_PORT)),
      indexRoute: toStringOption(options.index, DEFAULT_INDEX_ROUTE),
      rootDir: path ?? DEFAULT_ROOT_DIR
    },
    quiet: options.quiet === true
  };
}

function toStringOption(raw: string | boolean | undefined, fallback: string): string {
  return typeof raw === "string" ? raw : fallback;
}
