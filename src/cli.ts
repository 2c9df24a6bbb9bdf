#!/usr/bin/env node

import process from "node:process";
import { createProgram, type ServeCommandInput } from "./command.js";
import { loadServerConfig } from "./config.js";
import { close, createSvgServer, listen } from "./server.js";
import { formatStartupBanner, USAGE_GUIDE } from "./usage.js";

const program = createProgram(runServe);

program.parseAsync(process.argv).catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`Error: ${message}`);
  process.exitCode = 1;
});

async function runServe(input: ServeCommandInput): Promise<void> {
  const config = await loadServerConfig(input.config);

  console.log(`${USAGE_GUIDE}\n`);

  const server = createSvgServer(config, {
    log: input.quiet ? undefined : (line) => console.log(line),
    logger: { error: (message) => console.error(message) }
  });
  const address = await listen(server, config.port, config.bindAddress);
  console.log(formatStartupBanner(config, address));

  await waitForInterrupt();
  await close(server);
  console.log("Server stopped");
}

function waitForInterrupt(): Promise<void> {
  return new Promise((resolvePromise) => {
    const onSignal = () => {
      process.off("SIGINT", onSignal);
      process.off("SIGTERM", onSignal);
      resolvePromise();
    };
    process.on("SIGINT", onSignal);
    process.on("SIGTERM", onSignal);
  });
}
