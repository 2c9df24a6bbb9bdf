import { realpath, stat } from "node:fs/promises";
import { resolve } from "node:path";
import { z } from "zod";
import type { ServerConfig } from "./types.js";

export const DEFAULT_BIND_ADDRESS = "127.0.0.1";
export const DEFAULT_PORT = 5000;
export const DEFAULT_INDEX_ROUTE = "/home";
export const DEFAULT_ROOT_DIR = ".";

export const serverConfigSchema = z.object({
  bindAddress: z.string().ip({ message: "must be an IPv4 or IPv6 address" }),
  port: z.coerce
    .string()
    .regex(/^\d+$/, "must be a decimal number")
    .transform(Number)
    .pipe(z.number().min(1, "must be between 1 and 65535").max(65535, "must be between 1 and 65535")),
  indexRoute: z.string().startsWith("/", "must begin with '/'"),
  rootDir: z.string().min(1, "must not be empty")
});

/** Raw values as they arrive from the command line. */
export interface ServerConfigInput {
  bindAddress: string;
  port: string | number;
  indexRoute: string;
  rootDir: string;
}

/**
 * Validates raw CLI values and canonicalizes the root directory.
 * Throws when any field is invalid or the root is not an existing directory.
 */
export async function loadServerConfig(input: ServerConfigInput): Promise<ServerConfig> {
  const parsed = serverConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new Error(`Invalid configuration: ${formatIssues(parsed.error.issues)}`);
  }

  const rootDir = await canonicalDirectory(parsed.data.rootDir);

  return Object.freeze({
    bindAddress: parsed.data.bindAddress,
    port: parsed.data.port,
    indexRoute: parsed.data.indexRoute,
    rootDir
  });
}

async function canonicalDirectory(rawPath: string): Promise<string> {
  let canonical: string;
  try {
    canonical = await realpath(resolve(rawPath));
  } catch {
    throw new Error(`SVG folder '${rawPath}' does not exist`);
  }

  const info = await stat(canonical);
  if (!info.isDirectory()) {
    throw new Error(`SVG folder '${rawPath}' is not a directory`);
  }
  return canonical;
}

function formatIssues(issues: z.ZodIssue[]): string {
  return issues
    .map((issue) => {
      const field = issue.path.join(".");
      return field.length > 0 ? `${field} ${issue.message}` : issue.message;
    })
    .join("; ");
}
