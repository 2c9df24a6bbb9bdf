import { constants } from "node:fs";
import { access, realpath, stat } from "node:fs/promises";
import { isAbsolute, relative, resolve, sep } from "node:path";
import type { Resolution, ServerConfig } from "./types.js";

const NOT_FOUND: Resolution = { kind: "not_found" };

/**
 * Maps a decoded request path onto the served directory. The path carries no
 * query string; a `?` in it is part of a file name.
 *
 * `/` always redirects to the index route. Every other path is canonicalized
 * (dot segments and symlinks resolved) before anything is looked up, and only a
 * readable regular file strictly inside `rootDir` is served.
 */
export async function resolveRequestPath(requestPath: string, config: ServerConfig): Promise<Resolution> {
  if (requestPath === "/") {
    return { kind: "redirect", to: config.indexRoute };
  }

  const relativePath = requestPath.replace(/^\/+/, "");
  if (relativePath.length === 0 || relativePath.includes("\0")) {
    return NOT_FOUND;
  }

  const candidate = resolve(config.rootDir, relativePath);
  if (!isWithinRoot(config.rootDir, candidate)) {
    return NOT_FOUND;
  }

  const canonical = await canonicalize(candidate);
  if (canonical === null || !isWithinRoot(config.rootDir, canonical)) {
    return NOT_FOUND;
  }

  if (!(await isReadableFile(canonical))) {
    return NOT_FOUND;
  }

  return { kind: "serve", filePath: canonical };
}

/** True when `target` is a strict descendant of `rootDir`. Both must be absolute. */
export function isWithinRoot(rootDir: string, target: string): boolean {
  const rel = relative(rootDir, target);
  if (rel.length === 0 || isAbsolute(rel)) {
    return false;
  }
  return rel !== ".." && !rel.startsWith(`..${sep}`);
}

async function canonicalize(candidate: string): Promise<string | null> {
  try {
    return await realpath(candidate);
  } catch {
    return null;
  }
}

async function isReadableFile(filePath: string): Promise<boolean> {
  try {
    const info = await stat(filePath);
    if (!info.isFile()) {
      return false;
    }
    await access(filePath, constants.R_OK);
    return true;
  } catch {
    return false;
  }
}
