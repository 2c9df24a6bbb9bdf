import { mkdtemp, realpath, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { basename, join } from "node:path";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { loadServerConfig } from "../src/config.js";

describe("loadServerConfig", () => {
  let tempDir: string;

  beforeAll(async () => {
    tempDir = await mkdtemp(join(tmpdir(), "svgserve-config-"));
    await writeFile(join(tempDir, "plain.svg"), "<svg/>");
  });

  afterAll(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it("builds a frozen config with a canonical root", async () => {
    const config = await loadServerConfig({
      bindAddress: "0.0.0.0",
      port: "8080",
      indexRoute: "/start",
      rootDir: join(tempDir, ".", "..", basename(tempDir))
    });

    expect(config).toEqual({
      bindAddress: "0.0.0.0",
      port: 8080,
      indexRoute: "/start",
      rootDir: await realpath(tempDir)
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it("rejects a bind address that is not an ip literal", async () => {
    await expect(
      loadServerConfig({ bindAddress: "localhost", port: "5000", indexRoute: "/home", rootDir: tempDir })
    ).rejects.toThrowError("Invalid configuration: bindAddress must be an IPv4 or IPv6 address");
  });

  it.each(["0", "65536", "abc", "80.5", "0x1F90", "1e3", " 80 ", ""])("rejects port %j", async (port) => {
    await expect(
      loadServerConfig({ bindAddress: "127.0.0.1", port, indexRoute: "/home", rootDir: tempDir })
    ).rejects.toThrowError(/^Invalid configuration: port must be/);
  });

  it("accepts decimal ports given as strings or numbers", async () => {
    const fromString = await loadServerConfig({ bindAddress: "127.0.0.1", port: "080", indexRoute: "/home", rootDir: tempDir });
    const fromNumber = await loadServerConfig({ bindAddress: "127.0.0.1", port: 65535, indexRoute: "/home", rootDir: tempDir });

    expect(fromString.port).toBe(80);
    expect(fromNumber.port).toBe(65535);
  });

  it("names non-decimal ports", async () => {
    await expect(
      loadServerConfig({ bindAddress: "127.0.0.1", port: "0x1F90", indexRoute: "/home", rootDir: tempDir })
    ).rejects.toThrowError("Invalid configuration: port must be a decimal number");
  });

  it("rejects an index route without a leading slash", async () => {
    await expect(
      loadServerConfig({ bindAddress: "127.0.0.1", port: 5000, indexRoute: "home", rootDir: tempDir })
    ).rejects.toThrowError("Invalid configuration: indexRoute must begin with '/'");
  });

  it("lists every invalid field", async () => {
    await expect(
      loadServerConfig({ bindAddress: "nope", port: "0", indexRoute: "/home", rootDir: tempDir })
    ).rejects.toThrowError(
      "Invalid configuration: bindAddress must be an IPv4 or IPv6 address; port must be between 1 and 65535"
    );
  });

  it("rejects a missing root directory", async () => {
    const missing = join(tempDir, "missing");
    await expect(
      loadServerConfig({ bindAddress: "127.0.0.1", port: 5000, indexRoute: "/home", rootDir: missing })
    ).rejects.toThrowError(`SVG folder '${missing}' does not exist`);
  });

  it("rejects a root that is a file", async () => {
    const file = join(tempDir, "plain.svg");
    await expect(
      loadServerConfig({ bindAddress: "127.0.0.1", port: 5000, indexRoute: "/home", rootDir: file })
    ).rejects.toThrowError(`SVG folder '${file}' is not a directory`);
  });
});
