/**
 * CLI config loading — file, env overrides, defaults.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { getConfigPath, loadConfig, requireAddress, saveConfig } from "../src/lib/config.js";

let home: string;
const saved = { ...process.env };

beforeEach(async () => {
  home = await mkdtemp(join(tmpdir(), "setmint-cli-"));
  process.env["SETMINT_HOME"] = home;
  delete process.env["SETMINT_NODE"];
  delete process.env["SETMINT_ADDRESS"];
});

afterEach(async () => {
  process.env = { ...saved };
  await rm(home, { recursive: true, force: true });
});

describe("loadConfig", () => {
  it("falls back to defaults without a file", async () => {
    expect(await loadConfig()).toEqual({ node: "http://localhost:3200", address: undefined });
  });

  it("reads the saved file", async () => {
    await saveConfig({ node: "http://node.test:9000", address: "0x" + "44".repeat(20) });
    expect(getConfigPath()).toBe(join(home, "config.json"));
    expect(await loadConfig()).toEqual({
      node: "http://node.test:9000",
      address: "0x" + "44".repeat(20),
    });
  });

  it("env overrides the file", async () => {
    await saveConfig({ node: "http://node.test:9000" });
    process.env["SETMINT_NODE"] = "http://env.test:1";
    process.env["SETMINT_ADDRESS"] = "0x" + "55".repeat(20);
    expect(await loadConfig()).toEqual({
      node: "http://env.test:1",
      address: "0x" + "55".repeat(20),
    });
  });

  it("rejects a malformed file", async () => {
    await writeFile(join(home, "config.json"), JSON.stringify({ node: 42 }));
    await expect(loadConfig()).rejects.toThrow("Malformed config file");
  });
});

describe("requireAddress", () => {
  it("throws without an address", () => {
    expect(() => requireAddress({ node: "http://x" })).toThrow("No address configured");
  });
});
