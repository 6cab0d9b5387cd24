/**
 * CLI configuration — loads from ~/.setmint/config.json + env overrides.
 *
 * Priority: env vars > config file > defaults.
 */

import { readFile, writeFile, mkdir } from "node:fs/promises";
import { homedir } from "node:os";
import { join } from "node:path";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

export interface CliConfig {
  /** Node base URL. */
  node: string;
  /** Acting account for mint/approve; required by those commands. */
  address?: string;
}

const ConfigFile = Type.Object({
  node: Type.Optional(Type.String()),
  address: Type.Optional(Type.String()),
});
type ConfigFile = Static<typeof ConfigFile>;

const DEFAULT_CONFIG_DIR = join(homedir(), ".setmint");
const DEFAULT_NODE = "http://localhost:3200";

export function getConfigDir(): string {
  return process.env["SETMINT_HOME"] ?? DEFAULT_CONFIG_DIR;
}

export function getConfigPath(): string {
  return join(getConfigDir(), "config.json");
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

async function readConfigFile(): Promise<ConfigFile> {
  let raw: string;
  try {
    raw = await readFile(getConfigPath(), "utf-8");
  } catch (err) {
    // No config file yet — use defaults
    if (isMissingFile(err)) return {};
    throw err;
  }
  const parsed: unknown = JSON.parse(raw);
  if (!Value.Check(ConfigFile, parsed)) {
    throw new Error(`Malformed config file: ${getConfigPath()}`);
  }
  return parsed;
}

/** Load config, merging env overrides on top. */
export async function loadConfig(): Promise<CliConfig> {
  const fileConfig = await readConfigFile();
  return {
    node: process.env["SETMINT_NODE"] ?? fileConfig.node ?? DEFAULT_NODE,
    address: process.env["SETMINT_ADDRESS"] ?? fileConfig.address,
  };
}

/** Save config to disk. */
export async function saveConfig(config: CliConfig): Promise<void> {
  await mkdir(getConfigDir(), { recursive: true });
  const toSave: ConfigFile = {
    node: config.node,
    ...(config.address ? { address: config.address } : {}),
  };
  await writeFile(getConfigPath(), JSON.stringify(toSave, null, 2) + "\n", "utf-8");
}

/** The configured address, or an error telling the user how to set one. */
export function requireAddress(config: CliConfig): string {
  if (!config.address) {
    throw new Error("No address configured. Use --address, SETMINT_ADDRESS or `setmint config --address`.");
  }
  return config.address;
}
