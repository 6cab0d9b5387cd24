/**
 * setmint config [--node url] [--address addr]
 *
 * Show or update CLI configuration.
 */

import { loadConfig, saveConfig, getConfigPath } from "../lib/config.js";

interface ConfigOptions {
  node?: string;
  address?: string;
}

export async function configCommand(opts: ConfigOptions): Promise<void> {
  const config = await loadConfig();
  let changed = false;

  if (opts.node) {
    config.node = opts.node.replace(/\/+$/, "");
    changed = true;
  }
  if (opts.address) {
    if (!/^0x[0-9a-fA-F]{40}$/.test(opts.address)) {
      throw new Error(`Invalid address: ${opts.address}`);
    }
    config.address = opts.address.toLowerCase();
    changed = true;
  }

  if (changed) {
    await saveConfig(config);
    console.log(`Config saved to ${getConfigPath()}`);
  }

  console.log(`\nCurrent config:`);
  console.log(`  node:    ${config.node}`);
  console.log(`  address: ${config.address ?? "(none)"}`);
}
