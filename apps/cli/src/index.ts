#!/usr/bin/env node
/**
 * setmint CLI — mint and inspect a collection through a node.
 *
 * Commands:
 *   info                      Collection summary
 *   mint <quantity> [--value] Mint to the configured address
 *   token <id>                Token owner, set, display number, URI
 *   account [address]         Native, payment-token and collection balances
 *   approve <amount>          Let the collection pull payment-token fees
 *   config                    Show/set CLI configuration
 */

import { Command } from "commander";
import { loadConfig, type CliConfig } from "./lib/config.js";
import { infoCommand } from "./commands/info.js";
import { mintCommand } from "./commands/mint.js";
import { tokenCommand } from "./commands/token.js";
import { accountCommand } from "./commands/account.js";
import { approveCommand } from "./commands/approve.js";
import { configCommand } from "./commands/config-cmd.js";

interface CommonOptions {
  node?: string;
  address?: string;
}

async function resolveConfig(opts: CommonOptions): Promise<CliConfig> {
  const config = await loadConfig();
  if (opts.node) config.node = opts.node;
  if (opts.address) config.address = opts.address;
  return config;
}

const program = new Command();

program
  .name("setmint")
  .description("Mint from a set-based collection")
  .version("0.1.0");

// ── info ────────────────────────────────────────────────────────────

program
  .command("info")
  .description("Show the collection: sets, supply, fees, royalty")
  .option("-n, --node <url>", "Node URL override")
  .action(async (opts: CommonOptions) => {
    await infoCommand(await resolveConfig(opts));
  });

// ── mint ────────────────────────────────────────────────────────────

program
  .command("mint")
  .description("Mint units of the active set (attaches the quoted native fee unless --value)")
  .argument("<quantity>", "Units to mint")
  .option("--value <amount>", "Native value to attach")
  .option("-a, --address <addr>", "Acting address override")
  .option("-n, --node <url>", "Node URL override")
  .action(async (quantity: string, opts: CommonOptions & { value?: string }) => {
    await mintCommand(quantity, await resolveConfig(opts), { value: opts.value });
  });

// ── token ───────────────────────────────────────────────────────────

program
  .command("token")
  .description("Show one token")
  .argument("<id>", "Token id")
  .option("-n, --node <url>", "Node URL override")
  .action(async (id: string, opts: CommonOptions) => {
    await tokenCommand(id, await resolveConfig(opts));
  });

// ── account ─────────────────────────────────────────────────────────

program
  .command("account")
  .description("Show balances for an address (default: configured address)")
  .argument("[address]", "Account address")
  .option("-n, --node <url>", "Node URL override")
  .action(async (address: string | undefined, opts: CommonOptions) => {
    await accountCommand(address, await resolveConfig(opts));
  });

// ── approve ─────────────────────────────────────────────────────────

program
  .command("approve")
  .description("Approve the collection to pull payment-token fees")
  .argument("<amount>", "Allowance in token base units")
  .option("-a, --address <addr>", "Acting address override")
  .option("-n, --node <url>", "Node URL override")
  .action(async (amount: string, opts: CommonOptions) => {
    await approveCommand(amount, await resolveConfig(opts));
  });

// ── config ──────────────────────────────────────────────────────────

program
  .command("config")
  .description("Show or update CLI configuration")
  .option("-n, --node <url>", "Set node URL")
  .option("-a, --address <addr>", "Set acting address")
  .action(async (opts: CommonOptions) => {
    await configCommand(opts);
  });

// ── Run ─────────────────────────────────────────────────────────────

program.parseAsync(process.argv).catch((err: Error) => {
  console.error(`\nError: ${err.message}`);
  process.exit(1);
});
