/**
 * setmint account [address]
 */

import { requireAddress, type CliConfig } from "../lib/config.js";
import { httpGet } from "../lib/http.js";
import { AccountResponse } from "../lib/schemas.js";

export async function accountCommand(address: string | undefined, config: CliConfig): Promise<void> {
  const target = address ?? requireAddress(config);
  const account = await httpGet(`${config.node}/accounts/${target}`, AccountResponse);

  console.log(`Account ${account.address}`);
  console.log(`  native:    ${account.native}`);
  console.log(`  ${account.paymentToken.symbol.padEnd(9)}  ${account.paymentToken.balance} (allowance ${account.paymentToken.allowance})`);
  console.log(`  tokens:    ${account.tokens}`);
}
