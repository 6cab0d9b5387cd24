/**
 * setmint approve <amount>
 *
 * Let the collection pull up to `amount` payment tokens for mint fees.
 */

import { requireAddress, type CliConfig } from "../lib/config.js";
import { httpPost } from "../lib/http.js";
import { ApproveResponse } from "../lib/schemas.js";

export async function approveCommand(amount: string, config: CliConfig): Promise<void> {
  const caller = requireAddress(config);
  if (!/^[0-9]+$/.test(amount)) {
    throw new Error(`Amount must be a whole number. Got: ${amount}`);
  }
  const res = await httpPost(
    `${config.node}/payment-token/approve`,
    { caller, amount },
    ApproveResponse,
  );
  console.log(`Allowance for ${res.spender}: ${res.allowance}`);
}
