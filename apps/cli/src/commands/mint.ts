/**
 * setmint mint <quantity> [--value amount]
 *
 * Without --value, attaches exactly the quoted native fee.
 */

import { requireAddress, type CliConfig } from "../lib/config.js";
import { httpGet, httpPost } from "../lib/http.js";
import { MintResponse, QuoteResponse } from "../lib/schemas.js";

export interface MintOptions {
  value?: string;
}

export async function mintCommand(
  quantityArg: string,
  config: CliConfig,
  opts: MintOptions = {},
): Promise<MintResponse> {
  const caller = requireAddress(config);
  const quantity = Number(quantityArg);
  if (!Number.isSafeInteger(quantity) || quantity < 1) {
    throw new Error(`Quantity must be a positive integer. Got: ${quantityArg}`);
  }
  if (opts.value !== undefined && !/^[0-9]+$/.test(opts.value)) {
    throw new Error(`--value must be a whole number. Got: ${opts.value}`);
  }

  const value =
    opts.value ??
    (await httpGet(`${config.node}/quote?quantity=${quantity}`, QuoteResponse)).ethFee;

  const receipt = await httpPost(
    `${config.node}/mint`,
    { caller, quantity, value },
    MintResponse,
  );

  console.log(`Minted ${receipt.tokenIds.length} in set ${receipt.set} (block ${receipt.blockNumber})`);
  receipt.tokenIds.forEach((id, i) => {
    console.log(`  #${id}  display ${receipt.displayNumbers[i]}`);
  });
  console.log(`  paid: ${receipt.fees.ethFee} native, ${receipt.fees.tokenFee} token`);
  return receipt;
}
