/**
 * setmint token <id>
 */

import type { CliConfig } from "../lib/config.js";
import { httpGet } from "../lib/http.js";
import { TokenResponse } from "../lib/schemas.js";

const ZERO_ADDRESS = "0x" + "0".repeat(40);

export async function tokenCommand(idArg: string, config: CliConfig): Promise<void> {
  const id = Number(idArg);
  if (!Number.isSafeInteger(id) || id < 1) {
    throw new Error(`Token id must be a positive integer. Got: ${idArg}`);
  }
  const token = await httpGet(`${config.node}/tokens/${id}`, TokenResponse);

  console.log(`Token #${token.tokenId}`);
  console.log(`  owner:    ${token.owner}`);
  console.log(`  set:      ${token.set}`);
  console.log(`  display:  ${token.displayNumber}`);
  console.log(`  uri:      ${token.uri}`);
  if (token.approved !== ZERO_ADDRESS) console.log(`  approved: ${token.approved}`);
}
