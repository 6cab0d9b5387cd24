/**
 * setmint info
 *
 * GET /collection → print summary.
 */

import { CollectionV1 } from "@setmint/contract";
import type { CliConfig } from "../lib/config.js";
import { httpGet } from "../lib/http.js";

export async function infoCommand(config: CliConfig): Promise<void> {
  const c = await httpGet(`${config.node}/collection`, CollectionV1);

  console.log(`${c.name} (${c.symbol}) at ${c.address}\n`);
  console.log(`  owner:        ${c.owner}`);
  console.log(`  status:       ${c.paused ? "paused" : "minting"}`);
  console.log(`  set:          ${c.currentSet} (${c.remainingInSet} left)`);
  console.log(`  minted:       ${c.totalMinted} / ${c.totalMaxSupply} (${c.totalSupply} live)`);
  console.log(`  batch limit:  ${c.batchLimit}`);
  console.log(`  fees:         ${c.ethFee} native + ${c.tokenFee} token per unit`);
  console.log(`  fee address:  ${c.feeAddress}`);
  console.log(`  royalty:      ${c.royalty.numerator / 100}% → ${c.royalty.receiver}`);

  if (c.sets.length > 0) {
    console.log(`\n  Sets:`);
    for (const s of c.sets) {
      const marker = s.active ? "*" : " ";
      console.log(`   ${marker} ${s.set}: ${s.counter}/${s.maxSupply}  ${s.baseURI}`);
    }
  }
}
