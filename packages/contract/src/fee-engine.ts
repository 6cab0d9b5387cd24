/**
 * Fee engine — per-unit pricing in native value and/or the payment token.
 *
 * Order inside a mint (see DESIGN.md, "Fee ordering"):
 *   1. check token balance and attached value (no transfers yet)
 *   2. pull totalTokenFee payer → feeAddress via transferFrom
 *   3. forward exactly totalEthFee contract → feeAddress
 *   4. only then does the caller mint
 * Value attached beyond totalEthFee stays in the contract until withdrawn.
 *
 * A zero fee in either currency skips every check and call in that currency.
 */

import type { Address, Chain, PaymentToken } from "@setmint/ledger";
import { ContractError, ensure } from "./errors.js";
import type { CollectionState } from "./state.js";

export interface FeeQuote {
  ethFee: bigint;
  tokenFee: bigint;
}

export function quoteFees(state: CollectionState, quantity: number): FeeQuote {
  const units = BigInt(quantity);
  return {
    ethFee: state.ethFee * units,
    tokenFee: state.tokenFee * units,
  };
}

function tokenAt(chain: Chain, address: Address): PaymentToken {
  const token = chain.tokenAt(address);
  if (!token) {
    throw new ContractError({ code: "TokenTransferFailed", token: address });
  }
  return token;
}

/**
 * Check and collect the fees for `quantity` units.
 * `attached` is the value the caller sent with the call; it already sits in
 * the contract's balance.
 */
export function collectFees(
  state: CollectionState,
  chain: Chain,
  payer: Address,
  attached: bigint,
  quantity: number,
): FeeQuote {
  const quote = quoteFees(state, quantity);
  const token = quote.tokenFee > 0n ? tokenAt(chain, state.paymentToken) : undefined;

  if (token) {
    const balance = token.balanceOf(payer);
    ensure(balance >= quote.tokenFee, {
      code: "InsufficientTokenBalance",
      balance,
      required: quote.tokenFee,
    });
  }
  if (quote.ethFee > 0n) {
    ensure(attached >= quote.ethFee, {
      code: "InsufficientEthFee",
      provided: attached,
      required: quote.ethFee,
    });
  }

  if (token) {
    const ok = token.transferFrom(state.address, payer, state.feeAddress, quote.tokenFee);
    ensure(ok, { code: "TokenTransferFailed", token: token.address });
  }
  if (quote.ethFee > 0n) {
    const sent = chain.sendValue(state.address, state.feeAddress, quote.ethFee);
    if (!sent.ok) {
      throw new ContractError(
        { code: "EthTransferFailed", receiver: state.feeAddress, amount: quote.ethFee },
        { cause: sent.error },
      );
    }
  }

  return quote;
}

// ── Withdrawals ───────────────────────────────────────────────────

/** Sweep the contract's whole native balance to `receiver`. */
export function withdrawNative(
  state: CollectionState,
  chain: Chain,
  receiver: Address,
): bigint {
  const amount = chain.balanceOf(state.address);
  const sent = chain.sendValue(state.address, receiver, amount);
  if (!sent.ok) {
    throw new ContractError(
      { code: "EthTransferFailed", receiver, amount },
      { cause: sent.error },
    );
  }
  return amount;
}

/** Sweep the contract's whole balance of `tokenAddress` to `receiver`. */
export function withdrawToken(
  state: CollectionState,
  chain: Chain,
  tokenAddress: Address,
  receiver: Address,
): bigint {
  const token = tokenAt(chain, tokenAddress);
  const amount = token.balanceOf(state.address);
  const ok = token.transfer(state.address, receiver, amount);
  ensure(ok, { code: "TokenTransferFailed", token: token.address });
  return amount;
}
