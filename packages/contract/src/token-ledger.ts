/**
 * Token ownership — id → (owner, set, display number), balances, approvals.
 *
 * Token ids run from FIRST_TOKEN_ID upward across every set and are never
 * reused; a burned id stays burned.
 */

import { ZERO_ADDRESS, type Address } from "@setmint/ledger";
import { ContractError, ensure } from "./errors.js";
import type { CollectionState, TokenRecord } from "./state.js";

export function tokenRecord(state: CollectionState, tokenId: number): TokenRecord {
  const record = state.tokens.get(tokenId);
  if (!record) throw new ContractError({ code: "TokenNotFound", tokenId });
  return record;
}

export function ownerOf(state: CollectionState, tokenId: number): Address {
  return tokenRecord(state, tokenId).owner;
}

export function balanceOf(state: CollectionState, owner: Address): number {
  ensure(owner !== ZERO_ADDRESS, { code: "ZeroAddress", field: "owner" });
  return state.balances.get(owner) ?? 0;
}

export function totalSupply(state: CollectionState): number {
  return state.tokens.size;
}

/** Metadata URI: the set's base URI followed by the display number. */
export function tokenURI(state: CollectionState, tokenId: number): string {
  const record = tokenRecord(state, tokenId);
  const baseURI = state.sets.get(record.set)?.baseURI ?? "";
  return `${baseURI}${record.displayNumber}`;
}

function adjustBalance(state: CollectionState, owner: Address, delta: number): void {
  const next = (state.balances.get(owner) ?? 0) + delta;
  if (next === 0) state.balances.delete(owner);
  else state.balances.set(owner, next);
}

/**
 * Issue one token per display number to `to`, under `set`.
 * @returns the new token ids, ascending
 */
export function issueTokens(
  state: CollectionState,
  to: Address,
  set: number,
  displayNumbers: readonly number[],
): number[] {
  ensure(to !== ZERO_ADDRESS, { code: "ZeroAddress", field: "to" });
  const ids: number[] = [];
  for (const displayNumber of displayNumbers) {
    const tokenId = state.nextTokenId++;
    state.tokens.set(tokenId, { owner: to, set, displayNumber });
    ids.push(tokenId);
  }
  adjustBalance(state, to, ids.length);
  return ids;
}

// ── Approvals ─────────────────────────────────────────────────────

export function getApproved(state: CollectionState, tokenId: number): Address {
  tokenRecord(state, tokenId);
  return state.tokenApprovals.get(tokenId) ?? ZERO_ADDRESS;
}

export function isApprovedForAll(
  state: CollectionState,
  owner: Address,
  operator: Address,
): boolean {
  return state.operatorApprovals.get(owner)?.has(operator) ?? false;
}

function isApprovedOrOwner(state: CollectionState, spender: Address, tokenId: number): boolean {
  const owner = ownerOf(state, tokenId);
  return (
    spender === owner ||
    state.tokenApprovals.get(tokenId) === spender ||
    isApprovedForAll(state, owner, spender)
  );
}

export function approve(
  state: CollectionState,
  caller: Address,
  approved: Address,
  tokenId: number,
): Address {
  const owner = ownerOf(state, tokenId);
  ensure(caller === owner || isApprovedForAll(state, owner, caller), {
    code: "NotOwnerNorApproved",
    caller,
    tokenId,
  });
  if (approved === ZERO_ADDRESS) state.tokenApprovals.delete(tokenId);
  else state.tokenApprovals.set(tokenId, approved);
  return owner;
}

export function setApprovalForAll(
  state: CollectionState,
  owner: Address,
  operator: Address,
  approved: boolean,
): void {
  const operators = state.operatorApprovals.get(owner) ?? new Set<Address>();
  if (approved) operators.add(operator);
  else operators.delete(operator);
  if (operators.size > 0) state.operatorApprovals.set(owner, operators);
  else state.operatorApprovals.delete(owner);
}

// ── Transfer / burn ───────────────────────────────────────────────

export function transferToken(
  state: CollectionState,
  caller: Address,
  from: Address,
  to: Address,
  tokenId: number,
): void {
  const record = tokenRecord(state, tokenId);
  ensure(record.owner === from, {
    code: "TransferFromIncorrectOwner",
    from,
    owner: record.owner,
    tokenId,
  });
  ensure(isApprovedOrOwner(state, caller, tokenId), {
    code: "NotOwnerNorApproved",
    caller,
    tokenId,
  });
  ensure(to !== ZERO_ADDRESS, { code: "ZeroAddress", field: "to" });

  state.tokenApprovals.delete(tokenId);
  adjustBalance(state, from, -1);
  adjustBalance(state, to, 1);
  record.owner = to;
}

/** Destroy a token. Set counters keep counting it as minted. */
export function burnToken(state: CollectionState, caller: Address, tokenId: number): Address {
  const owner = ownerOf(state, tokenId);
  ensure(isApprovedOrOwner(state, caller, tokenId), {
    code: "NotOwnerNorApproved",
    caller,
    tokenId,
  });
  state.tokenApprovals.delete(tokenId);
  state.tokens.delete(tokenId);
  adjustBalance(state, owner, -1);
  return owner;
}
