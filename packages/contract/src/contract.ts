/**
 * SetMintContract — the deployed collection.
 *
 * Composes the supply ledger, fee engine, display-number assigner, token
 * ownership, royalty and ownable capabilities over one CollectionState.
 * Every state-changing entry point runs inside a chain transaction, so a
 * failure anywhere (fee transfers included) leaves no trace.
 *
 * Mint flow:
 *   attach value → guard → supply checks → collect fees → draw numbers
 *   → count units → issue tokens → emit
 */

import {
  ZERO_ADDRESS,
  type Address,
  type Chain,
  type Journaled,
  type Restore,
} from "@setmint/ledger";
import { assignDisplayNumbers } from "./assigner.js";
import { EventLog, type ContractEvent, type LogEntry } from "./events.js";
import {
  collectFees,
  quoteFees,
  withdrawNative,
  withdrawToken,
  type FeeQuote,
} from "./fee-engine.js";
import { renounceOwnership, requireOwner, transferOwnership } from "./ownable.js";
import { blockEntropySource, type RandomSource } from "./randomness.js";
import { nonReentrant } from "./reentrancy.js";
import { royaltyInfo, setRoyalty, type RoyaltyQuote } from "./royalty.js";
import type { CollectionV1, SetV1, TokenV1 } from "./schemas/index.js";
import {
  checkAmount,
  checkBatchLimit,
  checkCount,
  createCollectionState,
  toAddress,
  toNonZeroAddress,
  type CollectionParams,
  type CollectionState,
} from "./state.js";
import {
  availableInSet,
  checkMint,
  configureSet,
  recordMint,
  setPaused,
  startSet,
  totalMaxSupply,
  totalMinted,
} from "./supply-ledger.js";
import {
  approve,
  balanceOf,
  burnToken,
  getApproved,
  isApprovedForAll,
  issueTokens,
  ownerOf,
  setApprovalForAll,
  tokenRecord,
  tokenURI,
  totalSupply,
  transferToken,
} from "./token-ledger.js";

export interface CallMsg {
  caller: Address;
  /** Native value attached to the call. Default 0. */
  value?: bigint;
}

export interface ContractDeps {
  chain: Chain;
  /** Default: blockEntropySource(). */
  random?: RandomSource;
}

export interface MintReceipt {
  tokenIds: number[];
  set: number;
  displayNumbers: number[];
  fees: FeeQuote;
  blockNumber: number;
}

export class SetMintContract implements Journaled {
  readonly log = new EventLog();
  private readonly state: CollectionState;
  private readonly chain: Chain;
  private readonly random: RandomSource;

  constructor(address: Address, params: CollectionParams, deps: ContractDeps) {
    this.state = createCollectionState(address, params);
    this.chain = deps.chain;
    this.random = deps.random ?? blockEntropySource();
    this.chain.register(this);
    this.emit({ type: "OwnershipTransferred", previousOwner: ZERO_ADDRESS, newOwner: this.state.owner });
  }

  get address(): Address {
    return this.state.address;
  }

  checkpoint(): Restore {
    const saved = structuredClone(this.state);
    const restoreLog = this.log.checkpoint();
    return () => {
      Object.assign(this.state, saved);
      restoreLog();
    };
  }

  // ── Plumbing ─────────────────────────────────────────────────────

  private emit(event: ContractEvent): void {
    this.log.emit(this.chain.blockContext, event);
  }

  /** Run `fn` as one transaction with `msg.value` moved into the contract first. */
  private call<T>(msg: CallMsg, fn: (caller: Address, value: bigint) => T): T {
    const caller = toAddress("caller", msg.caller);
    const value = checkAmount("value", msg.value ?? 0n);
    return this.chain.transact(() => {
      this.chain.transferValue(caller, this.state.address, value);
      return fn(caller, value);
    });
  }

  /** Owner-only call, under the same reentrancy guard as mint. */
  private admin<T>(callerInput: Address, fn: (caller: Address) => T): T {
    return this.call({ caller: callerInput }, (caller) =>
      nonReentrant(this.state, () => {
        requireOwner(this.state, caller);
        return fn(caller);
      }),
    );
  }

  // ── Mint ─────────────────────────────────────────────────────────

  mint(msg: CallMsg, quantity: number): MintReceipt {
    return this.call(msg, (caller, value) =>
      nonReentrant(this.state, () => {
        const state = this.state;
        const set = state.currentSet;
        checkMint(state, quantity);
        const fees = collectFees(state, this.chain, caller, value, quantity);

        const block = this.chain.blockContext;
        const displayNumbers = assignDisplayNumbers(state, this.random, block, caller, quantity);
        recordMint(state, quantity);
        const tokenIds = issueTokens(state, caller, set, displayNumbers);

        for (const tokenId of tokenIds) {
          this.emit({ type: "Transfer", from: ZERO_ADDRESS, to: caller, tokenId });
        }
        this.emit({
          type: "Minted",
          minter: caller,
          set,
          quantity,
          firstTokenId: tokenIds[0] ?? 0,
          ethFee: fees.ethFee,
          tokenFee: fees.tokenFee,
        });

        return { tokenIds, set, displayNumbers, fees, blockNumber: block.number };
      }),
    );
  }

  // ── Admin ────────────────────────────────────────────────────────

  setTokenFee(caller: Address, fee: bigint): void {
    this.admin(caller, (actor) => {
      this.state.tokenFee = checkAmount("tokenFee", fee);
      this.emit({ type: "TokenFeeChanged", actor, fee });
    });
  }

  setEthFee(caller: Address, fee: bigint): void {
    this.admin(caller, (actor) => {
      this.state.ethFee = checkAmount("ethFee", fee);
      this.emit({ type: "EthFeeChanged", actor, fee });
    });
  }

  setFeeAddress(caller: Address, feeAddress: Address): void {
    this.admin(caller, (actor) => {
      this.state.feeAddress = toNonZeroAddress("feeAddress", feeAddress);
      this.emit({ type: "FeeAddressChanged", actor, feeAddress: this.state.feeAddress });
    });
  }

  setBatchLimit(caller: Address, batchLimit: number): void {
    this.admin(caller, (actor) => {
      this.state.batchLimit = checkBatchLimit(batchLimit);
      this.emit({ type: "BatchLimitChanged", actor, batchLimit });
    });
  }

  setBaseURI(caller: Address, set: number, maxSupply: number, counter: number, uri: string): void {
    this.admin(caller, (actor) => {
      configureSet(this.state, set, maxSupply, counter, uri);
      this.emit({ type: "BaseURIChanged", actor, set, maxSupply, counter, uri });
    });
  }

  setContractURI(caller: Address, uri: string): void {
    this.admin(caller, (actor) => {
      this.state.contractURI = uri;
      this.emit({ type: "ContractURIChanged", actor, uri });
    });
  }

  setRoyalty(caller: Address, receiver: Address, numerator: number): void {
    this.admin(caller, (actor) => {
      setRoyalty(this.state, toNonZeroAddress("receiver", receiver), numerator);
      this.emit({ type: "RoyaltyChanged", actor, ...this.state.royalty });
    });
  }

  pause(caller: Address, paused: boolean): void {
    this.admin(caller, (actor) => {
      setPaused(this.state, paused);
      this.emit({ type: "PauseChanged", actor, paused });
    });
  }

  startSet(caller: Address, set: number): void {
    this.admin(caller, (actor) => {
      const poolSize = startSet(this.state, set);
      this.emit({ type: "SetStarted", actor, set, poolSize });
    });
  }

  withdrawETH(caller: Address, receiver: Address): bigint {
    return this.admin(caller, (actor) => {
      const to = toAddress("receiver", receiver);
      const amount = withdrawNative(this.state, this.chain, to);
      this.emit({ type: "Withdrawn", actor, asset: "native", receiver: to, amount });
      return amount;
    });
  }

  withdrawTokens(caller: Address, token: Address, receiver: Address): bigint {
    return this.admin(caller, (actor) => {
      const tokenAddress = toAddress("token", token);
      const to = toAddress("receiver", receiver);
      const amount = withdrawToken(this.state, this.chain, tokenAddress, to);
      this.emit({ type: "Withdrawn", actor, asset: tokenAddress, receiver: to, amount });
      return amount;
    });
  }

  transferOwnership(caller: Address, newOwner: Address): void {
    this.admin(caller, () => {
      const next = toAddress("newOwner", newOwner);
      const previousOwner = transferOwnership(this.state, next);
      this.emit({ type: "OwnershipTransferred", previousOwner, newOwner: next });
    });
  }

  renounceOwnership(caller: Address): void {
    this.admin(caller, () => {
      const previousOwner = renounceOwnership(this.state);
      this.emit({ type: "OwnershipTransferred", previousOwner, newOwner: ZERO_ADDRESS });
    });
  }

  // ── Token ownership ──────────────────────────────────────────────

  transferFrom(caller: Address, from: Address, to: Address, tokenId: number): void {
    this.call({ caller }, (actor) => {
      const src = toAddress("from", from);
      const dst = toAddress("to", to);
      transferToken(this.state, actor, src, dst, tokenId);
      this.emit({ type: "Transfer", from: src, to: dst, tokenId });
    });
  }

  approve(caller: Address, approved: Address, tokenId: number): void {
    this.call({ caller }, (actor) => {
      const spender = toAddress("approved", approved);
      const owner = approve(this.state, actor, spender, tokenId);
      this.emit({ type: "Approval", owner, approved: spender, tokenId });
    });
  }

  setApprovalForAll(caller: Address, operator: Address, approved: boolean): void {
    this.call({ caller }, (owner) => {
      const op = toNonZeroAddress("operator", operator);
      setApprovalForAll(this.state, owner, op, approved);
      this.emit({ type: "ApprovalForAll", owner, operator: op, approved });
    });
  }

  burn(caller: Address, tokenId: number): void {
    this.call({ caller }, (actor) => {
      const owner = burnToken(this.state, actor, tokenId);
      this.emit({ type: "Transfer", from: owner, to: ZERO_ADDRESS, tokenId });
    });
  }

  // ── Queries ──────────────────────────────────────────────────────

  get name(): string {
    return this.state.name;
  }

  get symbol(): string {
    return this.state.symbol;
  }

  owner(): Address {
    return this.state.owner;
  }

  paymentToken(): Address {
    return this.state.paymentToken;
  }

  paused(): boolean {
    return this.state.paused;
  }

  batchLimit(): number {
    return this.state.batchLimit;
  }

  ethFee(): bigint {
    return this.state.ethFee;
  }

  tokenFee(): bigint {
    return this.state.tokenFee;
  }

  feeAddress(): Address {
    return this.state.feeAddress;
  }

  contractURI(): string {
    return this.state.contractURI;
  }

  currentSet(): number {
    return this.state.currentSet;
  }

  maxSupply(set: number = this.state.currentSet): number {
    return this.state.sets.get(set)?.maxSupply ?? 0;
  }

  totalMaxSupply(): number {
    return totalMaxSupply(this.state);
  }

  counter(set: number = this.state.currentSet): number {
    return this.state.sets.get(set)?.counter ?? 0;
  }

  baseURI(set: number = this.state.currentSet): string {
    return this.state.sets.get(set)?.baseURI ?? "";
  }

  /** Units still mintable in the active set. */
  remainingInSet(): number {
    return availableInSet(this.state);
  }

  totalMinted(): number {
    return totalMinted(this.state);
  }

  totalSupply(): number {
    return totalSupply(this.state);
  }

  quoteFees(quantity: number): FeeQuote {
    return quoteFees(this.state, checkCount("quantity", quantity));
  }

  royaltyInfo(salePrice: bigint): RoyaltyQuote {
    return royaltyInfo(this.state, salePrice);
  }

  tokenURI(tokenId: number): string {
    return tokenURI(this.state, tokenId);
  }

  ownerOf(tokenId: number): Address {
    return ownerOf(this.state, tokenId);
  }

  balanceOf(owner: Address): number {
    return balanceOf(this.state, toAddress("owner", owner));
  }

  getApproved(tokenId: number): Address {
    return getApproved(this.state, tokenId);
  }

  isApprovedForAll(owner: Address, operator: Address): boolean {
    return isApprovedForAll(this.state, toAddress("owner", owner), toAddress("operator", operator));
  }

  token(tokenId: number): TokenV1 {
    const record = tokenRecord(this.state, tokenId);
    return {
      tokenId,
      owner: record.owner,
      set: record.set,
      displayNumber: record.displayNumber,
      uri: tokenURI(this.state, tokenId),
    };
  }

  setInfo(set: number): SetV1 | undefined {
    const record = this.state.sets.get(set);
    if (!record) return undefined;
    return { set, ...record, active: set === this.state.currentSet };
  }

  sets(): SetV1[] {
    return Array.from(this.state.sets.keys())
      .sort((a, b) => a - b)
      .flatMap((set) => this.setInfo(set) ?? []);
  }

  logs(from: number = 0): LogEntry[] {
    return this.log.since(from);
  }

  describe(): CollectionV1 {
    const s = this.state;
    return {
      address: s.address,
      name: s.name,
      symbol: s.symbol,
      owner: s.owner,
      paymentToken: s.paymentToken,
      paused: s.paused,
      batchLimit: s.batchLimit,
      ethFee: s.ethFee.toString(),
      tokenFee: s.tokenFee.toString(),
      feeAddress: s.feeAddress,
      contractURI: s.contractURI,
      royalty: { ...s.royalty },
      currentSet: s.currentSet,
      remainingInSet: availableInSet(s),
      totalMinted: totalMinted(s),
      totalSupply: totalSupply(s),
      totalMaxSupply: totalMaxSupply(s),
      sets: this.sets(),
    };
  }
}
