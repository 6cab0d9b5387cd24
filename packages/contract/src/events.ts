/**
 * Contract events and the append-only log that records them.
 *
 * Entries written by a call that later fails are truncated away with the
 * rest of the call's state, so the log only ever shows committed history.
 */

import type { Address, BlockContext, Journaled, Restore } from "@setmint/ledger";

export type ContractEvent =
  | { type: "Transfer"; from: Address; to: Address; tokenId: number }
  | { type: "Approval"; owner: Address; approved: Address; tokenId: number }
  | { type: "ApprovalForAll"; owner: Address; operator: Address; approved: boolean }
  | {
      type: "Minted";
      minter: Address;
      set: number;
      quantity: number;
      firstTokenId: number;
      ethFee: bigint;
      tokenFee: bigint;
    }
  | { type: "TokenFeeChanged"; actor: Address; fee: bigint }
  | { type: "EthFeeChanged"; actor: Address; fee: bigint }
  | { type: "FeeAddressChanged"; actor: Address; feeAddress: Address }
  | { type: "BatchLimitChanged"; actor: Address; batchLimit: number }
  | {
      type: "BaseURIChanged";
      actor: Address;
      set: number;
      maxSupply: number;
      counter: number;
      uri: string;
    }
  | { type: "ContractURIChanged"; actor: Address; uri: string }
  | { type: "RoyaltyChanged"; actor: Address; receiver: Address; numerator: number }
  | { type: "PauseChanged"; actor: Address; paused: boolean }
  | { type: "SetStarted"; actor: Address; set: number; poolSize: number }
  | {
      type: "Withdrawn";
      actor: Address;
      /** "native" or the token contract address. */
      asset: string;
      receiver: Address;
      amount: bigint;
    }
  | { type: "OwnershipTransferred"; previousOwner: Address; newOwner: Address };

export type ContractEventType = ContractEvent["type"];

export interface LogEntry {
  /** Position in the log, from 0. */
  index: number;
  blockNumber: number;
  timestamp: number;
  event: ContractEvent;
}

export class EventLog implements Journaled {
  private readonly entries: LogEntry[] = [];

  get length(): number {
    return this.entries.length;
  }

  emit(block: BlockContext, event: ContractEvent): LogEntry {
    const entry: LogEntry = {
      index: this.entries.length,
      blockNumber: block.number,
      timestamp: block.timestamp,
      event,
    };
    this.entries.push(entry);
    return entry;
  }

  /** Entries with index >= from. */
  since(from: number = 0): LogEntry[] {
    return this.entries.slice(Math.max(0, from));
  }

  ofType<T extends ContractEventType>(type: T): Array<Extract<ContractEvent, { type: T }>> {
    const out: Array<Extract<ContractEvent, { type: T }>> = [];
    for (const { event } of this.entries) {
      if (isEventOfType(event, type)) out.push(event);
    }
    return out;
  }

  checkpoint(): Restore {
    const length = this.entries.length;
    return () => {
      this.entries.length = length;
    };
  }
}

export function isEventOfType<T extends ContractEventType>(
  event: ContractEvent,
  type: T,
): event is Extract<ContractEvent, { type: T }> {
  return event.type === type;
}
