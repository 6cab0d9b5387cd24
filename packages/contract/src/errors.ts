/**
 * Contract failures.
 *
 * Every rejected call throws a ContractError whose `failure` names what went
 * wrong and carries the values a caller needs to correct it. Kinds:
 *   precondition  — the request shape or current state forbids the call
 *   transport     — a payment rail (token transfer, value forward) failed
 *   authorization — the caller may not invoke this operation
 */

import type { Address } from "@setmint/ledger";

export type ErrorKind = "precondition" | "transport" | "authorization";

export type ContractFailure =
  | { code: "ContractPaused" }
  | { code: "InvalidAmount"; field: string; value: string }
  | { code: "InvalidAddress"; field: string; value: string }
  | { code: "InsufficientMintQuantity"; quantity: number }
  | { code: "ExceedsBatchLimit"; quantity: number; batchLimit: number }
  | { code: "ExceedsMaxSupply"; set: number; requested: number; available: number }
  | { code: "InsufficientTokenBalance"; balance: bigint; required: bigint }
  | { code: "InsufficientEthFee"; provided: bigint; required: bigint }
  | { code: "BatchLimitTooHigh"; batchLimit: number; max: number }
  | { code: "ZeroAddress"; field: string }
  | { code: "SetAlreadyActive"; set: number }
  | { code: "SetNotConfigured"; set: number }
  | { code: "InvalidSetConfig"; set: number; maxSupply: number; counter: number }
  | { code: "RoyaltyTooHigh"; numerator: number; denominator: number }
  | { code: "ReentrantCall" }
  | { code: "TokenNotFound"; tokenId: number }
  | { code: "NotOwnerNorApproved"; caller: Address; tokenId: number }
  | { code: "TransferFromIncorrectOwner"; from: Address; owner: Address; tokenId: number }
  | { code: "TokenTransferFailed"; token: Address }
  | { code: "EthTransferFailed"; receiver: Address; amount: bigint }
  | { code: "Unauthorized"; caller: Address };

export type ErrorCode = ContractFailure["code"];

const KINDS: Record<ErrorCode, ErrorKind> = {
  ContractPaused: "precondition",
  InvalidAmount: "precondition",
  InvalidAddress: "precondition",
  InsufficientMintQuantity: "precondition",
  ExceedsBatchLimit: "precondition",
  ExceedsMaxSupply: "precondition",
  InsufficientTokenBalance: "precondition",
  InsufficientEthFee: "precondition",
  BatchLimitTooHigh: "precondition",
  ZeroAddress: "precondition",
  SetAlreadyActive: "precondition",
  SetNotConfigured: "precondition",
  InvalidSetConfig: "precondition",
  RoyaltyTooHigh: "precondition",
  ReentrantCall: "precondition",
  TokenNotFound: "precondition",
  NotOwnerNorApproved: "authorization",
  TransferFromIncorrectOwner: "precondition",
  TokenTransferFailed: "transport",
  EthTransferFailed: "transport",
  Unauthorized: "authorization",
};

export class ContractError extends Error {
  readonly kind: ErrorKind;

  constructor(
    readonly failure: ContractFailure,
    options?: { cause?: unknown },
  ) {
    super(describeFailure(failure), options);
    this.name = "ContractError";
    this.kind = KINDS[failure.code];
  }

  get code(): ErrorCode {
    return this.failure.code;
  }
}

export function isContractError(err: unknown): err is ContractError {
  return err instanceof ContractError;
}

/** Throw unless `condition` holds. */
export function ensure(condition: boolean, failure: ContractFailure): asserts condition {
  if (!condition) throw new ContractError(failure);
}

function describeFailure(failure: ContractFailure): string {
  const { code, ...detail } = failure;
  const parts = Object.entries(detail).map(([k, v]) => `${k}=${String(v)}`);
  return parts.length > 0 ? `${code}(${parts.join(", ")})` : code;
}
