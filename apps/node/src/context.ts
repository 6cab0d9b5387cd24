/**
 * Shared route context and wire helpers.
 */

import { Type, type Static } from "@sinclair/typebox";
import { AddressV1, toJsonValue, type JsonValue } from "@setmint/contract";
import type { Deployment } from "./deploy.js";
import type { EventStore } from "./event-log/writer.js";

export interface NodeContext {
  deployment: Deployment;
  events: EventStore;
}

/** Lower a result for JSON: bigint → decimal string. */
export function toWire(value: unknown): JsonValue {
  return toJsonValue(value);
}

/** Body field naming the acting account (dev node: unsigned). */
export const CallerField = { caller: AddressV1 };

export const TokenIdParams = Type.Object({ id: Type.Integer({ minimum: 1 }) });
export type TokenIdParams = Static<typeof TokenIdParams>;
