/**
 * Event store schemas — the wire form of committed contract events.
 *
 * Every committed contract event is copied into the store with a sequence
 * number and a content id. Anyone holding the log can replay it and
 * reconstruct the collection's history.
 */

import { Type, type Static } from "@sinclair/typebox";

const Hex32 = Type.String({ pattern: "^[0-9a-f]{64}$" });

export const StoredEventV1 = Type.Object({
  /** Monotonic sequence number within the store, from 0. */
  seq: Type.Integer({ minimum: 0 }),
  /** Contract event type discriminator. */
  type: Type.String(),
  blockNumber: Type.Integer({ minimum: 0 }),
  /** Block timestamp (ms since epoch). */
  timestamp: Type.Integer({ minimum: 0 }),
  /** SHA256 of canonical(payload). */
  id: Hex32,
  /** Event fields with amounts as decimal strings. */
  payload: Type.Record(Type.String(), Type.Unknown()),
});

export type StoredEventV1 = Static<typeof StoredEventV1>;

export const EventsQuery = Type.Object({
  from: Type.Optional(Type.Integer({ minimum: 0, default: 0 })),
  type: Type.Optional(Type.String()),
});

export type EventsQuery = Static<typeof EventsQuery>;
