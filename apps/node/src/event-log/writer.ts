/**
 * Event store writer — in-memory append-only copy of the contract log.
 *
 * sync() pulls whatever the contract committed since the last call. The
 * contract log never rewrites committed entries, so the store only appends.
 */

import { contentId, toJsonValue, type LogEntry } from "@setmint/contract";
import type { StoredEventV1 } from "./schemas.js";

export interface EventSource {
  logs(from?: number): LogEntry[];
}

export class EventStore {
  private readonly events: StoredEventV1[] = [];

  constructor(private readonly source: EventSource) {}

  /** Append newly committed entries. @returns the entries appended */
  sync(): StoredEventV1[] {
    const appended = this.source.logs(this.events.length).map((entry) => this.toStored(entry));
    this.events.push(...appended);
    return appended;
  }

  getEvents(fromSeq: number = 0): StoredEventV1[] {
    this.sync();
    return this.events.slice(Math.max(0, fromSeq));
  }

  getEventsByType(type: string, fromSeq: number = 0): StoredEventV1[] {
    return this.getEvents(fromSeq).filter((e) => e.type === type);
  }

  getEventCount(): number {
    this.sync();
    return this.events.length;
  }

  private toStored(entry: LogEntry): StoredEventV1 {
    const { type, ...fields } = entry.event;
    const lowered = toJsonValue(fields);
    const payload: Record<string, unknown> =
      lowered !== null && typeof lowered === "object" && !Array.isArray(lowered) ? lowered : {};
    return {
      seq: entry.index,
      type,
      blockNumber: entry.blockNumber,
      timestamp: entry.timestamp,
      id: contentId({ type, blockNumber: entry.blockNumber, index: entry.index, payload }),
      payload,
    };
  }
}
