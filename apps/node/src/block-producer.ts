/**
 * Block producer — seals the current block on a fixed interval.
 *
 * Each new block rotates the chain's prevrandao beacon and moves its
 * timestamp forward, so display-number draws in different blocks see
 * different entropy.
 */

import type { BlockContext, Chain } from "@setmint/ledger";

export interface BlockProducerOptions {
  /** Block interval (ms). 0 = never advance on a timer. Default: 2000. */
  intervalMs?: number;
  /** Clock for block timestamps. Default: Date.now. */
  now?: () => number;
  /** Called after each new block. */
  onBlock?: (block: BlockContext) => void;
  /** Called when a tick throws. */
  onError?: (error: unknown) => void;
}

export interface BlockProducer {
  start(): void;
  stop(): void;
  /** Seal the current block now (useful for testing). */
  tick(): BlockContext;
  running(): boolean;
}

const DEFAULT_INTERVAL_MS = 2_000;

export function createBlockProducer(
  chain: Chain,
  options: BlockProducerOptions = {},
): BlockProducer {
  const intervalMs = options.intervalMs ?? DEFAULT_INTERVAL_MS;
  const now = options.now ?? Date.now;
  const onError = options.onError ?? ((err) => console.error("[block-producer] error:", err));

  let timer: ReturnType<typeof setInterval> | null = null;

  function tick(): BlockContext {
    const block = chain.advanceBlock(now());
    options.onBlock?.(block);
    return block;
  }

  return {
    start() {
      if (timer || intervalMs <= 0) return;
      timer = setInterval(() => {
        try {
          tick();
        } catch (err) {
          onError(err);
        }
      }, intervalMs);
      timer.unref();
    },

    stop() {
      if (timer) {
        clearInterval(timer);
        timer = null;
      }
    },

    tick,

    running() {
      return timer !== null;
    },
  };
}
