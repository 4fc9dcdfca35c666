/**
 * Cooperative cancellation helpers
 *
 * Long traversals check their `AbortSignal` before every hop or frontier
 * expansion and stop with a partial result instead of throwing.
 */

import type { CancellationPoint } from '../core/types.js';

export function isCancelled(signal?: AbortSignal): boolean {
  return signal?.aborted ?? false;
}

/**
 * Tracks the first point at which an operation observed cancellation
 */
export class CancellationTracker {
  private readonly signal?: AbortSignal;
  private point?: CancellationPoint;

  constructor(signal?: AbortSignal) {
    this.signal = signal;
  }

  /**
   * Returns true (and records where) when the signal has fired
   */
  check(stage: string, hop: number, detail?: string): boolean {
    if (this.point) return true;
    if (!isCancelled(this.signal)) return false;

    this.point = detail === undefined ? { stage, hop } : { stage, hop, detail };
    return true;
  }

  get cancelled(): boolean {
    return this.point !== undefined;
  }

  get cancelledAt(): CancellationPoint | undefined {
    return this.point;
  }
}
