/**
 * deadline.ts
 * Cooperative time budget for synchronous work
 */

import { RecommendationTimeoutError } from './errors';

export class Deadline {
  private readonly expiresAt: number;

  constructor(
    readonly timeoutMs: number,
    private readonly now: () => number = Date.now
  ) {
    this.expiresAt = now() + timeoutMs;
  }

  /** A deadline that never expires */
  static unbounded(): Deadline {
    return new Deadline(Number.POSITIVE_INFINITY);
  }

  get expired(): boolean {
    return this.now() >= this.expiresAt;
  }

  /**
   * Throws RecommendationTimeoutError once the budget is spent
   */
  check(): void {
    if (this.expired) {
      throw new RecommendationTimeoutError(this.timeoutMs);
    }
  }
}

// Scans check the clock every this many records
export const DEADLINE_CHECK_INTERVAL = 256;
