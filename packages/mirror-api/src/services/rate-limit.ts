/**
 * Rate gate shared by every batch of one provider.
 * Enforces a fixed minimum spacing between request starts; concurrent callers
 * reserve consecutive slots instead of racing for the same one.
 */

import type { Duration, Timestamp } from '../types/index.js';

export type Sleep = (ms: Duration) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export interface RateLimiterOptions {
  now?: () => Timestamp;
  sleep?: Sleep;
}

export class RateLimiter {
  readonly minIntervalMs: Duration;
  private nextSlot: Timestamp = 0;
  private readonly now: () => Timestamp;
  private readonly sleep: Sleep;

  constructor(requestsPerSecond: number, options: RateLimiterOptions = {}) {
    this.minIntervalMs = 1000 / requestsPerSecond;
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? sleep;
  }

  /**
   * Wait until this caller may issue its request
   */
  async acquire(): Promise<void> {
    const now = this.now();
    const slot = Math.max(now, this.nextSlot);
    this.nextSlot = slot + this.minIntervalMs;

    const waitTime = slot - now;
    if (waitTime > 0) {
      await this.sleep(waitTime);
    }
  }
}

// One gate per provider name, so every orchestrator in the process shares it
const rateLimiters = new Map<string, RateLimiter>();

export function getRateLimiter(provider: string, requestsPerSecond: number): RateLimiter {
  let limiter = rateLimiters.get(provider);
  if (!limiter) {
    limiter = new RateLimiter(requestsPerSecond);
    rateLimiters.set(provider, limiter);
  }
  return limiter;
}
