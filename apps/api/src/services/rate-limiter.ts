import type { RateDecision } from '@phonekey/domain';
import type { RateWindowStore } from './rate-window-store.js';

export interface RateLimitPolicy {
  windowSeconds: number;
  maxRequests: number;
}

/** Fixed-window budget per phone number, shared by issue and resend. */
export class RateLimiter {
  constructor(
    private readonly store: RateWindowStore,
    private readonly policy: RateLimitPolicy,
    private readonly clock: () => Date = () => new Date()
  ) {}

  async checkAndConsume(phoneE164: string): Promise<RateDecision> {
    const now = this.clock();
    const windowMs = this.policy.windowSeconds * 1000;
    const { allowed, window } = await this.store.consume(phoneE164, now, windowMs, this.policy.maxRequests);

    if (allowed) {
      return { allowed, retryAfterMs: 0, retryAfterSeconds: 0, window };
    }

    const retryAfterMs = Math.max(0, window.windowStart.getTime() + windowMs - now.getTime());
    return {
      allowed,
      retryAfterMs,
      retryAfterSeconds: Math.max(1, Math.ceil(retryAfterMs / 1000)),
      window
    };
  }
}
