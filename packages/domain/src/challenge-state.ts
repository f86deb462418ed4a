import type { Challenge, ChallengeState } from './types.js';

type ChallengeFlags = Pick<
  Challenge,
  'verified' | 'supersededAt' | 'expiresAt' | 'attemptsUsed' | 'maxAttempts'
>;

/**
 * Derives the state of a challenge from its stored fields. A superseded
 * challenge reads as expired whatever its own TTL says.
 */
export function challengeState(challenge: ChallengeFlags, now: Date): ChallengeState {
  if (challenge.verified) {
    return 'VERIFIED';
  }
  if (challenge.supersededAt || now.getTime() >= challenge.expiresAt.getTime()) {
    return 'EXPIRED';
  }
  if (challenge.attemptsUsed >= challenge.maxAttempts) {
    return 'EXHAUSTED';
  }
  return 'PENDING';
}

export function attemptsRemaining(challenge: Pick<Challenge, 'attemptsUsed' | 'maxAttempts'>): number {
  return Math.max(0, challenge.maxAttempts - challenge.attemptsUsed);
}
