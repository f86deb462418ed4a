export type ChallengeState = 'PENDING' | 'VERIFIED' | 'EXPIRED' | 'EXHAUSTED';

export type OtpRequestKind = 'ISSUE' | 'RESEND';

export interface Challenge {
  id: string;
  phoneE164: string;
  secretDigest: string;
  attemptsUsed: number;
  maxAttempts: number;
  expiresAt: Date;
  verified: boolean;
  verifiedAt: Date | null;
  supersededAt: Date | null;
  deliveryReference: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface NewChallenge {
  phoneE164: string;
  secretDigest: string;
  maxAttempts: number;
  expiresAt: Date;
}

export interface RateWindow {
  phoneE164: string;
  windowStart: Date;
  requestCount: number;
}

export interface RateDecision {
  allowed: boolean;
  retryAfterMs: number;
  retryAfterSeconds: number;
  window: RateWindow;
}

/**
 * Settings copied onto a challenge when it is issued. Changing them later does
 * not touch challenges that are already outstanding.
 */
export interface OtpPolicy {
  codeLength: number;
  ttlSeconds: number;
  maxAttempts: number;
  rateWindowSeconds: number;
  rateMaxRequests: number;
  smsTemplate: string;
}

export interface IssueResult {
  reference: string;
  expiresAt: Date;
  expiresInSeconds: number;
}

export interface VerifyResult {
  sessionToken: string;
  userId: string;
  challengeId: string;
}

export interface User {
  id: string;
  phoneE164: string;
  lastLoginAt: Date | null;
  createdAt: Date;
}

export interface SessionSubject {
  userId: string;
  phoneE164: string;
}
