import type { FastifyBaseLogger } from 'fastify';
import type { Challenge, IssueResult, OtpPolicy, OtpRequestKind, VerifyResult } from '@phonekey/domain';
import {
  attemptsRemaining,
  challengeState,
  deliveryFailed,
  invalidOrExpired,
  maxAttemptsExceeded,
  rateLimited
} from '@phonekey/domain';
import type { SmsGateway } from '../adapters/sms-gateway.js';
import { generateOtp, type OtpHasher } from '../utils/hash.js';
import { maskPhone } from '../utils/phone.js';
import type { ChallengeStore } from './challenge-store.js';
import type { RateLimiter } from './rate-limiter.js';
import type { SessionIssuer } from './session-issuer.js';
import type { UserProvisioner } from './user-service.js';

export type OtpLogger = Pick<FastifyBaseLogger, 'info' | 'warn' | 'error'>;

export interface OtpServiceDeps {
  store: ChallengeStore;
  rateLimiter: RateLimiter;
  hasher: OtpHasher;
  sms: SmsGateway;
  users: UserProvisioner;
  sessions: SessionIssuer;
  policy: OtpPolicy;
  logger: OtpLogger;
  clock?: () => Date;
  generateCode?: (length: number) => string;
}

export function renderOtpMessage(template: string, code: string, ttlSeconds: number): string {
  return template.replaceAll('{code}', code).replaceAll('{minutes}', String(Math.ceil(ttlSeconds / 60)));
}

/**
 * Issue, resend and verify for phone OTP challenges. The plaintext code only
 * lives between generation and the SMS hand-off.
 */
export class OtpService {
  private readonly clock: () => Date;
  private readonly generateCode: (length: number) => string;

  constructor(private readonly deps: OtpServiceDeps) {
    this.clock = deps.clock ?? (() => new Date());
    this.generateCode = deps.generateCode ?? generateOtp;
  }

  async issue(phoneE164: string): Promise<IssueResult> {
    return this.dispatch(phoneE164, 'ISSUE');
  }

  async resend(phoneE164: string): Promise<IssueResult> {
    return this.dispatch(phoneE164, 'RESEND');
  }

  async verify(phoneE164: string, code: string): Promise<VerifyResult> {
    const { store, hasher, users, sessions, logger } = this.deps;
    const phone = maskPhone(phoneE164);

    const latest = await store.findLatest(phoneE164);
    if (!latest) {
      logger.info({ phone, reason: 'none' }, 'otp_verify_rejected');
      throw invalidOrExpired();
    }

    const state = challengeState(latest, this.clock());
    if (state !== 'PENDING') {
      logger.info({ phone, challengeId: latest.id, reason: state }, 'otp_verify_rejected');
      throw invalidOrExpired();
    }

    const outcome = await store.incrementAttempts(latest.id, this.clock());
    if (outcome.status === 'REJECTED') {
      throw this.rejectAfterRace(phone, latest.id, outcome.challenge);
    }

    const challenge = outcome.challenge;
    if (!hasher.matches(phoneE164, code, challenge.secretDigest)) {
      const remaining = attemptsRemaining(challenge);
      const exhausted = remaining === 0;
      logger.info(
        { phone, challengeId: challenge.id, attemptsUsed: challenge.attemptsUsed, attemptsRemaining: remaining },
        exhausted ? 'otp_attempts_exhausted' : 'otp_code_mismatch'
      );
      throw exhausted ? maxAttemptsExceeded() : invalidOrExpired();
    }

    const won = await store.markVerified(challenge.id, this.clock());
    if (!won) {
      logger.warn({ phone, challengeId: challenge.id }, 'otp_verify_lost_race');
      throw invalidOrExpired();
    }

    const user = await users.resolveOrCreateByPhone(phoneE164);
    const sessionToken = await sessions.issue({ userId: user.id, phoneE164 });
    logger.info({ phone, challengeId: challenge.id, userId: user.id }, 'otp_verified');

    return { sessionToken, userId: user.id, challengeId: challenge.id };
  }

  private rejectAfterRace(phone: string, challengeId: string, current: Challenge | null): Error {
    const state = current ? challengeState(current, this.clock()) : 'EXPIRED';
    this.deps.logger.info({ phone, challengeId, reason: state }, 'otp_increment_refused');
    return state === 'EXHAUSTED' ? maxAttemptsExceeded() : invalidOrExpired();
  }

  private async dispatch(phoneE164: string, kind: OtpRequestKind): Promise<IssueResult> {
    const { store, rateLimiter, hasher, sms, policy, logger } = this.deps;
    const phone = maskPhone(phoneE164);

    const decision = await rateLimiter.checkAndConsume(phoneE164);
    if (!decision.allowed) {
      logger.warn({ phone, kind, retryAfterSeconds: decision.retryAfterSeconds }, 'otp_rate_limited');
      throw rateLimited(decision.retryAfterSeconds);
    }

    const now = this.clock();
    const code = this.generateCode(policy.codeLength);
    const challenge = await store.create(
      {
        phoneE164,
        secretDigest: hasher.digest(phoneE164, code),
        maxAttempts: policy.maxAttempts,
        expiresAt: new Date(now.getTime() + policy.ttlSeconds * 1000)
      },
      now
    );

    let deliveryReference: string;
    try {
      deliveryReference = await sms.send(phoneE164, renderOtpMessage(policy.smsTemplate, code, policy.ttlSeconds));
    } catch (error) {
      logger.error({ err: error, phone, kind, challengeId: challenge.id }, 'otp_delivery_failed');
      throw deliveryFailed(error);
    }

    await store.setDeliveryReference(challenge.id, deliveryReference, this.clock());
    logger.info({ phone, kind, challengeId: challenge.id, deliveryReference }, 'otp_issued');

    return {
      reference: challenge.id,
      expiresAt: challenge.expiresAt,
      expiresInSeconds: policy.ttlSeconds
    };
  }
}
