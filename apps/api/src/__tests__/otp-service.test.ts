import type { OtpPolicy } from '@phonekey/domain';
import { isOtpError, storageUnavailable } from '@phonekey/domain';
import { describe, expect, it, vi } from 'vitest';
import { OtpService, renderOtpMessage } from '../services/otp-service.js';
import { RateLimiter } from '../services/rate-limiter.js';
import { OtpHasher } from '../utils/hash.js';
import {
  FakeSessionIssuer,
  FakeSmsGateway,
  FakeUsers,
  InMemoryChallengeStore,
  InMemoryRateWindowStore,
  fakeLogger,
  testClock
} from './support/fakes.js';

const phone = '+15551234567';

function errorCode(reason: unknown): string {
  return isOtpError(reason) ? reason.code : 'unexpected';
}

function setup(overrides: Partial<OtpPolicy> = {}, codes: string[] = []) {
  const clock = testClock();
  const store = new InMemoryChallengeStore();
  const sms = new FakeSmsGateway();
  const users = new FakeUsers();
  const sessions = new FakeSessionIssuer();
  const logger = fakeLogger();
  const policy: OtpPolicy = {
    codeLength: 6,
    ttlSeconds: 300,
    maxAttempts: 3,
    rateWindowSeconds: 60,
    rateMaxRequests: 3,
    smsTemplate: 'Your code is {code}. Valid for {minutes} minutes.',
    ...overrides
  };
  const queue = [...codes];
  const service = new OtpService({
    store,
    rateLimiter: new RateLimiter(
      new InMemoryRateWindowStore(),
      { windowSeconds: policy.rateWindowSeconds, maxRequests: policy.rateMaxRequests },
      clock.now
    ),
    hasher: new OtpHasher('test-secret'),
    sms,
    users,
    sessions,
    policy,
    logger,
    clock: clock.now,
    generateCode: codes.length > 0 ? () => queue.shift() ?? '000000' : undefined
  });
  return { service, store, sms, users, sessions, logger, policy, clock };
}

describe('renderOtpMessage', () => {
  it('fills the code and the TTL in minutes', () => {
    expect(renderOtpMessage('Code {code}, {minutes} min', '004217', 90)).toBe('Code 004217, 2 min');
  });
});

describe('OtpService.issue', () => {
  it('stores a digest, sends the code once and returns the challenge reference', async () => {
    const { service, store, sms } = setup({}, ['482913']);

    const result = await service.issue(phone);

    expect(sms.sent).toEqual([{ phoneE164: phone, message: 'Your code is 482913. Valid for 5 minutes.' }]);
    expect(result.expiresInSeconds).toBe(300);
    expect(result.expiresAt.toISOString()).toBe('2026-03-01T12:05:00.000Z');

    const stored = store.byId.get(result.reference);
    expect(stored?.secretDigest).toBe(new OtpHasher('test-secret').digest(phone, '482913'));
    expect(stored?.attemptsUsed).toBe(0);
    expect(stored?.maxAttempts).toBe(3);
    expect(stored?.deliveryReference).toBe('SM1');
  });

  it('never logs the plaintext code', async () => {
    const { service, logger } = setup({}, ['482913']);

    await service.issue(phone);
    await service.verify(phone, '482913');

    const logged = JSON.stringify([logger.info.mock.calls, logger.warn.mock.calls, logger.error.mock.calls]);
    expect(logged).not.toContain('482913');
  });

  it('rate limits the request after the ceiling with a positive retry-after', async () => {
    const { service, sms } = setup();

    await service.issue(phone);
    await service.issue(phone);
    await service.issue(phone);

    await expect(service.issue(phone)).rejects.toMatchObject({ code: 'rate_limited', retryAfterSeconds: 60 });
    expect(sms.sent).toHaveLength(3);
  });

  it('reports delivery failure but keeps the challenge verifiable', async () => {
    const { service, sms, store } = setup({}, ['135790']);
    sms.failWith = new Error('twilio_send_failed:503:unavailable');

    await expect(service.issue(phone)).rejects.toMatchObject({ code: 'delivery_failed' });
    expect(store.byId.size).toBe(1);

    const result = await service.verify(phone, '135790');
    expect(result.userId).toBe('user-1');
  });

  it('leaves only the newer of two concurrent issues verifiable', async () => {
    const { service, store, sessions } = setup({}, ['111111', '222222']);

    const [first, second] = await Promise.all([service.issue(phone), service.issue(phone)]);

    const current = [...store.byId.values()].filter((challenge) => challenge.supersededAt === null);
    expect(current.map((challenge) => challenge.id)).toEqual([second.reference]);
    expect(store.byId.get(first.reference)?.supersededAt).not.toBeNull();

    await expect(service.verify(phone, '111111')).rejects.toMatchObject({ code: 'invalid_or_expired' });
    const result = await service.verify(phone, '222222');
    expect(result.challengeId).toBe(second.reference);
    expect(sessions.issued).toHaveLength(1);
  });

  it('fixes TTL and attempt budget at issuance', async () => {
    const { service, policy } = setup({}, ['482913']);

    await service.issue(phone);
    policy.maxAttempts = 10;

    await expect(service.verify(phone, '000000')).rejects.toMatchObject({ code: 'invalid_or_expired' });
    await expect(service.verify(phone, '000000')).rejects.toMatchObject({ code: 'invalid_or_expired' });
    await expect(service.verify(phone, '000000')).rejects.toMatchObject({ code: 'max_attempts_exceeded' });
  });
});

describe('OtpService.verify', () => {
  it('succeeds once and rejects a replay of the same code', async () => {
    const { service, sessions } = setup({}, ['482913']);

    await service.issue(phone);
    const result = await service.verify(phone, '482913');

    expect(result.sessionToken).toBe('session-1');
    expect(result.userId).toBe('user-1');
    expect(sessions.issued).toEqual([{ userId: 'user-1', phoneE164: phone }]);

    await expect(service.verify(phone, '482913')).rejects.toMatchObject({ code: 'invalid_or_expired' });
    expect(sessions.issued).toHaveLength(1);
  });

  it('rejects a phone that never had a challenge with the generic error', async () => {
    const { service } = setup();

    await expect(service.verify(phone, '123456')).rejects.toMatchObject({
      code: 'invalid_or_expired',
      message: 'Invalid or expired code.'
    });
  });

  it('counts wrong codes and exhausts the challenge', async () => {
    const { service, store, sessions } = setup({}, ['482913']);

    const { reference } = await service.issue(phone);

    await expect(service.verify(phone, '000000')).rejects.toMatchObject({ code: 'invalid_or_expired' });
    expect(store.byId.get(reference)?.attemptsUsed).toBe(1);
    await expect(service.verify(phone, '000000')).rejects.toMatchObject({ code: 'invalid_or_expired' });
    await expect(service.verify(phone, '000000')).rejects.toMatchObject({ code: 'max_attempts_exceeded' });
    expect(store.byId.get(reference)?.attemptsUsed).toBe(3);

    await expect(service.verify(phone, '482913')).rejects.toMatchObject({ code: 'invalid_or_expired' });
    expect(store.byId.get(reference)?.attemptsUsed).toBe(3);
    expect(sessions.issued).toHaveLength(0);
  });

  it('accepts the right code on the last remaining attempt', async () => {
    const { service } = setup({}, ['482913']);

    await service.issue(phone);
    await expect(service.verify(phone, '000000')).rejects.toMatchObject({ code: 'invalid_or_expired' });
    await expect(service.verify(phone, '000000')).rejects.toMatchObject({ code: 'invalid_or_expired' });

    const result = await service.verify(phone, '482913');
    expect(result.sessionToken).toBe('session-1');
  });

  it('rejects an expired challenge without spending an attempt', async () => {
    const { service, store, clock } = setup({}, ['482913']);

    const { reference } = await service.issue(phone);
    clock.advance(300_000);

    await expect(service.verify(phone, '482913')).rejects.toMatchObject({ code: 'invalid_or_expired' });
    expect(store.byId.get(reference)?.attemptsUsed).toBe(0);
  });

  it('accepts a code just before expiry', async () => {
    const { service, clock } = setup({}, ['482913']);

    await service.issue(phone);
    clock.advance(299_999);

    await expect(service.verify(phone, '482913')).resolves.toMatchObject({ userId: 'user-1' });
  });

  it('gives exactly one session to concurrent correct verifies', async () => {
    const { service, sessions } = setup({ maxAttempts: 5 }, ['482913']);

    await service.issue(phone);
    const outcomes = await Promise.allSettled(Array.from({ length: 5 }, () => service.verify(phone, '482913')));

    const fulfilled = outcomes.filter((o) => o.status === 'fulfilled');
    const rejected = outcomes.filter((o): o is PromiseRejectedResult => o.status === 'rejected');
    expect(fulfilled).toHaveLength(1);
    expect(rejected.map((o) => errorCode(o.reason))).toEqual([
      'invalid_or_expired',
      'invalid_or_expired',
      'invalid_or_expired',
      'invalid_or_expired'
    ]);
    expect(sessions.issued).toHaveLength(1);
  });

  it('reports exhaustion when a concurrent burst outruns the budget', async () => {
    const { service, sessions } = setup({ maxAttempts: 2 }, ['482913']);

    await service.issue(phone);
    const outcomes = await Promise.allSettled(Array.from({ length: 4 }, () => service.verify(phone, '000000')));

    const codes = outcomes.map((o) => (o.status === 'rejected' ? errorCode(o.reason) : 'ok'));
    expect(codes).toEqual(['invalid_or_expired', 'max_attempts_exceeded', 'max_attempts_exceeded', 'max_attempts_exceeded']);
    expect(sessions.issued).toHaveLength(0);
  });

  it('propagates storage failures as storage_unavailable', async () => {
    const { service, store } = setup();
    vi.spyOn(store, 'findLatest').mockRejectedValue(storageUnavailable(new Error('Query read timeout')));

    await expect(service.verify(phone, '123456')).rejects.toMatchObject({ code: 'storage_unavailable' });
  });
});

describe('OtpService.resend', () => {
  it('supersedes the previous code even inside its TTL', async () => {
    const { service, sessions } = setup({}, ['111111', '222222']);

    await service.issue(phone);
    await service.resend(phone);

    await expect(service.verify(phone, '111111')).rejects.toMatchObject({ code: 'invalid_or_expired' });
    const result = await service.verify(phone, '222222');
    expect(result.sessionToken).toBe('session-1');
    expect(sessions.issued).toHaveLength(1);
  });

  it('leaves the superseded challenge unverifiable', async () => {
    const { service, store } = setup({}, ['111111', '222222']);

    const first = await service.issue(phone);
    await service.resend(phone);

    expect(store.byId.get(first.reference)?.supersededAt?.toISOString()).toBe('2026-03-01T12:00:00.000Z');
    expect(await store.markVerified(first.reference, new Date('2026-03-01T12:00:01.000Z'))).toBe(false);
  });

  it('shares the rate budget with issue', async () => {
    const { service } = setup();

    await service.issue(phone);
    await service.resend(phone);
    await service.resend(phone);

    await expect(service.resend(phone)).rejects.toMatchObject({ code: 'rate_limited' });
  });
});
