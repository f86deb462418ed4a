import type { FastifyInstance, FastifyRequest } from 'fastify';
import { isOtpError, type IssueResult } from '@phonekey/domain';
import { z } from 'zod';
import type { AuditEntry, AuditLog } from '../services/audit-service.js';
import type { OtpService } from '../services/otp-service.js';
import type { SessionIssuer } from '../services/session-issuer.js';
import type { UserProvisioner } from '../services/user-service.js';
import { normalizePhoneE164 } from '../utils/phone.js';

export interface AuthRouteOptions {
  otp: OtpService;
  users: UserProvisioner;
  sessions: SessionIssuer;
  audit: AuditLog;
  defaultCountryCode: string;
}

const phoneBody = z.object({ phone: z.string().min(1) });
const verifyBody = z.object({
  phone: z.string().min(1),
  code: z
    .string()
    .trim()
    .regex(/^\d{4,10}$/)
});

async function recordAudit(req: FastifyRequest, audit: AuditLog, entry: AuditEntry): Promise<void> {
  try {
    await audit.log(entry);
  } catch (error) {
    req.log.error({ err: error, eventType: entry.eventType }, 'audit_log_failed');
  }
}

export async function authRoutes(app: FastifyInstance, opts: AuthRouteOptions): Promise<void> {
  const { otp, users, sessions, audit, defaultCountryCode } = opts;

  function parsePhone(body: unknown): string | undefined {
    const parsed = phoneBody.safeParse(body);
    return parsed.success ? normalizePhoneE164(parsed.data.phone, defaultCountryCode) : undefined;
  }

  async function requestCode(req: FastifyRequest, phone: string, kind: 'ISSUE' | 'RESEND'): Promise<IssueResult> {
    try {
      const result = kind === 'ISSUE' ? await otp.issue(phone) : await otp.resend(phone);
      await recordAudit(req, audit, {
        eventType: kind === 'ISSUE' ? 'AUTH_OTP_ISSUED' : 'AUTH_OTP_RESENT',
        phoneE164: phone,
        userId: null,
        challengeId: result.reference
      });
      return result;
    } catch (error) {
      if (isOtpError(error) && error.code === 'rate_limited') {
        await recordAudit(req, audit, {
          eventType: 'AUTH_OTP_RATE_LIMITED',
          phoneE164: phone,
          userId: null,
          challengeId: null,
          metadata: { kind, retryAfterSeconds: error.retryAfterSeconds }
        });
      }
      throw error;
    }
  }

  app.post('/auth/otp/start', async (req, reply) => {
    const phone = parsePhone(req.body);
    if (!phone) {
      return reply.status(400).send({ error: 'invalid_phone' });
    }

    const result = await requestCode(req, phone, 'ISSUE');
    return reply.send({ ok: true, reference: result.reference, expiresInSeconds: result.expiresInSeconds });
  });

  app.post('/auth/otp/resend', async (req, reply) => {
    const phone = parsePhone(req.body);
    if (!phone) {
      return reply.status(400).send({ error: 'invalid_phone' });
    }

    const result = await requestCode(req, phone, 'RESEND');
    return reply.send({ ok: true, reference: result.reference, expiresInSeconds: result.expiresInSeconds });
  });

  app.post('/auth/otp/verify', async (req, reply) => {
    const parsed = verifyBody.safeParse(req.body);
    const phone = parsed.success ? normalizePhoneE164(parsed.data.phone, defaultCountryCode) : undefined;
    if (!parsed.success || !phone) {
      return reply.status(400).send({ error: 'invalid_request' });
    }

    try {
      const result = await otp.verify(phone, parsed.data.code);
      await recordAudit(req, audit, {
        eventType: 'AUTH_PHONE_VERIFIED',
        phoneE164: phone,
        userId: result.userId,
        challengeId: result.challengeId
      });
      return reply.send({ token: result.sessionToken, userId: result.userId });
    } catch (error) {
      if (isOtpError(error) && (error.code === 'invalid_or_expired' || error.code === 'max_attempts_exceeded')) {
        await recordAudit(req, audit, {
          eventType: 'AUTH_OTP_VERIFY_REJECTED',
          phoneE164: phone,
          userId: null,
          challengeId: null,
          metadata: { reason: error.code }
        });
      }
      throw error;
    }
  });

  app.get('/auth/me', { preHandler: [app.authenticate] }, async (req, reply) => {
    const user = await users.findById(req.user.userId);
    if (!user) {
      return reply.status(404).send({ error: 'user_not_found' });
    }
    return reply.send({
      userId: user.id,
      phoneE164: user.phoneE164,
      lastLoginAt: user.lastLoginAt ? user.lastLoginAt.toISOString() : null
    });
  });

  app.post('/auth/refresh', { preHandler: [app.authenticate] }, async (req, reply) => {
    const user = await users.findById(req.user.userId);
    if (!user) {
      return reply.status(404).send({ error: 'user_not_found' });
    }

    const token = await sessions.issue({ userId: user.id, phoneE164: user.phoneE164 });
    await recordAudit(req, audit, {
      eventType: 'AUTH_SESSION_REFRESHED',
      phoneE164: user.phoneE164,
      userId: user.id,
      challengeId: null
    });
    return reply.send({ token, userId: user.id });
  });
}
