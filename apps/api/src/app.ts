import Fastify, { type FastifyServerOptions } from 'fastify';
import formbody from '@fastify/formbody';
import cors from '@fastify/cors';
import jwt from '@fastify/jwt';
import { isOtpError, type OtpError, type OtpPolicy } from '@phonekey/domain';
import type { SmsGateway } from './adapters/sms-gateway.js';
import { authRoutes } from './routes/auth.js';
import { healthRoutes } from './routes/health.js';
import type { AuditLog } from './services/audit-service.js';
import type { ChallengeStore } from './services/challenge-store.js';
import { OtpService } from './services/otp-service.js';
import { RateLimiter } from './services/rate-limiter.js';
import type { RateWindowStore } from './services/rate-window-store.js';
import { JwtSessionIssuer } from './services/session-issuer.js';
import type { UserProvisioner } from './services/user-service.js';
import { OtpHasher } from './utils/hash.js';

declare module 'fastify' {
  interface FastifyInstance {
    authenticate: (request: import('fastify').FastifyRequest, reply: import('fastify').FastifyReply) => Promise<void>;
  }
}

export interface ServerOptions {
  logger?: FastifyServerOptions['logger'];
  jwtSecret: string;
  jwtExpiresIn: string;
  otpHashSecret: string;
  defaultCountryCode: string;
  policy: OtpPolicy;
  challenges: ChallengeStore;
  rateWindows: RateWindowStore;
  sms: SmsGateway;
  users: UserProvisioner;
  audit: AuditLog;
  ping: () => Promise<void>;
  clock?: () => Date;
  generateCode?: (length: number) => string;
}

const STATUS_BY_CODE: Record<OtpError['code'], number> = {
  rate_limited: 429,
  delivery_failed: 502,
  invalid_or_expired: 401,
  max_attempts_exceeded: 403,
  storage_unavailable: 503
};

export async function buildServer(options: ServerOptions) {
  const app = Fastify({ logger: options.logger ?? true });
  await app.register(cors, { origin: true });
  await app.register(formbody);
  await app.register(jwt, { secret: options.jwtSecret });

  app.decorate('authenticate', async function authenticate(request, reply) {
    try {
      await request.jwtVerify();
    } catch {
      return reply.status(401).send({ error: 'unauthorized' });
    }
  });

  app.setErrorHandler(async (error, request, reply) => {
    if (isOtpError(error)) {
      if (error.code === 'storage_unavailable') {
        request.log.error({ err: error.cause }, 'storage_unavailable');
        return reply.status(503).send({ error: 'service_unavailable' });
      }
      if (error.code === 'rate_limited' && error.retryAfterSeconds !== undefined) {
        reply.header('Retry-After', String(error.retryAfterSeconds));
        return reply
          .status(STATUS_BY_CODE.rate_limited)
          .send({ error: error.code, message: error.message, retryAfterSeconds: error.retryAfterSeconds });
      }
      return reply.status(STATUS_BY_CODE[error.code]).send({ error: error.code, message: error.message });
    }

    if (error.statusCode !== undefined && error.statusCode < 500) {
      return reply.status(error.statusCode).send({ error: 'bad_request', message: error.message });
    }

    request.log.error({ err: error }, 'unhandled_error');
    return reply.status(500).send({ error: 'internal_error' });
  });

  const clock = options.clock ?? (() => new Date());
  const sessions = new JwtSessionIssuer(app.jwt, options.jwtExpiresIn);
  const otp = new OtpService({
    store: options.challenges,
    rateLimiter: new RateLimiter(
      options.rateWindows,
      { windowSeconds: options.policy.rateWindowSeconds, maxRequests: options.policy.rateMaxRequests },
      clock
    ),
    hasher: new OtpHasher(options.otpHashSecret),
    sms: options.sms,
    users: options.users,
    sessions,
    policy: options.policy,
    logger: app.log,
    clock,
    generateCode: options.generateCode
  });

  await app.register(healthRoutes, { ping: options.ping });
  await app.register(authRoutes, {
    otp,
    users: options.users,
    sessions,
    audit: options.audit,
    defaultCountryCode: options.defaultCountryCode
  });

  return app;
}
