import { TwilioClient } from '@phonekey/clients';
import { buildServer } from './app.js';
import { TwilioSmsGateway } from './adapters/sms-gateway.js';
import { env, otpPolicyFromEnv } from './config/env.js';
import { AuditService } from './services/audit-service.js';
import { PgChallengeStore } from './services/challenge-store.js';
import { PgDatabase, createPool } from './services/db.js';
import { RedisRateWindowStore } from './services/rate-window-store.js';
import { createRedis } from './services/redis.js';
import { UserService } from './services/user-service.js';

const pool = createPool(env.DATABASE_URL, env.STORAGE_TIMEOUT_MS);
const db = new PgDatabase(pool);
const redis = createRedis(env.REDIS_URL, env.STORAGE_TIMEOUT_MS);
const twilio = new TwilioClient({
  accountSid: env.TWILIO_ACCOUNT_SID,
  authToken: env.TWILIO_AUTH_TOKEN,
  fromPhone: env.TWILIO_SMS_FROM
});

const app = await buildServer({
  logger: { level: env.LOG_LEVEL },
  jwtSecret: env.JWT_SECRET,
  jwtExpiresIn: env.JWT_EXPIRES_IN,
  otpHashSecret: env.OTP_HASH_SECRET,
  defaultCountryCode: env.DEFAULT_COUNTRY_CODE,
  policy: otpPolicyFromEnv(env),
  challenges: new PgChallengeStore(db),
  rateWindows: new RedisRateWindowStore(redis),
  sms: new TwilioSmsGateway(twilio),
  users: new UserService(db),
  audit: new AuditService(db),
  ping: async () => {
    await db.ping();
    await redis.ping();
  }
});

if (!twilio.isConfigured()) {
  app.log.warn('twilio_not_configured_sms_dev_mode');
}

pool.on('error', (error) => {
  app.log.error({ err: error }, 'pg_pool_error');
});
redis.on('error', (error: Error) => {
  app.log.error({ err: error }, 'redis_error');
});
app.addHook('onClose', async () => {
  await redis.quit();
  await pool.end();
});

await app.listen({ port: env.PORT, host: '0.0.0.0' });
