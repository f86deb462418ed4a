import type { RateWindow } from '@phonekey/domain';
import { storageUnavailable } from '@phonekey/domain';

export interface WindowConsumption {
  allowed: boolean;
  window: RateWindow;
}

export interface RateWindowStore {
  /**
   * Opens a fresh window when none is running, otherwise increments the count
   * only while it is below `ceiling`. One atomic step against the store.
   */
  consume(phoneE164: string, now: Date, windowMs: number, ceiling: number): Promise<WindowConsumption>;
}

export interface ScriptClient {
  eval(script: string, numKeys: number, ...args: (string | number)[]): Promise<unknown>;
}

const CONSUME_SCRIPT = `
local start = tonumber(redis.call('HGET', KEYS[1], 'window_start'))
local now = tonumber(ARGV[1])
local window_ms = tonumber(ARGV[2])
local ceiling = tonumber(ARGV[3])
if not start or now >= start + window_ms then
  redis.call('HSET', KEYS[1], 'window_start', now, 'request_count', 1)
  redis.call('PEXPIRE', KEYS[1], window_ms)
  return {1, now, 1}
end
local count = tonumber(redis.call('HGET', KEYS[1], 'request_count')) or 0
if count >= ceiling then
  return {0, start, count}
end
count = redis.call('HINCRBY', KEYS[1], 'request_count', 1)
return {1, start, count}
`;

export function rateWindowKey(phoneE164: string): string {
  return `otp:rate:${phoneE164}`;
}

function parseReply(reply: unknown): [number, number, number] {
  if (!Array.isArray(reply) || reply.length !== 3) {
    throw new Error('rate_window_script_bad_reply');
  }
  const values = reply.map((value) => Number(value));
  if (values.some((value) => !Number.isFinite(value))) {
    throw new Error('rate_window_script_bad_reply');
  }
  return [values[0] ?? 0, values[1] ?? 0, values[2] ?? 0];
}

export class RedisRateWindowStore implements RateWindowStore {
  constructor(private readonly redis: ScriptClient) {}

  async consume(phoneE164: string, now: Date, windowMs: number, ceiling: number): Promise<WindowConsumption> {
    let reply: unknown;
    try {
      reply = await this.redis.eval(CONSUME_SCRIPT, 1, rateWindowKey(phoneE164), now.getTime(), windowMs, ceiling);
    } catch (error) {
      throw storageUnavailable(error);
    }

    const [allowed, windowStart, requestCount] = parseReply(reply);
    return {
      allowed: allowed === 1,
      window: { phoneE164, windowStart: new Date(windowStart), requestCount }
    };
  }
}
