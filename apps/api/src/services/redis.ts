import { Redis } from 'ioredis';

export function createRedis(url: string, commandTimeoutMs: number): Redis {
  return new Redis(url, {
    maxRetriesPerRequest: 3,
    enableReadyCheck: true,
    connectTimeout: commandTimeoutMs,
    commandTimeout: commandTimeoutMs
  });
}
