import type { FastifyInstance } from 'fastify';
import { storageUnavailable } from '@phonekey/domain';

export interface HealthRouteOptions {
  ping: () => Promise<void>;
}

export async function healthRoutes(app: FastifyInstance, opts: HealthRouteOptions): Promise<void> {
  app.get('/healthz', async () => {
    try {
      await opts.ping();
    } catch (error) {
      throw storageUnavailable(error);
    }
    return { ok: true, service: 'api' };
  });
}
