import type { PhotoWebFastifyInstance } from '../server/fastify';

/** Register the liveness endpoint (`/healthz`). */
export async function registerHealthRoutes(app: PhotoWebFastifyInstance): Promise<void> {
  app.get('/healthz', { config: { surface: 'api' } }, async () => ({ status: 'ok' }));
}
