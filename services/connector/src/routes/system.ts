import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { VolumeRegistry } from '../volumes/registry';

export async function registerSystemRoutes(app: FastifyInstance, volumes: VolumeRegistry): Promise<void> {
  const health = async () => ({
    status: 'ok',
    volumes: volumes.describe()
  });

  app.get('/healthz', health);
  app.get('/health', health);

  // Ready once every volume root can be described.
  async function readinessCheck(_request: FastifyRequest, reply: FastifyReply) {
    const unreadable = await volumes.findUnreadable();
    for (const { id, error } of unreadable) {
      app.log.warn({ err: error, volumeId: id }, 'volume readiness check failed');
    }
    const unavailable = unreadable.map(({ id, reason }) => ({ id, reason }));
    if (unavailable.length > 0) {
      reply.status(503);
      return {
        status: 'unavailable',
        reason: 'one or more volumes are not readable',
        volumes: unavailable
      };
    }
    return { status: 'ok' };
  }

  app.get('/readyz', readinessCheck);
  app.get('/ready', readinessCheck);
}
