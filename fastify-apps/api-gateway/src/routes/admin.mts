/**
 * Administrative routes
 */
import type { FastifyPluginAsync } from 'fastify';

export const adminRoutes: FastifyPluginAsync = async (fastify) => {
  /**
   * Re-read endpoint definitions; the previous table stays active if this throws
   */
  fastify.post('/admin/endpoints/refresh', async (request) => {
    const summary = await fastify.gateway.directory.reload();
    request.log.info(summary, 'Endpoint definitions refreshed');
    return { endpoints: summary.endpoints, composites: summary.composites };
  });
};
