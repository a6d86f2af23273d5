import type { FastifyInstance } from 'fastify';
import type { Container } from '../../../container';

export const registerMetricsRoute = async (app: FastifyInstance, context: { container: Container }) => {
  const registry = context.container.metrics.getRegistry();
  app.get('/metrics', async (_request, reply) => {
    reply.header('content-type', registry.contentType);
    return registry.metrics();
  });
};
