import type { FastifyInstance, FastifyRequest } from 'fastify';
import type { RequireMacAuth } from '../../middleware/requireMacAuth';

export const whoamiRoutes = async (app: FastifyInstance, context: { requireMacAuth: RequireMacAuth }) => {
  const handler = async (request: FastifyRequest) => ({ id: request.macIdentity, method: request.method });

  app.get('/whoami', { preHandler: context.requireMacAuth }, handler);
  app.post('/whoami', { preHandler: context.requireMacAuth }, handler);
};
