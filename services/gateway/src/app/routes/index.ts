import type { FastifyInstance } from 'fastify';
import type { Container } from '../../container';
import { createRequireMacAuth } from '../middleware/requireMacAuth';
import { registerErrorHandler } from './meta/errorHandler';
import { registerHealthRoute } from './meta/health';
import { registerMetricsRoute } from './meta/metrics';
import { whoamiRoutes } from './modules/whoami';

export const registerRoutes = async (app: FastifyInstance, context: { container: Container }) => {
  const { container } = context;
  const requireMacAuth = createRequireMacAuth({
    keyResolver: container.keyResolver,
    nonceCache: container.nonceCache,
    metrics: container.metrics,
    logger: container.logger,
    algorithm: container.algorithm
  });

  registerErrorHandler(app);
  app.decorateRequest('macIdentity', null);
  await registerHealthRoute(app);
  await registerMetricsRoute(app, context);
  await whoamiRoutes(app, { requireMacAuth });
};
