import { fileURLToPath } from 'node:url';
import { createLogger } from '@macauth/auth';
import Fastify, { type FastifyInstance } from 'fastify';
import type { Logger } from 'pino';
import { loadConfig, type Config } from '../config';
import { createContainer, type Container } from '../container';
import { registerRoutes } from './routes';

export interface ServerOptions {
  config: Config;
  logger: Logger;
  container: Container;
}

export interface GatewayServer {
  listen(): Promise<FastifyInstance>;
  close(): Promise<void>;
  app: FastifyInstance;
}

export const createServer = async ({ config, logger, container }: ServerOptions): Promise<GatewayServer> => {
  const app = Fastify({ logger: { level: logger.level } });

  await registerRoutes(app, { container });

  return {
    listen: async () => {
      try {
        await app.listen({ host: config.HTTP_HOST, port: config.HTTP_PORT });
      } catch (error) {
        logger.error({ err: error }, 'failed to bind gateway');
        throw error;
      }
      return app;
    },
    close: async () => app.close(),
    app
  };
};

const isDirect =
  process.argv[1] !== undefined &&
  (process.argv[1] === fileURLToPath(import.meta.url) ||
    process.argv[1].endsWith('src/app/server.ts') ||
    process.argv[1].endsWith('dist/app/server.js'));

if (isDirect) {
  (async () => {
    const config = loadConfig();
    const logger = createLogger({ level: config.LOG_LEVEL, name: 'gateway' });
    const container = createContainer({ config, logger });
    const server = await createServer({ config, logger, container });
    await server.listen();
  })().catch((error) => {
    console.error('Failed to start gateway', error);
    process.exit(1);
  });
}
