import Fastify from 'fastify';
import { env } from './core/env.js';
import { logger, loggerOptions } from './core/logger.js';
import { CapacityError, EncodingError } from './core/errors.js';
import { signingRoutes } from './signing/routes.js';

async function buildServer() {
  const app = Fastify({
    logger: loggerOptions,
    // a JSON \uXXXX escape spends 6 body bytes per message byte; only readMessage rejects on length
    bodyLimit: env.maxMessageBytes * 6 + 4096,
  });

  app.setErrorHandler((err, req, reply) => {
    if (err instanceof CapacityError) {
      return reply.status(413).send({ status: 'error', message: err.message });
    }
    if (err instanceof EncodingError || err.validation) {
      return reply.status(400).send({ status: 'error', message: err.message });
    }
    if (err.statusCode && err.statusCode < 500) {
      return reply.status(err.statusCode).send({ status: 'error', message: err.message });
    }
    req.log.error({ err }, 'request failed');
    return reply.status(500).send({ status: 'error', message: 'internal error' });
  });

  app.get('/healthz', async () => ({ status: 'ok' }));
  app.get('/readyz', async () => ({ status: 'ready' }));

  await app.register(signingRoutes, {
    secret: env.hmacSecret,
    maxMessageBytes: env.maxMessageBytes,
  });

  return app;
}

async function start() {
  const app = await buildServer();
  try {
    await app.listen({ port: env.port, host: env.host });
    logger.info({ maxMessageBytes: env.maxMessageBytes }, `Server listening on http://${env.host}:${env.port}`);
  } catch (err) {
    logger.error({ err }, 'server failed to start');
    process.exit(1);
  }
}

if (import.meta.url === `file://${process.argv[1]}`) {
  void start();
}

export { buildServer };
