/**
 * Fastify application factory
 */
import Fastify, { type FastifyBaseLogger, type FastifyError, type FastifyInstance } from 'fastify';
import type { Dispatcher } from 'undici';
import { isCompositeCancelledError } from '@apigw/composite-orchestrator';
import { isTransportError } from '@apigw/fetch-client';
import type { Logger } from '@apigw/logger';
import type { GatewayConfig } from './config.mjs';
import { sendProblem } from './errors.mjs';
import type { RedisClients } from './redis.mjs';
import servicesPlugin from './services.mjs';
import { adminRoutes } from './routes/admin.mjs';
import { compositeRoutes } from './routes/composite.mjs';
import { healthRoutes } from './routes/health.mjs';
import { proxyRoutes } from './routes/proxy.mjs';

export interface BuildAppOptions {
  config: GatewayConfig;
  logger: Logger;
  dispatcher?: Dispatcher;
  redis?: RedisClients;
}

/**
 * Build the gateway; endpoint and environment definitions are loaded during `ready()`
 */
export async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
  const loggerInstance: FastifyBaseLogger = options.logger;
  const app = Fastify({ loggerInstance });

  // Bodies are forwarded as received; composite routes decode JSON themselves
  app.removeAllContentTypeParsers();
  app.addContentTypeParser('*', { parseAs: 'buffer' }, (_request, body, done) => {
    done(null, body);
  });

  app.setErrorHandler<FastifyError>((error, request, reply) => {
    if (isCompositeCancelledError(error) || (isTransportError(error) && error.aborted)) {
      request.log.info({ err: error.message }, 'Request cancelled by client');
      return sendProblem(reply, 499, error.message);
    }
    if (isTransportError(error)) {
      request.log.warn({ err: error.message, url: error.url }, 'Backend unreachable');
      return sendProblem(reply, error.timedOut ? 504 : 502, error.message);
    }

    const status = error.statusCode;
    if (status !== undefined && status >= 400 && status < 500) {
      return sendProblem(reply, status, error.message);
    }

    request.log.error({ err: error }, 'Unhandled request error');
    return sendProblem(reply, 500, 'Unexpected error');
  });

  app.setNotFoundHandler((request, reply) => sendProblem(reply, 404, `Route ${request.method} ${request.url} not found`));

  await app.register(servicesPlugin, {
    config: options.config,
    logger: options.logger,
    dispatcher: options.dispatcher,
    redis: options.redis,
  });
  await app.register(healthRoutes);
  await app.register(adminRoutes);
  await app.register(compositeRoutes);
  await app.register(proxyRoutes);

  return app;
}
