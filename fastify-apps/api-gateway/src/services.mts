/**
 * Fastify plugin wiring the gateway engines as an application-scoped singleton
 */
import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyPluginAsync } from 'fastify';
import type { Dispatcher } from 'undici';
import { MemoryLockStore, RedisLockStore, type LockStore } from '@apigw/cache-lock';
import {
  MemoryCacheStore,
  RedisCacheStore,
  ResponseCacheEngine,
  type CacheStore,
} from '@apigw/cache-response';
import { CompositeOrchestrator } from '@apigw/composite-orchestrator';
import { EndpointDirectory } from '@apigw/endpoint-directory';
import { UndiciBackendInvoker, type BackendInvoker } from '@apigw/fetch-client';
import type { Logger } from '@apigw/logger';
import type { GatewayConfig } from './config.mjs';
import { EnvironmentSettings } from './environments.mjs';
import { adaptRedis, connectRedis, type RedisClients } from './redis.mjs';

/**
 * Everything a route handler needs
 */
export interface GatewayServices {
  config: GatewayConfig;
  directory: EndpointDirectory;
  environments: EnvironmentSettings;
  invoker: BackendInvoker;
  orchestrator: CompositeOrchestrator;
  cache: ResponseCacheEngine;
}

declare module 'fastify' {
  interface FastifyInstance {
    gateway: GatewayServices;
  }
}

/**
 * Plugin options
 */
export interface ServicesPluginOptions {
  config: GatewayConfig;
  logger: Logger;
  /** undici dispatcher for backend calls (MockAgent in tests). Default: global dispatcher */
  dispatcher?: Dispatcher;
  /** Redis clients for CACHE_PROVIDER=redis; connected from REDIS_URL when omitted */
  redis?: RedisClients;
}

function createStores(options: ServicesPluginOptions): { store: CacheStore; lockStore: LockStore } {
  const { config, logger } = options;
  if (config.cache.provider === 'memory') {
    return { store: new MemoryCacheStore(), lockStore: new MemoryLockStore() };
  }

  let clients = options.redis;
  if (!clients) {
    if (!config.cache.redisUrl) {
      throw new Error('REDIS_URL is required when CACHE_PROVIDER is redis');
    }
    clients = adaptRedis(connectRedis(config.cache.redisUrl, logger));
  }
  return {
    store: new RedisCacheStore(clients.cacheClient, config.cache.keyPrefix),
    lockStore: new RedisLockStore(clients.lockClient, config.cache.keyPrefix),
  };
}

const servicesPlugin: FastifyPluginAsync<ServicesPluginOptions> = async (
  fastify: FastifyInstance,
  options: ServicesPluginOptions
) => {
  const { config, logger } = options;

  const directory = new EndpointDirectory({ endpointsDir: config.endpointsDir, logger });
  await directory.load();
  const environments = await EnvironmentSettings.load(config.environmentsDir, logger);

  const invoker = new UndiciBackendInvoker({
    dispatcher: options.dispatcher,
    timeout: { read: config.backendTimeoutMs },
    logger,
  });
  const orchestrator = new CompositeOrchestrator({
    directory,
    invoker,
    logger,
    sharedValueScope: config.sharedValueScope,
  });
  const { store, lockStore } = createStores(options);
  const cache = new ResponseCacheEngine(
    {
      defaultTtlSeconds: config.cache.defaultTtlSeconds,
      cacheableContentTypes: config.cache.contentTypes,
      lock: config.lock,
    },
    { store, lockStore, logger }
  );

  fastify.decorate('gateway', { config, directory, environments, invoker, orchestrator, cache });

  fastify.addHook('onClose', async () => {
    await cache.close();
    await invoker.close();
    fastify.log.info('Gateway services closed');
  });
};

export default fp(servicesPlugin, {
  name: 'gateway-services',
  fastify: '5.x',
});
