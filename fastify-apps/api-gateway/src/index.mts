/**
 * @apigw/api-gateway
 */

export { buildApp, type BuildAppOptions } from './app.mjs';
export { loadConfig, ConfigError, type GatewayConfig } from './config.mjs';
export { EnvironmentSettings, SETTINGS_FILE_NAME, type EnvironmentProfile } from './environments.mjs';
export { compositeFailureStatus, problem, sendProblem, PROBLEM_CONTENT_TYPE, type ProblemDetails } from './errors.mjs';
export { adaptRedis, connectRedis, type RedisClients } from './redis.mjs';
export type { GatewayServices, ServicesPluginOptions } from './services.mjs';
export {
  parseEndpointSegment,
  parseProxyPath,
  buildTargetUrl,
  isSoapRequest,
  forwardableHeaders,
  responseHeaders,
  type EndpointSegment,
  type ProxyPath,
} from './proxy.mjs';
