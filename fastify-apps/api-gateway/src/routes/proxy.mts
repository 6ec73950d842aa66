/**
 * Proxy dispatch: ANY /api/:env/<endpoint>[/<subPath>]
 *
 * GET responses go through the stampede-safe cache; SOAP traffic bypasses
 * both the cache and URL rewriting.
 */
import type { FastifyPluginAsync } from 'fastify';
import { buildCacheKey, buildLockKey, getHeaderValue, type RecomputeResult } from '@apigw/cache-response';
import { isEnvironmentAllowed } from '@apigw/endpoint-directory';
import { UrlRewriter, publicEndpointPath } from '@apigw/url-rewriter';
import { sendProblem } from '../errors.mjs';
import {
  BODY_METHODS,
  buildTargetUrl,
  forwardableHeaders,
  hasDotSegment,
  headerValue,
  isSoapRequest,
  isWithinBasePath,
  parseProxyPath,
  quoteSoapAction,
  rawQuery,
  resourcePath,
  responseHeaders,
  toHttpMethod,
} from '../proxy.mjs';
import { clientAbortSignal, publicBaseUrl } from '../request.mjs';

interface ProxyRoute {
  Params: { env: string; '*': string };
}

const SOAP_ENVELOPE = /<(soap|SOAP-ENV):Envelope/;

export const proxyRoutes: FastifyPluginAsync = async (fastify) => {
  fastify.all<ProxyRoute>('/api/:env/*', async (request, reply) => {
    const { env } = request.params;
    const { config, directory, environments, invoker, cache } = fastify.gateway;

    if (!environments.isAllowed(env)) {
      return sendProblem(reply, 400, `Environment '${env}' is not allowed`);
    }

    const path = parseProxyPath(request.url);
    const endpoint = path ? directory.lookup(path.segment.name) : undefined;
    if (!path || !endpoint || endpoint.type !== 'standard' || endpoint.isPrivate) {
      return sendProblem(reply, 404, `Endpoint '${path?.segment.name ?? ''}' not found`);
    }
    if (hasDotSegment(path.subPath)) {
      return sendProblem(reply, 400, 'Path segments "." and ".." are not allowed');
    }
    if (!isEnvironmentAllowed(endpoint, env)) {
      return sendProblem(reply, 403, `Endpoint '${endpoint.name}' is not available in '${env}'`);
    }

    const method = toHttpMethod(request.method);
    if (!method || !endpoint.allowedMethods.has(method)) {
      return sendProblem(
        reply.header('allow', [...endpoint.allowedMethods].join(', ')),
        405,
        `Method ${request.method} is not allowed for '${endpoint.name}'`
      );
    }

    const query = rawQuery(request.url);
    const targetUrl = buildTargetUrl(endpoint.baseUrl, path, query);
    if (!isWithinBasePath(endpoint.baseUrl, targetUrl)) {
      return sendProblem(reply, 400, `Path is outside endpoint '${endpoint.name}'`);
    }
    const soap = isSoapRequest(request.headers, targetUrl);

    const headers = { ...forwardableHeaders(request.headers), ...environments.headersFor(env) };
    const soapAction = headerValue(request.headers, 'soapaction');
    if (soap && soapAction !== undefined) {
      headers['soapaction'] = quoteSoapAction(soapAction);
    }

    const body = BODY_METHODS.has(method) && Buffer.isBuffer(request.body) ? request.body : undefined;
    const signal = clientAbortSignal(reply);
    const rewriter = soap
      ? undefined
      : new UrlRewriter(
          [
            {
              originUrl: endpoint.baseUrl,
              publicUrl: publicBaseUrl(request, config.publicBaseUrl) + publicEndpointPath(env, endpoint.name),
            },
          ],
          { includeHostFallback: true }
        );

    const recompute = async (): Promise<RecomputeResult> => {
      const response = await invoker.invoke({
        url: targetUrl,
        method,
        headers,
        body,
        timeoutMs: config.backendTimeoutMs,
        signal,
      });
      return {
        body: rewriter ? rewriter.rewrite(response.body) : response.body,
        headers: response.headers,
        statusCode: response.status,
        contentType: response.contentType,
      };
    };

    let result: RecomputeResult;
    if (method === 'GET' && !soap) {
      const cacheKey = buildCacheKey({
        environment: environments.get(env)?.name ?? env,
        endpoint: endpoint.name,
        subPath: resourcePath(path),
        query,
        authorization: headerValue(request.headers, 'authorization'),
        acceptLanguage: headerValue(request.headers, 'accept-language'),
      });
      const cached = await cache.handleCacheableGet(cacheKey, buildLockKey(cacheKey), recompute, {
        endpointTtlSeconds: endpoint.cacheDurationSeconds,
        signal,
      });
      request.log.debug({ endpoint: endpoint.name, cacheKey, source: cached.source }, 'Proxy GET served');
      result = cached;
    } else {
      result = await recompute();
    }

    const outHeaders = responseHeaders(result.headers);
    if (method === 'GET' && !soap && getHeaderValue(outHeaders, 'cache-control') === undefined) {
      outHeaders['cache-control'] = config.cache.controlDefault;
    }
    if (soap && getHeaderValue(outHeaders, 'content-type') === undefined && SOAP_ENVELOPE.test(result.body)) {
      outHeaders['content-type'] = 'text/xml; charset=utf-8';
    }

    return reply.code(result.statusCode).headers(outHeaders).send(result.body);
  });
};
