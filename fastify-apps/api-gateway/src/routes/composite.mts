/**
 * Composite dispatch: POST /api/:env/composite/:name
 */
import type { FastifyPluginAsync } from 'fastify';
import { isEnvironmentAllowed } from '@apigw/endpoint-directory';
import { compositeFailureStatus, sendProblem } from '../errors.mjs';
import { DROPPED_REQUEST_HEADERS, forwardableHeaders } from '../proxy.mjs';
import { clientAbortSignal, parseJsonBody, publicBaseUrl } from '../request.mjs';

interface CompositeRoute {
  Params: { env: string; name: string };
}

/**
 * Headers the orchestrator sets per step
 */
const COMPOSITE_DROPPED_HEADERS = [...DROPPED_REQUEST_HEADERS, 'content-type', 'accept'];

export const compositeRoutes: FastifyPluginAsync = async (fastify) => {
  fastify.all<CompositeRoute>('/api/:env/composite/:name', async (request, reply) => {
    const { env, name } = request.params;
    const { config, directory, environments, orchestrator } = fastify.gateway;

    if (!environments.isAllowed(env)) {
      return sendProblem(reply, 400, `Environment '${env}' is not allowed`);
    }
    if (request.method !== 'POST') {
      return sendProblem(reply.header('allow', 'POST'), 405, `Composite endpoints accept POST only`);
    }

    const endpoint = directory.lookupComposite(name);
    if (!endpoint?.compositeConfig) {
      return sendProblem(reply, 404, `Composite endpoint '${name}' not found`);
    }
    if (!isEnvironmentAllowed(endpoint, env)) {
      return sendProblem(reply, 403, `Composite endpoint '${endpoint.name}' is not available in '${env}'`);
    }

    const body = parseJsonBody(request.body);
    if (!body.ok) {
      return sendProblem(reply, 400, body.reason, { errorKind: 'MalformedInputDocument' });
    }

    const result = await orchestrator.execute(endpoint.compositeConfig, body.value, env, {
      headers: {
        ...forwardableHeaders(request.headers, COMPOSITE_DROPPED_HEADERS),
        ...environments.headersFor(env),
      },
      publicBaseUrl: publicBaseUrl(request, config.publicBaseUrl),
      signal: clientAbortSignal(reply),
      timeoutMs: config.backendTimeoutMs,
    });

    if (result.success) {
      return reply.code(200).send({ success: true, stepResults: result.stepResults });
    }

    return reply.code(compositeFailureStatus(result.errorKind, result.httpStatusCode)).send({
      success: false,
      failedStep: result.failedStep,
      errorKind: result.errorKind,
      errorMessage: result.errorMessage,
      errorDetail: result.errorDetail,
      structuredError: result.structuredError,
      failedElementIndex: result.failedElementIndex,
      stepResults: result.stepResults,
    });
  });
};
