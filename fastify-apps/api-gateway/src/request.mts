/**
 * Per-request helpers shared by the gateway routes
 */
import type { FastifyReply, FastifyRequest } from 'fastify';

/**
 * Signal aborted when the client goes away before the reply is written
 */
export function clientAbortSignal(reply: FastifyReply): AbortSignal {
  const controller = new AbortController();
  reply.raw.once('close', () => {
    if (!reply.raw.writableFinished) {
      controller.abort(new Error('Client closed the connection'));
    }
  });
  return controller.signal;
}

/**
 * Scheme and authority clients used to reach the gateway
 */
export function publicBaseUrl(request: FastifyRequest, configured?: string): string {
  return configured ?? `${request.protocol}://${request.host}`;
}

export type JsonBody = { ok: true; value: unknown } | { ok: false; reason: string };

/**
 * Decode a raw JSON request body
 */
export function parseJsonBody(body: unknown): JsonBody {
  const text = Buffer.isBuffer(body) ? body.toString('utf8') : typeof body === 'string' ? body : '';
  if (text.trim().length === 0) {
    return { ok: false, reason: 'Request body is empty' };
  }
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (error) {
    return { ok: false, reason: `Request body is not valid JSON: ${error instanceof Error ? error.message : String(error)}` };
  }
}
