/**
 * HTTP error mapping: problem+json bodies and composite failure statuses
 */
import type { FastifyReply } from 'fastify';
import type { CompositeErrorKind } from '@apigw/composite-orchestrator';

const TITLES: Record<number, string> = {
  400: 'Bad Request',
  403: 'Forbidden',
  404: 'Not Found',
  405: 'Method Not Allowed',
  415: 'Unsupported Media Type',
  422: 'Unprocessable Entity',
  499: 'Client Closed Request',
  500: 'Internal Server Error',
  502: 'Bad Gateway',
  504: 'Gateway Timeout',
};

export const PROBLEM_CONTENT_TYPE = 'application/problem+json';

export interface ProblemDetails {
  type: string;
  title: string;
  status: number;
  detail: string;
  instance?: string;
  [extension: string]: unknown;
}

export function problem(status: number, detail: string, extensions: Record<string, unknown> = {}): ProblemDetails {
  return {
    type: 'about:blank',
    title: TITLES[status] ?? 'Error',
    status,
    detail,
    ...extensions,
  };
}

/**
 * Send a problem+json reply
 */
export function sendProblem(
  reply: FastifyReply,
  status: number,
  detail: string,
  extensions: Record<string, unknown> = {}
): FastifyReply {
  return reply
    .code(status)
    .type(PROBLEM_CONTENT_TYPE)
    .send(problem(status, detail, { instance: reply.request.id, ...extensions }));
}

/**
 * Status for a failed composite
 */
export function compositeFailureStatus(kind: CompositeErrorKind, backendStatus?: number): number {
  switch (kind) {
    case 'MalformedInputDocument':
      return 400;
    case 'TemplateReferenceUnresolved':
      return 422;
    case 'StepNotFound':
      return 500;
    case 'BackendCallFailed':
      return backendStatus !== undefined && backendStatus >= 400 ? backendStatus : 502;
  }
}
