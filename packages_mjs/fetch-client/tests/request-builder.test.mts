/**
 * Tests for request-builder.mts
 */
import { brotliCompressSync, deflateSync, gzipSync } from 'node:zlib';
import { describe, it, expect } from 'vitest';
import {
  buildHeaders,
  buildUndiciOptions,
  createDeadlineSignal,
  decodeBody,
  normalizeResponseHeaders,
} from '../src/core/request-builder.mjs';
import { resolveInvokerConfig } from '../src/config.mjs';
import { createLogger } from '@apigw/logger';

const logger = createLogger({ level: 'silent' });

describe('request-builder', () => {
  describe('buildHeaders', () => {
    // Happy Path: request headers override configured defaults
    it('should merge config and request headers with lower-cased names', () => {
      const config = resolveInvokerConfig({ headers: { DatabaseName: 'prod' }, logger });
      const headers = buildHeaders(config, {
        url: 'http://backend.test/a',
        method: 'GET',
        headers: { 'X-Trace': 't-1', databasename: 'dev' },
      });

      expect(headers).toEqual({ databasename: 'dev', 'x-trace': 't-1' });
    });

    // Decision: hop-by-hop headers are dropped
    it('should drop hop-by-hop headers', () => {
      const config = resolveInvokerConfig({ logger });
      const headers = buildHeaders(config, {
        url: 'http://backend.test/a',
        method: 'POST',
        headers: { Host: 'gateway.test', 'Content-Length': '12', Accept: 'application/json' },
      });

      expect(headers).toEqual({ accept: 'application/json' });
    });
  });

  describe('normalizeResponseHeaders', () => {
    it('should join multi-valued headers and skip undefined', () => {
      expect(
        normalizeResponseHeaders({ 'Set-Cookie': ['a=1', 'b=2'], 'Content-Type': 'text/plain', etag: undefined })
      ).toEqual({ 'set-cookie': 'a=1, b=2', 'content-type': 'text/plain' });
    });
  });

  describe('buildUndiciOptions', () => {
    // Decision: GET never carries a body
    it('should omit body for GET', () => {
      const config = resolveInvokerConfig({ logger });
      const options = buildUndiciOptions(config, { url: 'http://backend.test', method: 'GET', body: 'x' });
      expect(options.body).toBeUndefined();
    });

    // Decision: per-call deadline supersedes the read timeout
    it('should derive timeouts from the request deadline', () => {
      const config = resolveInvokerConfig({ timeout: { connect: 2000, read: 9000 }, logger });
      const options = buildUndiciOptions(config, {
        url: 'http://backend.test',
        method: 'POST',
        body: '{}',
        timeoutMs: 1000,
      });
      expect(options.body).toBe('{}');
      expect(options.bodyTimeout).toBe(1000);
      expect(options.headersTimeout).toBe(2000);
    });
  });

  describe('createDeadlineSignal', () => {
    it('should abort when the parent aborts', () => {
      const parent = new AbortController();
      const deadline = createDeadlineSignal(60_000, parent.signal);
      parent.abort();
      expect(deadline.signal.aborted).toBe(true);
      expect(deadline.timedOut()).toBe(false);
      deadline.dispose();
    });

    it('should abort and report timeout once the deadline passes', async () => {
      const deadline = createDeadlineSignal(5);
      await new Promise((resolve) => setTimeout(resolve, 20));
      expect(deadline.signal.aborted).toBe(true);
      expect(deadline.timedOut()).toBe(true);
      deadline.dispose();
    });

    it('should start aborted when the parent already is', () => {
      const parent = new AbortController();
      parent.abort();
      const deadline = createDeadlineSignal(60_000, parent.signal);
      expect(deadline.signal.aborted).toBe(true);
      deadline.dispose();
    });
  });

  describe('decodeBody', () => {
    const text = '{"Id":7}';

    it('should pass unencoded bodies through', () => {
      expect(decodeBody(Buffer.from(text), undefined).toString('utf8')).toBe(text);
      expect(decodeBody(Buffer.from(text), 'identity').toString('utf8')).toBe(text);
      expect(decodeBody(Buffer.alloc(0), 'gzip').length).toBe(0);
    });

    it('should decode gzip, deflate and br', () => {
      expect(decodeBody(gzipSync(text), 'gzip').toString('utf8')).toBe(text);
      expect(decodeBody(deflateSync(text), 'deflate').toString('utf8')).toBe(text);
      expect(decodeBody(brotliCompressSync(text), 'BR').toString('utf8')).toBe(text);
    });

    // Path: codings are removed in reverse order of application
    it('should undo stacked codings', () => {
      const body = brotliCompressSync(gzipSync(text));
      expect(decodeBody(body, 'gzip, br').toString('utf8')).toBe(text);
    });

    // Error Path: unknown coding
    it('should reject unsupported codings', () => {
      expect(() => decodeBody(Buffer.from(text), 'compress')).toThrow('Unsupported content-encoding: compress');
    });
  });
});
