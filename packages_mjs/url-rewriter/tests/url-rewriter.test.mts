/**
 * Tests for url-rewriter.mts
 */
import { describe, it, expect } from 'vitest';
import {
  UrlRewriter,
  rewriteUrls,
  rewriteEndpointUrls,
  publicEndpointPath,
  escapeRegExp,
} from '../src/url-rewriter.mjs';

const ORIGIN = 'http://erp.internal:8020/services/Account';

describe('rewriteUrls', () => {
  // Happy Path: full backend URL with an OData key suffix
  it('should rewrite the backend URL and keep the suffix', () => {
    const content = '{"link":"http://erp.internal:8020/services/Account(42)"}';
    expect(rewriteUrls(content, ORIGIN, '', 'https://gw.example.com', '/api/prod/Account')).toBe(
      '{"link":"https://gw.example.com/api/prod/Account(42)"}'
    );
  });

  // Path: origin path joined to base URL
  it('should join origin base and path', () => {
    const content = 'see http://erp.internal:8020/services/Account/lines?$top=1 now';
    expect(
      rewriteUrls(content, 'http://erp.internal:8020/', '/services/Account/', 'https://gw.example.com/', '/api/prod/Account/')
    ).toBe('see https://gw.example.com/api/prod/Account/lines?$top=1 now');
  });

  // Decision: boundary prevents partial-token corruption
  it('should not rewrite a longer path segment', () => {
    const content = '"http://erp.internal:8020/services/Account2"';
    expect(rewriteUrls(content, ORIGIN, '', 'https://gw.example.com', '/api/prod/Account')).toBe(content);
  });

  // Decision: host fallback maps other paths on the origin host
  it('should rewrite other paths on the host when host fallback is enabled', () => {
    const content = '"http://erp.internal:8020/services/Account2"';
    expect(
      rewriteUrls(content, ORIGIN, '', 'https://gw.example.com', '/api/prod/Account', { includeHostFallback: true })
    ).toBe('"https://gw.example.com/api/prod/Account/services/Account2"');
  });

  // Decision: quoted host names only with host fallback
  it('should rewrite quoted bare host names with host fallback', () => {
    const content = `{"server":"erp.internal","note":'erp.internal'}`;
    expect(rewriteUrls(content, ORIGIN, '', 'https://gw.example.com', '/api/prod/Account')).toBe(content);
    expect(
      rewriteUrls(content, ORIGIN, '', 'https://gw.example.com', '/api/prod/Account', { includeHostFallback: true })
    ).toBe(`{"server":"gw.example.com","note":'gw.example.com'}`);
  });

  it('should leave unquoted host names alone', () => {
    const content = 'host erp.internal is down';
    expect(
      rewriteUrls(content, ORIGIN, '', 'https://gw.example.com', '/api/prod/Account', { includeHostFallback: true })
    ).toBe(content);
  });

  // Edge: empty input
  it('should return empty content unchanged', () => {
    expect(rewriteUrls('', ORIGIN, '', 'https://gw.example.com', '/api/prod/Account')).toBe('');
    expect(rewriteUrls('abc', '', '', 'https://gw.example.com', '/x')).toBe('abc');
  });

  it('should match at end of input', () => {
    expect(rewriteUrls(ORIGIN, ORIGIN, '', 'https://gw.example.com', '/api/prod/Account')).toBe(
      'https://gw.example.com/api/prod/Account'
    );
  });
});

describe('UrlRewriter', () => {
  // Edge: regex metacharacters in the backend URL are literal
  it('should treat dots in the origin literally', () => {
    const rewriter = new UrlRewriter([{ originUrl: 'http://svc:9000/api/v1.0/items', publicUrl: '/api/dev/Items' }]);
    expect(rewriter.rewrite('http://svc:9000/api/v1x0/items http://svc:9000/api/v1.0/items')).toBe(
      'http://svc:9000/api/v1x0/items /api/dev/Items'
    );
  });

  it('should skip mappings with an empty origin', () => {
    const rewriter = new UrlRewriter([{ originUrl: '/', publicUrl: '/api/dev/Items' }]);
    expect(rewriter.rewrite('/a/b')).toBe('/a/b');
  });
});

describe('rewriteEndpointUrls', () => {
  const endpoints = [
    { name: 'Orders', url: 'http://svc:9000/api/orders' },
    { name: 'OrderLines', url: 'http://svc:9000/api/orders/lines' },
  ];

  // Decision: longest backend URL wins
  it('should map each backend URL to its endpoint', () => {
    const content = '["http://svc:9000/api/orders/lines/1","http://svc:9000/api/orders/7"]';
    expect(rewriteEndpointUrls(content, endpoints, { publicBaseUrl: 'https://gw.test', environment: 'prod' })).toBe(
      '["https://gw.test/api/prod/OrderLines/1","https://gw.test/api/prod/Orders/7"]'
    );
  });

  it('should produce path-only links without a public base URL', () => {
    expect(rewriteEndpointUrls('"http://svc:9000/api/orders"', endpoints, { publicBaseUrl: '', environment: 'dev' })).toBe(
      '"/api/dev/Orders"'
    );
  });
});

describe('helpers', () => {
  it('should encode endpoint path segments', () => {
    expect(publicEndpointPath('prod eu', 'Orders')).toBe('/api/prod%20eu/Orders');
  });

  it('should escape regex metacharacters', () => {
    expect(escapeRegExp('a.b(c)')).toBe('a\\.b\\(c\\)');
  });
});
