/**
 * Textual URL rewriting over serialized payloads
 *
 * A backend URL only matches when followed by a URL boundary (path separator, query,
 * fragment, quote, whitespace, JSON punctuation or end of input), so `http://erp/svc`
 * never rewrites inside `http://erp/svc2`.
 */
import type { EndpointLocation, PublicLocation, UrlMapping, UrlRewriterOptions } from './types.mjs';

const URL_BOUNDARY = `(?=[/?#"'\\s,}\\]<>()]|$)`;

/**
 * Escape a literal for use inside a RegExp
 */
export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\/]/g, '\\$&');
}

/**
 * Strip trailing slashes
 */
export function trimTrailingSlash(value: string): string {
  return value.replace(/\/+$/, '');
}

function parseUrl(value: string): URL | undefined {
  return URL.canParse(value) ? new URL(value) : undefined;
}

interface Alternative {
  pattern: string;
  text: string;
  replacement: string;
}

/**
 * Compiled rewriter for a fixed set of mappings; rewrites in a single pass
 *
 * @example
 * const rewriter = new UrlRewriter([
 *   { originUrl: 'http://erp.internal:8020/services/Account', publicUrl: 'https://gw.example.com/api/prod/Account' },
 * ]);
 * rewriter.rewrite('{"link":"http://erp.internal:8020/services/Account(42)"}');
 * // '{"link":"https://gw.example.com/api/prod/Account(42)"}'
 */
export class UrlRewriter {
  private readonly pattern: RegExp | undefined;
  private readonly replacements = new Map<string, string>();

  constructor(mappings: UrlMapping[], options: UrlRewriterOptions = {}) {
    const normalized = mappings
      .map((mapping) => ({
        originUrl: trimTrailingSlash(mapping.originUrl),
        publicUrl: trimTrailingSlash(mapping.publicUrl),
      }))
      .filter((mapping) => mapping.originUrl.length > 0)
      .sort((a, b) => b.originUrl.length - a.originUrl.length);

    const alternatives: Alternative[] = normalized.map((mapping) => ({
      pattern: escapeRegExp(mapping.originUrl) + URL_BOUNDARY,
      text: mapping.originUrl,
      replacement: mapping.publicUrl,
    }));

    if (options.includeHostFallback) {
      const hostAlternatives: Alternative[] = [];
      const hostNameAlternatives: Alternative[] = [];

      for (const mapping of normalized) {
        const origin = parseUrl(mapping.originUrl);
        if (!origin) {
          continue;
        }
        const hostOrigin = `${origin.protocol}//${origin.host}`;
        hostAlternatives.push({
          pattern: escapeRegExp(hostOrigin) + '(?=/)',
          text: hostOrigin,
          replacement: mapping.publicUrl,
        });

        const publicHost = parseUrl(mapping.publicUrl);
        if (publicHost) {
          hostNameAlternatives.push({
            pattern: `(?<=["'])${escapeRegExp(origin.hostname)}(?=["'])`,
            text: origin.hostname,
            replacement: publicHost.hostname,
          });
        }
      }

      alternatives.push(...hostAlternatives, ...hostNameAlternatives);
    }

    for (const alternative of alternatives) {
      if (!this.replacements.has(alternative.text)) {
        this.replacements.set(alternative.text, alternative.replacement);
      }
    }

    this.pattern =
      alternatives.length > 0
        ? new RegExp(alternatives.map((alternative) => alternative.pattern).join('|'), 'g')
        : undefined;
  }

  /**
   * Rewrite every backend occurrence in `content`
   */
  rewrite(content: string): string {
    if (!this.pattern || content.length === 0) {
      return content;
    }
    return content.replace(this.pattern, (match) => this.replacements.get(match) ?? match);
  }
}

/**
 * Rewrite one backend location to one public location
 *
 * `originPath` and `publicPath` are appended to their base URLs.
 */
export function rewriteUrls(
  content: string,
  originBaseUrl: string,
  originPath: string,
  publicBaseUrl: string,
  publicPath: string,
  options: UrlRewriterOptions = {}
): string {
  if (!content || !originBaseUrl) {
    return content;
  }

  const originPathPart = trimTrailingSlash(originPath).replace(/^\/+/, '');
  const originUrl = originPathPart
    ? `${trimTrailingSlash(originBaseUrl)}/${originPathPart}`
    : trimTrailingSlash(originBaseUrl);
  const publicUrl = trimTrailingSlash(publicBaseUrl) + trimTrailingSlash(publicPath);

  return new UrlRewriter([{ originUrl, publicUrl }], options).rewrite(content);
}

/**
 * Gateway path of an endpoint: `/api/{environment}/{name}`
 */
export function publicEndpointPath(environment: string, name: string): string {
  return `/api/${encodeURIComponent(environment)}/${encodeURIComponent(name)}`;
}

/**
 * Build a rewriter mapping every endpoint's backend URL to its gateway URL
 *
 * Longer backend URLs win over shorter ones that prefix them.
 */
export function createEndpointRewriter(
  endpoints: EndpointLocation[],
  location: PublicLocation,
  options: UrlRewriterOptions = {}
): UrlRewriter {
  const base = trimTrailingSlash(location.publicBaseUrl);
  return new UrlRewriter(
    endpoints.map((endpoint) => ({
      originUrl: endpoint.url,
      publicUrl: base + publicEndpointPath(location.environment, endpoint.name),
    })),
    options
  );
}

/**
 * Rewrite every known endpoint's backend URL in `content`
 */
export function rewriteEndpointUrls(
  content: string,
  endpoints: EndpointLocation[],
  location: PublicLocation
): string {
  return createEndpointRewriter(endpoints, location).rewrite(content);
}
