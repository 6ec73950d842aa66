/**
 * @apigw/url-rewriter
 *
 * Rewrites backend URLs found in response payloads to the gateway's public URLs.
 */

export type { UrlMapping, UrlRewriterOptions, EndpointLocation, PublicLocation } from './types.mjs';

export {
  UrlRewriter,
  rewriteUrls,
  rewriteEndpointUrls,
  createEndpointRewriter,
  publicEndpointPath,
  escapeRegExp,
  trimTrailingSlash,
} from './url-rewriter.mjs';
