/**
 * Type definitions for @apigw/url-rewriter
 */

/**
 * One backend location and the public location that replaces it
 */
export interface UrlMapping {
  /** Backend URL as it appears in payloads, e.g. http://erp.internal:8020/services/Account */
  originUrl: string;
  /** Gateway URL that replaces it, e.g. https://gw.example.com/api/prod/Account */
  publicUrl: string;
}

/**
 * Rewriter options
 */
export interface UrlRewriterOptions {
  /**
   * Also rewrite other paths on the origin host (`scheme://host[:port]/...`) and quoted
   * bare host names. Default: false
   */
  includeHostFallback?: boolean;
}

/**
 * A named endpoint whose backend URL is rewritten to `/api/{environment}/{name}`
 */
export interface EndpointLocation {
  name: string;
  url: string;
}

/**
 * Public location of the gateway for endpoint rewriting
 */
export interface PublicLocation {
  /** Scheme and authority of the gateway, e.g. https://gw.example.com. Empty for path-only links */
  publicBaseUrl: string;
  environment: string;
}
