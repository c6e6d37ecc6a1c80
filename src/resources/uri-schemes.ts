/**
 * Resource locator schemes.
 *
 * Every knowledge record is addressable as `<scheme>://<key>`, e.g.
 * `bestpractice://bp-001` or `governance://http-connector`.
 */

export const URI_SCHEMES = {
  BEST_PRACTICE: 'bestpractice',
  SNIPPET: 'snippet',
  TROUBLESHOOTING: 'troubleshooting',
  TIP: 'tip',
  GOVERNANCE: 'governance',
} as const;

export type UriScheme = (typeof URI_SCHEMES)[keyof typeof URI_SCHEMES];

/**
 * Build a resource locator
 *
 * @example
 * buildUri(URI_SCHEMES.TIP, 'tip-004') // 'tip://tip-004'
 */
export const buildUri = (scheme: UriScheme, key: string): string => `${scheme}://${key}`;

/**
 * URI template with a single key variable, as registered with the MCP server
 */
export const uriTemplate = (scheme: UriScheme, variable: string): string => `${scheme}://{${variable}}`;
