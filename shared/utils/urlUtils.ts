/**
 * URL helpers
 */

const TRACKING_PARAM = /^utm_/i;

/**
 * Canonical form of a link: absolute, without fragment, utm_* parameters or a
 * trailing slash on the path. Returns null for values that are not http(s) URLs.
 * @param link Absolute or relative link
 * @param base Base URL for relative links
 */
export function normalizeLink(link: string, base?: string): string | null {
  let url: URL;
  try {
    url = base ? new URL(link.trim(), base) : new URL(link.trim());
  } catch {
    return null;
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    return null;
  }

  url.hash = '';
  for (const name of [...url.searchParams.keys()]) {
    if (TRACKING_PARAM.test(name)) {
      url.searchParams.delete(name);
    }
  }
  if (url.pathname.length > 1 && url.pathname.endsWith('/')) {
    url.pathname = url.pathname.replace(/\/+$/, '');
  }

  const normalized = url.toString();
  // An empty query leaves a dangling "?" behind
  return normalized.endsWith('?') ? normalized.slice(0, -1) : normalized;
}
