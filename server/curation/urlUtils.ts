const TRACKING_PARAM_PREFIXES = ['utm_', 'fbclid', 'gclid', 'mc_cid', 'mc_eid', 'ref'];

export const parseHttpUrl = (url: string | null | undefined): URL | null => {
  const raw = String(url ?? '').trim();
  if (!raw) return null;
  try {
    const parsed = new URL(raw);
    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
      return null;
    }
    return parsed.hostname ? parsed : null;
  } catch {
    return null;
  }
};

export const normalizeDomain = (value: string | null | undefined): string =>
  String(value ?? '')
    .trim()
    .toLowerCase()
    .replace(/^www\./, '')
    .replace(/\.$/, '');

/**
 * Host of the URL without a leading `www.`, or '' when the URL has none.
 */
export const extractDomain = (url: string | null | undefined): string => {
  const parsed = parseHttpUrl(url);
  return parsed ? normalizeDomain(parsed.hostname) : '';
};

/** True when `host` equals `domain` or is one of its subdomains. */
export const hostMatches = (host: string, domain: string): boolean => {
  const normalizedHost = normalizeDomain(host);
  const normalizedDomain = normalizeDomain(domain);
  if (!normalizedHost || !normalizedDomain) return false;
  return normalizedHost === normalizedDomain || normalizedHost.endsWith(`.${normalizedDomain}`);
};

/**
 * Identity key for exact-URL duplicates: lowercased host, no `www.`, no
 * fragment, no trailing slash and no tracking parameters.
 */
export const normalizeUrlKey = (url: string): string => {
  const parsed = parseHttpUrl(url);
  if (!parsed) {
    return String(url || '').trim().toLowerCase();
  }
  const kept: Array<[string, string]> = [];
  parsed.searchParams.forEach((value, key) => {
    if (TRACKING_PARAM_PREFIXES.some((prefix) => key.toLowerCase().startsWith(prefix))) {
      return;
    }
    kept.push([key, value]);
  });
  const query = new URLSearchParams(kept).toString();
  const pathname = parsed.pathname.replace(/\/+$/, '') || '/';
  return `${normalizeDomain(parsed.hostname)}${pathname}${query ? `?${query}` : ''}`;
};
