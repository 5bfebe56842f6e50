export const DEFAULT_RETRY_AFTER_SECONDS = 15;

export interface LinkEntry {
  url: string;
  rel: string[];
  params: Record<string, string>;
}

export function headerValue(headers: object | undefined, name: string): unknown {
  if (!headers) return undefined;
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === wanted) return value;
  }
  return undefined;
}

function headerText(value: unknown): string | null {
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  if (Array.isArray(value)) {
    const parts = value.filter((v): v is string => typeof v === 'string');
    return parts.length > 0 ? parts.join(', ') : null;
  }
  return null;
}

/**
 * Seconds to wait before retrying. Accepts delta-seconds or an HTTP-date;
 * anything else falls back to DEFAULT_RETRY_AFTER_SECONDS.
 */
export function parseRetryAfter(value: unknown, now: number = Date.now()): number {
  const text = headerText(value)?.trim();
  if (!text) return DEFAULT_RETRY_AFTER_SECONDS;

  if (/^\d+(\.\d+)?$/.test(text)) return Number(text);

  const at = Date.parse(text);
  if (!Number.isNaN(at)) return Math.max(0, Math.ceil((at - now) / 1000));

  return DEFAULT_RETRY_AFTER_SECONDS;
}

const LINK_RE = /<([^>]*)>([^<]*)/g;

// RFC 8288: `<url>; rel="next", <url>; rel="prev"`
export function parseLinkHeader(value: unknown): LinkEntry[] {
  const text = headerText(value);
  if (!text) return [];

  const entries: LinkEntry[] = [];
  for (const match of text.matchAll(LINK_RE)) {
    const params: Record<string, string> = {};
    for (const part of match[2].split(';')) {
      const eq = part.indexOf('=');
      if (eq === -1) continue;
      const key = part.slice(0, eq).trim().toLowerCase();
      const raw = part.slice(eq + 1).trim().replace(/,\s*$/, '');
      params[key] = raw.replace(/^"(.*)"$/, '$1');
    }
    entries.push({
      url: match[1].trim(),
      rel: (params.rel ?? '').split(/\s+/).filter(Boolean).map(r => r.toLowerCase()),
      params,
    });
  }
  return entries;
}

export function nextLink(value: unknown): string | null {
  const next = parseLinkHeader(value).find(entry => entry.rel.includes('next'));
  return next && next.url ? next.url : null;
}

/** Folds `Set-Cookie` values into the jar; a later cookie replaces one with the same name. */
export function mergeSetCookie(jar: Map<string, string>, setCookie: unknown): void {
  const values = Array.isArray(setCookie) ? setCookie : [setCookie];
  for (const value of values) {
    if (typeof value !== 'string') continue;
    const pair = value.split(';', 1)[0];
    const eq = pair.indexOf('=');
    if (eq <= 0) continue;
    jar.set(pair.slice(0, eq).trim(), pair.slice(eq + 1).trim());
  }
}

export function cookieHeader(jar: Map<string, string>): string | null {
  if (jar.size === 0) return null;
  return Array.from(jar, ([name, value]) => `${name}=${value}`).join('; ');
}
