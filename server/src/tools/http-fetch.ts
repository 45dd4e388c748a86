import { lookup } from 'node:dns/promises';
import { isIP } from 'node:net';

const DEFAULT_MAX_REDIRECTS = 3;
const DEFAULT_MAX_BYTES = 5_000_000;
const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

export type HostResolver = (hostname: string) => Promise<string[]>;

export interface FetchPageOptions {
  signal?: AbortSignal;
  maxRedirects?: number;
  maxBytes?: number;
  headers?: Record<string, string>;
  fetchImpl?: typeof fetch;
  /** Resolves a hostname to its addresses for the private-network check. */
  resolveHost?: HostResolver;
}

export interface FetchedPage {
  url: string;
  status: number;
  contentType: string;
  body: string;
}

/** Error carrying the upstream HTTP status so retry classification can see it. */
export class HttpStatusError extends Error {
  constructor(
    public readonly status: number,
    url: string,
  ) {
    super(`GET ${url} failed with status ${status}`);
    this.name = 'HttpStatusError';
  }
}

function isPrivateIPv4(ip: string): boolean {
  const parts = ip.split('.').map((p) => Number.parseInt(p, 10));
  if (parts.length !== 4 || parts.some((p) => Number.isNaN(p) || p < 0 || p > 255)) return true;
  const [a, b] = parts;

  if (a === 0) return true; // 0.0.0.0/8
  if (a === 10) return true; // 10.0.0.0/8
  if (a === 127) return true; // loopback
  if (a === 169 && b === 254) return true; // link-local / metadata
  if (a === 172 && b >= 16 && b <= 31) return true; // 172.16/12
  if (a === 192 && b === 168) return true; // 192.168/16
  if (a === 100 && b >= 64 && b <= 127) return true; // CGNAT 100.64/10
  return false;
}

function isPrivateIPv6(ip: string): boolean {
  const normalized = ip.trim().toLowerCase();
  if (!normalized) return true;

  if (normalized === '::' || normalized === '::1') return true; // unspecified / loopback
  if (normalized.startsWith('::ffff:')) {
    return isPrivateIPv4(normalized.replace(/^::ffff:/, ''));
  }

  // Unique local addresses (fc00::/7)
  if (normalized.startsWith('fc') || normalized.startsWith('fd')) return true;
  // Link-local addresses (fe80::/10)
  if (/^fe[89ab]/.test(normalized)) return true;
  return false;
}

export function isPrivateHost(hostname: string): boolean {
  const host = hostname.trim().toLowerCase().replace(/^\[|\]$/g, '');
  if (!host) return true;
  if (host === 'localhost' || host.endsWith('.localhost') || host.endsWith('.local')) return true;

  const ipVersion = isIP(host);
  if (ipVersion === 4) return isPrivateIPv4(host);
  if (ipVersion === 6) return isPrivateIPv6(host);
  return false;
}

async function resolveWithDns(hostname: string): Promise<string[]> {
  const records = await lookup(hostname, { all: true, verbatim: true });
  return records.map((r) => r.address);
}

/** Reject hosts that are, or resolve to, loopback/private/link-local addresses. */
export async function assertPublicHost(hostname: string, resolveHost: HostResolver = resolveWithDns): Promise<void> {
  const host = hostname.trim().toLowerCase();
  if (isPrivateHost(host)) {
    throw new Error(`Host ${host} is not allowed`);
  }
  if (isIP(host.replace(/^\[|\]$/g, '')) !== 0) return;

  let addresses: string[];
  try {
    addresses = await resolveHost(host);
  } catch (err) {
    throw new Error(`Unable to resolve host ${host}`, { cause: err });
  }
  if (addresses.length === 0) {
    throw new Error(`Unable to resolve host ${host}`);
  }
  for (const address of addresses) {
    if (isPrivateHost(address)) {
      throw new Error(`Host ${host} resolves to a private address`);
    }
  }
}

export function decodeHtmlEntities(input: string): string {
  return input
    .replace(/&#(\d+);/g, (_m, code: string) => String.fromCodePoint(Number.parseInt(code, 10)))
    .replace(/&#x([0-9a-f]+);/gi, (_m, code: string) => String.fromCodePoint(Number.parseInt(code, 16)))
    .replace(/&nbsp;/gi, ' ')
    .replace(/&quot;/gi, '"')
    .replace(/&#39;|&apos;/gi, "'")
    .replace(/&lt;/gi, '<')
    .replace(/&gt;/gi, '>')
    .replace(/&amp;/gi, '&');
}

export function extractVisibleTextFromHtml(html: string): string {
  const noScripts = html
    .replace(/<script[\s\S]*?<\/script>/gi, ' ')
    .replace(/<style[\s\S]*?<\/style>/gi, ' ')
    .replace(/<noscript[\s\S]*?<\/noscript>/gi, ' ');
  const withLineBreaks = noScripts.replace(/<\/(p|div|li|h1|h2|h3|h4|h5|h6|tr|td)>|<br\s*\/?>/gi, '\n');
  const withoutTags = withLineBreaks.replace(/<[^>]+>/g, ' ');
  return decodeHtmlEntities(withoutTags)
    .replace(/[ \t]+/g, ' ')
    .replace(/ *\n */g, '\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

/**
 * GET a public http(s) page. Redirects are followed by hand so every hop is
 * checked against the private-network rule, and bodies over `maxBytes` are
 * refused.
 */
export async function fetchPublicPage(rawUrl: string, options: FetchPageOptions = {}): Promise<FetchedPage> {
  const fetchImpl = options.fetchImpl ?? fetch;
  const maxRedirects = options.maxRedirects ?? DEFAULT_MAX_REDIRECTS;
  const maxBytes = options.maxBytes ?? DEFAULT_MAX_BYTES;

  let currentUrl: URL;
  try {
    currentUrl = new URL(rawUrl.trim());
  } catch {
    throw new Error(`Invalid URL: ${rawUrl}`);
  }

  for (let redirects = 0; redirects <= maxRedirects; redirects += 1) {
    if (!['http:', 'https:'].includes(currentUrl.protocol)) {
      throw new Error(`Unsupported protocol ${currentUrl.protocol}`);
    }
    await assertPublicHost(currentUrl.hostname, options.resolveHost);

    const res = await fetchImpl(currentUrl.toString(), {
      method: 'GET',
      headers: {
        Accept: 'text/html, text/plain;q=0.9, */*;q=0.1',
        ...options.headers,
      },
      redirect: 'manual',
      signal: options.signal,
    });

    if (REDIRECT_STATUSES.has(res.status)) {
      if (redirects >= maxRedirects) {
        throw new Error(`Too many redirects fetching ${rawUrl}`);
      }
      const location = res.headers.get('location');
      if (!location) {
        throw new Error(`Redirect from ${currentUrl.toString()} had no location`);
      }
      try {
        currentUrl = new URL(location, currentUrl);
      } catch {
        throw new Error(`Redirect target is invalid: ${location}`);
      }
      continue;
    }

    if (!res.ok) {
      throw new HttpStatusError(res.status, currentUrl.toString());
    }

    const contentLength = Number.parseInt(res.headers.get('content-length') ?? '', 10);
    if (Number.isFinite(contentLength) && contentLength > maxBytes) {
      throw new Error(`Response from ${currentUrl.toString()} is too large (${contentLength} bytes)`);
    }
    const body = await res.text();
    if (body.length > maxBytes) {
      throw new Error(`Response from ${currentUrl.toString()} is too large`);
    }

    return {
      url: currentUrl.toString(),
      status: res.status,
      contentType: res.headers.get('content-type')?.toLowerCase() ?? '',
      body,
    };
  }

  throw new Error(`Unable to fetch ${rawUrl}`);
}
