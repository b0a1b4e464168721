/**
 * Link Resolver — downloads invoice links found in message bodies
 *
 * Every hop of a download is checked before any request is made: the URL must
 * be http(s) and every address its host resolves to must be public. Loopback,
 * link-local, private, CGNAT, unspecified and IPv4-mapped forms of those are
 * refused, as is a host that does not resolve. Redirects are followed by hand
 * (at most linkMaxRedirects hops) so each target goes through the same check.
 *
 * A download is refused when the declared or actual size passes the ceiling or
 * the media type is not supported. Refusals are logged and return null; the
 * resolver never throws to the scanner.
 *
 * One LinkResolver is built per run. DNS lookup and fetch are injectable.
 */

import { lookup as dnsLookup } from 'node:dns/promises';
import { BlockList, isIPv4, isIPv6 } from 'node:net';

import {
  extensionForMediaType,
  intakeConfig,
  isSupportedMediaType,
  normalizeMediaType,
} from './config.js';
import type { CandidateDocument } from './types.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type LookupFn = (hostname: string) => Promise<string[]>;
export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

export interface LinkResolverOptions {
  maxBytes: number;
  timeoutMs: number;
  maxRedirects: number;
  userAgent: string;
  lookup: LookupFn;
  fetch: FetchFn;
}

export class LinkRefusedError extends Error {
  readonly code = 'LINK_REFUSED';

  constructor(message: string) {
    super(message);
    this.name = 'LinkRefusedError';
  }
}

const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);

// ---------------------------------------------------------------------------
// Address checks
// ---------------------------------------------------------------------------

const blockedRanges = new BlockList();
blockedRanges.addSubnet('0.0.0.0', 8, 'ipv4');
blockedRanges.addSubnet('10.0.0.0', 8, 'ipv4');
blockedRanges.addSubnet('100.64.0.0', 10, 'ipv4');
blockedRanges.addSubnet('127.0.0.0', 8, 'ipv4');
blockedRanges.addSubnet('169.254.0.0', 16, 'ipv4');
blockedRanges.addSubnet('172.16.0.0', 12, 'ipv4');
blockedRanges.addSubnet('192.168.0.0', 16, 'ipv4');
blockedRanges.addAddress('::', 'ipv6');
blockedRanges.addAddress('::1', 'ipv6');
blockedRanges.addSubnet('fc00::', 7, 'ipv6');
blockedRanges.addSubnet('fe80::', 10, 'ipv6');

function mappedIPv4(address: string): string | null {
  const dotted = address.match(/^::ffff:(\d{1,3}(?:\.\d{1,3}){3})$/i);
  if (dotted) return dotted[1];

  const hex = address.match(/^::ffff:([0-9a-f]{1,4}):([0-9a-f]{1,4})$/i);
  if (hex) {
    const high = parseInt(hex[1], 16);
    const low = parseInt(hex[2], 16);
    return [high >> 8, high & 0xff, low >> 8, low & 0xff].join('.');
  }
  return null;
}

/** True for loopback, link-local, private-range and other non-public addresses */
export function isBlockedAddress(address: string): boolean {
  const ip = address.replace(/^\[|\]$/g, '');

  if (isIPv4(ip)) return blockedRanges.check(ip, 'ipv4');
  if (isIPv6(ip)) {
    const mapped = mappedIPv4(ip);
    if (mapped) return blockedRanges.check(mapped, 'ipv4');
    return blockedRanges.check(ip, 'ipv6');
  }
  // Not an IP at all: never trust it
  return true;
}

const systemLookup: LookupFn = async (hostname) => {
  const results = await dnsLookup(hostname, { all: true, verbatim: true });
  return results.map((result) => result.address);
};

// ---------------------------------------------------------------------------
// Naming
// ---------------------------------------------------------------------------

function decodeOrNull(value: string): string | null {
  try {
    return decodeURIComponent(value);
  } catch {
    return null;
  }
}

function baseName(name: string): string {
  return name.split(/[\\/]/).pop()?.trim() ?? '';
}

/**
 * Filename from a Content-Disposition header. The RFC 5987 form
 * (filename*=UTF-8''name) wins over the plain filename parameter.
 */
export function filenameFromDisposition(header: string | null): string | null {
  if (!header) return null;

  const extended = header.match(/filename\*\s*=\s*([^;]+)/i);
  if (extended) {
    const value = extended[1].trim().replace(/^"(.*)"$/, '$1');
    const encoded = value.match(/^[^']*'[^']*'(.*)$/)?.[1] ?? value;
    const decoded = decodeOrNull(encoded);
    if (decoded && baseName(decoded)) return baseName(decoded);
  }

  const plain = header.match(/filename\s*=\s*(?:"([^"]*)"|([^;]+))/i);
  if (plain) {
    const name = baseName(plain[1] ?? plain[2] ?? '');
    if (name) return name;
  }

  return null;
}

/** Last path segment of the final URL, if it looks like a file */
export function filenameFromUrl(url: URL): string | null {
  const segment = url.pathname.split('/').pop() ?? '';
  const name = decodeOrNull(segment) ?? segment;
  return name.includes('.') ? name : null;
}

export function deriveLinkFilename(disposition: string | null, finalUrl: URL, mediaType: string): string {
  return (
    filenameFromDisposition(disposition) ??
    filenameFromUrl(finalUrl) ??
    `invoice${extensionForMediaType(mediaType)}`
  );
}

// ---------------------------------------------------------------------------
// LinkResolver
// ---------------------------------------------------------------------------

export class LinkResolver {
  private readonly options: LinkResolverOptions;

  constructor(options: Partial<LinkResolverOptions> = {}) {
    this.options = {
      maxBytes: options.maxBytes ?? intakeConfig.maxAttachmentBytes,
      timeoutMs: options.timeoutMs ?? intakeConfig.linkTimeoutMs,
      maxRedirects: options.maxRedirects ?? intakeConfig.linkMaxRedirects,
      userAgent: options.userAgent ?? intakeConfig.linkUserAgent,
      lookup: options.lookup ?? systemLookup,
      fetch: options.fetch ?? ((url, init) => fetch(url, init)),
    };
  }

  /** Downloads the link as a document, or returns null when it is refused. */
  async resolve(url: string): Promise<CandidateDocument | null> {
    try {
      return await this.download(url);
    } catch (err) {
      console.warn('[link-resolver] Link refused', {
        url,
        reason: err instanceof Error ? err.message : String(err),
      });
      return null;
    }
  }

  /** Throws LinkRefusedError unless every address of the host is public. */
  async assertPublicHost(hostname: string): Promise<void> {
    let addresses: string[];
    try {
      addresses = await this.options.lookup(hostname.replace(/^\[|\]$/g, ''));
    } catch (err) {
      throw new LinkRefusedError(
        `Host ${hostname} did not resolve: ${err instanceof Error ? err.message : String(err)}`,
      );
    }

    if (addresses.length === 0) {
      throw new LinkRefusedError(`Host ${hostname} did not resolve`);
    }
    const blocked = addresses.find(isBlockedAddress);
    if (blocked) {
      throw new LinkRefusedError(`Host ${hostname} resolves to non-public address ${blocked}`);
    }
  }

  private async download(startUrl: string): Promise<CandidateDocument> {
    let current = parseHttpUrl(startUrl);

    for (let hop = 0; ; hop++) {
      await this.assertPublicHost(current.hostname);

      const response = await this.options.fetch(current.href, {
        redirect: 'manual',
        headers: { 'User-Agent': this.options.userAgent },
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });

      if (REDIRECT_STATUSES.has(response.status)) {
        const location = response.headers.get('location');
        await response.body?.cancel();
        if (!location) throw new LinkRefusedError(`Redirect ${response.status} without Location`);
        if (hop >= this.options.maxRedirects) {
          throw new LinkRefusedError(`More than ${this.options.maxRedirects} redirects`);
        }
        current = parseHttpUrl(new URL(location, current).href);
        continue;
      }

      if (!response.ok) {
        await response.body?.cancel();
        throw new LinkRefusedError(`HTTP ${response.status}`);
      }

      return this.toDocument(response, current);
    }
  }

  private async toDocument(response: Response, finalUrl: URL): Promise<CandidateDocument> {
    const contentType = response.headers.get('content-type');
    const disposition = response.headers.get('content-disposition');

    const provisional = normalizeMediaType(contentType);
    const name = deriveLinkFilename(disposition, finalUrl, provisional);
    const mediaType = normalizeMediaType(contentType, name);

    if (!isSupportedMediaType(mediaType)) {
      await response.body?.cancel();
      throw new LinkRefusedError(`Unsupported media type ${mediaType || '(none)'}`);
    }

    const declared = Number(response.headers.get('content-length'));
    if (Number.isFinite(declared) && declared > this.options.maxBytes) {
      await response.body?.cancel();
      throw new LinkRefusedError(`Content-Length ${declared} exceeds ${this.options.maxBytes} bytes`);
    }

    const bytes = await readBodyCapped(response, this.options.maxBytes);
    return { name, mediaType, bytes, origin: 'link' };
  }
}

function parseHttpUrl(raw: string): URL {
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    throw new LinkRefusedError('Malformed URL');
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new LinkRefusedError(`Scheme ${url.protocol} not allowed`);
  }
  return url;
}

async function readBodyCapped(response: Response, maxBytes: number): Promise<Buffer> {
  if (!response.body) return Buffer.alloc(0);

  const reader = response.body.getReader();
  const chunks: Uint8Array[] = [];
  let total = 0;

  for (;;) {
    const { done, value } = await reader.read();
    if (done) break;
    total += value.byteLength;
    if (total > maxBytes) {
      await reader.cancel();
      throw new LinkRefusedError(`Body exceeds ${maxBytes} bytes`);
    }
    chunks.push(value);
  }

  return Buffer.concat(chunks);
}
