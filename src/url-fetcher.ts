/**
 * rulestudio URL Config Fetcher
 * Downloads a .swiftlint.yml over HTTPS, resolving GitHub and Gist pages to raw content
 */

import { isMap, parseDocument } from 'yaml';
import { UrlFetchError, errorMessage } from './errors.js';
import { getConfig } from './config.js';
import { getSandboxRestrictions } from './sandbox.js';

export interface FetchResponse {
  status: number;
  text(): Promise<string>;
}

/**
 * Minimal slice of `fetch` the fetcher depends on
 */
export type Fetcher = (url: string, init: { signal: AbortSignal }) => Promise<FetchResponse>;

const defaultFetcher: Fetcher = async (url, init) => {
  if (getSandboxRestrictions().noNetwork) {
    throw UrlFetchError.networkDisabled();
  }
  return fetch(url, { signal: init.signal });
};

// =============================================================================
// URL HANDLING
// =============================================================================

/**
 * Parse and check a URL. Only https with a host is accepted.
 */
export function validateUrl(input: string): URL {
  let url: URL;
  try {
    url = new URL(input.trim());
  } catch {
    throw UrlFetchError.invalidUrl();
  }

  const scheme = url.protocol.replace(/:$/, '').toLowerCase();
  if (scheme === 'http') {
    throw UrlFetchError.insecureUrl();
  }
  if (scheme !== 'https') {
    throw UrlFetchError.unsupportedScheme(scheme);
  }
  if (url.hostname === '') {
    throw UrlFetchError.invalidUrl();
  }
  return url;
}

/**
 * github.com/o/r/blob/main/.swiftlint.yml -> raw.githubusercontent.com/o/r/main/.swiftlint.yml
 * gist.github.com/u/id -> gist.githubusercontent.com/u/id/raw
 */
export function resolveToRawUrl(url: URL): URL {
  const host = url.hostname.toLowerCase();

  if (host === 'github.com' && url.pathname.includes('/blob/')) {
    return new URL(`https://raw.githubusercontent.com${url.pathname.replace('/blob/', '/')}`);
  }
  if (host === 'gist.github.com' && !url.pathname.includes('/raw')) {
    return new URL(`https://gist.githubusercontent.com${url.pathname}/raw`);
  }
  return url;
}

// =============================================================================
// FETCHER
// =============================================================================

export class URLConfigFetcher {
  private readonly fetcher: Fetcher;
  private readonly timeoutMs: number;

  constructor(options: { fetcher?: Fetcher; timeoutMs?: number } = {}) {
    this.fetcher = options.fetcher || defaultFetcher;
    this.timeoutMs = options.timeoutMs ?? getConfig().fetchTimeoutMs;
  }

  async fetchConfig(input: string): Promise<string> {
    const url = resolveToRawUrl(validateUrl(input));

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    let content: string;
    try {
      const response = await this.fetcher(url.toString(), { signal: controller.signal });
      if (response.status < 200 || response.status > 299) {
        throw UrlFetchError.httpError(response.status);
      }
      content = await response.text();
    } catch (error) {
      if (error instanceof UrlFetchError) throw error;
      if (controller.signal.aborted) throw UrlFetchError.timeout();
      throw UrlFetchError.networkError(errorMessage(error), error);
    } finally {
      clearTimeout(timer);
    }

    const doc = parseDocument(content);
    if (doc.errors.length > 0) {
      throw UrlFetchError.invalidYaml(doc.errors[0].message);
    }
    // An empty or comment-only document passes; the import preview reports it
    if (doc.contents !== null && !isMap(doc.contents)) {
      throw UrlFetchError.invalidYaml('top level is not a mapping');
    }
    return content;
  }
}
