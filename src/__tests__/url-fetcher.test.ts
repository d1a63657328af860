/**
 * Tests for remote config fetching
 */

import { describe, it, expect } from 'vitest';
import { URLConfigFetcher, resolveToRawUrl, validateUrl } from '../url-fetcher.js';
import { createStubFetcher } from './helpers.js';

describe('validateUrl', () => {
  it('accepts https URLs', () => {
    expect(validateUrl(' https://example.com/.swiftlint.yml ').toString()).toBe('https://example.com/.swiftlint.yml');
  });

  it('rejects http as insecure', () => {
    expect(() => validateUrl('http://example.com/a.yml')).toThrow(expect.objectContaining({ code: 'insecureUrl' }));
  });

  it('rejects other schemes', () => {
    expect(() => validateUrl('ftp://example.com/a.yml')).toThrow('Unsupported URL scheme: ftp');
  });

  it('rejects text that is not a URL', () => {
    expect(() => validateUrl('not a url')).toThrow(expect.objectContaining({ code: 'invalidUrl' }));
  });
});

describe('resolveToRawUrl', () => {
  it('maps GitHub blob pages to raw content', () => {
    const url = resolveToRawUrl(new URL('https://github.com/acme/app/blob/main/.swiftlint.yml'));

    expect(url.toString()).toBe('https://raw.githubusercontent.com/acme/app/main/.swiftlint.yml');
  });

  it('maps gists to their raw endpoint', () => {
    const url = resolveToRawUrl(new URL('https://gist.github.com/someone/abc123'));

    expect(url.toString()).toBe('https://gist.githubusercontent.com/someone/abc123/raw');
  });

  it('leaves other URLs alone', () => {
    const url = resolveToRawUrl(new URL('https://example.com/lint/.swiftlint.yml'));

    expect(url.toString()).toBe('https://example.com/lint/.swiftlint.yml');
  });
});

describe('URLConfigFetcher', () => {
  it('fetches from the resolved raw URL', async () => {
    const { fetcher, urls } = createStubFetcher({
      'https://raw.githubusercontent.com/acme/app/main/.swiftlint.yml': 'todo: true\n',
    });

    const content = await new URLConfigFetcher({ fetcher, timeoutMs: 1000 }).fetchConfig(
      'https://github.com/acme/app/blob/main/.swiftlint.yml'
    );

    expect(content).toBe('todo: true\n');
    expect(urls).toEqual(['https://raw.githubusercontent.com/acme/app/main/.swiftlint.yml']);
  });

  it('reports HTTP errors with the status', async () => {
    const { fetcher } = createStubFetcher({});

    await expect(
      new URLConfigFetcher({ fetcher, timeoutMs: 1000 }).fetchConfig('https://example.com/missing.yml')
    ).rejects.toMatchObject({ code: 'httpError', message: 'HTTP error 404.' });
  });

  it('rejects content whose top level is not a mapping', async () => {
    const { fetcher } = createStubFetcher({ 'https://example.com/list.yml': '- a\n- b\n' });

    await expect(
      new URLConfigFetcher({ fetcher, timeoutMs: 1000 }).fetchConfig('https://example.com/list.yml')
    ).rejects.toMatchObject({ code: 'invalidYaml' });
  });

  it('accepts an empty document', async () => {
    const { fetcher } = createStubFetcher({ 'https://example.com/empty.yml': '# nothing yet\n' });

    const content = await new URLConfigFetcher({ fetcher, timeoutMs: 1000 }).fetchConfig('https://example.com/empty.yml');

    expect(content).toBe('# nothing yet\n');
  });

  it('wraps transport failures as network errors', async () => {
    const fetcher = async () => {
      throw new Error('connection reset');
    };

    await expect(
      new URLConfigFetcher({ fetcher, timeoutMs: 1000 }).fetchConfig('https://example.com/a.yml')
    ).rejects.toMatchObject({ code: 'networkError', message: 'Network error: connection reset' });
  });

  it('reports a timeout when the request is aborted', async () => {
    const fetcher = (_url: string, init: { signal: AbortSignal }) =>
      new Promise<never>((_resolve, reject) => {
        init.signal.addEventListener('abort', () => reject(new Error('aborted')));
      });

    await expect(
      new URLConfigFetcher({ fetcher, timeoutMs: 10 }).fetchConfig('https://example.com/slow.yml')
    ).rejects.toMatchObject({ code: 'timeout' });
  });
});
