/**
 * Tests for MX lookup and the MX cache, with a fake resolver
 */

import { lookupMx, validateMx, MxResolver } from '../src/validators/dnsValidator';
import { InMemoryCache, MxCache } from '../src/utils/cache';
import { DnsLookupError } from '../src/utils/errors';
import { MxRecord } from '../src/types/email';

function dnsError(code: string): Error {
  return Object.assign(new Error(`queryMx ${code} example.com`), { code });
}

function resolverOf(answer: () => Promise<MxRecord[]>): MxResolver & { resolveMx: jest.Mock } {
  return { resolveMx: jest.fn(answer) };
}

async function lookupFailure(promise: Promise<unknown>): Promise<DnsLookupError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof DnsLookupError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected lookupMx to fail');
}

describe('lookupMx', () => {
  it('should sort by priority and normalize hosts', async () => {
    const resolver = resolverOf(async () => [
      { exchange: 'MX2.Example.com.', priority: 20 },
      { exchange: 'mx1.example.com', priority: 10 },
      { exchange: '.', priority: 0 },
    ]);

    await expect(lookupMx('Example.COM', { resolver })).resolves.toEqual([
      { exchange: 'mx1.example.com', priority: 10 },
      { exchange: 'mx2.example.com', priority: 20 },
    ]);
    expect(resolver.resolveMx).toHaveBeenCalledWith('example.com');
  });

  it.each(['ENOTFOUND', 'ENODATA'])('should treat %s as no MX', async (code) => {
    const resolver = resolverOf(async () => {
      throw dnsError(code);
    });

    const error = await lookupFailure(lookupMx('example.com', { resolver }));

    expect(error.kind).toBe('no_mx');
    expect(error.message).toBe('no MX records found for example.com');
  });

  it('should treat an empty answer as no MX', async () => {
    const error = await lookupFailure(lookupMx('example.com', { resolver: resolverOf(async () => []) }));

    expect(error.kind).toBe('no_mx');
  });

  it('should report resolver timeouts', async () => {
    const resolver = resolverOf(async () => {
      throw dnsError('ETIMEOUT');
    });

    const error = await lookupFailure(lookupMx('example.com', { resolver }));

    expect(error.kind).toBe('timeout');
    expect(error.message).toBe('MX lookup for example.com timed out (ETIMEOUT)');
  });

  it('should bound a hanging resolver', async () => {
    const resolver = resolverOf(() => new Promise<MxRecord[]>(() => undefined));

    const error = await lookupFailure(lookupMx('example.com', { resolver, timeoutMs: 50 }));

    expect(error.kind).toBe('timeout');
    expect(error.message).toBe('MX lookup for example.com timed out after 50ms');
  });

  it('should report other failures as resolution errors', async () => {
    const resolver = resolverOf(async () => {
      throw dnsError('ESERVFAIL');
    });

    const error = await lookupFailure(lookupMx('example.com', { resolver }));

    expect(error.kind).toBe('resolution_failed');
    expect(error.message).toBe('MX lookup for example.com failed (ESERVFAIL)');
  });

  it('should serve repeated lookups from the cache, negative answers included', async () => {
    const cache = new MxCache(new InMemoryCache<MxRecord[]>(), 60_000);
    const resolver = resolverOf(async () => []);

    await lookupFailure(lookupMx('example.com', { resolver, cache }));
    await lookupFailure(lookupMx('example.com', { resolver, cache }));

    expect(resolver.resolveMx).toHaveBeenCalledTimes(1);
    await expect(cache.getMx('example.com')).resolves.toEqual([]);
  });

  it('should not cache failures', async () => {
    const cache = new MxCache(new InMemoryCache<MxRecord[]>(), 60_000);
    const resolver = resolverOf(async () => {
      throw dnsError('ESERVFAIL');
    });

    await lookupFailure(lookupMx('example.com', { resolver, cache }));
    await lookupFailure(lookupMx('example.com', { resolver, cache }));

    expect(resolver.resolveMx).toHaveBeenCalledTimes(2);
  });
});

describe('validateMx', () => {
  it('should summarize a lookup without throwing', async () => {
    const resolver = resolverOf(async () => [{ exchange: 'mx.example.com', priority: 5 }]);

    await expect(validateMx('example.com', { resolver })).resolves.toEqual({
      acceptsMail: true,
      records: [{ exchange: 'mx.example.com', priority: 5 }],
    });
    await expect(validateMx('example.com', { resolver: resolverOf(async () => []) })).resolves.toEqual({
      acceptsMail: false,
      records: [],
      error: 'no MX records found for example.com',
    });
  });
});

describe('InMemoryCache', () => {
  it('should expire entries after their TTL', async () => {
    let clock = 0;
    const cache = new InMemoryCache<string>(() => clock);

    await cache.set('key', 'value', 100);
    clock = 100;
    await expect(cache.get('key')).resolves.toBe('value');
    clock = 101;
    await expect(cache.get('key')).resolves.toBeNull();
  });
});
