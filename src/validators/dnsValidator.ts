/**
 * DNS and MX record validator.
 * Queries DNS for MX records to verify domain can receive email.
 * Results (including "no MX") are cached to reduce DNS queries.
 */

import { promises as dns } from 'dns';
import { MxDetails, MxRecord } from '../types/email';
import { MxCache } from '../utils/cache';
import { DnsLookupError, errnoCode, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

const log = logger.child('dns');

const DEFAULT_LOOKUP_TIMEOUT_MS = 10000;

/**
 * Source of MX records. The default asks the system resolver.
 */
export interface MxResolver {
  resolveMx(domain: string): Promise<MxRecord[]>;
}

export const systemMxResolver: MxResolver = {
  resolveMx: (domain) => dns.resolveMx(domain),
};

export interface MxLookupOptions {
  resolver?: MxResolver;
  /** Null disables caching */
  cache?: MxCache | null;
  timeoutMs?: number;
}

// Answers meaning the name exists but has no mail exchanger
const NO_MX_CODES = new Set(['ENOTFOUND', 'ENODATA', 'NXDOMAIN']);
const TIMEOUT_CODES = new Set(['ETIMEOUT', 'ETIMEDOUT']);

function withTimeout<T>(promise: Promise<T>, timeoutMs: number, domain: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      reject(new DnsLookupError('timeout', domain, `MX lookup for ${domain} timed out after ${timeoutMs}ms`));
    }, timeoutMs);

    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        reject(error);
      }
    );
  });
}

/**
 * Sort by priority (lower number = higher priority) and drop RFC 7505 null MX entries
 */
function normalizeRecords(records: MxRecord[]): MxRecord[] {
  return records
    .map((record) => ({
      exchange: record.exchange.toLowerCase().replace(/\.+$/, ''),
      priority: record.priority,
    }))
    .filter((record) => record.exchange.length > 0)
    .sort((a, b) => a.priority - b.priority);
}

/**
 * MX records of `domain`, best first.
 * @throws DnsLookupError `no_mx` when the domain cannot receive mail,
 *   `timeout` or `resolution_failed` when DNS did not give an answer
 */
export async function lookupMx(domain: string, options: MxLookupOptions = {}): Promise<MxRecord[]> {
  const normalizedDomain = domain.toLowerCase();
  const resolver = options.resolver ?? systemMxResolver;
  const cache = options.cache ?? null;

  const cached = cache ? await cache.getMx(normalizedDomain) : null;
  let records: MxRecord[];

  if (cached !== null) {
    records = cached;
  } else {
    log.debug(`Performing DNS MX lookup for domain: ${normalizedDomain}`);

    try {
      records = normalizeRecords(
        await withTimeout(resolver.resolveMx(normalizedDomain), options.timeoutMs ?? DEFAULT_LOOKUP_TIMEOUT_MS, normalizedDomain)
      );
    } catch (error) {
      if (error instanceof DnsLookupError) {
        throw error;
      }

      const code = errnoCode(error);
      if (code && NO_MX_CODES.has(code)) {
        records = [];
      } else if (code && TIMEOUT_CODES.has(code)) {
        throw new DnsLookupError('timeout', normalizedDomain, `MX lookup for ${normalizedDomain} timed out (${code})`);
      } else {
        log.warn(`DNS lookup error for ${normalizedDomain}`, { code, error: errorMessage(error) });
        throw new DnsLookupError(
          'resolution_failed',
          normalizedDomain,
          `MX lookup for ${normalizedDomain} failed (${code ?? errorMessage(error)})`
        );
      }
    }

    if (cache) {
      // Negative answers are cached too; timeouts and failures are not
      await cache.setMx(normalizedDomain, records);
    }
  }

  if (records.length === 0) {
    throw new DnsLookupError('no_mx', normalizedDomain, `no MX records found for ${normalizedDomain}`);
  }

  log.debug(`MX lookup successful for ${normalizedDomain}`, { recordCount: records.length });
  return records;
}

/**
 * Non-throwing variant for reporting
 */
export async function validateMx(domain: string, options: MxLookupOptions = {}): Promise<MxDetails> {
  try {
    const records = await lookupMx(domain, options);
    return { acceptsMail: true, records };
  } catch (error) {
    if (error instanceof DnsLookupError) {
      return { acceptsMail: false, records: [], error: error.message };
    }
    throw error;
  }
}
