/**
 * Outbound public IP, reported as the connection descriptor of direct
 * (proxy-less) SMTP probes.
 *
 * The value is cached for 5 minutes. Concurrent cache misses share a single
 * in-flight lookup; every waiter receives the same descriptor. Each service
 * gets 5 seconds for headers and body, and a whole refresh at most 12.
 */

import { hostname } from 'os';
import { isIP } from 'net';
import { logger } from './logger';

const log = logger.child('public-ip');

export const PUBLIC_IP_TTL_MS = 5 * 60 * 1000;

const PUBLIC_IP_SERVICES = [
  'https://api.ipify.org',
  'https://ifconfig.me/ip',
  'https://icanhazip.com',
  'https://ipecho.net/plain',
];

const FETCH_TIMEOUT_MS = 5000;
const REFRESH_TIMEOUT_MS = 12_000;

export interface PublicIpProvider {
  /** `local:<ip>`, or `local:<hostname>` when no IP could be determined */
  get(): Promise<string>;
}

export type IpFetcher = () => Promise<string | null>;

/** The part of a fetch Response the lookup reads */
export interface IpServiceResponse {
  ok: boolean;
  status: number;
  text(): Promise<string>;
}

export type IpServiceFetch = (url: string, init: { signal: AbortSignal }) => Promise<IpServiceResponse>;

export interface ServiceIpFetcherOptions {
  fetch?: IpServiceFetch;
  services?: readonly string[];
  /** Per service, headers and body together */
  timeoutMs?: number;
}

/**
 * Settle with `work`, or reject once `ms` have passed
 */
export function withDeadline<T>(work: Promise<T>, ms: number, what: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`${what} timed out after ${ms}ms`)), ms);
  });
  return Promise.race([work, deadline]).finally(() => clearTimeout(timer));
}

async function fetchBody(url: string, fetchFn: IpServiceFetch, signal: AbortSignal): Promise<string> {
  const response = await fetchFn(url, { signal });
  if (!response.ok) {
    throw new Error(`HTTP ${response.status}`);
  }
  return response.text();
}

/**
 * IP fetcher asking the public IP echo services in turn; first valid answer wins
 */
export function createServiceIpFetcher(options: ServiceIpFetcherOptions = {}): IpFetcher {
  const fetchFn: IpServiceFetch = options.fetch ?? fetch;
  const services = options.services ?? PUBLIC_IP_SERVICES;
  const timeoutMs = options.timeoutMs ?? FETCH_TIMEOUT_MS;

  return async () => {
    for (const url of services) {
      const controller = new AbortController();
      try {
        const ip = (await withDeadline(fetchBody(url, fetchFn, controller.signal), timeoutMs, `GET ${url}`)).trim();
        if (isIP(ip) !== 0) {
          return ip;
        }
        log.debug(`${url} returned something that is not an IP`, { body: ip.substring(0, 64) });
      } catch (error) {
        // Drops the connection of a stalled body
        controller.abort();
        log.debug(`Public IP lookup via ${url} failed`, { error: error instanceof Error ? error.message : String(error) });
      }
    }
    return null;
  };
}

interface CachedIp {
  descriptor: string;
  fetchedAt: number;
}

export interface PublicIpCacheOptions {
  fetchIp?: IpFetcher;
  ttlMs?: number;
  /** Upper bound on one refresh; the hostname is reported past it */
  refreshTimeoutMs?: number;
  now?: () => number;
  hostname?: () => string;
}

export class PublicIpCache implements PublicIpProvider {
  private cached: CachedIp | null = null;
  private inFlight: Promise<string> | null = null;

  private readonly fetchIp: IpFetcher;
  private readonly ttlMs: number;
  private readonly refreshTimeoutMs: number;
  private readonly now: () => number;
  private readonly hostname: () => string;

  constructor(options: PublicIpCacheOptions = {}) {
    this.fetchIp = options.fetchIp ?? createServiceIpFetcher();
    this.ttlMs = options.ttlMs ?? PUBLIC_IP_TTL_MS;
    this.refreshTimeoutMs = options.refreshTimeoutMs ?? REFRESH_TIMEOUT_MS;
    this.now = options.now ?? Date.now;
    this.hostname = options.hostname ?? hostname;
  }

  get(): Promise<string> {
    if (this.cached && this.now() - this.cached.fetchedAt < this.ttlMs) {
      return Promise.resolve(this.cached.descriptor);
    }

    if (!this.inFlight) {
      this.inFlight = this.refresh().finally(() => {
        this.inFlight = null;
      });
    }

    return this.inFlight;
  }

  private async refresh(): Promise<string> {
    let ip: string | null = null;

    try {
      ip = await withDeadline(this.fetchIp(), this.refreshTimeoutMs, 'Public IP lookup');
    } catch (error) {
      log.warn('Public IP lookup failed, reporting hostname instead', {
        error: error instanceof Error ? error.message : String(error),
      });
    }

    const descriptor = ip && isIP(ip) !== 0 ? `local:${ip}` : `local:${this.localHostname()}`;
    this.cached = { descriptor, fetchedAt: this.now() };
    return descriptor;
  }

  private localHostname(): string {
    try {
      return this.hostname() || 'unknown';
    } catch (error) {
      log.debug('Could not read local hostname', { error: error instanceof Error ? error.message : String(error) });
      return 'unknown';
    }
  }
}

/**
 * Process-wide cache
 */
export const publicIpCache = new PublicIpCache();
