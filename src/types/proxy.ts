/**
 * Proxy pool and per-provider verification method types.
 */

import { EmailAddress, Provider } from './email';
import type { ProxyRotator } from '../proxy/proxyRotator';

export type ProxyId = string;

/**
 * SOCKS5 proxy endpoint
 */
export interface ProxyDescriptor {
  host: string;
  port: number;
  username?: string;
  password?: string;
  /** Overrides the connect/handshake timeout for connections through this proxy */
  timeoutMs?: number;
}

export type ProxyPool = ReadonlyMap<ProxyId, Readonly<ProxyDescriptor>>;

export type RotationStrategy = 'round_robin' | 'random';

export interface ProxyPoolPolicy {
  enabled: boolean;
  strategy: RotationStrategy;
}

/**
 * Per-stage SMTP timeouts in milliseconds
 */
export interface SmtpTimeouts {
  connectMs: number;
  greetingMs: number;
  ehloMs: number;
  mailFromMs: number;
  rcptToMs: number;
  quitMs: number;
}

export interface SmtpMethodConfig {
  /** Static proxy assignment; always wins over rotation */
  proxyId?: ProxyId;
  port: number;
  helloName: string;
  fromEmail: string;
  /** Whether a second probe with a random local part may be issued */
  checkCatchAll: boolean;
  timeouts: SmtpTimeouts;
}

/**
 * How addresses hosted by a provider are verified
 */
export type VerificationMethod =
  | { kind: 'skip' }
  | { kind: 'api' }
  | { kind: 'headless' }
  | { kind: 'smtp'; config: SmtpMethodConfig };

export type ProviderMethods = Readonly<Record<Provider, VerificationMethod>>;

/**
 * Immutable configuration built once at startup and shared by every call.
 * `rotator` is the single process-wide rotation state.
 */
export interface VerifierConfig {
  readonly methods: ProviderMethods;
  readonly proxies: ProxyPool;
  readonly rotation: Readonly<ProxyPoolPolicy>;
  readonly rotator: ProxyRotator | null;
}

/**
 * Per-request context handed to the proxy router and the method dispatcher
 */
export interface VerificationContext {
  readonly email: EmailAddress;
  readonly mxHost: string;
  readonly provider: Provider;
  readonly method: VerificationMethod;
  readonly config: VerifierConfig;
}

/**
 * Outcome of proxy resolution
 */
export interface ResolvedProxy {
  id: ProxyId;
  proxy: Readonly<ProxyDescriptor>;
  source: 'provider' | 'rotation' | 'default';
}
