/**
 * Error taxonomy for a single verification attempt.
 * None of these are retried; they end up in the verdict reason and debug trace.
 */

import { ConnectFailureKind, SmtpReply } from '../types/email';

export class AddressSyntaxError extends Error {
  constructor(readonly input: string, readonly detail: string) {
    super(`Invalid email syntax: ${detail}`);
    this.name = 'AddressSyntaxError';
  }
}

export type DnsErrorKind = 'no_mx' | 'resolution_failed' | 'timeout';

export class DnsLookupError extends Error {
  constructor(readonly kind: DnsErrorKind, readonly domain: string, message: string) {
    super(message);
    this.name = 'DnsLookupError';
  }
}

export type { ConnectFailureKind };

/**
 * Failure to obtain (or keep) a usable stream to the SMTP server.
 * `stage` names where it happened: a transport stage such as "connect" or
 * "socks5_connect", or an SMTP stage when a reply never came.
 */
export class ConnectError extends Error {
  constructor(
    readonly kind: ConnectFailureKind,
    readonly stage: string,
    readonly detail: string,
    readonly timeoutMs?: number,
    options?: { cause?: unknown }
  ) {
    super(detail, options);
    this.name = 'ConnectError';
  }
}

export class SmtpProtocolError extends Error {
  constructor(readonly stage: string, message: string, readonly reply?: SmtpReply) {
    super(message);
    this.name = 'SmtpProtocolError';
  }
}

export class ConfigError extends Error {
  constructor(readonly problems: string[]) {
    super(`Configuration validation failed:\n  - ${problems.join('\n  - ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Extract a Node errno code (ECONNREFUSED, ETIMEDOUT, ...) from an unknown error
 */
export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
