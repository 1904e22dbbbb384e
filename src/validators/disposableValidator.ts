/**
 * Disposable email domain validator.
 * Detects temporary/disposable email addresses from known providers.
 * The curated list lives in data/disposable-domains.json.
 */

import { loadWordList } from '../utils/dataFiles';

/**
 * Known disposable/temporary email domains, loaded at module initialization
 */
const DISPOSABLE_DOMAINS = new Set(
  loadWordList('disposable-domains.json', [
    '10minutemail.com',
    'guerrillamail.com',
    'mailinator.com',
    'tempmail.com',
    'throwaway.email',
    'temp-mail.org',
    'yopmail.com',
    'maildrop.cc',
  ])
);

export interface DisposableValidationResult {
  disposable: boolean;
  /** List entry that matched (the domain itself or a parent domain) */
  matchedDomain?: string;
}

/**
 * Check if a domain is from a known disposable email provider.
 *
 * The domain and each of its parent domains are looked up, so
 * foo.mailinator.com matches mailinator.com.
 */
export function validateDisposable(domain: string): DisposableValidationResult {
  const labels = domain.toLowerCase().trim().replace(/\.+$/, '').split('.');

  // Stop before the bare TLD
  for (let start = 0; start < labels.length - 1; start++) {
    const candidate = labels.slice(start).join('.');
    if (DISPOSABLE_DOMAINS.has(candidate)) {
      return { disposable: true, matchedDomain: candidate };
    }
  }

  return { disposable: false };
}

export function isDisposableDomain(domain: string): boolean {
  return validateDisposable(domain).disposable;
}

/**
 * Get the total count of known disposable domains
 */
export function getDisposableDomainsCount(): number {
  return DISPOSABLE_DOMAINS.size;
}
