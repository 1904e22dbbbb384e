/**
 * Email syntax validator.
 * Validates email format against RFC 5321/5322 standards.
 * Uses the 'validator' package for the RFC check; the stricter dot rules
 * on top of it reject forms most mail servers refuse anyway.
 */

import isEmail from 'validator/lib/isEmail';
import { EmailAddress } from '../types/email';
import { AddressSyntaxError } from '../utils/errors';
import { loadWordList } from '../utils/dataFiles';

export type SyntaxProblem =
  | 'empty'
  | 'missing_at_sign'
  | 'multiple_at_signs'
  | 'empty_local_part'
  | 'empty_domain'
  | 'invalid_format'
  | 'edge_dot'
  | 'consecutive_dots';

export type SyntaxValidationResult =
  | { syntaxValid: true; email: EmailAddress }
  | { syntaxValid: false; localPart: string; domain: string; problem: SyntaxProblem };

const PROBLEM_TEXT: Record<SyntaxProblem, string> = {
  empty: 'address is empty',
  missing_at_sign: 'missing @ sign',
  multiple_at_signs: 'more than one @ sign',
  empty_local_part: 'nothing before the @ sign',
  empty_domain: 'nothing after the @ sign',
  invalid_format: 'not an RFC 5322 address',
  edge_dot: 'local part starts or ends with a dot',
  consecutive_dots: 'consecutive dots',
};

function invalid(problem: SyntaxProblem, localPart = '', domain = ''): SyntaxValidationResult {
  return { syntaxValid: false, localPart, domain, problem };
}

/**
 * Validate email syntax and extract components
 */
export function validateSyntax(input: string): SyntaxValidationResult {
  const trimmed = input.trim();

  if (!trimmed) {
    return invalid('empty');
  }

  const atCount = (trimmed.match(/@/g) || []).length;
  if (atCount === 0) {
    return invalid('missing_at_sign', trimmed);
  }
  if (atCount > 1) {
    return invalid('multiple_at_signs');
  }

  const [localPart, rawDomain] = trimmed.split('@');
  // Domains are case-insensitive; the local part is kept as typed
  const domain = rawDomain.toLowerCase();

  if (!localPart) {
    return invalid('empty_local_part', '', domain);
  }
  if (!domain) {
    return invalid('empty_domain', localPart);
  }

  if (!isEmail(trimmed)) {
    return invalid('invalid_format', localPart, domain);
  }

  if (localPart.startsWith('.') || localPart.endsWith('.')) {
    return invalid('edge_dot', localPart, domain);
  }

  if (localPart.includes('..') || domain.includes('..')) {
    return invalid('consecutive_dots', localPart, domain);
  }

  return {
    syntaxValid: true,
    email: Object.freeze({ address: `${localPart}@${domain}`, localPart, domain }),
  };
}

/**
 * Parse an address or throw.
 * @throws AddressSyntaxError
 */
export function parseAddress(input: string): EmailAddress {
  const result = validateSyntax(input);
  if (!result.syntaxValid) {
    throw new AddressSyntaxError(input, PROBLEM_TEXT[result.problem]);
  }
  return result.email;
}

export function describeSyntaxProblem(problem: SyntaxProblem): string {
  return PROBLEM_TEXT[problem];
}

const MAIL_PROVIDER_DOMAINS = loadWordList('mail-providers.json', [
  'gmail.com',
  'yahoo.com',
  'hotmail.com',
  'outlook.com',
  'icloud.com',
  'aol.com',
]);

const MAX_SUGGESTION_DISTANCE = 2;

/**
 * Levenshtein distance, two-row variant
 */
export function editDistance(a: string, b: string): number {
  let previous = Array.from({ length: b.length + 1 }, (_, index) => index);

  for (let i = 1; i <= a.length; i++) {
    const current = [i];
    for (let j = 1; j <= b.length; j++) {
      const substitution = previous[j - 1] + (a[i - 1] === b[j - 1] ? 0 : 1);
      current.push(Math.min(previous[j] + 1, current[j - 1] + 1, substitution));
    }
    previous = current;
  }

  return previous[b.length];
}

/**
 * Well-known mailbox provider domain `domain` is probably a typo of,
 * e.g. "gmial.com" -> "gmail.com". Undefined when nothing is close enough
 * or the domain is itself a known provider.
 */
export function suggestDomain(domain: string): string | undefined {
  const normalized = domain.trim().toLowerCase();
  if (!normalized || MAIL_PROVIDER_DOMAINS.includes(normalized)) {
    return undefined;
  }

  let best: { domain: string; distance: number } | undefined;
  for (const candidate of MAIL_PROVIDER_DOMAINS) {
    const distance = editDistance(normalized, candidate);
    if (distance <= MAX_SUGGESTION_DISTANCE && (!best || distance < best.distance)) {
      best = { domain: candidate, distance };
    }
  }

  return best?.domain;
}
