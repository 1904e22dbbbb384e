/**
 * Verdict and reason aggregation.
 *
 * Every check contributes zero or more tagged signals. The verdict is the
 * highest tier present:
 *
 *   invalid > risky > unknown > (nothing) safe
 *
 * The reason lists the tags of the winning tier in the order they were
 * raised, e.g. "Risky: disposable email address, role-based account (e.g., admin@, support@)".
 */

import { Verdict } from '../types/email';

export type SignalTier = 'invalid' | 'risky' | 'unknown';

export interface VerdictSignal {
  tier: SignalTier;
  tag: string;
}

export const SAFE_REASON = 'Email verification passed all checks';

/**
 * Fixed tag texts
 */
export const Tags = {
  SYNTAX_INVALID: 'email syntax is invalid',
  NO_MX: 'no MX records found for domain',
  NOT_DELIVERABLE: 'email is not deliverable',
  ACCOUNT_DISABLED: 'email account is disabled',
  DISPOSABLE: 'disposable email address',
  ROLE_ACCOUNT: 'role-based account (e.g., admin@, support@)',
  CATCH_ALL: 'catch-all address (accepts all emails)',
  FULL_INBOX: 'inbox is full',
  CANNOT_CONNECT: 'cannot connect to SMTP server',
  PROVIDER_CHECK_UNAVAILABLE: 'provider-specific check unavailable',
} as const;

const TIER_ORDER: readonly SignalTier[] = ['invalid', 'risky', 'unknown'];

const TIER_VERDICT: Record<SignalTier, Verdict> = {
  invalid: Verdict.INVALID,
  risky: Verdict.RISKY,
  unknown: Verdict.UNKNOWN,
};

const VERDICT_LABEL: Record<Verdict, string> = {
  [Verdict.SAFE]: 'Safe',
  [Verdict.RISKY]: 'Risky',
  [Verdict.INVALID]: 'Invalid',
  [Verdict.UNKNOWN]: 'Unknown',
};

export interface Classification {
  verdict: Verdict;
  reason: string;
}

/**
 * Collects signals in the order checks raise them
 */
export class SignalSet {
  private readonly signals: VerdictSignal[] = [];

  add(tier: SignalTier, tag: string): this {
    this.signals.push({ tier, tag });
    return this;
  }

  invalid(tag: string): this {
    return this.add('invalid', tag);
  }

  risky(tag: string): this {
    return this.add('risky', tag);
  }

  unknown(tag: string): this {
    return this.add('unknown', tag);
  }

  toArray(): VerdictSignal[] {
    return [...this.signals];
  }
}

/**
 * Pick the verdict and build the reason string
 */
export function classifyResult(signals: readonly VerdictSignal[] | SignalSet): Classification {
  const list = signals instanceof SignalSet ? signals.toArray() : signals;

  for (const tier of TIER_ORDER) {
    const tags = list.filter((signal) => signal.tier === tier).map((signal) => signal.tag);
    if (tags.length === 0) {
      continue;
    }

    const verdict = TIER_VERDICT[tier];
    const unique = Array.from(new Set(tags));
    return { verdict, reason: `${VERDICT_LABEL[verdict]}: ${unique.join(', ')}` };
  }

  return { verdict: Verdict.SAFE, reason: SAFE_REASON };
}
