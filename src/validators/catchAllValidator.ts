/**
 * Catch-all detection.
 *
 * A domain is catch-all when its MX accepts RCPT TO for a local part that
 * cannot exist. The check is a second SMTP probe for a random address and
 * only runs after the real address was accepted.
 */

import { randomBytes } from 'crypto';
import { CatchAllStatus, EmailAddress, ProbeOutcome } from '../types/email';
import { VerificationMethod } from '../types/proxy';

export const CATCH_ALL_LOCAL_PREFIX = 'verify-';

/**
 * Random address on the same domain, e.g. verify-3f9a0c1d2b4e@example.com
 */
export function catchAllProbeAddress(email: EmailAddress, random: (size: number) => Buffer = randomBytes): string {
  return `${CATCH_ALL_LOCAL_PREFIX}${random(6).toString('hex')}@${email.domain}`;
}

/**
 * Whether a catch-all probe should follow the primary probe
 */
export function shouldCheckCatchAll(primary: ProbeOutcome, method: VerificationMethod): boolean {
  return method.kind === 'smtp' && method.config.checkCatchAll && primary.signal === 'deliverable';
}

/**
 * Acceptance means catch-all; a rejection means the MX checks recipients.
 * Anything else (timeouts, 4xx, blocked probe) proves nothing.
 */
export function interpretCatchAllProbe(outcome: ProbeOutcome): CatchAllStatus {
  switch (outcome.signal) {
    case 'deliverable':
      return 'yes';
    case 'undeliverable':
      return 'no';
    default:
      return 'indeterminate';
  }
}
