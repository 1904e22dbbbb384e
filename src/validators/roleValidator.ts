/**
 * Role account validator.
 * Detects generic/role-based email addresses that are typically shared mailboxes
 * rather than individual user accounts (e.g., admin@, support@, sales@).
 */

import { loadWordList } from '../utils/dataFiles';

/**
 * Common role-based email prefixes, from data/role-prefixes.json.
 * These are typically shared mailboxes rather than individual accounts
 */
const ROLE_PREFIXES = new Set(
  loadWordList('role-prefixes.json', ['admin', 'support', 'info', 'sales', 'contact', 'noreply', 'postmaster'])
);

export interface RoleValidationResult {
  roleAccount: boolean;
  /** Role prefix the local part matched */
  matchedRole?: string;
}

/**
 * Check if an email's local part is a common role-based address
 *
 * @param localPart - Local part of email (before @)
 */
export function validateRole(localPart: string): RoleValidationResult {
  // Plus-addressing tags never change the mailbox owner
  const normalizedLocal = localPart.toLowerCase().trim().split('+')[0];

  if (ROLE_PREFIXES.has(normalizedLocal)) {
    return { roleAccount: true, matchedRole: normalizedLocal };
  }

  // "support1", "admin123"
  const withoutTrailingNumbers = normalizedLocal.replace(/[0-9]+$/, '');
  if (ROLE_PREFIXES.has(withoutTrailingNumbers)) {
    return { roleAccount: true, matchedRole: withoutTrailingNumbers };
  }

  // "support-team", "admin_user", "info.desk"
  for (const role of ROLE_PREFIXES) {
    if (normalizedLocal.startsWith(role) && /^[-_.0-9]/.test(normalizedLocal.slice(role.length))) {
      return { roleAccount: true, matchedRole: role };
    }
  }

  return { roleAccount: false };
}

export function isRoleAccount(localPart: string): boolean {
  return validateRole(localPart).roleAccount;
}

/**
 * Get the total count of known role prefixes
 */
export function getRolePrefixesCount(): number {
  return ROLE_PREFIXES.size;
}
