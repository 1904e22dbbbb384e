/**
 * Mail provider classification from the MX hostname.
 * Rules are ordered; the first match wins. A rule matches when the host is
 * the rule domain itself or one of its subdomains.
 */

import { Provider } from '../types/email';

interface ProviderRule {
  provider: Provider;
  domains: readonly string[];
}

const PROVIDER_RULES: readonly ProviderRule[] = [
  // Gmail / Google Workspace
  { provider: Provider.GMAIL, domains: ['google.com', 'googlemail.com'] },
  // Outlook.com / Hotmail consumer mailboxes
  { provider: Provider.HOTMAIL_B2C, domains: ['olc.protection.outlook.com'] },
  // Microsoft 365 tenants
  { provider: Provider.HOTMAIL_B2B, domains: ['mail.protection.outlook.com'] },
  // Yahoo / AOL
  { provider: Provider.YAHOO, domains: ['yahoodns.net'] },
  { provider: Provider.MIMECAST, domains: ['mimecast.com'] },
  { provider: Provider.PROOFPOINT, domains: ['pphosted.com', 'ppe-hosted.com'] },
];

export function normalizeMxHost(mxHost: string): string {
  return mxHost.trim().toLowerCase().replace(/\.+$/, '');
}

function hostMatches(host: string, domain: string): boolean {
  return host === domain || host.endsWith(`.${domain}`);
}

/**
 * Detect email provider from MX hostname
 */
export function classifyProvider(mxHost: string): Provider {
  const host = normalizeMxHost(mxHost);

  for (const rule of PROVIDER_RULES) {
    if (rule.domains.some((domain) => hostMatches(host, domain))) {
      return rule.provider;
    }
  }

  return Provider.EVERYTHING_ELSE;
}

export function isGmail(mxHost: string): boolean {
  return classifyProvider(mxHost) === Provider.GMAIL;
}

export function isHotmailB2C(mxHost: string): boolean {
  return classifyProvider(mxHost) === Provider.HOTMAIL_B2C;
}

export function isHotmailB2B(mxHost: string): boolean {
  return classifyProvider(mxHost) === Provider.HOTMAIL_B2B;
}

export function isHotmail(mxHost: string): boolean {
  return isHotmailB2C(mxHost) || isHotmailB2B(mxHost);
}

export function isYahoo(mxHost: string): boolean {
  return classifyProvider(mxHost) === Provider.YAHOO;
}

export function isMimecast(mxHost: string): boolean {
  return classifyProvider(mxHost) === Provider.MIMECAST;
}

export function isProofpoint(mxHost: string): boolean {
  return classifyProvider(mxHost) === Provider.PROOFPOINT;
}
