/**
 * SMTP reply parsing and RCPT TO interpretation.
 *
 * RCPT TO replies are matched against an ordered table; the first row that
 * matches decides the probe signal.
 */

import { ProbeSignal, SmtpReply } from '../types/email';

export interface ParsedReplyLine {
  code: number;
  /** True for "250-..." continuation lines */
  continues: boolean;
  text: string;
}

const REPLY_LINE = /^(\d{3})([ -]?)(.*)$/;
const ENHANCED_CODE = /^([245])\.(\d{1,3})\.(\d{1,3})(?=\s|$)/;

/**
 * Split one reply line into code, continuation flag and text.
 * Returns null for lines that do not start with a three-digit code.
 */
export function parseReplyLine(line: string): ParsedReplyLine | null {
  const match = REPLY_LINE.exec(line);
  if (!match) {
    return null;
  }
  return {
    code: parseInt(match[1], 10),
    continues: match[2] === '-',
    text: match[3].trim(),
  };
}

export function extractEnhancedCode(text: string): string | undefined {
  const match = ENHANCED_CODE.exec(text.trim());
  return match ? `${match[1]}.${match[2]}.${match[3]}` : undefined;
}

export function replyText(reply: SmtpReply): string {
  return reply.lines.join(' ').trim();
}

export function formatReply(reply: SmtpReply): string {
  const text = replyText(reply);
  return text ? `${reply.code} ${text}` : String(reply.code);
}

export interface RcptClassification {
  signal: ProbeSignal;
  disabled: boolean;
}

const FULL_MAILBOX_TEXT = [
  'mailbox full',
  'mailbox is full',
  'inbox is full',
  'over quota',
  'overquota',
  'quota exceeded',
  'exceeded storage',
];

// Mail-system (5.3.x) and too-many-recipients (5.5.3) replies
const SERVER_SIDE_CODE = /^5\.(3\.\d{1,3}|5\.3)$/;

const DISABLED_TEXT = ['disabled', 'deactivated', 'suspended', 'inactive'];

const BLOCKED_PROBE_TEXT = [
  'blacklist',
  'blocklist',
  'spamhaus',
  'blocked using',
  'reverse dns',
  'rdns',
  'poor reputation',
];

function mentions(text: string, needles: readonly string[]): boolean {
  return needles.some((needle) => text.includes(needle));
}

/**
 * Interpret the reply to RCPT TO
 */
export function classifyRcptReply(reply: SmtpReply): RcptClassification {
  const { code } = reply;
  const enhanced = reply.enhancedCode ?? '';
  const text = replyText(reply).toLowerCase();
  const permanent = code >= 500 && code < 600;
  const transient = code >= 400 && code < 500;

  if (code >= 200 && code < 300) {
    return { signal: 'deliverable', disabled: false };
  }

  // x.2.2 decides when present; the wording only counts on a reply without an enhanced code
  const fullMailbox = enhanced
    ? enhanced === '4.2.2' || enhanced === '5.2.2'
    : (permanent || transient) && mentions(text, FULL_MAILBOX_TEXT);
  if (fullMailbox) {
    return { signal: 'fullMailbox', disabled: false };
  }

  if (permanent && (SERVER_SIDE_CODE.test(enhanced) || (code === 552 && !enhanced))) {
    return { signal: 'protocolError', disabled: false };
  }

  if (permanent && (enhanced === '5.2.1' || mentions(text, DISABLED_TEXT))) {
    return { signal: 'undeliverable', disabled: true };
  }

  if (
    permanent &&
    (mentions(text, BLOCKED_PROBE_TEXT) || (enhanced === '5.7.1' && text.includes('client host')))
  ) {
    return { signal: 'protocolError', disabled: false };
  }

  if (permanent) {
    // 550/551/553/554 and 5.1.x land here too
    return { signal: 'undeliverable', disabled: false };
  }

  if (transient) {
    return { signal: 'temporaryFailure', disabled: false };
  }

  return { signal: 'protocolError', disabled: false };
}
