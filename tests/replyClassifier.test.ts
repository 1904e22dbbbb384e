/**
 * Tests for SMTP reply parsing and RCPT TO interpretation
 */

import {
  classifyRcptReply,
  extractEnhancedCode,
  formatReply,
  parseReplyLine,
} from '../src/smtp/replyClassifier';
import { SmtpReply } from '../src/types/email';

function reply(code: number, text: string): SmtpReply {
  return { code, enhancedCode: extractEnhancedCode(text), lines: [text] };
}

describe('parseReplyLine', () => {
  it('should split code, continuation flag and text', () => {
    expect(parseReplyLine('250-mx.test Hello')).toEqual({ code: 250, continues: true, text: 'mx.test Hello' });
    expect(parseReplyLine('250 PIPELINING')).toEqual({ code: 250, continues: false, text: 'PIPELINING' });
    expect(parseReplyLine('221')).toEqual({ code: 221, continues: false, text: '' });
  });

  it('should reject lines without a reply code', () => {
    expect(parseReplyLine('hello there')).toBeNull();
    expect(parseReplyLine('25 short')).toBeNull();
  });
});

describe('extractEnhancedCode', () => {
  it('should read an RFC 3463 code at the start of the text', () => {
    expect(extractEnhancedCode('5.1.1 User unknown')).toBe('5.1.1');
    expect(extractEnhancedCode('2.1.5')).toBe('2.1.5');
  });

  it('should ignore codes elsewhere in the text', () => {
    expect(extractEnhancedCode('User unknown 5.1.1')).toBeUndefined();
    expect(extractEnhancedCode('5.1.1User')).toBeUndefined();
  });
});

describe('formatReply', () => {
  it('should join lines after the code', () => {
    expect(formatReply({ code: 550, lines: ['5.1.1 first', 'second'] })).toBe('550 5.1.1 first second');
    expect(formatReply({ code: 421, lines: [] })).toBe('421');
  });
});

describe('classifyRcptReply', () => {
  it.each([
    [250, '2.1.5 OK', 'deliverable', false],
    [251, 'User not local; will forward', 'deliverable', false],
    [452, '4.2.2 Mailbox full', 'fullMailbox', false],
    [552, 'Requested action aborted: exceeded storage allocation', 'fullMailbox', false],
    [550, '5.2.2 The email account that you tried to reach is over quota', 'fullMailbox', false],
    [450, 'Mailbox is full, try again later', 'fullMailbox', false],
    [452, '4.5.3 Too many recipients', 'temporaryFailure', false],
    [452, '4.7.1 Rate limit exceeded', 'temporaryFailure', false],
    [452, '4.3.1 Insufficient system resources', 'temporaryFailure', false],
    [452, 'Insufficient system storage', 'temporaryFailure', false],
    [552, '5.3.4 Message size exceeds fixed limit', 'protocolError', false],
    [552, 'Message size exceeds fixed maximum message size', 'protocolError', false],
    [550, '5.5.3 Too many recipients', 'protocolError', false],
    [550, '5.2.1 The email account that you tried to reach is disabled', 'undeliverable', true],
    [554, 'Account suspended', 'undeliverable', true],
    [554, '5.7.1 Service unavailable; Client host [192.0.2.1] blocked using zen.spamhaus.org', 'protocolError', false],
    [550, '5.7.1 Client host rejected: cannot find your reverse hostname', 'protocolError', false],
    [550, 'Sender IP has poor reputation', 'protocolError', false],
    [550, '5.1.1 User unknown', 'undeliverable', false],
    [551, 'User not local', 'undeliverable', false],
    [553, 'Mailbox name not allowed', 'undeliverable', false],
    [554, 'Transaction failed', 'undeliverable', false],
    [521, 'Does not accept mail', 'undeliverable', false],
    [450, '4.7.1 Greylisted, try again later', 'temporaryFailure', false],
    [421, 'Service not available', 'temporaryFailure', false],
    [354, 'Start mail input', 'protocolError', false],
  ])('should classify %i "%s" as %s', (code, text, signal, disabled) => {
    expect(classifyRcptReply(reply(code, text))).toEqual({ signal, disabled });
  });

  it('should read the enhanced code from the first line only', () => {
    const multiLine: SmtpReply = {
      code: 550,
      enhancedCode: '5.2.1',
      lines: ['5.2.1 The account is gone', '5.1.1 see https://support.example.test'],
    };

    expect(classifyRcptReply(multiLine)).toEqual({ signal: 'undeliverable', disabled: true });
  });
});
