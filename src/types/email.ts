/**
 * Core types for email verification.
 * Shared by the validators, the SMTP layer and the orchestration service.
 */

/**
 * Final deliverability verdict
 */
export enum Verdict {
  SAFE = 'safe',
  RISKY = 'risky',
  INVALID = 'invalid',
  UNKNOWN = 'unknown',
}

/**
 * Mail provider category, derived from the MX hostname
 */
export enum Provider {
  GMAIL = 'gmail',
  HOTMAIL_B2B = 'hotmail_b2b',
  HOTMAIL_B2C = 'hotmail_b2c',
  YAHOO = 'yahoo',
  MIMECAST = 'mimecast',
  PROOFPOINT = 'proofpoint',
  EVERYTHING_ELSE = 'everything_else',
}

/**
 * A syntactically valid address. Frozen once parsed.
 */
export interface EmailAddress {
  readonly address: string;
  readonly localPart: string;
  /** Lowercased */
  readonly domain: string;
}

/**
 * MX record information
 */
export interface MxRecord {
  exchange: string;
  priority: number;
}

/**
 * Stage of the SMTP dialogue a probe reached
 */
export type ProbeStage = 'connect' | 'greeting' | 'ehlo' | 'mail_from' | 'rcpt_to';

/**
 * What a single RCPT TO probe tells us about the mailbox
 */
export type ProbeSignal =
  | 'deliverable'
  | 'undeliverable'
  | 'fullMailbox'
  | 'temporaryFailure'
  | 'connectFailure'
  | 'protocolError';

/**
 * Why a stream to the SMTP server could not be obtained or kept
 */
export type ConnectFailureKind = 'tcp' | 'socks5_handshake' | 'socks5_reply' | 'timeout';

/**
 * Parsed SMTP reply (possibly assembled from several continuation lines)
 */
export interface SmtpReply {
  code: number;
  /** Enhanced status code (RFC 3463) when the server sent one, e.g. "5.1.1" */
  enhancedCode?: string;
  /** Text of every line, without the code prefix */
  lines: string[];
}

export interface ProbeOutcome {
  stage: ProbeStage;
  signal: ProbeSignal;
  replyCode?: number;
  enhancedCode?: string;
  replyText?: string;
  /** Set on undeliverable outcomes whose reply says the account is disabled */
  disabled?: boolean;
  /** Human-readable cause for failures that are not plain RCPT verdicts */
  detail?: string;
  /** Set on connectFailure outcomes */
  connectKind?: ConnectFailureKind;
  /** Bound that expired, for timeouts */
  timeoutMs?: number;
  /** Commands and replies exchanged, one entry per line */
  transcript: string[];
}

/**
 * Result of the catch-all heuristic
 */
export type CatchAllStatus = 'yes' | 'no' | 'indeterminate' | 'not_checked';

export interface SyntaxDetails {
  address: string | null;
  localPart: string;
  domain: string;
  isValidSyntax: boolean;
  /** Well-known provider domain the input domain is probably a typo of */
  suggestion?: string;
}

export interface MxDetails {
  acceptsMail: boolean;
  records: MxRecord[];
  error?: string;
}

export interface MiscDetails {
  isDisposable: boolean;
  isRoleAccount: boolean;
}

export interface SmtpDetails {
  canConnectSmtp: boolean;
  isDeliverable: boolean;
  isDisabled: boolean;
  hasFullInbox: boolean;
  catchAll: CatchAllStatus;
  error?: string;
}

/**
 * Debug block for one verification method run
 */
export interface MethodDebug {
  provider: Provider;
  method: 'skip' | 'api' | 'headless' | 'smtp';
  mxHost: string;
  /** proxy:<host>:<port>[@user:pass] or local:<ip|hostname> */
  connection: string;
  proxyId?: string;
  proxySource?: 'provider' | 'rotation' | 'default';
  durationMs: number;
  trace: string[];
}

export interface DebugDetails {
  startedAt: Date;
  finishedAt: Date;
  durationMs: number;
  methods: MethodDebug[];
}

/**
 * Complete verification result
 */
export interface VerificationResult {
  input: string;
  verdict: Verdict;
  reason: string;
  syntax: SyntaxDetails;
  mx: MxDetails | null;
  misc: MiscDetails | null;
  smtp: SmtpDetails | null;
  debug: DebugDetails;
}
