/**
 * Provider verification methods.
 *
 * runVerificationMethod() is the single dispatch point over the
 * VerificationMethod union. Each branch returns the verdict signals it
 * raised, the SMTP sub-result and its debug block.
 */

import { EmailAddress, MethodDebug, ProbeOutcome, Provider, SmtpDetails, CatchAllStatus } from '../types/email';
import { ResolvedProxy, SmtpMethodConfig, VerificationContext } from '../types/proxy';
import { resolveProxy } from '../proxy/proxyRouter';
import { describeConnection } from '../proxy/connectionDescriptor';
import { probeMailbox } from '../smtp/smtpProbe';
import { TransportOpener } from '../smtp/transport';
import { formatReply } from '../smtp/replyClassifier';
import { catchAllProbeAddress, interpretCatchAllProbe, shouldCheckCatchAll } from '../validators/catchAllValidator';
import { Tags, VerdictSignal } from '../validators/resultClassifier';
import { PublicIpProvider } from '../utils/publicIp';
import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import { metrics } from '../utils/metrics';

const log = logger.child('methods');

/**
 * Answer of a provider-specific channel (HTTP API, headless browser)
 */
export interface ProviderCheckResult {
  /** null when the channel could not tell */
  deliverable: boolean | null;
  disabled?: boolean;
  detail?: string;
}

/**
 * Pluggable implementation behind the `api` and `headless` methods
 */
export interface ProviderCheck {
  check(email: EmailAddress, provider: Provider): Promise<ProviderCheckResult>;
}

export interface MethodDependencies {
  publicIp: PublicIpProvider;
  /** Replaces the real TCP/SOCKS5 transport */
  openTransport?: TransportOpener;
  providerChecks?: {
    api?: ProviderCheck;
    headless?: ProviderCheck;
  };
  /** Random source for catch-all probe addresses */
  randomBytes?: (size: number) => Buffer;
}

export interface MethodRun {
  signals: VerdictSignal[];
  smtp: SmtpDetails | null;
  debug: MethodDebug;
}

export function formatSeconds(ms: number): string {
  return `${Number((ms / 1000).toFixed(1))}s`;
}

/**
 * Verdict signals raised by one primary probe outcome
 */
export function signalsForOutcome(outcome: ProbeOutcome): VerdictSignal[] {
  const reply = outcome.replyCode !== undefined
    ? formatReply({ code: outcome.replyCode, lines: outcome.replyText ? [outcome.replyText] : [] })
    : undefined;

  switch (outcome.signal) {
    case 'deliverable':
      return [];
    case 'undeliverable':
      return [{ tier: 'invalid', tag: outcome.disabled ? Tags.ACCOUNT_DISABLED : Tags.NOT_DELIVERABLE }];
    case 'fullMailbox':
      return [{ tier: 'risky', tag: Tags.FULL_INBOX }];
    case 'temporaryFailure':
      return [{ tier: 'unknown', tag: `temporary SMTP failure: ${reply ?? 'no reply text'}` }];
    case 'connectFailure':
      if (outcome.connectKind === 'timeout') {
        return [{ tier: 'unknown', tag: `SMTP connection timed out after ${formatSeconds(outcome.timeoutMs ?? 0)}` }];
      }
      if (outcome.connectKind === 'socks5_handshake' || outcome.connectKind === 'socks5_reply') {
        return [{ tier: 'unknown', tag: outcome.detail ?? 'SOCKS5 proxy connection failed' }];
      }
      return [{ tier: 'unknown', tag: outcome.detail ? `${Tags.CANNOT_CONNECT} (${outcome.detail})` : Tags.CANNOT_CONNECT }];
    case 'protocolError':
      if (outcome.stage === 'rcpt_to' && reply) {
        return [{ tier: 'unknown', tag: `SMTP server refused to evaluate the recipient: ${reply}` }];
      }
      return [{ tier: 'unknown', tag: `SMTP protocol error: ${outcome.detail ?? reply ?? 'unexpected reply'}` }];
  }
}

function smtpDetails(outcome: ProbeOutcome, catchAll: CatchAllStatus): SmtpDetails {
  return {
    canConnectSmtp: outcome.signal !== 'connectFailure',
    isDeliverable: outcome.signal === 'deliverable',
    isDisabled: outcome.disabled === true,
    hasFullInbox: outcome.signal === 'fullMailbox',
    catchAll,
    error: outcome.detail,
  };
}

function baseDebug(context: VerificationContext, connection: string, startedAt: number, trace: string[]): MethodDebug {
  return {
    provider: context.provider,
    method: context.method.kind,
    mxHost: context.mxHost,
    connection,
    durationMs: Date.now() - startedAt,
    trace,
  };
}

async function probeWith(
  context: VerificationContext,
  smtp: SmtpMethodConfig,
  recipient: string,
  resolved: ResolvedProxy | undefined,
  deps: MethodDependencies
): Promise<ProbeOutcome> {
  return probeMailbox({
    mxHost: context.mxHost,
    recipient,
    smtp,
    proxy: resolved?.proxy,
    openTransport: deps.openTransport,
  });
}

async function runCatchAllProbe(
  context: VerificationContext,
  smtp: SmtpMethodConfig,
  resolved: ResolvedProxy | undefined,
  deps: MethodDependencies,
  trace: string[]
): Promise<CatchAllStatus> {
  const recipient = catchAllProbeAddress(context.email, deps.randomBytes);
  trace.push(`catch-all probe for ${recipient} via ${resolved ? `${resolved.source}:${resolved.id}` : 'direct'}`);

  try {
    const outcome = await probeWith(context, smtp, recipient, resolved, deps);
    metrics.recordProbe(outcome.signal, resolved?.source ?? 'direct', true);
    trace.push(...outcome.transcript.map((line) => `[catch-all] ${line}`));
    return interpretCatchAllProbe(outcome);
  } catch (error) {
    log.debug('Catch-all probe failed, result indeterminate', { error: errorMessage(error) });
    trace.push(`[catch-all] failed: ${errorMessage(error)}`);
    return 'indeterminate';
  }
}

async function runSmtpMethod(
  context: VerificationContext,
  smtp: SmtpMethodConfig,
  deps: MethodDependencies
): Promise<MethodRun> {
  const startedAt = Date.now();
  // Resolved once: the catch-all session must leave through the same proxy
  const resolved = resolveProxy(context);
  const connection = await describeConnection(resolved?.proxy, deps.publicIp);
  const trace: string[] = [
    `proxy: ${resolved ? `${resolved.id} (${resolved.source})` : 'none'}`,
  ];

  const outcome = await probeWith(context, smtp, context.email.address, resolved, deps);
  metrics.recordProbe(outcome.signal, resolved?.source ?? 'direct');
  trace.push(...outcome.transcript, `outcome: ${outcome.signal} at ${outcome.stage}`);

  const signals = signalsForOutcome(outcome);

  let catchAll: CatchAllStatus = 'not_checked';
  if (shouldCheckCatchAll(outcome, context.method)) {
    catchAll = await runCatchAllProbe(context, smtp, resolved, deps, trace);
    if (catchAll === 'yes') {
      signals.push({ tier: 'risky', tag: Tags.CATCH_ALL });
    }
  }

  return {
    signals,
    smtp: smtpDetails(outcome, catchAll),
    debug: {
      ...baseDebug(context, connection, startedAt, trace),
      proxyId: resolved?.id,
      proxySource: resolved?.source,
    },
  };
}

async function runProviderCheck(
  context: VerificationContext,
  kind: 'api' | 'headless',
  deps: MethodDependencies
): Promise<MethodRun> {
  const startedAt = Date.now();
  const connection = await describeConnection(undefined, deps.publicIp);
  const check = deps.providerChecks?.[kind];
  const trace: string[] = [];

  if (!check) {
    trace.push(`no ${kind} check registered for ${context.provider}`);
    return {
      signals: [{ tier: 'unknown', tag: Tags.PROVIDER_CHECK_UNAVAILABLE }],
      smtp: null,
      debug: baseDebug(context, connection, startedAt, trace),
    };
  }

  let result: ProviderCheckResult;
  try {
    result = await check.check(context.email, context.provider);
  } catch (error) {
    trace.push(`${kind} check failed: ${errorMessage(error)}`);
    return {
      signals: [{ tier: 'unknown', tag: `provider-specific check failed: ${errorMessage(error)}` }],
      smtp: null,
      debug: baseDebug(context, connection, startedAt, trace),
    };
  }

  trace.push(`${kind} check: deliverable=${String(result.deliverable)}${result.detail ? ` (${result.detail})` : ''}`);

  const signals: VerdictSignal[] = [];
  if (result.deliverable === false) {
    signals.push({ tier: 'invalid', tag: result.disabled ? Tags.ACCOUNT_DISABLED : Tags.NOT_DELIVERABLE });
  } else if (result.deliverable === null) {
    signals.push({
      tier: 'unknown',
      tag: result.detail ? `provider-specific check inconclusive: ${result.detail}` : 'provider-specific check inconclusive',
    });
  }

  return {
    signals,
    smtp: {
      canConnectSmtp: false,
      isDeliverable: result.deliverable === true,
      isDisabled: result.disabled === true,
      hasFullInbox: false,
      catchAll: 'not_checked',
      error: result.detail,
    },
    debug: baseDebug(context, connection, startedAt, trace),
  };
}

/**
 * Run the method configured for the context's provider
 */
export async function runVerificationMethod(
  context: VerificationContext,
  deps: MethodDependencies
): Promise<MethodRun> {
  const { method } = context;

  switch (method.kind) {
    case 'skip': {
      const startedAt = Date.now();
      const connection = await describeConnection(undefined, deps.publicIp);
      const tag = `SMTP verification skipped for provider ${context.provider}`;
      return {
        signals: [{ tier: 'unknown', tag }],
        smtp: null,
        debug: baseDebug(context, connection, startedAt, [tag]),
      };
    }
    case 'api':
    case 'headless':
      return runProviderCheck(context, method.kind, deps);
    case 'smtp':
      return runSmtpMethod(context, method.config, deps);
  }
}
