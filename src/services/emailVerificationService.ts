/**
 * Email verification orchestration service.
 * Coordinates the validation layers and the provider method, then folds
 * every signal into one verdict. This is the entry point external callers use.
 */

import {
  MethodDebug,
  MiscDetails,
  MxDetails,
  SmtpDetails,
  SyntaxDetails,
  VerificationResult,
} from '../types/email';
import { VerifierConfig } from '../types/proxy';
import { loadVerifierConfigFromEnv } from '../config/verifierConfig';
import { describeSyntaxProblem, suggestDomain, validateSyntax } from '../validators/syntaxValidator';
import { lookupMx, MxResolver, systemMxResolver } from '../validators/dnsValidator';
import { validateDisposable } from '../validators/disposableValidator';
import { validateRole } from '../validators/roleValidator';
import { classifyProvider } from '../validators/providers';
import { classifyResult, SignalSet, Tags } from '../validators/resultClassifier';
import { MethodDependencies, runVerificationMethod } from './verificationMethods';
import { MxCache, mxCache } from '../utils/cache';
import { DnsLookupError } from '../utils/errors';
import { publicIpCache } from '../utils/publicIp';
import { hashEmailForLogging, logger } from '../utils/logger';
import { metrics } from '../utils/metrics';

const log = logger.child('verify');

/** Addresses in flight per batch; each may hold an SMTP connection open */
export const DEFAULT_BATCH_CONCURRENCY = 5;

export interface VerifyDependencies extends MethodDependencies {
  config: VerifierConfig;
  resolver?: MxResolver;
  /** Null or absent disables MX caching */
  mxCache?: MxCache | null;
  dnsTimeoutMs?: number;
}

/**
 * Dependencies wired to the environment configuration, the system
 * resolver and the shared caches
 */
export function createDefaultDependencies(config: VerifierConfig = loadVerifierConfigFromEnv()): VerifyDependencies {
  return {
    config,
    publicIp: publicIpCache,
    resolver: systemMxResolver,
    mxCache,
  };
}

/**
 * Verify one address.
 *
 * Steps:
 * 1. Syntax (no network activity when it fails)
 * 2. Disposable domain and role account heuristics
 * 3. MX lookup; the highest-priority host is probed
 * 4. Provider classification and the provider's verification method
 * 5. Verdict and reason from the collected signals
 */
export async function verifyEmail(input: string, deps: VerifyDependencies): Promise<VerificationResult> {
  const startedAt = new Date();
  const emailHash = hashEmailForLogging(input);
  const signals = new SignalSet();
  const methods: MethodDebug[] = [];

  const finish = (
    syntax: SyntaxDetails,
    mx: MxDetails | null,
    misc: MiscDetails | null,
    smtp: SmtpDetails | null
  ): VerificationResult => {
    const { verdict, reason } = classifyResult(signals);
    const finishedAt = new Date();
    metrics.recordVerdict(verdict);

    log.info('Verification complete', {
      emailHash,
      domain: syntax.domain || 'unknown',
      verdict,
      timeMs: finishedAt.getTime() - startedAt.getTime(),
    });

    return {
      input,
      verdict,
      reason,
      syntax,
      mx,
      misc,
      smtp,
      debug: {
        startedAt,
        finishedAt,
        durationMs: finishedAt.getTime() - startedAt.getTime(),
        methods,
      },
    };
  };

  log.debug('Starting verification', { emailHash });

  const parsed = validateSyntax(input);
  if (!parsed.syntaxValid) {
    log.debug(`Syntax rejected: ${describeSyntaxProblem(parsed.problem)}`, { emailHash });
    signals.invalid(Tags.SYNTAX_INVALID);
    return finish(
      { address: null, localPart: parsed.localPart, domain: parsed.domain, isValidSyntax: false },
      null,
      null,
      null
    );
  }

  const { email } = parsed;
  const syntax: SyntaxDetails = {
    address: email.address,
    localPart: email.localPart,
    domain: email.domain,
    isValidSyntax: true,
  };

  const disposable = validateDisposable(email.domain);
  const role = validateRole(email.localPart);
  if (disposable.disposable) {
    signals.risky(Tags.DISPOSABLE);
  }
  if (role.roleAccount) {
    signals.risky(Tags.ROLE_ACCOUNT);
  }
  const misc: MiscDetails = { isDisposable: disposable.disposable, isRoleAccount: role.roleAccount };

  let mx: MxDetails;
  try {
    const records = await lookupMx(email.domain, {
      resolver: deps.resolver,
      cache: deps.mxCache ?? null,
      timeoutMs: deps.dnsTimeoutMs,
    });
    mx = { acceptsMail: true, records };
  } catch (error) {
    if (!(error instanceof DnsLookupError)) {
      throw error;
    }

    if (error.kind === 'no_mx') {
      signals.invalid(Tags.NO_MX);
    } else {
      signals.unknown(`MX lookup failed - ${error.message}`);
    }
    syntax.suggestion = suggestDomain(email.domain);
    return finish(syntax, { acceptsMail: false, records: [], error: error.message }, misc, null);
  }

  const mxHost = mx.records[0].exchange;
  const provider = classifyProvider(mxHost);
  const method = deps.config.methods[provider];
  log.debug(`Provider ${provider} via ${method.kind}`, { emailHash, mxHost });

  const run = await runVerificationMethod(
    { email, mxHost, provider, method, config: deps.config },
    deps
  );
  methods.push(run.debug);
  for (const signal of run.signals) {
    signals.add(signal.tier, signal.tag);
  }

  if (run.smtp && !run.smtp.isDeliverable) {
    syntax.suggestion = suggestDomain(email.domain);
  }

  return finish(syntax, mx, misc, run.smtp);
}

/**
 * Verify many addresses with at most `concurrency` in flight.
 * Results come back in input order.
 */
export async function verifyEmailBatch(
  inputs: string[],
  deps: VerifyDependencies,
  concurrency: number = DEFAULT_BATCH_CONCURRENCY
): Promise<VerificationResult[]> {
  log.info(`Starting batch verification for ${inputs.length} emails`);

  const results: VerificationResult[] = new Array(inputs.length);
  let nextIndex = 0;

  const worker = async (): Promise<void> => {
    while (nextIndex < inputs.length) {
      const index = nextIndex++;
      results[index] = await verifyEmail(inputs[index], deps);
    }
  };

  const workers = Array.from({ length: Math.max(1, Math.min(concurrency, inputs.length)) }, () => worker());
  await Promise.all(workers);

  log.info(`Batch verification complete: ${results.length} emails processed`);
  return results;
}
