/**
 * Builds the immutable VerifierConfig shared by every verification call.
 *
 * The proxy rotator is created here, once per configuration load, and carried
 * by reference inside the frozen config object.
 */

import { z } from 'zod';
import { Provider } from '../types/email';
import {
  ProviderMethods,
  ProxyDescriptor,
  ProxyId,
  ProxyPool,
  ProxyPoolPolicy,
  SmtpMethodConfig,
  SmtpTimeouts,
  VerificationMethod,
  VerifierConfig,
} from '../types/proxy';
import { ProxyRotator } from '../proxy/proxyRotator';
import { Config, ProviderEnvSettings, config as envConfig } from './env';
import { ConfigError } from '../utils/errors';
import { logger } from '../utils/logger';

const log = logger.child('verifier-config');

const proxyDescriptorSchema = z.object({
  host: z.string().trim().min(1, 'host is required'),
  port: z.coerce.number().int().min(1).max(65535),
  username: z.string().min(1).optional(),
  password: z.string().optional(),
  timeoutMs: z.coerce.number().int().positive().optional(),
});

const proxyPoolSchema = z.record(z.string().min(1), proxyDescriptorSchema);

export const DEFAULT_SMTP_METHOD_CONFIG: Readonly<SmtpMethodConfig> = Object.freeze({
  port: 25,
  helloName: 'localhost',
  fromEmail: 'user@example.org',
  checkCatchAll: true,
  timeouts: Object.freeze({
    connectMs: 8000,
    greetingMs: 10000,
    ehloMs: 5000,
    mailFromMs: 5000,
    rcptToMs: 10000,
    quitMs: 1000,
  }),
});

/**
 * SMTP method with defaults filled in
 */
export function smtpMethod(
  overrides: Partial<Omit<SmtpMethodConfig, 'timeouts'>> & { timeouts?: Partial<SmtpTimeouts> } = {}
): VerificationMethod {
  return {
    kind: 'smtp',
    config: {
      ...DEFAULT_SMTP_METHOD_CONFIG,
      ...overrides,
      timeouts: { ...DEFAULT_SMTP_METHOD_CONFIG.timeouts, ...overrides.timeouts },
    },
  };
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.length > 0 ? `PROXIES.${issue.path.join('.')}` : 'PROXIES';
    return `${path}: ${issue.message}`;
  });
}

/**
 * Parse the PROXIES JSON object (ProxyId -> descriptor). Empty input is an empty pool.
 */
export function parseProxyPool(json: string): Map<ProxyId, ProxyDescriptor> {
  const pool = new Map<ProxyId, ProxyDescriptor>();
  if (!json.trim()) {
    return pool;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    throw new ConfigError([`PROXIES is not valid JSON: ${error instanceof Error ? error.message : String(error)}`]);
  }

  const parsed = proxyPoolSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(formatIssues(parsed.error));
  }

  for (const [id, descriptor] of Object.entries(parsed.data)) {
    if (descriptor.username && descriptor.password === undefined) {
      log.warn(`Proxy "${id}" has a username but no password; credentials will not be offered`);
    }
    pool.set(id, descriptor);
  }

  return pool;
}

export interface VerifierConfigInput {
  /** Providers left out use the default SMTP method */
  methods?: Partial<Record<Provider, VerificationMethod>>;
  proxies?: ReadonlyMap<ProxyId, ProxyDescriptor> | Readonly<Record<ProxyId, ProxyDescriptor>>;
  rotation?: Partial<ProxyPoolPolicy>;
  /** Random source for the random rotation strategy */
  random?: () => number;
}

function isPoolMap(
  proxies: NonNullable<VerifierConfigInput['proxies']>
): proxies is ReadonlyMap<ProxyId, ProxyDescriptor> {
  return proxies instanceof Map;
}

function toPool(proxies: VerifierConfigInput['proxies']): ProxyPool {
  const pool = new Map<ProxyId, Readonly<ProxyDescriptor>>();
  if (!proxies) {
    return pool;
  }
  const entries = isPoolMap(proxies) ? Array.from(proxies.entries()) : Object.entries(proxies);
  for (const [id, descriptor] of entries) {
    pool.set(id, Object.freeze({ ...descriptor }));
  }
  return pool;
}

function freezeMethod(method: VerificationMethod): VerificationMethod {
  if (method.kind !== 'smtp') {
    return Object.freeze({ ...method });
  }
  return Object.freeze({
    kind: 'smtp',
    config: Object.freeze({ ...method.config, timeouts: Object.freeze({ ...method.config.timeouts }) }),
  });
}

function byProvider(pick: (provider: Provider) => VerificationMethod): Record<Provider, VerificationMethod> {
  return {
    [Provider.GMAIL]: pick(Provider.GMAIL),
    [Provider.HOTMAIL_B2B]: pick(Provider.HOTMAIL_B2B),
    [Provider.HOTMAIL_B2C]: pick(Provider.HOTMAIL_B2C),
    [Provider.YAHOO]: pick(Provider.YAHOO),
    [Provider.MIMECAST]: pick(Provider.MIMECAST),
    [Provider.PROOFPOINT]: pick(Provider.PROOFPOINT),
    [Provider.EVERYTHING_ELSE]: pick(Provider.EVERYTHING_ELSE),
  };
}

/**
 * Assemble and freeze a VerifierConfig.
 * @throws ConfigError when a provider references a proxy id that is not in the pool
 */
export function createVerifierConfig(input: VerifierConfigInput = {}): VerifierConfig {
  const proxies = toPool(input.proxies);
  const rotation: ProxyPoolPolicy = {
    enabled: input.rotation?.enabled ?? false,
    strategy: input.rotation?.strategy ?? 'round_robin',
  };

  const problems: string[] = [];
  const methods = byProvider((provider) => {
    const method = input.methods?.[provider] ?? smtpMethod();
    if (method.kind === 'smtp' && method.config.proxyId && !proxies.has(method.config.proxyId)) {
      problems.push(`Provider ${provider} references unknown proxy "${method.config.proxyId}"`);
    }
    return freezeMethod(method);
  });

  if (problems.length > 0) {
    throw new ConfigError(problems);
  }

  const rotator = rotation.enabled ? new ProxyRotator(Array.from(proxies.keys()), rotation.strategy, input.random) : null;

  if (rotation.enabled && proxies.size === 0) {
    log.warn('Proxy rotation is enabled but the pool is empty; connections will be direct');
  }

  return Object.freeze({
    methods: Object.freeze(methods) satisfies ProviderMethods,
    proxies,
    rotation: Object.freeze(rotation),
    rotator,
  });
}

function methodFromEnv(settings: ProviderEnvSettings, cfg: Config): VerificationMethod {
  switch (settings.method) {
    case 'skip':
      return { kind: 'skip' };
    case 'api':
      return { kind: 'api' };
    case 'headless':
      return { kind: 'headless' };
    case 'smtp':
      return smtpMethod({
        proxyId: settings.proxyId,
        port: cfg.smtp.port,
        helloName: cfg.smtp.helloName,
        fromEmail: cfg.smtp.fromEmail,
        checkCatchAll: settings.checkCatchAll,
        timeouts: {
          connectMs: cfg.smtp.connectTimeoutMs,
          greetingMs: cfg.smtp.greetingTimeoutMs,
          ehloMs: cfg.smtp.ehloTimeoutMs,
          mailFromMs: cfg.smtp.mailTimeoutMs,
          rcptToMs: cfg.smtp.rcptTimeoutMs,
          quitMs: cfg.smtp.quitTimeoutMs,
        },
      });
  }
}

/**
 * Build the VerifierConfig from environment settings
 */
export function loadVerifierConfigFromEnv(cfg: Config = envConfig): VerifierConfig {
  const strategy = cfg.proxy.rotationStrategy;
  if (strategy !== 'round_robin' && strategy !== 'random') {
    throw new ConfigError([`PROXY_ROTATION_STRATEGY must be round_robin or random (got: "${strategy}")`]);
  }

  const methods = byProvider((provider) => methodFromEnv(cfg.providers[provider], cfg));

  const verifierConfig = createVerifierConfig({
    methods,
    proxies: parseProxyPool(cfg.proxy.poolJson),
    rotation: { enabled: cfg.proxy.rotationEnabled, strategy },
  });

  log.info('Verifier configuration loaded', {
    proxies: verifierConfig.proxies.size,
    rotation: verifierConfig.rotation.enabled ? verifierConfig.rotation.strategy : 'disabled',
  });

  return verifierConfig;
}
