/**
 * Environment configuration loader with validation.
 * All configuration comes from environment variables with sensible defaults.
 * Fails fast on critical misconfigurations.
 *
 * This module only reads raw values. The immutable VerifierConfig (proxy pool,
 * per-provider methods, shared rotator) is assembled in ./verifierConfig.
 */

import dotenv from 'dotenv';
import { join } from 'path';
import { Provider } from '../types/email';
import { logger } from '../utils/logger';
import { ConfigError } from '../utils/errors';

// Load .env file from root directory
dotenv.config({ path: join(__dirname, '../../.env') });

export type MethodKind = 'smtp' | 'skip' | 'api' | 'headless';

export interface ProviderEnvSettings {
  method: MethodKind;
  proxyId?: string;
  checkCatchAll: boolean;
}

export interface Config {
  // Server
  port: number;
  nodeEnv: string;

  redis: {
    enabled: boolean;                   // Use Redis for the MX cache (in-memory otherwise)
    url: string;
    keyPrefix: string;
  };

  mxCacheTtlSeconds: number;

  smtp: {
    port: number;                       // Port probed on the MX host
    helloName: string;                  // Name sent in EHLO/HELO
    fromEmail: string;                  // Address sent in MAIL FROM

    // Per-stage timeouts
    connectTimeoutMs: number;           // TCP connect, and each SOCKS5 handshake step
    greetingTimeoutMs: number;          // Waiting for the 220 banner
    ehloTimeoutMs: number;
    mailTimeoutMs: number;
    rcptTimeoutMs: number;
    quitTimeoutMs: number;              // Bounded wait for the 221 after QUIT
  };

  proxy: {
    poolJson: string;                   // JSON object ProxyId -> descriptor
    rotationEnabled: boolean;
    rotationStrategy: string;
  };

  providers: Record<Provider, ProviderEnvSettings>;
}

/**
 * Parse environment variable as integer with validation
 * @throws Error if value is invalid or out of range
 */
function getEnvInt(
  key: string,
  defaultValue: number,
  options: { min?: number; max?: number } = {}
): number {
  const value = process.env[key];

  if (!value) {
    return defaultValue;
  }

  const parsed = parseInt(value, 10);

  if (isNaN(parsed)) {
    throw new Error(`Environment variable ${key}="${value}" is not a valid integer`);
  }

  if (options.min !== undefined && parsed < options.min) {
    throw new Error(`Environment variable ${key}=${parsed} is below minimum ${options.min}`);
  }

  if (options.max !== undefined && parsed > options.max) {
    throw new Error(`Environment variable ${key}=${parsed} exceeds maximum ${options.max}`);
  }

  return parsed;
}

/**
 * Get environment variable as string with fallback default
 */
function getEnvString(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

function getEnvBool(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (!value) return defaultValue;
  return value.toLowerCase() === 'true';
}

function getEnvMethod(key: string): MethodKind {
  const value = (process.env[key] || 'smtp').toLowerCase();
  switch (value) {
    case 'smtp':
    case 'skip':
    case 'api':
    case 'headless':
      return value;
    default:
      throw new Error(`Environment variable ${key}="${value}" must be one of smtp, skip, api, headless`);
  }
}

/**
 * Env prefix per provider, e.g. GMAIL_VERIF_METHOD / GMAIL_PROXY
 */
export const PROVIDER_ENV_PREFIX: Record<Provider, string> = {
  [Provider.GMAIL]: 'GMAIL',
  [Provider.HOTMAIL_B2B]: 'HOTMAILB2B',
  [Provider.HOTMAIL_B2C]: 'HOTMAILB2C',
  [Provider.YAHOO]: 'YAHOO',
  [Provider.MIMECAST]: 'MIMECAST',
  [Provider.PROOFPOINT]: 'PROOFPOINT',
  [Provider.EVERYTHING_ELSE]: 'EVERYTHING_ELSE',
};

// Large consumer providers are not catch-all; a second probe only costs reputation.
const CATCH_ALL_DEFAULTS: Record<Provider, boolean> = {
  [Provider.GMAIL]: false,
  [Provider.HOTMAIL_B2B]: false,
  [Provider.HOTMAIL_B2C]: false,
  [Provider.YAHOO]: false,
  [Provider.MIMECAST]: true,
  [Provider.PROOFPOINT]: true,
  [Provider.EVERYTHING_ELSE]: true,
};

function loadProviderSettings(provider: Provider): ProviderEnvSettings {
  const prefix = PROVIDER_ENV_PREFIX[provider];
  const proxyId = process.env[`${prefix}_PROXY`]?.trim();
  return {
    method: getEnvMethod(`${prefix}_VERIF_METHOD`),
    proxyId: proxyId ? proxyId : undefined,
    checkCatchAll: getEnvBool(`${prefix}_CHECK_CATCH_ALL`, CATCH_ALL_DEFAULTS[provider]),
  };
}

/**
 * Read the whole configuration from the current environment
 */
export function loadConfig(): Config {
  return {
    port: getEnvInt('PORT', 4000, { min: 1, max: 65535 }),
    nodeEnv: getEnvString('NODE_ENV', 'development'),

    redis: {
      enabled: getEnvBool('REDIS_ENABLED', false),
      url: getEnvString('REDIS_URL', 'redis://localhost:6379'),
      keyPrefix: getEnvString('REDIS_KEY_PREFIX', 'mailprobe:'),
    },

    mxCacheTtlSeconds: getEnvInt('MX_CACHE_TTL_SECONDS', 600, { min: 0, max: 86400 }),

    smtp: {
      port: getEnvInt('SMTP_PORT', 25, { min: 1, max: 65535 }),
      helloName: getEnvString('SMTP_HELLO_NAME', 'localhost'),
      fromEmail: getEnvString('SMTP_FROM_EMAIL', 'user@example.org'),
      connectTimeoutMs: getEnvInt('SMTP_CONNECT_TIMEOUT_MS', 8000, { min: 100, max: 60000 }),
      greetingTimeoutMs: getEnvInt('SMTP_GREETING_TIMEOUT_MS', 10000, { min: 100, max: 60000 }),
      ehloTimeoutMs: getEnvInt('SMTP_EHLO_TIMEOUT_MS', 5000, { min: 100, max: 60000 }),
      mailTimeoutMs: getEnvInt('SMTP_MAIL_TIMEOUT_MS', 5000, { min: 100, max: 60000 }),
      rcptTimeoutMs: getEnvInt('SMTP_RCPT_TIMEOUT_MS', 10000, { min: 100, max: 60000 }),
      quitTimeoutMs: getEnvInt('SMTP_QUIT_TIMEOUT_MS', 1000, { min: 0, max: 10000 }),
    },

    proxy: {
      poolJson: getEnvString('PROXIES', ''),
      rotationEnabled: getEnvBool('PROXY_ROTATION_ENABLED', false),
      rotationStrategy: getEnvString('PROXY_ROTATION_STRATEGY', 'round_robin'),
    },

    providers: {
      [Provider.GMAIL]: loadProviderSettings(Provider.GMAIL),
      [Provider.HOTMAIL_B2B]: loadProviderSettings(Provider.HOTMAIL_B2B),
      [Provider.HOTMAIL_B2C]: loadProviderSettings(Provider.HOTMAIL_B2C),
      [Provider.YAHOO]: loadProviderSettings(Provider.YAHOO),
      [Provider.MIMECAST]: loadProviderSettings(Provider.MIMECAST),
      [Provider.PROOFPOINT]: loadProviderSettings(Provider.PROOFPOINT),
      [Provider.EVERYTHING_ELSE]: loadProviderSettings(Provider.EVERYTHING_ELSE),
    },
  };
}

/**
 * Load and validate configuration from environment
 */
export const config: Config = loadConfig();

/**
 * Validate critical configuration values at startup
 * Throws if configuration is invalid
 */
export function validateConfig(cfg: Config = config): void {
  const errors: string[] = [];

  if (!cfg.smtp.helloName) {
    errors.push('SMTP_HELLO_NAME must not be empty');
  }

  if (!cfg.smtp.fromEmail || !cfg.smtp.fromEmail.includes('@')) {
    errors.push(`SMTP_FROM_EMAIL must be a valid email address (got: "${cfg.smtp.fromEmail}")`);
  }

  if (cfg.proxy.rotationStrategy !== 'round_robin' && cfg.proxy.rotationStrategy !== 'random') {
    errors.push(`PROXY_ROTATION_STRATEGY must be round_robin or random (got: "${cfg.proxy.rotationStrategy}")`);
  }

  if (cfg.proxy.rotationEnabled && !cfg.proxy.poolJson) {
    logger.warn('PROXY_ROTATION_ENABLED=true but PROXIES is empty; connections will be direct');
  }

  if (cfg.smtp.helloName === 'localhost') {
    logger.warn('SMTP_HELLO_NAME is "localhost"; many MX hosts reject such EHLO names');
  }

  if (errors.length > 0) {
    throw new ConfigError(errors);
  }
}
