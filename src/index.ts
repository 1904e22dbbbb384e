export * from './types/email';
export * from './types/proxy';
export {
  AddressSyntaxError,
  ConfigError,
  ConnectError,
  DnsLookupError,
  SmtpProtocolError,
} from './utils/errors';
export type { DnsErrorKind } from './utils/errors';

export {
  createVerifierConfig,
  loadVerifierConfigFromEnv,
  parseProxyPool,
  smtpMethod,
  DEFAULT_SMTP_METHOD_CONFIG,
} from './config/verifierConfig';
export type { VerifierConfigInput } from './config/verifierConfig';

export {
  verifyEmail,
  verifyEmailBatch,
  createDefaultDependencies,
} from './services/emailVerificationService';
export type { VerifyDependencies } from './services/emailVerificationService';
export { runVerificationMethod } from './services/verificationMethods';
export type { MethodDependencies, ProviderCheck, ProviderCheckResult } from './services/verificationMethods';

export { parseAddress, validateSyntax, suggestDomain } from './validators/syntaxValidator';
export { classifyProvider } from './validators/providers';
export { lookupMx, systemMxResolver } from './validators/dnsValidator';
export type { MxResolver } from './validators/dnsValidator';
export { classifyResult } from './validators/resultClassifier';

export { ProxyRotator } from './proxy/proxyRotator';
export { resolveProxy, DEFAULT_PROXY_ID } from './proxy/proxyRouter';
export { describeConnection, describeProxy } from './proxy/connectionDescriptor';

export { connectViaSocks5 } from './smtp/socksClient';
export { SocksError, describeSocksError } from './smtp/socksErrors';
export { openTransport } from './smtp/transport';
export { probeMailbox } from './smtp/smtpProbe';

export { PublicIpCache, publicIpCache } from './utils/publicIp';
export type { PublicIpProvider } from './utils/publicIp';
