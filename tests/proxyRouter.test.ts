/**
 * Tests for proxy resolution precedence
 */

import { createVerifierConfig, smtpMethod } from '../src/config/verifierConfig';
import { resolveProxy } from '../src/proxy/proxyRouter';
import { Provider } from '../src/types/email';
import { VerificationContext, VerificationMethod, VerifierConfig } from '../src/types/proxy';

const POOL = {
  default: { host: 'default.proxy.test', port: 1080 },
  p1: { host: 'p1.proxy.test', port: 1081 },
  p2: { host: 'p2.proxy.test', port: 1082 },
  gmailOnly: { host: 'gmail.proxy.test', port: 1083, username: 'user', password: 'test-secret' },
};

function context(config: VerifierConfig, method: VerificationMethod = smtpMethod()): VerificationContext {
  return {
    email: { address: 'someone@example.com', localPart: 'someone', domain: 'example.com' },
    mxHost: 'mx.example.com',
    provider: Provider.GMAIL,
    method,
    config,
  };
}

describe('resolveProxy', () => {
  it('should prefer the provider static proxy over rotation', () => {
    const config = createVerifierConfig({ proxies: POOL, rotation: { enabled: true } });
    const method = smtpMethod({ proxyId: 'gmailOnly' });

    const resolved = resolveProxy(context(config, method));

    expect(resolved?.id).toBe('gmailOnly');
    expect(resolved?.source).toBe('provider');
    expect(config.rotator?.ticketsIssued).toBe(0);
  });

  it('should use rotation when no static proxy is assigned', () => {
    const config = createVerifierConfig({ proxies: POOL, rotation: { enabled: true } });

    const ids = [1, 2, 3, 4].map(() => resolveProxy(context(config)));

    expect(ids.map((resolved) => resolved?.id)).toEqual(['default', 'p1', 'p2', 'gmailOnly']);
    expect(ids.every((resolved) => resolved?.source === 'rotation')).toBe(true);
  });

  it('should fall back to the "default" entry when rotation is disabled', () => {
    const config = createVerifierConfig({ proxies: POOL });

    const resolved = resolveProxy(context(config));

    expect(resolved).toEqual({ id: 'default', proxy: POOL.default, source: 'default' });
  });

  it('should return undefined without a default entry', () => {
    const config = createVerifierConfig({ proxies: { p1: POOL.p1 } });

    expect(resolveProxy(context(config))).toBeUndefined();
  });

  it('should return undefined for an empty pool even with rotation enabled', () => {
    const config = createVerifierConfig({ rotation: { enabled: true } });

    expect(resolveProxy(context(config))).toBeUndefined();
  });

  it('should ignore proxy settings for non-SMTP methods and still honour the pool', () => {
    const config = createVerifierConfig({ proxies: POOL });

    expect(resolveProxy(context(config, { kind: 'skip' }))?.source).toBe('default');
  });

  it('should share rotation state between contexts built from one config', () => {
    const config = createVerifierConfig({ proxies: { p1: POOL.p1, p2: POOL.p2 }, rotation: { enabled: true } });

    const first = resolveProxy(context(config));
    const second = resolveProxy({ ...context(config), provider: Provider.YAHOO });

    expect([first?.id, second?.id]).toEqual(['p1', 'p2']);
  });
});
