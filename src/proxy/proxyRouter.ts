/**
 * Per-request proxy resolution.
 *
 * Precedence is fixed:
 *   1. static proxy assigned to the provider's SMTP method
 *   2. pool rotation (when enabled and the shared rotator exists)
 *   3. the pool entry named "default"
 *   4. none (direct connection)
 */

import { ProxyId, ProxyPool, ResolvedProxy, VerificationContext } from '../types/proxy';
import { logger } from '../utils/logger';

const log = logger.child('proxy-router');

export const DEFAULT_PROXY_ID = 'default';

function lookup(pool: ProxyPool, id: ProxyId, source: ResolvedProxy['source']): ResolvedProxy | undefined {
  const proxy = pool.get(id);
  return proxy ? { id, proxy, source } : undefined;
}

export function resolveProxy(context: VerificationContext): ResolvedProxy | undefined {
  const { config, method, provider } = context;
  const pool = config.proxies;

  if (method.kind === 'smtp' && method.config.proxyId) {
    const assigned = lookup(pool, method.config.proxyId, 'provider');
    if (assigned) {
      return assigned;
    }
    log.warn(`Proxy "${method.config.proxyId}" assigned to ${provider} is not in the pool; falling back`);
  }

  if (config.rotation.enabled && config.rotator) {
    const id = config.rotator.next();
    if (id !== undefined) {
      const rotated = lookup(pool, id, 'rotation');
      if (rotated) {
        return rotated;
      }
      log.warn(`Rotator returned unknown proxy "${id}"`);
    }
  }

  return lookup(pool, DEFAULT_PROXY_ID, 'default');
}
