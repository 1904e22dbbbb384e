/**
 * Connection descriptor reported in every method's debug block.
 *
 *   proxy:<host>:<port>                       proxy without credentials
 *   proxy:<host>:<port>@<username>:<password> proxy with credentials
 *   local:<ip>                                direct, public IP known
 *   local:<hostname>                          direct, public IP unresolvable
 */

import { ProxyDescriptor } from '../types/proxy';
import { PublicIpProvider } from '../utils/publicIp';
import { hasProxyCredentials } from '../smtp/socksClient';

export function describeProxy(proxy: Readonly<ProxyDescriptor>): string {
  const base = `proxy:${proxy.host}:${proxy.port}`;
  if (hasProxyCredentials(proxy)) {
    return `${base}@${proxy.username}:${proxy.password}`;
  }
  return base;
}

export async function describeConnection(
  proxy: Readonly<ProxyDescriptor> | undefined,
  publicIp: PublicIpProvider
): Promise<string> {
  if (proxy) {
    return describeProxy(proxy);
  }
  return publicIp.get();
}
