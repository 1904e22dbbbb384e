/**
 * Opens the byte stream an SMTP session runs over: either a direct TCP
 * connection to the MX host or a SOCKS5 tunnel through a proxy.
 *
 * The socket is handed over paused; the SMTP session resumes it once its
 * listeners are attached.
 */

import { Socket, connect as netConnect } from 'net';
import { ProxyDescriptor } from '../types/proxy';
import { ConnectError, errnoCode } from '../utils/errors';
import { logger } from '../utils/logger';
import { connectViaSocks5 } from './socksClient';
import { SocksError, describeSocksError } from './socksErrors';

const log = logger.child('smtp-transport');

export interface TransportOptions {
  host: string;
  port: number;
  proxy?: Readonly<ProxyDescriptor>;
  connectTimeoutMs: number;
}

export type TransportOpener = (options: TransportOptions) => Promise<Socket>;

function connectDirect(host: string, port: number, timeoutMs: number): Promise<Socket> {
  return new Promise<Socket>((resolve, reject) => {
    const socket = netConnect({ host, port });

    const cleanup = (): void => {
      clearTimeout(timer);
      socket.off('connect', onConnect);
      socket.off('error', onError);
    };

    const timer = setTimeout(() => {
      cleanup();
      socket.destroy();
      reject(new ConnectError('timeout', 'connect', `TCP connect to ${host}:${port} timed out`, timeoutMs));
    }, timeoutMs);

    const onConnect = (): void => {
      cleanup();
      socket.pause();
      resolve(socket);
    };

    const onError = (error: Error): void => {
      cleanup();
      socket.destroy();
      const code = errnoCode(error);
      const detail = code ? `${code}: ${error.message}` : error.message;
      reject(new ConnectError('tcp', 'connect', `TCP connect to ${host}:${port} failed (${detail})`, undefined, {
        cause: error,
      }));
    };

    socket.once('connect', onConnect);
    socket.once('error', onError);
  });
}

/**
 * Map a SOCKS5 failure onto the connect-failure taxonomy
 */
export function socksFailureToConnectError(error: SocksError): ConnectError {
  const detail = `SOCKS5 proxy connection failed: ${describeSocksError(error)}`;
  const stage = `socks5_${error.stage}`;

  if (error.code === 'timeout') {
    return new ConnectError('timeout', stage, detail, error.details.timeoutMs, { cause: error });
  }
  if (error.code === 'reply') {
    return new ConnectError('socks5_reply', stage, detail, undefined, { cause: error });
  }
  return new ConnectError('socks5_handshake', stage, detail, undefined, { cause: error });
}

/**
 * Connect to host:port, through the proxy when one is given.
 * @throws ConnectError
 */
export async function openTransport(options: TransportOptions): Promise<Socket> {
  const { host, port, proxy, connectTimeoutMs } = options;

  if (!proxy) {
    log.debug(`Connecting directly to ${host}:${port}`);
    return connectDirect(host, port, connectTimeoutMs);
  }

  const timeoutMs = proxy.timeoutMs ?? connectTimeoutMs;
  log.debug(`Connecting to ${host}:${port} via SOCKS5 proxy ${proxy.host}:${proxy.port}`);

  try {
    const { socket, boundAddress } = await connectViaSocks5({
      proxy,
      destination: { host, port },
      timeoutMs,
    });
    log.debug('SOCKS5 tunnel established', { bound: `${boundAddress.host}:${boundAddress.port}` });
    return socket;
  } catch (error) {
    if (error instanceof SocksError) {
      throw socksFailureToConnectError(error);
    }
    throw error;
  }
}
