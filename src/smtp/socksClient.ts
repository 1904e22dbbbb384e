/**
 * Minimal SOCKS5 client (RFC 1928, username/password auth from RFC 1929)
 * over a raw net.Socket.
 *
 * Only the CONNECT command is implemented. On success the socket is returned
 * paused, with any bytes that arrived after the proxy reply pushed back onto
 * the stream, so the SMTP session starts reading from the first server byte.
 */

import { Socket, connect as netConnect, isIPv4, isIPv6 } from 'net';
import { ProxyDescriptor } from '../types/proxy';
import { errnoCode } from '../utils/errors';
import { SocksError, SocksStage } from './socksErrors';

const SOCKS_VERSION = 0x05;
const AUTH_VERSION = 0x01;

const METHOD_NO_AUTH = 0x00;
const METHOD_USER_PASS = 0x02;
const METHOD_NONE_ACCEPTABLE = 0xff;

const CMD_CONNECT = 0x01;

const ATYP_IPV4 = 0x01;
const ATYP_DOMAIN = 0x03;
const ATYP_IPV6 = 0x04;

const MAX_FIELD_BYTES = 255;

export interface SocksDestination {
  host: string;
  port: number;
}

export interface SocksConnectOptions {
  proxy: Readonly<ProxyDescriptor>;
  destination: SocksDestination;
  /** Bound for the TCP connect and for each handshake step */
  timeoutMs: number;
}

export interface SocksConnection {
  socket: Socket;
  /** Address the proxy bound for the outgoing connection */
  boundAddress: SocksDestination;
}

/**
 * Buffers handshake bytes and hands out exact-size reads
 */
class HandshakeReader {
  private buffer = Buffer.alloc(0);
  private pending: {
    size: number;
    resolve: (chunk: Buffer) => void;
    reject: (error: SocksError) => void;
    timer: NodeJS.Timeout;
  } | null = null;
  private failure: SocksError | null = null;
  private stage: SocksStage = 'greeting';

  constructor(private readonly socket: Socket, private readonly timeoutMs: number) {
    socket.on('data', this.onData);
    socket.on('error', this.onError);
    socket.on('close', this.onClose);
  }

  read(size: number, stage: SocksStage): Promise<Buffer> {
    this.stage = stage;
    if (this.failure) {
      return Promise.reject(this.failure);
    }

    return new Promise<Buffer>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending = null;
        reject(
          new SocksError('timeout', stage, `no answer from proxy within ${this.timeoutMs}ms`, {
            timeoutMs: this.timeoutMs,
          })
        );
      }, this.timeoutMs);

      this.pending = { size, resolve, reject, timer };
      this.flush();
    });
  }

  /**
   * Stop consuming the socket and give back whatever was read past the handshake
   */
  detach(): void {
    this.socket.off('data', this.onData);
    this.socket.off('error', this.onError);
    this.socket.off('close', this.onClose);
    this.socket.pause();
    if (this.buffer.length > 0) {
      this.socket.unshift(this.buffer);
      this.buffer = Buffer.alloc(0);
    }
  }

  private readonly onData = (chunk: Buffer): void => {
    this.buffer = Buffer.concat([this.buffer, chunk]);
    this.flush();
  };

  private readonly onError = (error: Error): void => {
    this.fail(
      new SocksError('io', this.stage, error.message, { errno: errnoCode(error) }, { cause: error })
    );
  };

  private readonly onClose = (): void => {
    this.fail(new SocksError('io', this.stage, 'proxy closed the connection during the handshake'));
  };

  private flush(): void {
    if (!this.pending || this.buffer.length < this.pending.size) {
      return;
    }
    const { size, resolve, timer } = this.pending;
    this.pending = null;
    clearTimeout(timer);

    const chunk = this.buffer.subarray(0, size);
    this.buffer = this.buffer.subarray(size);
    resolve(chunk);
  }

  private fail(error: SocksError): void {
    if (!this.failure) {
      this.failure = error;
    }
    if (this.pending) {
      const { reject, timer } = this.pending;
      this.pending = null;
      clearTimeout(timer);
      reject(this.failure);
    }
  }
}

function openProxySocket(proxy: Readonly<ProxyDescriptor>, timeoutMs: number): Promise<Socket> {
  return new Promise<Socket>((resolve, reject) => {
    const socket = netConnect({ host: proxy.host, port: proxy.port });

    const cleanup = (): void => {
      clearTimeout(timer);
      socket.off('connect', onConnect);
      socket.off('error', onError);
    };

    const timer = setTimeout(() => {
      cleanup();
      socket.destroy();
      reject(
        new SocksError('timeout', 'proxy_connect', `TCP connect to proxy timed out after ${timeoutMs}ms`, {
          timeoutMs,
        })
      );
    }, timeoutMs);

    const onConnect = (): void => {
      cleanup();
      resolve(socket);
    };

    const onError = (error: Error): void => {
      cleanup();
      socket.destroy();
      reject(
        new SocksError('io', 'proxy_connect', error.message, { errno: errnoCode(error) }, { cause: error })
      );
    };

    socket.once('connect', onConnect);
    socket.once('error', onError);
  });
}

/**
 * Username/password auth is offered only when both are non-empty
 */
export function hasProxyCredentials(proxy: Readonly<ProxyDescriptor>): boolean {
  return Boolean(proxy.username && proxy.password);
}

function ipv4ToBytes(address: string): Buffer {
  return Buffer.from(address.split('.').map((octet) => parseInt(octet, 10)));
}

function ipv6ToBytes(address: string): Buffer {
  const withoutZone = address.split('%')[0];
  const expandGroups = (part: string): string[] => {
    if (!part) {
      return [];
    }
    return part.split(':').flatMap((group) => {
      if (isIPv4(group)) {
        const bytes = ipv4ToBytes(group);
        return [bytes.readUInt16BE(0).toString(16), bytes.readUInt16BE(2).toString(16)];
      }
      return [group];
    });
  };

  let groups: string[];
  const gap = withoutZone.indexOf('::');
  if (gap === -1) {
    groups = expandGroups(withoutZone);
  } else {
    const head = expandGroups(withoutZone.slice(0, gap));
    const tail = expandGroups(withoutZone.slice(gap + 2));
    const zeros = new Array<string>(8 - head.length - tail.length).fill('0');
    groups = [...head, ...zeros, ...tail];
  }

  const bytes = Buffer.alloc(16);
  groups.forEach((group, index) => bytes.writeUInt16BE(parseInt(group, 16), index * 2));
  return bytes;
}

/**
 * ATYP + DST.ADDR for a CONNECT request
 */
export function encodeDestinationAddress(host: string): Buffer {
  if (isIPv4(host)) {
    return Buffer.concat([Buffer.from([ATYP_IPV4]), ipv4ToBytes(host)]);
  }
  if (isIPv6(host)) {
    return Buffer.concat([Buffer.from([ATYP_IPV6]), ipv6ToBytes(host)]);
  }

  const domain = Buffer.from(host, 'utf8');
  if (domain.length > MAX_FIELD_BYTES) {
    throw new SocksError(
      'domain_too_long',
      'connect',
      `destination hostname is ${domain.length} bytes, SOCKS5 allows at most ${MAX_FIELD_BYTES}`
    );
  }
  return Buffer.concat([Buffer.from([ATYP_DOMAIN, domain.length]), domain]);
}

function validateOptions(options: SocksConnectOptions): void {
  const { proxy, destination } = options;

  if (!proxy.host) {
    throw new SocksError('invalid_argument', 'proxy_connect', 'proxy host is empty');
  }
  if (!Number.isInteger(proxy.port) || proxy.port < 1 || proxy.port > 65535) {
    throw new SocksError('invalid_argument', 'proxy_connect', `proxy port ${proxy.port} is out of range`);
  }
  if (!destination.host) {
    throw new SocksError('invalid_argument', 'connect', 'destination host is empty');
  }
  if (!Number.isInteger(destination.port) || destination.port < 1 || destination.port > 65535) {
    throw new SocksError('invalid_argument', 'connect', `destination port ${destination.port} is out of range`);
  }
  if (hasProxyCredentials(proxy)) {
    const username = Buffer.byteLength(proxy.username ?? '', 'utf8');
    const password = Buffer.byteLength(proxy.password ?? '', 'utf8');
    if (username > MAX_FIELD_BYTES || password > MAX_FIELD_BYTES) {
      throw new SocksError('invalid_argument', 'auth', `credentials may be at most ${MAX_FIELD_BYTES} bytes each`);
    }
  }
}

async function negotiateMethod(socket: Socket, reader: HandshakeReader, withCredentials: boolean): Promise<number> {
  const methods = withCredentials ? [METHOD_NO_AUTH, METHOD_USER_PASS] : [METHOD_NO_AUTH];
  socket.write(Buffer.from([SOCKS_VERSION, methods.length, ...methods]));

  const [version, method] = await reader.read(2, 'greeting');
  if (version !== SOCKS_VERSION) {
    throw new SocksError('version_mismatch', 'greeting', `proxy answered with version ${version}, expected 5`);
  }

  if (method === METHOD_NONE_ACCEPTABLE) {
    if (withCredentials) {
      throw new SocksError('auth_method_unacceptable', 'greeting', 'proxy accepted none of the offered methods');
    }
    throw new SocksError('auth_required', 'greeting', 'proxy requires authentication');
  }
  if (method === METHOD_USER_PASS && !withCredentials) {
    throw new SocksError('auth_required', 'greeting', 'proxy selected username/password but none are configured');
  }
  if (method !== METHOD_NO_AUTH && method !== METHOD_USER_PASS) {
    throw new SocksError('auth_method_unacceptable', 'greeting', `proxy selected unsupported method ${method}`);
  }

  return method;
}

async function authenticate(socket: Socket, reader: HandshakeReader, proxy: Readonly<ProxyDescriptor>): Promise<void> {
  const username = Buffer.from(proxy.username ?? '', 'utf8');
  const password = Buffer.from(proxy.password ?? '', 'utf8');
  socket.write(
    Buffer.concat([
      Buffer.from([AUTH_VERSION, username.length]),
      username,
      Buffer.from([password.length]),
      password,
    ])
  );

  const [version, status] = await reader.read(2, 'auth');
  if (version !== AUTH_VERSION) {
    throw new SocksError('version_mismatch', 'auth', `authentication reply version ${version}, expected 1`);
  }
  if (status !== 0x00) {
    throw new SocksError('auth_rejected', 'auth', `proxy rejected the credentials (status ${status})`);
  }
}

async function readBoundAddress(reader: HandshakeReader, atyp: number): Promise<SocksDestination> {
  switch (atyp) {
    case ATYP_IPV4: {
      const bytes = await reader.read(6, 'reply');
      return { host: Array.from(bytes.subarray(0, 4)).join('.'), port: bytes.readUInt16BE(4) };
    }
    case ATYP_IPV6: {
      const bytes = await reader.read(18, 'reply');
      const groups: string[] = [];
      for (let offset = 0; offset < 16; offset += 2) {
        groups.push(bytes.readUInt16BE(offset).toString(16));
      }
      return { host: groups.join(':'), port: bytes.readUInt16BE(16) };
    }
    case ATYP_DOMAIN: {
      const [length] = await reader.read(1, 'reply');
      const bytes = await reader.read(length + 2, 'reply');
      return { host: bytes.subarray(0, length).toString('utf8'), port: bytes.readUInt16BE(length) };
    }
    default:
      throw new SocksError('unsupported_address_type', 'reply', `proxy replied with address type ${atyp}`);
  }
}

async function requestConnect(
  socket: Socket,
  reader: HandshakeReader,
  destination: SocksDestination
): Promise<SocksDestination> {
  const address = encodeDestinationAddress(destination.host);
  const port = Buffer.alloc(2);
  port.writeUInt16BE(destination.port, 0);
  socket.write(Buffer.concat([Buffer.from([SOCKS_VERSION, CMD_CONNECT, 0x00]), address, port]));

  const [version, reply, , atyp] = await reader.read(4, 'reply');
  if (version !== SOCKS_VERSION) {
    throw new SocksError('version_mismatch', 'reply', `proxy answered with version ${version}, expected 5`);
  }
  if (reply !== 0x00) {
    throw new SocksError('reply', 'reply', `proxy CONNECT failed with reply code ${reply}`, { replyCode: reply });
  }

  return readBoundAddress(reader, atyp);
}

/**
 * Open a tunnel to `destination` through a SOCKS5 proxy.
 * @throws SocksError
 */
export async function connectViaSocks5(options: SocksConnectOptions): Promise<SocksConnection> {
  validateOptions(options);
  const { proxy, destination, timeoutMs } = options;

  // Fail before any I/O when the hostname cannot be encoded
  encodeDestinationAddress(destination.host);

  const socket = await openProxySocket(proxy, timeoutMs);
  const reader = new HandshakeReader(socket, timeoutMs);

  try {
    const method = await negotiateMethod(socket, reader, hasProxyCredentials(proxy));
    if (method === METHOD_USER_PASS) {
      await authenticate(socket, reader, proxy);
    }
    const boundAddress = await requestConnect(socket, reader, destination);
    reader.detach();
    return { socket, boundAddress };
  } catch (error) {
    socket.destroy();
    throw error;
  }
}
