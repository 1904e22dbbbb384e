/**
 * Tests for the SOCKS5 client, its error decoder and the SMTP transport
 * against an in-process proxy
 */

import { Socket } from 'net';
import { connectViaSocks5, encodeDestinationAddress } from '../src/smtp/socksClient';
import { SocksError, describeSocksError, socksReplyName } from '../src/smtp/socksErrors';
import { openTransport } from '../src/smtp/transport';
import { describeProxy } from '../src/proxy/connectionDescriptor';
import { ConnectError } from '../src/utils/errors';
import { FakeSocksServer, startFakeSmtpServer, startFakeSocksServer } from './helpers/fakeServers';

async function caught(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error('expected the promise to reject');
}

async function socksFailure(promise: Promise<unknown>): Promise<SocksError> {
  const error = await caught(promise);
  if (!(error instanceof SocksError)) {
    throw new Error(`expected a SocksError, got ${String(error)}`);
  }
  return error;
}

async function connectFailure(promise: Promise<unknown>): Promise<ConnectError> {
  const error = await caught(promise);
  if (!(error instanceof ConnectError)) {
    throw new Error(`expected a ConnectError, got ${String(error)}`);
  }
  return error;
}

function firstChunk(socket: Socket): Promise<string> {
  return new Promise((resolve) => {
    socket.once('data', (chunk: Buffer) => resolve(chunk.toString('utf8')));
    socket.resume();
  });
}

async function unusedPort(): Promise<number> {
  const server = await startFakeSmtpServer();
  await server.close();
  return server.port;
}

const DESTINATION = { host: 'mx.example.test', port: 25 };

describe('connectViaSocks5', () => {
  let proxy: FakeSocksServer | undefined;

  afterEach(async () => {
    await proxy?.close();
    proxy = undefined;
  });

  it('should tunnel without authentication and keep bytes sent right after the reply', async () => {
    proxy = await startFakeSocksServer({ trailing: '220 mx.example.test ESMTP\r\n' });

    const { socket, boundAddress } = await connectViaSocks5({
      proxy: { host: '127.0.0.1', port: proxy.port },
      destination: DESTINATION,
      timeoutMs: 2000,
    });

    try {
      expect(boundAddress).toEqual({ host: '127.0.0.1', port: 1080 });
      expect(socket.isPaused()).toBe(true);
      await expect(firstChunk(socket)).resolves.toBe('220 mx.example.test ESMTP\r\n');
      expect(proxy.methodsOffered).toEqual([[0x00]]);
      expect(proxy.requests).toEqual([DESTINATION]);
    } finally {
      socket.destroy();
    }
  });

  it('should authenticate with username and password', async () => {
    proxy = await startFakeSocksServer({ auth: { username: 'user', password: 'test-secret' } });

    const { socket } = await connectViaSocks5({
      proxy: { host: '127.0.0.1', port: proxy.port, username: 'user', password: 'test-secret' },
      destination: DESTINATION,
      timeoutMs: 2000,
    });
    socket.destroy();

    expect(proxy.methodsOffered).toEqual([[0x00, 0x02]]);
    expect(proxy.credentials).toEqual([{ username: 'user', password: 'test-secret' }]);
    expect(proxy.requests).toEqual([DESTINATION]);
  });

  it('should offer only no-auth when the password is empty', async () => {
    proxy = await startFakeSocksServer();

    const { socket } = await connectViaSocks5({
      proxy: { host: '127.0.0.1', port: proxy.port, username: 'user', password: '' },
      destination: DESTINATION,
      timeoutMs: 2000,
    });
    socket.destroy();

    expect(proxy.methodsOffered).toEqual([[0x00]]);
    expect(proxy.credentials).toEqual([]);
    expect(describeProxy({ host: '127.0.0.1', port: 1080, username: 'user', password: '' })).toBe(
      'proxy:127.0.0.1:1080'
    );
  });

  it('should report rejected credentials', async () => {
    proxy = await startFakeSocksServer({ auth: { username: 'user', password: 'test-secret' } });

    const error = await socksFailure(
      connectViaSocks5({
        proxy: { host: '127.0.0.1', port: proxy.port, username: 'user', password: 'wrong-secret' },
        destination: DESTINATION,
        timeoutMs: 2000,
      })
    );

    expect(error.code).toBe('auth_rejected');
    expect(error.stage).toBe('auth');
    expect(describeSocksError(error)).toBe(
      'SOCKS5 Authentication Rejected: the proxy refused the username/password'
    );
  });

  it('should report a proxy that requires credentials we do not have', async () => {
    proxy = await startFakeSocksServer({ auth: { username: 'user', password: 'test-secret' } });

    const error = await socksFailure(
      connectViaSocks5({ proxy: { host: '127.0.0.1', port: proxy.port }, destination: DESTINATION, timeoutMs: 2000 })
    );

    expect(error.code).toBe('auth_required');
    expect(describeSocksError(error)).toBe(
      'SOCKS5 Authentication Required: the proxy requires a username and password'
    );
  });

  it('should decode reply code 0x05 as Connection Refused', async () => {
    proxy = await startFakeSocksServer({ replyCode: 0x05 });

    const error = await socksFailure(
      connectViaSocks5({ proxy: { host: '127.0.0.1', port: proxy.port }, destination: DESTINATION, timeoutMs: 2000 })
    );

    expect(error.code).toBe('reply');
    expect(error.replyCode).toBe(0x05);
    expect(describeSocksError(error)).toBe(
      'SOCKS5 Connection Refused (reply code 0x05): the SMTP host refused the connection made by the proxy'
    );
  });

  it('should time out when the proxy never answers', async () => {
    proxy = await startFakeSocksServer({ silent: true });

    const error = await socksFailure(
      connectViaSocks5({ proxy: { host: '127.0.0.1', port: proxy.port }, destination: DESTINATION, timeoutMs: 150 })
    );

    expect(error.code).toBe('timeout');
    expect(error.stage).toBe('greeting');
    expect(describeSocksError(error)).toBe('SOCKS5 Timeout: no answer from the proxy during greeting within 150ms');
  });

  it('should explain a refused TCP connection to the proxy', async () => {
    const port = await unusedPort();

    const error = await socksFailure(
      connectViaSocks5({ proxy: { host: '127.0.0.1', port }, destination: DESTINATION, timeoutMs: 2000 })
    );

    expect(error.code).toBe('io');
    expect(error.stage).toBe('proxy_connect');
    expect(describeSocksError(error)).toBe(
      'SOCKS5 I/O Error (ECONNREFUSED): the proxy refused the TCP connection (wrong port or proxy down)'
    );
  });

  it('should reject a destination hostname over 255 bytes before connecting', async () => {
    proxy = await startFakeSocksServer();

    const error = await socksFailure(
      connectViaSocks5({
        proxy: { host: '127.0.0.1', port: proxy.port },
        destination: { host: `${'a'.repeat(252)}.test`, port: 25 },
        timeoutMs: 2000,
      })
    );

    expect(error.code).toBe('domain_too_long');
    expect(proxy.methodsOffered).toEqual([]);
  });

  it('should reject an out-of-range proxy port', async () => {
    const error = await socksFailure(
      connectViaSocks5({ proxy: { host: '127.0.0.1', port: 0 }, destination: DESTINATION, timeoutMs: 2000 })
    );

    expect(error.code).toBe('invalid_argument');
  });
});

describe('encodeDestinationAddress', () => {
  it('should encode IPv4 literals', () => {
    expect(Array.from(encodeDestinationAddress('192.0.2.10'))).toEqual([0x01, 192, 0, 2, 10]);
  });

  it('should encode IPv6 literals', () => {
    const expected = [0x04, ...new Array<number>(15).fill(0), 1];
    expect(Array.from(encodeDestinationAddress('::1'))).toEqual(expected);
  });

  it('should encode hostnames with a length prefix', () => {
    expect(Array.from(encodeDestinationAddress('mx.test'))).toEqual([0x03, 7, ...Buffer.from('mx.test')]);
  });
});

describe('socksReplyName', () => {
  it.each([
    [0x01, 'General Failure'],
    [0x02, 'Connection Not Allowed'],
    [0x03, 'Network Unreachable'],
    [0x04, 'Host Unreachable'],
    [0x05, 'Connection Refused'],
    [0x06, 'TTL Expired'],
    [0x07, 'Command Not Supported'],
    [0x08, 'Address Type Not Supported'],
    [0x09, 'Unknown Reply'],
  ])('should name reply code %i as %s', (code, name) => {
    expect(socksReplyName(code)).toBe(name);
  });

  it('should describe codes outside the RFC', () => {
    const error = new SocksError('reply', 'reply', 'proxy CONNECT failed', { replyCode: 0x2a });

    expect(describeSocksError(error)).toBe(
      'SOCKS5 Unknown Reply (reply code 0x2a): the proxy returned a code outside RFC 1928'
    );
  });
});

describe('openTransport', () => {
  let proxy: FakeSocksServer | undefined;

  afterEach(async () => {
    await proxy?.close();
    proxy = undefined;
  });

  it('should map a SOCKS5 reply failure onto a connect error', async () => {
    proxy = await startFakeSocksServer({ replyCode: 0x05 });

    const error = await connectFailure(
      openTransport({ host: 'mx.example.test', port: 25, proxy: { host: '127.0.0.1', port: proxy.port }, connectTimeoutMs: 2000 })
    );

    expect(error.kind).toBe('socks5_reply');
    expect(error.stage).toBe('socks5_reply');
    expect(error.detail).toBe(
      'SOCKS5 proxy connection failed: SOCKS5 Connection Refused (reply code 0x05): the SMTP host refused the connection made by the proxy'
    );
  });

  it('should use the proxy timeout over the connect timeout', async () => {
    proxy = await startFakeSocksServer({ silent: true });

    const error = await connectFailure(
      openTransport({
        host: 'mx.example.test',
        port: 25,
        proxy: { host: '127.0.0.1', port: proxy.port, timeoutMs: 100 },
        connectTimeoutMs: 5000,
      })
    );

    expect(error.kind).toBe('timeout');
    expect(error.stage).toBe('socks5_greeting');
    expect(error.timeoutMs).toBe(100);
  });

  it('should report handshake failures separately from reply failures', async () => {
    proxy = await startFakeSocksServer({ auth: { username: 'user', password: 'test-secret' } });

    const error = await connectFailure(
      openTransport({ host: 'mx.example.test', port: 25, proxy: { host: '127.0.0.1', port: proxy.port }, connectTimeoutMs: 2000 })
    );

    expect(error.kind).toBe('socks5_handshake');
    expect(error.stage).toBe('socks5_greeting');
  });

  it('should report a refused direct connection', async () => {
    const port = await unusedPort();

    const error = await connectFailure(openTransport({ host: '127.0.0.1', port, connectTimeoutMs: 2000 }));

    expect(error.kind).toBe('tcp');
    expect(error.stage).toBe('connect');
    expect(error.detail).toMatch(new RegExp(`^TCP connect to 127\\.0\\.0\\.1:${port} failed \\(ECONNREFUSED: `));
  });

  it('should hand over a paused socket for direct connections', async () => {
    const smtp = await startFakeSmtpServer();

    try {
      const socket = await openTransport({ host: '127.0.0.1', port: smtp.port, connectTimeoutMs: 2000 });
      expect(socket.isPaused()).toBe(true);
      await expect(firstChunk(socket)).resolves.toBe('220 mx.test ESMTP ready\r\n');
      socket.destroy();
    } finally {
      await smtp.close();
    }
  });
});
