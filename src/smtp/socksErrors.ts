/**
 * SOCKS5 failure taxonomy and decoder.
 *
 * describeSocksError() turns a SocksError into the human-readable cause that
 * ends up in the verdict reason, e.g.
 *   "SOCKS5 Connection Refused (reply code 0x05): the SMTP host refused the connection made by the proxy"
 */

export type SocksErrorCode =
  | 'reply'
  | 'version_mismatch'
  | 'auth_required'
  | 'auth_rejected'
  | 'auth_method_unacceptable'
  | 'domain_too_long'
  | 'unsupported_address_type'
  | 'invalid_argument'
  | 'timeout'
  | 'io';

/**
 * Handshake step the failure happened in
 */
export type SocksStage = 'proxy_connect' | 'greeting' | 'auth' | 'connect' | 'reply';

export class SocksError extends Error {
  constructor(
    readonly code: SocksErrorCode,
    readonly stage: SocksStage,
    message: string,
    readonly details: { replyCode?: number; errno?: string; timeoutMs?: number } = {},
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'SocksError';
  }

  get replyCode(): number | undefined {
    return this.details.replyCode;
  }
}

interface ReplyCodeInfo {
  name: string;
  explanation: string;
}

const REPLY_CODES: Record<number, ReplyCodeInfo> = {
  0x01: {
    name: 'General Failure',
    explanation: 'the proxy hit an internal error, is overloaded, or blocks outbound port 25',
  },
  0x02: {
    name: 'Connection Not Allowed',
    explanation: 'the proxy ruleset does not allow a connection to this host',
  },
  0x03: {
    name: 'Network Unreachable',
    explanation: 'the proxy has no route to the SMTP host network',
  },
  0x04: {
    name: 'Host Unreachable',
    explanation: 'the SMTP host is not responding to the proxy',
  },
  0x05: {
    name: 'Connection Refused',
    explanation: 'the SMTP host refused the connection made by the proxy',
  },
  0x06: {
    name: 'TTL Expired',
    explanation: 'the connection attempt from the proxy expired before reaching the SMTP host',
  },
  0x07: {
    name: 'Command Not Supported',
    explanation: 'the proxy does not support the CONNECT command',
  },
  0x08: {
    name: 'Address Type Not Supported',
    explanation: 'the proxy cannot handle the requested destination address type',
  },
};

const ERRNO_EXPLANATIONS: Record<string, string> = {
  ECONNREFUSED: 'the proxy refused the TCP connection (wrong port or proxy down)',
  ECONNRESET: 'the proxy reset the connection',
  ETIMEDOUT: 'the TCP connection to the proxy timed out',
  EHOSTUNREACH: 'the proxy host is unreachable',
  ENETUNREACH: 'the network of the proxy host is unreachable',
  ENOTFOUND: 'the proxy hostname does not resolve',
  EAI_AGAIN: 'the proxy hostname could not be resolved right now',
  EPIPE: 'the proxy closed the connection while we were writing',
};

function hex(code: number): string {
  return `0x${code.toString(16).padStart(2, '0')}`;
}

/**
 * Name of a SOCKS5 reply code, e.g. 0x05 -> "Connection Refused"
 */
export function socksReplyName(code: number): string {
  return REPLY_CODES[code]?.name ?? 'Unknown Reply';
}

export function describeSocksError(error: SocksError): string {
  switch (error.code) {
    case 'reply': {
      const code = error.details.replyCode ?? 0;
      const info = REPLY_CODES[code];
      if (!info) {
        return `SOCKS5 Unknown Reply (reply code ${hex(code)}): the proxy returned a code outside RFC 1928`;
      }
      return `SOCKS5 ${info.name} (reply code ${hex(code)}): ${info.explanation}`;
    }
    case 'version_mismatch':
      return `SOCKS5 Version Mismatch: ${error.message}`;
    case 'auth_required':
      return 'SOCKS5 Authentication Required: the proxy requires a username and password';
    case 'auth_rejected':
      return 'SOCKS5 Authentication Rejected: the proxy refused the username/password';
    case 'auth_method_unacceptable':
      return 'SOCKS5 No Acceptable Authentication Method: the proxy accepted none of the offered methods';
    case 'domain_too_long':
      return `SOCKS5 Domain Too Long: ${error.message}`;
    case 'unsupported_address_type':
      return `SOCKS5 Unsupported Address Type: ${error.message}`;
    case 'invalid_argument':
      return `SOCKS5 Invalid Argument: ${error.message}`;
    case 'timeout':
      return `SOCKS5 Timeout: no answer from the proxy during ${error.stage} within ${error.details.timeoutMs ?? 0}ms`;
    case 'io': {
      const errno = error.details.errno;
      const explanation = errno ? ERRNO_EXPLANATIONS[errno] : undefined;
      if (errno && explanation) {
        return `SOCKS5 I/O Error (${errno}): ${explanation}`;
      }
      return `SOCKS5 I/O Error: ${error.message}`;
    }
  }
}
