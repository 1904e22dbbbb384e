/**
 * SMTP mailbox probe.
 *
 * Walks one SMTP dialogue up to RCPT TO and reports what the server said:
 *
 *   connect -> greeting -> EHLO (HELO fallback) -> MAIL FROM -> RCPT TO -> QUIT
 *
 * DATA is never sent. Every read is bounded by its stage timeout, QUIT is
 * attempted with a short bounded wait while the socket is writable, and the
 * socket is destroyed on every exit path.
 */

import { Socket } from 'net';
import { StringDecoder } from 'string_decoder';
import { ProbeOutcome, ProbeStage, SmtpReply } from '../types/email';
import { ProxyDescriptor, SmtpMethodConfig } from '../types/proxy';
import { ConnectError, SmtpProtocolError, errnoCode, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import { TransportOpener, openTransport } from './transport';
import { classifyRcptReply, extractEnhancedCode, formatReply, parseReplyLine, replyText } from './replyClassifier';

const log = logger.child('smtp-probe');

type SessionStage = ProbeStage | 'quit';

export interface ProbeOptions {
  mxHost: string;
  /** Address put in RCPT TO */
  recipient: string;
  smtp: SmtpMethodConfig;
  proxy?: Readonly<ProxyDescriptor>;
  /** Replaces the real transport; used by tests */
  openTransport?: TransportOpener;
}

function isPositive(reply: SmtpReply): boolean {
  return reply.code >= 200 && reply.code < 300;
}

/**
 * Line-oriented reader/writer over an established transport
 */
class SmtpSession {
  private buffer = '';
  private readonly decoder = new StringDecoder('utf8');
  private partial: string[] = [];
  private readonly replies: SmtpReply[] = [];
  private waiter: {
    resolve: (reply: SmtpReply) => void;
    reject: (error: Error) => void;
    timer: NodeJS.Timeout;
  } | null = null;
  private failure: Error | null = null;
  private stage: SessionStage = 'greeting';

  constructor(private readonly socket: Socket, private readonly transcript: string[], private readonly mxHost: string) {
    socket.on('data', this.onData);
    socket.on('error', this.onError);
    socket.on('close', this.onClose);
    socket.resume();
  }

  send(command: string): void {
    this.transcript.push(`>>> ${command}`);
    log.debug(`SMTP [${this.mxHost}] >>> ${command}`);
    this.socket.write(`${command}\r\n`);
  }

  readReply(stage: SessionStage, timeoutMs: number): Promise<SmtpReply> {
    this.stage = stage;

    const ready = this.replies.shift();
    if (ready) {
      return Promise.resolve(ready);
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }

    return new Promise<SmtpReply>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.waiter = null;
        reject(new ConnectError('timeout', stage, `no reply from ${this.mxHost} during ${stage}`, timeoutMs));
      }, timeoutMs);
      this.waiter = { resolve, reject, timer };
    });
  }

  get writable(): boolean {
    return !this.failure && !this.socket.destroyed && this.socket.writable;
  }

  /**
   * Say QUIT if the connection still works, then destroy the socket
   */
  async close(quitTimeoutMs: number): Promise<void> {
    try {
      if (this.writable) {
        this.send('QUIT');
        await this.readReply('quit', quitTimeoutMs);
      }
    } catch (error) {
      log.debug(`QUIT to ${this.mxHost} did not complete`, { error: errorMessage(error) });
    } finally {
      this.socket.destroy();
    }
  }

  private readonly onData = (chunk: Buffer): void => {
    this.buffer += this.decoder.write(chunk);

    let newline = this.buffer.indexOf('\n');
    while (newline !== -1) {
      const line = this.buffer.slice(0, newline).replace(/\r$/, '');
      this.buffer = this.buffer.slice(newline + 1);
      newline = this.buffer.indexOf('\n');

      if (line) {
        this.acceptLine(line);
      }
    }
  };

  private acceptLine(line: string): void {
    this.transcript.push(`<<< ${line}`);
    log.debug(`SMTP [${this.mxHost}] <<< ${line}`);

    const parsed = parseReplyLine(line);
    if (!parsed) {
      this.fail(new SmtpProtocolError(this.stage, `malformed reply line from ${this.mxHost}: ${line.slice(0, 200)}`));
      return;
    }

    this.partial.push(parsed.text);
    if (parsed.continues) {
      return;
    }

    const lines = this.partial;
    this.partial = [];
    this.deliver({ code: parsed.code, enhancedCode: extractEnhancedCode(lines[0] ?? ''), lines });
  }

  private deliver(reply: SmtpReply): void {
    if (this.waiter) {
      const { resolve, timer } = this.waiter;
      this.waiter = null;
      clearTimeout(timer);
      resolve(reply);
      return;
    }
    this.replies.push(reply);
  }

  private readonly onError = (error: Error): void => {
    const code = errnoCode(error);
    const detail = code ? `${code}: ${error.message}` : error.message;
    this.fail(new ConnectError('tcp', this.stage, `connection to ${this.mxHost} failed (${detail})`, undefined, {
      cause: error,
    }));
  };

  private readonly onClose = (): void => {
    this.fail(new ConnectError('tcp', this.stage, `connection closed by ${this.mxHost} during ${this.stage}`));
  };

  private fail(error: Error): void {
    if (!this.failure) {
      this.failure = error;
    }
    if (this.waiter) {
      const { reject, timer } = this.waiter;
      this.waiter = null;
      clearTimeout(timer);
      reject(this.failure);
    }
  }
}

function failureOutcome(stage: ProbeStage, error: unknown, transcript: string[]): ProbeOutcome {
  if (error instanceof ConnectError) {
    transcript.push(`!!! ${error.stage}: ${error.detail}`);
    return {
      stage,
      signal: 'connectFailure',
      connectKind: error.kind,
      timeoutMs: error.timeoutMs,
      detail: error.detail,
      transcript,
    };
  }

  const detail = errorMessage(error);
  transcript.push(`!!! ${stage}: ${detail}`);
  const reply = error instanceof SmtpProtocolError ? error.reply : undefined;
  return {
    stage,
    signal: 'protocolError',
    replyCode: reply?.code,
    enhancedCode: reply?.enhancedCode,
    replyText: reply ? replyText(reply) : undefined,
    detail,
    transcript,
  };
}

function rejectedOutcome(stage: ProbeStage, reply: SmtpReply, what: string, transcript: string[]): ProbeOutcome {
  return failureOutcome(stage, new SmtpProtocolError(stage, `${what} rejected: ${formatReply(reply)}`, reply), transcript);
}

async function sayHello(session: SmtpSession, helloName: string, timeoutMs: number): Promise<SmtpReply> {
  session.send(`EHLO ${helloName}`);
  const ehlo = await session.readReply('ehlo', timeoutMs);
  if (isPositive(ehlo)) {
    return ehlo;
  }

  log.debug(`EHLO rejected (${ehlo.code}), falling back to HELO`);
  session.send(`HELO ${helloName}`);
  return session.readReply('ehlo', timeoutMs);
}

/**
 * Run one probe for `recipient` against `mxHost`
 */
export async function probeMailbox(options: ProbeOptions): Promise<ProbeOutcome> {
  const { mxHost, recipient, smtp, proxy } = options;
  const open = options.openTransport ?? openTransport;
  const { timeouts } = smtp;
  const transcript: string[] = [];

  let socket: Socket;
  try {
    socket = await open({ host: mxHost, port: smtp.port, proxy, connectTimeoutMs: timeouts.connectMs });
  } catch (error) {
    return failureOutcome('connect', error, transcript);
  }

  const session = new SmtpSession(socket, transcript, mxHost);
  let stage: ProbeStage = 'greeting';

  try {
    const greeting = await session.readReply('greeting', timeouts.greetingMs);
    if (!isPositive(greeting)) {
      return {
        stage,
        signal: 'connectFailure',
        connectKind: 'tcp',
        replyCode: greeting.code,
        replyText: replyText(greeting),
        detail: `greeting refused: ${formatReply(greeting)}`,
        transcript,
      };
    }

    stage = 'ehlo';
    const hello = await sayHello(session, smtp.helloName, timeouts.ehloMs);
    if (!isPositive(hello)) {
      return rejectedOutcome(stage, hello, 'HELO', transcript);
    }

    stage = 'mail_from';
    session.send(`MAIL FROM:<${smtp.fromEmail}>`);
    const mailFrom = await session.readReply('mail_from', timeouts.mailFromMs);
    if (!isPositive(mailFrom)) {
      return rejectedOutcome(stage, mailFrom, 'MAIL FROM', transcript);
    }

    stage = 'rcpt_to';
    session.send(`RCPT TO:<${recipient}>`);
    const rcpt = await session.readReply('rcpt_to', timeouts.rcptToMs);
    const { signal, disabled } = classifyRcptReply(rcpt);

    return {
      stage,
      signal,
      disabled,
      replyCode: rcpt.code,
      enhancedCode: rcpt.enhancedCode,
      replyText: replyText(rcpt),
      transcript,
    };
  } catch (error) {
    return failureOutcome(stage, error, transcript);
  } finally {
    await session.close(timeouts.quitMs);
  }
}
