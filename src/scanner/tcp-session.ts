import net, { type Socket } from 'net';
import type { Dialer } from '../types/network.js';

/**
 * Default dialer: one TCP connect bounded by `timeoutMs`.
 */
export const connectTcp: Dialer = (host, port, timeoutMs) =>
  new Promise<Socket>((resolve, reject) => {
    const socket = net.createConnection({ host, port });
    socket.setTimeout(timeoutMs);

    const cleanup = (): void => {
      socket.removeListener('connect', onConnect);
      socket.removeListener('timeout', onTimeout);
      socket.removeListener('error', onError);
    };

    function onConnect(): void {
      cleanup();
      socket.setTimeout(0);
      resolve(socket);
    }

    function onTimeout(): void {
      cleanup();
      socket.destroy();
      reject(new Error(`Connection to ${host}:${port} timed out after ${timeoutMs}ms`));
    }

    function onError(error: Error): void {
      cleanup();
      socket.destroy();
      reject(error);
    }

    socket.once('connect', onConnect);
    socket.once('timeout', onTimeout);
    socket.once('error', onError);
  });

/**
 * Buffered conversation over a connected socket.
 *
 * Incoming data is queued as it arrives so a read issued after the peer has
 * already spoken still sees it. Reads never reject: they resolve `null` on
 * timeout or once the connection is gone with nothing left to deliver.
 */
export class TcpSession {
  private readonly socket: Socket;
  private readonly chunks: Buffer[] = [];
  private notify: (() => void) | null = null;
  private ended = false;

  constructor(socket: Socket) {
    this.socket = socket;

    socket.on('data', (chunk: Buffer) => {
      this.chunks.push(chunk);
      this.wake();
    });

    const finish = (): void => {
      this.ended = true;
      this.wake();
    };
    socket.on('end', finish);
    socket.on('close', finish);
    // Read/write failures end the session; callers observe them as empty reads
    socket.on('error', finish);
  }

  static async open(host: string, port: number, timeoutMs: number, dial: Dialer = connectTcp): Promise<TcpSession> {
    return new TcpSession(await dial(host, port, timeoutMs));
  }

  get isOpen(): boolean {
    return !this.ended && !this.socket.destroyed;
  }

  write(data: string | Buffer): boolean {
    if (!this.isOpen) {
      return false;
    }
    this.socket.write(data);
    return true;
  }

  async read(timeoutMs: number): Promise<Buffer | null> {
    if (this.chunks.length === 0 && !this.ended) {
      await new Promise<void>((resolve) => {
        const timer = setTimeout(() => this.wake(), timeoutMs);
        this.notify = () => {
          clearTimeout(timer);
          resolve();
        };
      });
    }

    if (this.chunks.length === 0) {
      return null;
    }

    const data = Buffer.concat(this.chunks);
    this.chunks.length = 0;
    return data;
  }

  async readText(timeoutMs: number): Promise<string | null> {
    const data = await this.read(timeoutMs);
    return data ? data.toString('utf8') : null;
  }

  close(): void {
    this.ended = true;
    this.socket.destroy();
  }

  private wake(): void {
    const notify = this.notify;
    this.notify = null;
    notify?.();
  }
}

/**
 * Open a session, hand it to `conversation`, and always close it afterwards.
 */
export async function withSession<T>(
  host: string,
  port: number,
  timeoutMs: number,
  dial: Dialer,
  conversation: (session: TcpSession) => Promise<T>
): Promise<T> {
  const session = await TcpSession.open(host, port, timeoutMs, dial);
  try {
    return await conversation(session);
  } finally {
    session.close();
  }
}
