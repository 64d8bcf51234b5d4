import net, { type Server, type Socket } from 'net';
import { connectTcp } from '../../src/scanner/tcp-session.js';
import type { HttpClient, HttpRequestOptions, HttpResponse } from '../../src/types/http.js';
import type { Dialer } from '../../src/types/network.js';
import type { ReportSink } from '../../src/types/scanner.js';

export class RecordingSink implements ReportSink {
  readonly infos: string[] = [];
  readonly warnings: string[] = [];
  readonly errors: string[] = [];

  info(message: string): void {
    this.infos.push(message);
  }

  warning(message: string): void {
    this.warnings.push(message);
  }

  error(message: string): void {
    this.errors.push(message);
  }
}

export interface Fixture {
  server: Server;
  port: number;
  close(): Promise<void>;
}

/**
 * Loopback TCP server driven by `onConnection`.
 */
export async function startFixture(onConnection: (socket: Socket) => void): Promise<Fixture> {
  const sockets = new Set<Socket>();
  const server = net.createServer((socket) => {
    sockets.add(socket);
    socket.on('close', () => sockets.delete(socket));
    socket.on('error', () => sockets.delete(socket));
    onConnection(socket);
  });

  await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Fixture server has no TCP address');
  }
  const { port } = address;

  return {
    server,
    port,
    close: () =>
      new Promise<void>((resolve) => {
        for (const socket of sockets) socket.destroy();
        server.close(() => resolve());
      }),
  };
}

// A port nothing listens on: bind, read the port, release it
export async function closedPort(): Promise<number> {
  const fixture = await startFixture(() => undefined);
  await fixture.close();
  return fixture.port;
}

/**
 * Dialer that routes well-known ports to fixture ports on loopback.
 */
export function mappedDialer(routes: ReadonlyMap<number, number>): Dialer {
  return (_host, port, timeoutMs) => {
    const target = routes.get(port);
    if (target === undefined) {
      return Promise.reject(new Error(`ECONNREFUSED ${port}`));
    }
    return connectTcp('127.0.0.1', target, timeoutMs);
  };
}

export const refusingDialer: Dialer = (_host, port) => Promise.reject(new Error(`ECONNREFUSED ${port}`));

type Route = HttpResponse | Error;

/**
 * HttpClient answering from a URL table; unknown URLs fail like a refused connection.
 */
export class FakeHttpClient implements HttpClient {
  readonly method = 'basic' as const;
  readonly requests: string[] = [];

  constructor(private readonly routes: Record<string, Route> = {}) {}

  async get(url: string, _options: HttpRequestOptions): Promise<HttpResponse> {
    this.requests.push(url);
    const route = this.routes[url];
    if (route === undefined) {
      throw new Error(`connect ECONNREFUSED ${url}`);
    }
    if (route instanceof Error) {
      throw route;
    }
    return route;
  }
}
