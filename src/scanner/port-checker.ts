import type { Dialer } from '../types/network.js';
import { connectTcp } from './tcp-session.js';

export interface PortChecker {
  check(host: string, port: number, timeoutMs: number): Promise<boolean>;
}

/**
 * Liveness test: a single TCP connect, closed as soon as it succeeds.
 * Refusals, timeouts and resolution failures all read as closed; no retries.
 */
export class TcpPortChecker implements PortChecker {
  private readonly dial: Dialer;

  constructor(dial: Dialer = connectTcp) {
    this.dial = dial;
  }

  async check(host: string, port: number, timeoutMs: number): Promise<boolean> {
    try {
      const socket = await this.dial(host, port, timeoutMs);
      socket.destroy();
      return true;
    } catch {
      return false;
    }
  }
}
