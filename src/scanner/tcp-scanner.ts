import type { Logger } from 'winston';
import { runPool } from '../utils/worker-pool.js';
import { errorMessage } from '../utils/errors.js';
import { TcpPortChecker, type PortChecker } from './port-checker.js';
import type { ScanOptions, ScanOutcome, ScanResult, ScanTarget } from '../types/scanner.js';

export class TcpScanner {
  private readonly checker: PortChecker;
  private readonly logger: Logger;

  constructor(logger: Logger, checker: PortChecker = new TcpPortChecker()) {
    this.logger = logger;
    this.checker = checker;
  }

  /**
   * Check every port of `target` over a pool of `target.concurrency` workers.
   *
   * Each started port yields exactly one result, sorted ascending by port.
   * When `signal` aborts, unstarted ports are left out and the outcome is
   * flagged as interrupted.
   */
  async scan(target: ScanTarget, options: ScanOptions = {}): Promise<ScanOutcome> {
    const { host, timeoutMs } = target;
    const startTime = Date.now();

    this.logger.debug(`Scanning ${target.ports.length} ports on ${host}`, {
      concurrency: target.concurrency,
      timeoutMs,
    });

    const outcome = await runPool(
      target.ports,
      async (port) => this.checker.check(host, port, timeoutMs),
      {
        concurrency: target.concurrency,
        signal: options.signal,
        onSettled: (settlement, completed, total) => {
          options.onResult?.({ port: settlement.item, open: settlement.ok && settlement.value }, completed, total);
        },
      }
    );

    const results: ScanResult[] = outcome.settlements.map((settlement) => {
      if (settlement.ok) {
        return { port: settlement.item, open: settlement.value };
      }
      this.logger.debug(`Error checking port ${settlement.item}`, { error: errorMessage(settlement.error) });
      return { port: settlement.item, open: false };
    });

    results.sort((a, b) => a.port - b.port);

    const openCount = results.filter((r) => r.open).length;
    this.logger.debug(`Scan of ${host} finished: ${openCount} open of ${results.length} checked`, {
      durationMs: Date.now() - startTime,
      interrupted: outcome.interrupted,
    });

    return { results, interrupted: outcome.interrupted };
  }
}
