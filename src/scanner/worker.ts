import type { Logger } from 'winston';
import { runPool } from '../utils/worker-pool.js';
import { errorMessage } from '../utils/errors.js';
import { aggregate } from './result-aggregator.js';
import { UNKNOWN_SERVICE } from './signatures.js';
import type { TcpScanner } from './tcp-scanner.js';
import type { ServiceDetector } from './service-detector.js';
import type {
  PortGroup,
  PortScanWorkerOptions,
  Report,
  ReportSink,
  ScanOptions,
  ScanTarget,
  ServiceDetection,
} from '../types/scanner.js';

export interface ScanJob {
  target: ScanTarget;
  groups: readonly PortGroup[];
  labels?: ReadonlyMap<number, string> | undefined;
}

export interface PortScanWorkerDeps {
  scanner: TcpScanner;
  detector: ServiceDetector;
  logger: Logger;
  sink: ReportSink;
}

export interface DetectionOutcome {
  detections: Map<number, ServiceDetection>;
  interrupted: boolean;
}

/**
 * Runs one scan job: liveness checks over every port, then service
 * identification over the open ones, each phase on its own bounded pool.
 */
export class PortScanWorker {
  private readonly scanner: TcpScanner;
  private readonly detector: ServiceDetector;
  private readonly logger: Logger;
  private readonly sink: ReportSink;
  private readonly detectServices: boolean;
  private readonly maxDetectionConcurrency: number;

  constructor(deps: PortScanWorkerDeps, options: PortScanWorkerOptions = {}) {
    this.scanner = deps.scanner;
    this.detector = deps.detector;
    this.logger = deps.logger;
    this.sink = deps.sink;
    this.detectServices = options.detectServices ?? true;
    this.maxDetectionConcurrency = options.maxDetectionConcurrency ?? 10;
  }

  async run(job: ScanJob, signal?: AbortSignal, onResult?: ScanOptions['onResult']): Promise<Report> {
    const { target } = job;
    const startTime = Date.now();

    const scan = await this.scanner.scan(target, { signal, onResult });
    let interrupted = scan.interrupted;
    let detections = new Map<number, ServiceDetection>();

    const openPorts = scan.results.filter((r) => r.open).map((r) => r.port);

    if (this.detectServices && openPorts.length > 0 && !interrupted) {
      this.sink.info(`Detecting services on ${openPorts.length} open ports (${this.detector.method} mode)...`);
      const outcome = await this.identifyAll(target.host, openPorts, target.timeoutMs, target.concurrency, signal);
      detections = outcome.detections;
      interrupted = outcome.interrupted;
    }

    this.logger.debug(`Job for ${target.host} finished`, {
      ports: target.ports.length,
      open: openPorts.length,
      durationMs: Date.now() - startTime,
      interrupted,
    });

    return aggregate({
      target,
      results: scan.results,
      detections,
      groups: job.groups,
      labels: job.labels,
      interrupted,
    });
  }

  async identifyAll(
    host: string,
    ports: readonly number[],
    timeoutMs: number,
    concurrency: number,
    signal?: AbortSignal
  ): Promise<DetectionOutcome> {
    const outcome = await runPool(ports, (port) => this.detector.identify(host, port, timeoutMs), {
      concurrency: Math.min(concurrency, this.maxDetectionConcurrency),
      signal,
    });

    const detections = new Map<number, ServiceDetection>();
    for (const settlement of outcome.settlements) {
      if (settlement.ok) {
        detections.set(settlement.item, settlement.value);
      } else {
        this.logger.debug(`Service detection failed on port ${settlement.item}`, {
          error: errorMessage(settlement.error),
        });
        detections.set(settlement.item, this.detector.fallback(settlement.item, UNKNOWN_SERVICE));
      }
    }

    return { detections, interrupted: outcome.interrupted };
  }
}
