import { describe, expect, it, vi } from 'vitest';
import { PortScanWorker } from '../../src/scanner/worker.js';
import { TcpScanner } from '../../src/scanner/tcp-scanner.js';
import { ServiceDetector } from '../../src/scanner/service-detector.js';
import { createSilentLogger } from '../../src/utils/logger.js';
import { FakeHttpClient, RecordingSink, refusingDialer } from '../helpers/fixtures.js';
import type { PortChecker } from '../../src/scanner/port-checker.js';
import type { DetectionTier } from '../../src/scanner/probes/types.js';
import type { ScanTarget } from '../../src/types/scanner.js';

const logger = createSilentLogger();

const openOnly = (open: number[]): PortChecker => ({
  check: async (_host, port) => open.includes(port),
});

const namingTier: DetectionTier = {
  name: 'naming',
  appliesTo: () => true,
  detect: async ({ port }) => ({ service: `svc-${port}`, version: null, confidence: 'medium', details: {} }),
};

function createWorker(checker: PortChecker, tiers: DetectionTier[], detectServices = true) {
  const sink = new RecordingSink();
  const worker = new PortScanWorker(
    {
      scanner: new TcpScanner(logger, checker),
      detector: new ServiceDetector({ http: new FakeHttpClient(), logger, dial: refusingDialer, tiers }),
      logger,
      sink,
    },
    { detectServices }
  );
  return { worker, sink };
}

const target: ScanTarget = { host: 'localhost', ports: [22, 80, 443], timeoutMs: 200, concurrency: 5 };

describe('PortScanWorker', () => {
  it('identifies every open port and reports the rest as closed', async () => {
    const { worker, sink } = createWorker(openOnly([22, 80]), [namingTier]);

    const report = await worker.run({ target, groups: [] });

    expect(report.openPorts).toEqual([22, 80]);
    expect(report.closedPorts).toEqual([443]);
    expect(report.entries.map((entry) => entry.detection?.service ?? null)).toEqual(['svc-22', 'svc-80', null]);
    expect(sink.infos).toEqual(['Detecting services on 2 open ports (basic mode)...']);
  });

  it('skips identification when detection is off', async () => {
    const { worker, sink } = createWorker(openOnly([22]), [namingTier], false);

    const report = await worker.run({ target, groups: [] });

    expect(report.entries[0]?.detection).toBeNull();
    expect(sink.infos).toEqual([]);
  });

  it('gives a failed identification the Unknown fallback', async () => {
    const { worker } = createWorker(openOnly([80]), [namingTier]);

    const outcome = await worker.identifyAll('localhost', [80], 200, 5);

    expect(outcome.detections.get(80)?.service).toBe('svc-80');

    const failing = new ServiceDetector({ http: new FakeHttpClient(), logger, tiers: [] });
    vi.spyOn(failing, 'identify').mockRejectedValue(new Error('detector down'));
    const broken = new PortScanWorker(
      { scanner: new TcpScanner(logger, openOnly([80])), detector: failing, logger, sink: new RecordingSink() },
      {}
    );

    const fallback = await broken.identifyAll('localhost', [80], 200, 5);
    expect(fallback.detections.get(80)).toEqual({
      service: 'Unknown',
      version: null,
      confidence: 'low',
      method: 'basic',
      details: {},
    });
  });

  it('caps detection concurrency', async () => {
    let active = 0;
    let peak = 0;
    const slowTier: DetectionTier = {
      name: 'slow',
      appliesTo: () => true,
      detect: async () => {
        active++;
        peak = Math.max(peak, active);
        await new Promise((resolve) => setTimeout(resolve, 5));
        active--;
        return null;
      },
    };
    const ports = Array.from({ length: 30 }, (_, i) => 1000 + i);
    const { worker } = createWorker(openOnly(ports), [slowTier]);

    await worker.run({ target: { ...target, ports, concurrency: 50 }, groups: [] });

    expect(peak).toBe(10);
  });

  it('skips identification after an interrupted scan', async () => {
    const controller = new AbortController();
    const checker: PortChecker = {
      check: async () => {
        controller.abort();
        return true;
      },
    };
    const { worker, sink } = createWorker(checker, [namingTier]);

    const report = await worker.run({ target: { ...target, concurrency: 1 }, groups: [] }, controller.signal);

    expect(report.interrupted).toBe(true);
    expect(report.openPorts).toEqual([22]);
    expect(report.entries[0]?.detection).toBeNull();
    expect(sink.infos).toEqual([]);
  });
});
