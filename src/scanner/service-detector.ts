import type { Logger } from 'winston';
import { errorMessage } from '../utils/errors.js';
import { connectTcp } from './tcp-session.js';
import { DEFAULT_SERVICES, UNKNOWN_SERVICE } from './signatures.js';
import { SshTier } from './probes/ssh.js';
import { HttpTier } from './probes/http.js';
import { DatabaseTier } from './probes/database.js';
import { BannerTier } from './probes/banner.js';
import type { DetectionTier, ProbeContext } from './probes/types.js';
import type { HttpClient } from '../types/http.js';
import type { Dialer } from '../types/network.js';
import type { DetectionMethod, ServiceDetection } from '../types/scanner.js';

export interface ServiceDetectorOptions {
  http: HttpClient;
  logger: Logger;
  dial?: Dialer | undefined;
  tiers?: DetectionTier[] | undefined;
}

export function createDefaultTiers(): DetectionTier[] {
  return [new SshTier(), new HttpTier(), new DatabaseTier(), new BannerTier()];
}

/**
 * Tiered service identification for open ports.
 *
 * Tiers run in order and the first one to return a detection wins; a tier
 * that fails is logged and skipped. When every tier comes back empty the
 * port gets its well-known name (or `Unknown`) at low confidence.
 */
export class ServiceDetector {
  private readonly tiers: DetectionTier[];
  private readonly http: HttpClient;
  private readonly dial: Dialer;
  private readonly logger: Logger;

  constructor(options: ServiceDetectorOptions) {
    this.http = options.http;
    this.logger = options.logger;
    this.dial = options.dial ?? connectTcp;
    this.tiers = options.tiers ?? createDefaultTiers();
  }

  get method(): DetectionMethod {
    return this.http.method;
  }

  async identify(host: string, port: number, timeoutMs: number): Promise<ServiceDetection> {
    const context: ProbeContext = {
      host,
      port,
      timeoutMs,
      dial: this.dial,
      http: this.http,
      logger: this.logger,
    };

    for (const tier of this.tiers) {
      if (!tier.appliesTo(port)) continue;

      try {
        const detection = await tier.detect(context);
        if (detection) {
          this.logger.debug(`Port ${port} identified by ${tier.name} tier`, {
            service: detection.service,
            confidence: detection.confidence,
          });
          return { ...detection, method: this.method };
        }
      } catch (error) {
        this.logger.debug(`${tier.name} tier failed on port ${port}`, { error: errorMessage(error) });
      }
    }

    return this.fallback(port);
  }

  fallback(port: number, service: string = DEFAULT_SERVICES.get(port) ?? UNKNOWN_SERVICE): ServiceDetection {
    return {
      service,
      version: null,
      confidence: 'low',
      method: this.method,
      details: {},
    };
  }
}
