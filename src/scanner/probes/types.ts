import type { Logger } from 'winston';
import type { HttpClient } from '../../types/http.js';
import type { Dialer } from '../../types/network.js';
import type { ServiceDetection } from '../../types/scanner.js';

// What a tier reports; the cascade stamps the detection method
export type TierDetection = Omit<ServiceDetection, 'method'>;

export interface ProbeContext {
  host: string;
  port: number;
  timeoutMs: number;
  dial: Dialer;
  http: HttpClient;
  logger: Logger;
}

export interface DetectionTier {
  readonly name: string;
  appliesTo(port: number): boolean;
  // Resolves null when the tier has nothing to say; may reject on unexpected failures
  detect(context: ProbeContext): Promise<TierDetection | null>;
}

export function formatHostForUrl(host: string): string {
  return host.includes(':') && !host.startsWith('[') ? `[${host}]` : host;
}
