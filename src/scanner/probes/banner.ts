import { withSession } from '../tcp-session.js';
import { BANNER_KEYWORDS } from '../signatures.js';
import type { DetectionTier, ProbeContext, TierDetection } from './types.js';

const MAX_BANNER_LENGTH = 200;
const MAX_UNKNOWN_SERVICE_LENGTH = 30;
const PROBE_READ_TIMEOUT_MS = 2000;
const VERSION_PATTERN = /\d+(?:\.\d+)+/;

export function bannerProbes(host: string): string[] {
  return [
    '', // just listen
    `GET / HTTP/1.1\r\nHost: ${host}\r\n\r\n`,
    '\r\n',
    'HELP\r\n',
  ];
}

/**
 * Send the fixed probes in order on one connection and return the first
 * non-blank reply, truncated.
 */
export async function grabBanner({ host, port, timeoutMs, dial }: ProbeContext): Promise<string | null> {
  const readTimeout = Math.min(timeoutMs, PROBE_READ_TIMEOUT_MS);

  return withSession(host, port, timeoutMs, dial, async (session) => {
    for (const probe of bannerProbes(host)) {
      if (probe && !session.write(probe)) {
        break;
      }

      const reply = await session.readText(readTimeout);
      if (reply?.trim()) {
        return reply.slice(0, MAX_BANNER_LENGTH);
      }

      if (!session.isOpen) {
        break;
      }
    }
    return null;
  });
}

export function classifyBanner(banner: string): TierDetection {
  const firstLine = banner.split(/\r?\n/).find((line) => line.trim().length > 0)?.trim() ?? banner.trim();
  const lower = firstLine.toLowerCase();

  const match = BANNER_KEYWORDS.find(({ keyword }) => lower.includes(keyword));
  if (match) {
    return {
      service: match.service,
      version: firstLine.match(VERSION_PATTERN)?.[0] ?? null,
      confidence: 'medium',
      details: { banner },
    };
  }

  return {
    service: firstLine.slice(0, MAX_UNKNOWN_SERVICE_LENGTH),
    version: null,
    confidence: 'low',
    details: { banner },
  };
}

export class BannerTier implements DetectionTier {
  readonly name = 'banner';

  appliesTo(): boolean {
    return true;
  }

  async detect(context: ProbeContext): Promise<TierDetection | null> {
    const banner = await grabBanner(context);
    return banner ? classifyBanner(banner) : null;
  }
}
