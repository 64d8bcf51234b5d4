import { errorMessage } from '../../utils/errors.js';
import { FRAMEWORK_SIGNATURES, HTTPS_FIRST_PORTS, HTTP_PORTS } from '../signatures.js';
import { formatHostForUrl, type DetectionTier, type ProbeContext, type TierDetection } from './types.js';
import type { HttpProtocol, HttpResponse } from '../../types/http.js';

const TITLE_PATTERN = /<title[^>]*>([^<]+)<\/title>/i;
const MAX_TITLE_LENGTH = 50;

export function extractTitle(body: string): string | null {
  const match = body.match(TITLE_PATTERN);
  const title = match?.[1]?.trim();
  return title ? title.slice(0, MAX_TITLE_LENGTH) : null;
}

/**
 * First framework in table order whose indicator occurs in the lower-cased
 * body or `name: value` header lines.
 */
export function detectFramework(body: string, headers: Record<string, string>): string | null {
  const headerText = Object.entries(headers)
    .map(([name, value]) => `${name}: ${value}`)
    .join('\n');
  const haystack = `${body}\n${headerText}`.toLowerCase();

  for (const signature of FRAMEWORK_SIGNATURES) {
    if (signature.indicators.some((indicator) => haystack.includes(indicator))) {
      return signature.name;
    }
  }

  return null;
}

// "nginx/1.18.0 (Ubuntu)" -> product "nginx", version "1.18.0"
export function parseServerHeader(server: string | undefined): { product: string | null; version: string | null } {
  const value = server?.trim();
  if (!value) {
    return { product: null, version: null };
  }

  const slash = value.indexOf('/');
  if (slash === -1) {
    return { product: value.split(/\s+/)[0] ?? null, version: null };
  }

  const product = value.slice(0, slash).trim();
  const version = value.slice(slash + 1).split(/\s+/)[0] ?? '';
  return { product: product || null, version: version || null };
}

export function protocolsFor(port: number): HttpProtocol[] {
  return HTTPS_FIRST_PORTS.has(port) ? ['https', 'http'] : ['http'];
}

export function summarizeHttpResponse(protocol: HttpProtocol, response: HttpResponse): TierDetection {
  const serverHeader = response.headers['server'];
  const framework = detectFramework(response.body, response.headers);
  const { product, version } = parseServerHeader(serverHeader);

  const details: Record<string, unknown> = {
    protocol,
    statusCode: response.status,
    server: serverHeader ?? 'Unknown',
    title: extractTitle(response.body),
    framework,
    contentType: response.headers['content-type'] ?? null,
  };
  if (response.redirect !== undefined) {
    details['redirect'] = response.redirect;
  }
  if (response.responseTimeMs !== undefined) {
    details['responseTimeMs'] = response.responseTimeMs;
  }

  return {
    service: framework ?? product ?? protocol.toUpperCase(),
    version,
    confidence: 'high',
    details,
  };
}

export class HttpTier implements DetectionTier {
  readonly name = 'http';

  appliesTo(port: number): boolean {
    return HTTP_PORTS.has(port);
  }

  async detect({ host, port, timeoutMs, http, logger }: ProbeContext): Promise<TierDetection | null> {
    for (const protocol of protocolsFor(port)) {
      const url = `${protocol}://${formatHostForUrl(host)}:${port}/`;
      try {
        const response = await http.get(url, { timeoutMs });
        return summarizeHttpResponse(protocol, response);
      } catch (error) {
        logger.debug(`HTTP probe failed for ${url}`, { error: errorMessage(error) });
      }
    }

    return null;
  }
}
