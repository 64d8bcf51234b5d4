export const USER_AGENT = 'portsweep/0.1';

/**
 * Flatten response headers into lower-cased single string values.
 */
export function normalizeHeaders(entries: Iterable<[string, unknown]>): Record<string, string> {
  const headers: Record<string, string> = {};

  for (const [name, value] of entries) {
    if (Array.isArray(value)) {
      headers[name.toLowerCase()] = value.map(String).join(', ');
    } else if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
      headers[name.toLowerCase()] = String(value);
    }
  }

  return headers;
}
