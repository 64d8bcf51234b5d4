import { z } from 'zod';
import { errorMessage } from '../../utils/errors.js';
import { withSession, type TcpSession } from '../tcp-session.js';
import { DATABASE_SERVICES } from '../signatures.js';
import { formatHostForUrl, type DetectionTier, type ProbeContext, type TierDetection } from './types.js';

type Refinement = Pick<TierDetection, 'service' | 'version'> & { details?: Record<string, unknown> };

type Refiner = (context: ProbeContext) => Promise<Refinement | null>;

const REDIS_VERSION_PATTERN = /redis_version:([^\r\n]+)/i;
const MAX_INFO_BYTES = 8192;

const ElasticsearchRootSchema = z.object({
  cluster_name: z.string().optional(),
  version: z.object({ number: z.string() }),
});

const CouchDbRootSchema = z.object({
  couchdb: z.string(),
  version: z.string(),
});

function parseJson(body: string): unknown {
  try {
    return JSON.parse(body);
  } catch {
    return null;
  }
}

// Reads until `done` matches; `timeoutMs` bounds the whole exchange, not each chunk
async function readUntil(session: TcpSession, timeoutMs: number, done: (text: string) => boolean): Promise<string> {
  const deadline = Date.now() + timeoutMs;
  let text = '';
  while (!done(text) && text.length < MAX_INFO_BYTES) {
    const remaining = deadline - Date.now();
    if (remaining <= 0) break;
    const chunk = await session.readText(remaining);
    if (chunk === null) break;
    text += chunk;
  }
  return text;
}

const refineRedis: Refiner = async ({ host, port, timeoutMs, dial }) => {
  const reply = await withSession(host, port, timeoutMs, dial, async (session) => {
    session.write('INFO\r\n');
    return readUntil(session, timeoutMs, (text) => /redis_version:[^\r\n]*\r?\n/i.test(text));
  });

  if (!/redis_version/i.test(reply)) {
    return null;
  }

  const version = reply.match(REDIS_VERSION_PATTERN)?.[1]?.trim() ?? null;
  return { service: 'Redis', version: version || null };
};

const refineElasticsearch: Refiner = async ({ host, port, timeoutMs, http }) => {
  const response = await http.get(`http://${formatHostForUrl(host)}:${port}/`, { timeoutMs });

  if (response.status === 200) {
    const root = ElasticsearchRootSchema.safeParse(parseJson(response.body));
    if (root.success) {
      return {
        service: 'Elasticsearch',
        version: root.data.version.number,
        details: root.data.cluster_name ? { clusterName: root.data.cluster_name } : {},
      };
    }
  }

  return response.body.toLowerCase().includes('elasticsearch')
    ? { service: 'Elasticsearch', version: null }
    : null;
};

const refineCouchDb: Refiner = async ({ host, port, timeoutMs, http }) => {
  const response = await http.get(`http://${formatHostForUrl(host)}:${port}/`, { timeoutMs });
  const root = CouchDbRootSchema.safeParse(parseJson(response.body));
  return root.success ? { service: 'CouchDB', version: root.data.version } : null;
};

const refineInfluxDb: Refiner = async ({ host, port, timeoutMs, http }) => {
  const response = await http.get(`http://${formatHostForUrl(host)}:${port}/ping`, { timeoutMs });
  const version = response.headers['x-influxdb-version'];
  return version ? { service: 'InfluxDB', version } : null;
};

/**
 * Server version from a MySQL protocol v10 handshake: 3-byte length,
 * sequence id, protocol byte 0x0a, then a NUL-terminated version string.
 */
export function parseMySqlGreeting(packet: Buffer): Refinement | null {
  if (packet.length < 6 || packet[4] !== 0x0a) {
    return null;
  }

  const end = packet.indexOf(0, 5);
  if (end === -1) {
    return null;
  }

  const serverVersion = packet.subarray(5, end).toString('latin1');
  if (/mariadb/i.test(serverVersion)) {
    const mariaVersion = serverVersion.match(/(\d+\.\d+\.\d+)-MariaDB/i)?.[1];
    return { service: 'MariaDB', version: mariaVersion ?? serverVersion };
  }

  return { service: 'MySQL', version: serverVersion };
}

const refineMySql: Refiner = async ({ host, port, timeoutMs, dial }) => {
  const greeting = await withSession(host, port, timeoutMs, dial, (session) => session.read(timeoutMs));
  return greeting ? parseMySqlGreeting(greeting) : null;
};

const REFINERS: ReadonlyMap<number, Refiner> = new Map([
  [6379, refineRedis],
  [9200, refineElasticsearch],
  [5984, refineCouchDb],
  [8086, refineInfluxDb],
  [3306, refineMySql],
]);

/**
 * Port-specific probes for well-known database ports, falling back to the
 * static port name when a probe yields nothing.
 */
export class DatabaseTier implements DetectionTier {
  readonly name = 'database';

  appliesTo(port: number): boolean {
    return DATABASE_SERVICES.has(port);
  }

  async detect(context: ProbeContext): Promise<TierDetection | null> {
    const staticName = DATABASE_SERVICES.get(context.port);
    if (staticName === undefined) {
      return null;
    }

    const refine = REFINERS.get(context.port);
    let refinement: Refinement | null = null;

    if (refine) {
      try {
        refinement = await refine(context);
      } catch (error) {
        context.logger.debug(`Database probe failed on port ${context.port}`, { error: errorMessage(error) });
      }
    }

    return {
      service: refinement?.service ?? staticName,
      version: refinement?.version ?? null,
      confidence: 'medium',
      details: refinement?.details ?? {},
    };
  }
}
