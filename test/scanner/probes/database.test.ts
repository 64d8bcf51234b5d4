import { afterEach, describe, expect, it } from 'vitest';
import { DatabaseTier, parseMySqlGreeting } from '../../../src/scanner/probes/database.js';
import { createSilentLogger } from '../../../src/utils/logger.js';
import {
  FakeHttpClient,
  mappedDialer,
  refusingDialer,
  startFixture,
  type Fixture,
} from '../../helpers/fixtures.js';
import type { ProbeContext } from '../../../src/scanner/probes/types.js';
import type { Dialer } from '../../../src/types/network.js';

function context(port: number, options: { dial?: Dialer; http?: FakeHttpClient } = {}): ProbeContext {
  return {
    host: '127.0.0.1',
    port,
    timeoutMs: 1000,
    dial: options.dial ?? refusingDialer,
    http: options.http ?? new FakeHttpClient(),
    logger: createSilentLogger(),
  };
}

function greeting(version: string, protocol = 0x0a): Buffer {
  const payload = Buffer.concat([Buffer.from([protocol]), Buffer.from(version, 'latin1'), Buffer.from([0, 1, 2, 3])]);
  const header = Buffer.from([payload.length & 0xff, (payload.length >> 8) & 0xff, 0, 0]);
  return Buffer.concat([header, payload]);
}

describe('parseMySqlGreeting', () => {
  it('reads the MySQL server version', () => {
    expect(parseMySqlGreeting(greeting('8.0.33'))).toEqual({ service: 'MySQL', version: '8.0.33' });
  });

  it('recognizes MariaDB', () => {
    expect(parseMySqlGreeting(greeting('5.5.5-10.6.12-MariaDB-log'))).toEqual({
      service: 'MariaDB',
      version: '10.6.12',
    });
  });

  it('rejects other protocols and truncated packets', () => {
    expect(parseMySqlGreeting(greeting('8.0.33', 0x09))).toBeNull();
    expect(parseMySqlGreeting(Buffer.from([1, 0, 0, 0, 0x0a]))).toBeNull();
    expect(parseMySqlGreeting(Buffer.from([9, 0, 0, 0, 0x0a, 0x38, 0x2e, 0x30]))).toBeNull();
  });
});

describe('DatabaseTier', () => {
  const tier = new DatabaseTier();
  let fixture: Fixture | undefined;

  afterEach(async () => {
    await fixture?.close();
    fixture = undefined;
  });

  it('applies to well-known database ports only', () => {
    expect(tier.appliesTo(5432)).toBe(true);
    expect(tier.appliesTo(27017)).toBe(true);
    expect(tier.appliesTo(8080)).toBe(false);
  });

  it('reads the Redis version from INFO', async () => {
    fixture = await startFixture((socket) => {
      socket.on('data', (data) => {
        if (data.toString().startsWith('INFO')) {
          socket.write('$48\r\n# Server\r\nredis_version:6.0.9\r\nredis_mode:standalone\r\n');
        }
      });
    });

    const detection = await tier.detect(context(6379, { dial: mappedDialer(new Map([[6379, fixture.port]])) }));

    expect(detection).toEqual({ service: 'Redis', version: '6.0.9', confidence: 'medium', details: {} });
  });

  it('stops reading a Redis reply that trickles past the timeout', async () => {
    fixture = await startFixture((socket) => {
      socket.on('data', () => {
        const timer = setInterval(() => socket.write('x'), 50);
        socket.on('close', () => clearInterval(timer));
      });
    });
    const startTime = Date.now();

    const detection = await tier.detect({
      ...context(6379, { dial: mappedDialer(new Map([[6379, fixture.port]])) }),
      timeoutMs: 300,
    });

    expect(Date.now() - startTime).toBeLessThan(1500);
    expect(detection).toEqual({ service: 'Redis', version: null, confidence: 'medium', details: {} });
  });

  it('keeps the static name when the Redis probe fails', async () => {
    await expect(tier.detect(context(6379))).resolves.toEqual({
      service: 'Redis',
      version: null,
      confidence: 'medium',
      details: {},
    });
  });

  it('reads the MySQL handshake', async () => {
    fixture = await startFixture((socket) => socket.write(greeting('8.0.33')));

    const detection = await tier.detect(context(3306, { dial: mappedDialer(new Map([[3306, fixture.port]])) }));

    expect(detection?.service).toBe('MySQL');
    expect(detection?.version).toBe('8.0.33');
  });

  it('reads the Elasticsearch version from the root document', async () => {
    const http = new FakeHttpClient({
      'http://127.0.0.1:9200/': {
        status: 200,
        headers: { 'content-type': 'application/json' },
        body: JSON.stringify({ cluster_name: 'docker-cluster', version: { number: '7.10.2' } }),
      },
    });

    await expect(tier.detect(context(9200, { http }))).resolves.toEqual({
      service: 'Elasticsearch',
      version: '7.10.2',
      confidence: 'medium',
      details: { clusterName: 'docker-cluster' },
    });
  });

  it('reads the CouchDB welcome document', async () => {
    const http = new FakeHttpClient({
      'http://127.0.0.1:5984/': {
        status: 200,
        headers: {},
        body: '{"couchdb":"Welcome","version":"3.3.2"}',
      },
    });

    const detection = await tier.detect(context(5984, { http }));

    expect(detection?.service).toBe('CouchDB');
    expect(detection?.version).toBe('3.3.2');
  });

  it('reads the InfluxDB version header from /ping', async () => {
    const http = new FakeHttpClient({
      'http://127.0.0.1:8086/ping': { status: 204, headers: { 'x-influxdb-version': '1.8.10' }, body: '' },
    });

    const detection = await tier.detect(context(8086, { http }));

    expect(http.requests).toEqual(['http://127.0.0.1:8086/ping']);
    expect(detection?.service).toBe('InfluxDB');
    expect(detection?.version).toBe('1.8.10');
  });

  it('names PostgreSQL without probing', async () => {
    await expect(tier.detect(context(5432))).resolves.toEqual({
      service: 'PostgreSQL',
      version: null,
      confidence: 'medium',
      details: {},
    });
  });
});
