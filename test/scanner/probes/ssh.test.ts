import { afterEach, describe, expect, it } from 'vitest';
import { SshTier } from '../../../src/scanner/probes/ssh.js';
import { createSilentLogger } from '../../../src/utils/logger.js';
import { FakeHttpClient, mappedDialer, startFixture, type Fixture } from '../../helpers/fixtures.js';
import type { ProbeContext } from '../../../src/scanner/probes/types.js';

function context(port: number, fixturePort: number): ProbeContext {
  return {
    host: '127.0.0.1',
    port,
    timeoutMs: 1000,
    dial: mappedDialer(new Map([[port, fixturePort]])),
    http: new FakeHttpClient(),
    logger: createSilentLogger(),
  };
}

describe('SshTier', () => {
  let fixture: Fixture | undefined;

  afterEach(async () => {
    await fixture?.close();
    fixture = undefined;
  });

  it('covers port 22 and the low range around it', () => {
    const tier = new SshTier();
    expect([20, 22, 30].map((port) => tier.appliesTo(port))).toEqual([true, true, true]);
    expect([19, 31, 2222].map((port) => tier.appliesTo(port))).toEqual([false, false, false]);
  });

  it('reports the full identification string as the version', async () => {
    fixture = await startFixture((socket) => socket.write('SSH-2.0-OpenSSH_8.9p1 Ubuntu-3\r\n'));

    await expect(new SshTier().detect(context(22, fixture.port))).resolves.toEqual({
      service: 'SSH',
      version: 'SSH-2.0-OpenSSH_8.9p1 Ubuntu-3',
      confidence: 'high',
      details: {},
    });
  });

  it('returns null for a non-SSH greeting', async () => {
    fixture = await startFixture((socket) => socket.write('hello\r\n'));

    await expect(new SshTier().detect(context(22, fixture.port))).resolves.toBeNull();
  });
});
