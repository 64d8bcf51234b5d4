import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { TcpPortChecker } from '../../src/scanner/port-checker.js';
import { closedPort, startFixture, type Fixture } from '../helpers/fixtures.js';

describe('TcpPortChecker', () => {
  let fixture: Fixture;

  beforeAll(async () => {
    fixture = await startFixture(() => undefined);
  });

  afterAll(async () => {
    await fixture.close();
  });

  it('reports a listening port as open', async () => {
    await expect(new TcpPortChecker().check('127.0.0.1', fixture.port, 1000)).resolves.toBe(true);
  });

  it('reports a refused port as closed', async () => {
    const port = await closedPort();
    await expect(new TcpPortChecker().check('127.0.0.1', port, 1000)).resolves.toBe(false);
  });

  it('reports a dial failure as closed', async () => {
    const checker = new TcpPortChecker(() => Promise.reject(new Error('getaddrinfo ENOTFOUND nowhere')));
    await expect(checker.check('nowhere', 80, 1000)).resolves.toBe(false);
  });
});
