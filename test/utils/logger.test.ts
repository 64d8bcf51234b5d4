import { describe, expect, it } from 'vitest';
import { createLogger, createSilentLogger } from '../../src/utils/logger.js';

describe('createLogger', () => {
  it('uses the requested level', () => {
    expect(createLogger({ name: 'scan', level: 'debug', silent: true }).level).toBe('debug');
  });

  it('builds silent loggers for tests', () => {
    const logger = createSilentLogger();
    expect(logger.silent).toBe(true);
    expect(logger.transports).toHaveLength(1);
  });
});
