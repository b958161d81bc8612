import { describe, it, expect } from 'vitest';
import winston from 'winston';
import { logger } from '../logger.js';

describe('logger', () => {
  it('writes to a single console transport', () => {
    expect(logger.transports).toHaveLength(1);
    expect(logger.transports[0]).toBeInstanceOf(winston.transports.Console);
  });

  it('is silent under test', () => {
    expect(logger.silent).toBe(true);
  });
});
