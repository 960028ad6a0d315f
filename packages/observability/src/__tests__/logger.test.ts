/**
 * Tests for the ledger logger
 * Verifies amount rendering, base bindings and error serialization
 */

import { describe, it, expect } from 'vitest';
import { createLogger, stringifyAmounts } from '../logger.js';

function captureLogs() {
  const logs: string[] = [];
  const stream = {
    write: (log: string) => {
      logs.push(log);
    },
  };
  return { logs, stream };
}

describe('createLogger', () => {
  describe('Amount rendering', () => {
    it('should render bigint fields as decimal strings', () => {
      const { logs, stream } = captureLogs();
      const logger = createLogger({ level: 'info' }, stream);

      logger.info({ value: 1000000000000000000000000n }, 'transfer committed');

      expect(logs[0]).toBeDefined();
      const logEntry = JSON.parse(logs[0]!);
      expect(logEntry.value).toBe('1000000000000000000000000');
      expect(logEntry.msg).toBe('transfer committed');
    });

    it('should render nested bigint fields and arrays', () => {
      const { logs, stream } = captureLogs();
      const logger = createLogger({ level: 'info' }, stream);

      logger.info({ balances: { alice: 5n, bob: 0n }, amounts: [1n, 2n] });

      const logEntry = JSON.parse(logs[0]!);
      expect(logEntry.balances).toEqual({ alice: '5', bob: '0' });
      expect(logEntry.amounts).toEqual(['1', '2']);
    });

    it('should leave non-bigint values untouched', () => {
      const { logs, stream } = captureLogs();
      const logger = createLogger({ level: 'info' }, stream);

      logger.info({ op: 'approve', enabled: true, count: 3 });

      const logEntry = JSON.parse(logs[0]!);
      expect(logEntry.op).toBe('approve');
      expect(logEntry.enabled).toBe(true);
      expect(logEntry.count).toBe(3);
    });
  });

  describe('Bindings', () => {
    it('should tag every line with the service name', () => {
      const { logs, stream } = captureLogs();
      const logger = createLogger({ level: 'info' }, stream);

      logger.info('hello');

      const logEntry = JSON.parse(logs[0]!);
      expect(logEntry.service).toBe('mintable-ledger');
      expect(logEntry.pid).toBeUndefined();
    });

    it('should write ISO 8601 timestamps', () => {
      const { logs, stream } = captureLogs();
      const logger = createLogger({ level: 'info' }, stream);

      logger.info('hello');

      const logEntry = JSON.parse(logs[0]!);
      expect(logEntry.time).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
    });

    it('should respect the configured level', () => {
      const { logs, stream } = captureLogs();
      const logger = createLogger({ level: 'warn' }, stream);

      logger.info('dropped');
      logger.warn('kept');

      expect(logs).toHaveLength(1);
      expect(JSON.parse(logs[0]!).msg).toBe('kept');
    });
  });

  describe('Error serialization', () => {
    it('should serialize errors under err with their enumerable fields', () => {
      const { logs, stream } = captureLogs();
      const logger = createLogger({ level: 'info' }, stream);

      const error = Object.assign(new Error('allowance exhausted'), { code: 'INSUFFICIENT_ALLOWANCE' });
      logger.warn({ err: error, value: 7n }, 'operation rejected');

      const logEntry = JSON.parse(logs[0]!);
      expect(logEntry.err.message).toBe('allowance exhausted');
      expect(logEntry.err.type).toBe('Error');
      expect(logEntry.err.code).toBe('INSUFFICIENT_ALLOWANCE');
      expect(logEntry.value).toBe('7');
    });
  });
});

describe('stringifyAmounts', () => {
  it('should convert top-level and nested bigints without mutating the input', () => {
    const input = { a: 1n, nested: { b: 2n }, list: [3n, 'x'] };

    const result = stringifyAmounts(input);

    expect(result).toEqual({ a: '1', nested: { b: '2' }, list: ['3', 'x'] });
    expect(input.a).toBe(1n);
  });

  it('should keep Date instances as they are', () => {
    const when = new Date('2024-01-01T00:00:00.000Z');

    const result = stringifyAmounts({ when });

    expect(result.when).toBe(when);
  });
});
