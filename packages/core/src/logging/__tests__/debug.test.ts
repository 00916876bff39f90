/**
 * Tests for the lifecycle debug logger
 */

import { afterEach, beforeEach, describe, expect, jest, test } from '@jest/globals';
import {
  DebugLevel,
  DebugOutput,
  LifecycleDebug,
  createLogger,
  getDebug,
  parseDebugLevel,
  type DebugLogEntry,
} from '../debug';

describe('parseDebugLevel', () => {
  test('should parse level names regardless of case', () => {
    expect(parseDebugLevel('trace')).toBe(DebugLevel.Trace);
    expect(parseDebugLevel('WARN')).toBe(DebugLevel.Warn);
  });

  test('should fall back for missing or unknown names', () => {
    expect(parseDebugLevel(undefined)).toBe(DebugLevel.Info);
    expect(parseDebugLevel('loud', DebugLevel.Error)).toBe(DebugLevel.Error);
  });
});

describe('LifecycleDebug', () => {
  let debug: LifecycleDebug;

  beforeEach(() => {
    debug = getDebug();
  });

  test('should be a singleton', () => {
    expect(LifecycleDebug.getInstance()).toBe(debug);
  });

  test('should retain entries in memory', () => {
    const logger = createLogger('lifeguard:test');

    logger.info('file opened', { path: 'a.txt' });

    const [entry] = debug.getLogs();
    expect(entry).toMatchObject({
      level: DebugLevel.Info,
      namespace: 'lifeguard:test',
      message: 'file opened',
      data: { path: 'a.txt' },
    });
  });

  test('should drop entries above the configured level', () => {
    debug.configure({ level: DebugLevel.Warn });
    const logger = createLogger('lifeguard:test');

    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');
    logger.error('shown');

    expect(debug.getLogs().map(entry => DebugLevel[entry.level])).toEqual(['Warn', 'Error']);
  });

  test('should filter by namespace globs', () => {
    debug.configure({ namespace: 'lifeguard:file, lifeguard:conn*' });

    createLogger('lifeguard:file').info('a');
    createLogger('lifeguard:connection').info('b');
    createLogger('lifeguard:registry').info('c');

    expect(debug.getLogs().map(entry => entry.message)).toEqual(['a', 'b']);
  });

  test('should log nothing when disabled', () => {
    debug.configure({ enabled: false });

    createLogger('lifeguard:test').error('ignored');

    expect(debug.getLogs()).toEqual([]);
  });

  test('should redact sensitive fields and truncate long strings', () => {
    debug.configure({ maxArgSize: 4 });

    createLogger('lifeguard:test').info('connect', {
      host: 'localhost',
      password: 'test-secret',
      nested: { apiKey: 'placeholder', port: 5432 },
    });

    expect(debug.getLogs()[0].data).toEqual({
      host: 'loca...[TRUNCATED]',
      password: '[REDACTED]',
      nested: { apiKey: '[REDACTED]', port: 5432 },
    });
  });

  test('should keep only the most recent entries', () => {
    debug.configure({ retainLogs: 2 });
    const logger = createLogger('lifeguard:test');

    logger.info('one');
    logger.info('two');
    logger.info('three');

    expect(debug.getLogs().map(entry => entry.message)).toEqual(['two', 'three']);
    expect(debug.getLogs(1).map(entry => entry.message)).toEqual(['three']);
  });

  test('should hand entries to a custom output', () => {
    const received: DebugLogEntry[] = [];
    debug.configure({ output: DebugOutput.Custom, customOutput: entry => received.push(entry) });

    createLogger('lifeguard:test').child('file').warn('slow close');

    expect(received).toHaveLength(1);
    expect(received[0].namespace).toBe('lifeguard:test:file');
    expect(received[0].message).toBe('slow close');
  });

  describe('console output', () => {
    afterEach(() => {
      jest.restoreAllMocks();
    });

    test('should write errors to console.error with a level prefix', () => {
      const spy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
      debug.configure({ output: DebugOutput.Console });

      createLogger('lifeguard:test').error('release failed', { id: 3 });

      expect(spy).toHaveBeenCalledTimes(1);
      expect(spy).toHaveBeenCalledWith(
        expect.stringMatching(/^\[.+\] ERROR lifeguard:test: release failed$/),
        { id: 3 }
      );
    });

    test('should omit the data argument when there is none', () => {
      const spy = jest.spyOn(console, 'info').mockImplementation(() => undefined);
      debug.configure({ output: DebugOutput.Console });

      createLogger('lifeguard:test').info('acquired');

      expect(spy.mock.calls[0]).toHaveLength(1);
    });
  });
});
