/**
 * Tests for the connection-backed managed resource
 */

import { beforeEach, describe, expect, test } from '@jest/globals';
import { InstanceRegistry, ResourceErrorCode, ResourceState, type DiagnosticEvent } from '@lifeguard/core';
import { SimulatedDriver } from '../driver';
import { ManagedConnection, type ManagedConnectionOptions } from '../managed-connection';

describe('ManagedConnection', () => {
  let registry: InstanceRegistry;
  let driver: SimulatedDriver;
  let now: number;
  let options: ManagedConnectionOptions;

  beforeEach(() => {
    registry = new InstanceRegistry();
    driver = new SimulatedDriver();
    now = 1_000;
    options = { registry, driver, clock: () => new Date(now) };
  });

  describe('Acquisition', () => {
    test('should connect with default host, port and user', () => {
      const connection = new ManagedConnection({}, options);

      expect(connection.isConnected).toBe(true);
      expect(connection.identifier).toBe('localhost:5432');
      expect(connection.user).toBe('admin');
      expect(driver.opened).toEqual([{ host: 'localhost', port: 5432, user: 'admin', password: undefined }]);
    });

    test('should use explicit target values over defaults', () => {
      const connection = new ManagedConnection(
        { host: 'db.example.com', port: 3306, user: 'developer', password: 'test-secret' },
        { ...options, defaults: { host: 'ignored', port: 1, user: 'ignored' } }
      );

      expect(connection.identifier).toBe('db.example.com:3306');
      expect(driver.opened[0]).toEqual({ host: 'db.example.com', port: 3306, user: 'developer', password: 'test-secret' });
    });

    test('should take fallbacks from the given defaults', () => {
      const connection = new ManagedConnection({ port: 6543 }, { ...options, defaults: { host: 'db.local', port: 1, user: 'ops' } });

      expect(connection.identifier).toBe('db.local:6543');
      expect(connection.user).toBe('ops');
    });

    test('should record a refused connection', () => {
      const refusing = new SimulatedDriver({ refuseHosts: ['down.example.com'] });
      const connection = new ManagedConnection({ host: 'down.example.com' }, { ...options, driver: refusing });

      expect(connection.state).toBe(ResourceState.Failed);
      expect(connection.isConnected).toBe(false);
      expect(connection.acquisitionError?.details).toBe('connection refused by down.example.com:5432');
      expect(connection.execute('SELECT 1')).toBeUndefined();
      expect(refusing.queries).toEqual([]);
    });
  });

  describe('Queries', () => {
    test('should number queries in order', () => {
      const rowsDriver = new SimulatedDriver({ rowsFor: query => query.length });
      const connection = new ManagedConnection({}, { ...options, driver: rowsDriver });

      expect(connection.execute('SELECT 1')).toEqual({ sequence: 1, query: 'SELECT 1', rows: 8 });
      expect(connection.execute('SELECT 22')).toEqual({ sequence: 2, query: 'SELECT 22', rows: 9 });
      expect(connection.operations).toBe(2);
      expect(rowsDriver.queries).toEqual(['SELECT 1', 'SELECT 22']);
    });

    test('should report a failing query and stay connected', () => {
      const failing = new SimulatedDriver({ failQueries: /^DROP/ });
      const connection = new ManagedConnection({}, { ...options, driver: failing });

      expect(connection.execute('DROP TABLE users')).toBeUndefined();
      expect(connection.lastError?.code).toBe(ResourceErrorCode.OperationFailed);
      expect(connection.lastError?.context?.metadata).toEqual({ query: 'DROP TABLE users' });
      expect(connection.isConnected).toBe(true);
      expect(connection.execute('SELECT 1')).toEqual({ sequence: 2, query: 'SELECT 1', rows: 0 });
    });

    test('should refuse queries after release without reaching the driver', () => {
      const connection = new ManagedConnection({}, options);
      connection.release();

      expect(connection.execute('SELECT 1')).toBeUndefined();
      expect(connection.lastError?.details).toBe('connection is closed');
      expect(driver.queries).toEqual([]);
    });
  });

  describe('Release', () => {
    test('should close the session exactly once', () => {
      const connection = new ManagedConnection({}, options);

      connection.release();
      connection.release();
      connection[Symbol.dispose]();

      expect(driver.closed).toBe(1);
      expect(driver.openSessions).toBe(0);
      expect(connection.isConnected).toBe(false);
    });

    test('should not close a session that never opened', () => {
      const refusing = new SimulatedDriver({ refuseHosts: ['localhost'] });
      const connection = new ManagedConnection({}, { ...options, driver: refusing });

      connection.release();

      expect(refusing.closed).toBe(0);
      expect(registry.liveCount('connection')).toBe(0);
    });

    test('should report a failing close and still unregister', () => {
      const diagnostics: DiagnosticEvent[] = [];
      registry.on('diagnostic', event => diagnostics.push(event));
      const flaky = new SimulatedDriver({ failOnClose: true });
      const connection = new ManagedConnection({}, { ...options, driver: flaky });

      connection.release();

      expect(connection.state).toBe(ResourceState.Closed);
      expect(diagnostics.map(event => event.error.message)).toEqual(['Resource release failed: socket hang up']);
      expect(registry.liveCount('connection')).toBe(0);
    });

    test('should summarize the connection in the released event', () => {
      const summaries: Record<string, unknown>[] = [];
      registry.on('released', event => summaries.push(event.summary));
      const connection = new ManagedConnection({}, options);
      connection.execute('SELECT 1');
      now = 1_250;

      connection.release();

      expect(summaries).toEqual([{ operations: 1, connectedMs: 250 }]);
    });
  });

  test('should describe itself', () => {
    const connection = new ManagedConnection({ user: 'developer' }, options);

    expect(connection.describe()).toEqual({
      id: 1,
      kind: 'connection',
      identifier: 'localhost:5432',
      createdAt: new Date(1_000),
      state: ResourceState.Open,
      operations: 0,
      host: 'localhost',
      port: 5432,
      user: 'developer',
      isConnected: true,
      connectedAt: new Date(1_000),
    });
  });
});
