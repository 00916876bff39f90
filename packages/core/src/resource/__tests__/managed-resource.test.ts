/**
 * Test suite for the managed resource base class
 */

import { beforeEach, describe, expect, jest, test } from '@jest/globals';
import { ResourceState } from '../managed-resource';
import { InstanceRegistry, type DiagnosticEvent } from '../../registry/instance-registry';
import { ResourceErrorCode } from '../../errors';
import { TestResource } from './test-resource';

describe('ManagedResource', () => {
  let registry: InstanceRegistry;

  beforeEach(() => {
    registry = new InstanceRegistry();
  });

  describe('Acquisition', () => {
    test('should be open and counted after construction', () => {
      const created = new Date('2024-01-15T09:30:05.000Z');
      const resource = new TestResource(registry, { clock: () => created });

      expect(resource.state).toBe(ResourceState.Open);
      expect(resource.isOpen).toBe(true);
      expect(resource.id).toBe(1);
      expect(resource.createdAt).toBe(created);
      expect(registry.liveCount('test')).toBe(1);
    });

    test('should record acquisition failure without throwing', () => {
      const resource = new TestResource(registry, { failAcquire: true });

      expect(resource.state).toBe(ResourceState.Failed);
      expect(resource.isOpen).toBe(false);
      expect(resource.acquisitionError?.code).toBe(ResourceErrorCode.AcquisitionFailed);
      expect(resource.acquisitionError?.message).toBe('Resource acquisition failed: target unavailable');
      expect(resource.acquisitionError?.context?.metadata).toEqual({ errno: 'ENOENT' });
      expect(resource.lastError).toBe(resource.acquisitionError);
    });

    test('should still count a failed instance until it is released', () => {
      const resource = new TestResource(registry, { failAcquire: true });
      expect(registry.liveCount('test')).toBe(1);

      resource.release();

      expect(resource.state).toBe(ResourceState.Closed);
      expect(resource.releaseCalls).toBe(0);
      expect(registry.liveCount('test')).toBe(0);
    });

    test('should reject operations on a failed instance', () => {
      const resource = new TestResource(registry, { failAcquire: true });

      expect(resource.touch()).toBe(false);
      expect(resource.operations).toBe(0);
      expect(resource.lastError?.code).toBe(ResourceErrorCode.InvalidOperation);
      expect(resource.lastError?.details).toBe('test is failed');
    });
  });

  describe('Operations', () => {
    test('should count operations while open', () => {
      const resource = new TestResource(registry);

      expect(resource.touch()).toBe(true);
      expect(resource.touch()).toBe(true);
      expect(resource.operations).toBe(2);
      expect(resource.lastError).toBeUndefined();
    });

    test('should report but not throw after release', () => {
      const resource = new TestResource(registry);
      resource.touch();
      resource.release();

      expect(() => resource.touch()).not.toThrow();
      expect(resource.touch()).toBe(false);
      expect(resource.operations).toBe(1);
      expect(resource.lastError?.code).toBe(ResourceErrorCode.InvalidOperation);
      expect(resource.lastError?.context?.operation).toBe('touch');
    });

    test('should emit a diagnostic event for rejected operations', () => {
      const resource = new TestResource(registry);
      resource.release();
      const diagnostics: DiagnosticEvent[] = [];
      registry.on('diagnostic', event => diagnostics.push(event));

      resource.touch();

      expect(diagnostics).toHaveLength(1);
      expect(diagnostics[0].error.code).toBe(ResourceErrorCode.InvalidOperation);
      expect(diagnostics[0].resource.state).toBe(ResourceState.Closed);
    });
  });

  describe('Release', () => {
    test('should release exactly once', () => {
      const resource = new TestResource(registry);

      resource.release();
      resource.release();

      expect(resource.releaseCalls).toBe(1);
      expect(resource.isReleased).toBe(true);
      expect(registry.getStats('test')).toEqual({ created: 1, released: 1, live: 0 });
    });

    test('should release through Symbol.dispose', () => {
      const resource = new TestResource(registry);

      resource[Symbol.dispose]();

      expect(resource.releaseCalls).toBe(1);
      expect(resource.state).toBe(ResourceState.Closed);
    });

    test('should release through Symbol.asyncDispose', async () => {
      const resource = new TestResource(registry);

      await resource[Symbol.asyncDispose]();
      resource.release();

      expect(resource.releaseCalls).toBe(1);
    });

    test('should mark closed and unregister when release fails', () => {
      const resource = new TestResource(registry, { failRelease: true });

      expect(() => resource.release()).not.toThrow();

      expect(resource.state).toBe(ResourceState.Closed);
      expect(resource.lastError?.code).toBe(ResourceErrorCode.ReleaseFailed);
      expect(resource.lastError?.message).toBe('Resource release failed: flush failed');
      expect(registry.liveCount('test')).toBe(0);
    });

    test('should attach the operation count to the released event', () => {
      const resource = new TestResource(registry);
      const listener = jest.fn();
      registry.on('released', listener);

      resource.touch();
      resource.release();
      resource.release();

      expect(listener).toHaveBeenCalledTimes(1);
      expect(listener).toHaveBeenCalledWith(expect.objectContaining({
        live: 0,
        summary: { operations: 1 },
      }));
    });
  });

  test('should describe itself for debugging', () => {
    const resource = new TestResource(registry);
    expect(resource.toString()).toBe('test#1(test://resource, open)');

    resource.release();
    expect(resource.toString()).toBe('test#1(test://resource, closed)');
  });
});
