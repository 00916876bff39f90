/**
 * @fileoverview Owner of a set of managed resources
 *
 * Holds the configuration, the InstanceRegistry counting this manager's
 * resources and the connection driver, and builds resources wired to them.
 * Disposing the manager releases, newest first, the resources it created that
 * are still live; others sharing the registry are left alone.
 */

import {
  InstanceRegistry,
  ResourceError,
  ResourceErrorCode,
  createLogger,
  type ManagedResource,
  mergeConfig,
  withScope,
  type Clock,
  type LifeguardConfig,
  type LifeguardConfigOverrides,
  type ResourceScope,
} from '@lifeguard/core';
import { SimulatedDriver, type ConnectionDriver, type ConnectionTarget } from '../connection/driver';
import { ManagedConnection } from '../connection/managed-connection';
import { ManagedFile, type FileMode } from '../file/managed-file';

export interface ResourceManagerOptions {
  /** Fully resolved configuration; built with mergeConfig() when omitted */
  config?: LifeguardConfig;
  /** Overrides applied when `config` is omitted */
  overrides?: LifeguardConfigOverrides;
  registry?: InstanceRegistry;
  driver?: ConnectionDriver;
  clock?: Clock;
}

const logger = createLogger('lifeguard:manager');

export class ResourceManager implements Disposable {
  readonly config: LifeguardConfig;
  readonly registry: InstanceRegistry;
  readonly driver: ConnectionDriver;
  private readonly clock?: Clock;
  private owned: ManagedResource[] = [];
  private disposed = false;

  constructor(options: ResourceManagerOptions = {}) {
    this.config = options.config ?? mergeConfig(options.overrides);
    this.registry = options.registry ?? new InstanceRegistry();
    this.driver = options.driver ?? new SimulatedDriver();
    this.clock = options.clock;
  }

  openFile(identifier: string, mode: FileMode = 'write'): ManagedFile {
    this.ensureActive('openFile');
    return this.track(new ManagedFile(identifier, mode, {
      registry: this.registry,
      clock: this.clock,
      workDir: this.config.workDir,
      markers: this.config.fileMarkers,
    }));
  }

  connect(target: Partial<ConnectionTarget> = {}): ManagedConnection {
    this.ensureActive('connect');
    return this.track(new ManagedConnection(target, {
      registry: this.registry,
      clock: this.clock,
      driver: this.driver,
      defaults: this.config.connection,
    }));
  }

  /**
   * Run `body` with a scope; resources it `use`s are released on exit
   */
  scoped<R>(body: (scope: ResourceScope, manager: this) => R): R {
    return withScope(scope => body(scope, this));
  }

  /**
   * Live resources in the registry, including any created by other owners
   */
  liveCount(kind?: string): number {
    return this.registry.liveCount(kind);
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  [Symbol.dispose](): void {
    if (this.disposed) return;
    this.disposed = true;
    const live = this.owned.filter(resource => !resource.isReleased).reverse();
    this.owned = [];
    for (const resource of live) {
      resource.release();
    }
    logger.info('resource manager disposed', { released: live.length });
  }

  private track<T extends ManagedResource>(resource: T): T {
    this.owned = this.owned.filter(held => !held.isReleased);
    this.owned.push(resource);
    return resource;
  }

  private ensureActive(operation: string): void {
    if (this.disposed) {
      throw new ResourceError(ResourceErrorCode.UseAfterRelease, 'resource manager has been disposed', {
        context: { operation, component: 'ResourceManager' },
      });
    }
  }
}
