/**
 * Live-instance registry for managed resources
 * Counts instances per kind, keeps the live set for bulk release and leak
 * diagnostics, and publishes lifecycle events
 */

import '../memory/using-polyfill';
import { EventEmitter } from 'eventemitter3';
import type { ResourceError } from '../errors';
import { createLogger, type DebugLogger } from '../logging/debug';
import type { ManagedResource, ResourceSnapshot } from '../resource/managed-resource';

/**
 * Per-kind counters. `live` always equals `created - released`.
 */
export interface KindStats {
  created: number;
  released: number;
  live: number;
}

export interface CreatedEvent {
  resource: ResourceSnapshot;
  live: number;
}

export interface OperationEvent {
  resource: ResourceSnapshot;
  operation: string;
  count: number;
  data?: Record<string, unknown>;
}

export interface ReleasedEvent {
  resource: ResourceSnapshot;
  live: number;
  summary: Record<string, unknown>;
}

export interface DiagnosticEvent {
  resource: ResourceSnapshot;
  error: ResourceError;
}

export interface RegistryEventMap {
  created: (event: CreatedEvent) => void;
  operation: (event: OperationEvent) => void;
  released: (event: ReleasedEvent) => void;
  diagnostic: (event: DiagnosticEvent) => void;
}

/**
 * Resource held longer than the leak threshold
 */
export interface LeakInfo {
  resource: ResourceSnapshot;
  ageMs: number;
}

export interface InstanceRegistryOptions {
  logger?: DebugLogger;
}

/**
 * Owned counter of live resources.
 *
 * One registry is created by whatever component manages a set of
 * resources and handed to each resource at construction. Disposing the
 * registry releases everything still live, newest first.
 */
export class InstanceRegistry extends EventEmitter<RegistryEventMap> implements Disposable {
  private readonly live = new Map<number, ManagedResource>();
  private readonly stats = new Map<string, KindStats>();
  private readonly logger: DebugLogger;
  private sequence = 0;

  constructor(options: InstanceRegistryOptions = {}) {
    super();
    this.logger = options.logger ?? createLogger('lifeguard:registry');
  }

  /**
   * Count a newly constructed resource and return its instance id.
   * `created` is published once acquisition settles, via {@link reportCreated}.
   */
  register(resource: ManagedResource): number {
    const id = ++this.sequence;
    const stats = this.statsFor(resource.kind);
    stats.created++;
    stats.live++;
    this.live.set(id, resource);

    this.logger.debug(`registered ${resource.kind} #${id}`, { live: stats.live });
    return id;
  }

  /**
   * Publish `created` with the state acquisition left the resource in
   */
  reportCreated(resource: ManagedResource): void {
    const live = this.liveCount(resource.kind);
    this.publish('created', () => this.emit('created', { resource: resource.snapshot(), live }));
  }

  /**
   * Remove a resource from the live set. Returns false when it was not live.
   */
  unregister(resource: ManagedResource, summary: Record<string, unknown> = {}): boolean {
    if (this.live.get(resource.id) !== resource) {
      return false;
    }

    this.live.delete(resource.id);
    const stats = this.statsFor(resource.kind);
    stats.released++;
    stats.live = stats.created - stats.released;

    this.logger.debug(`unregistered ${resource.kind} #${resource.id}`, { live: stats.live });
    this.publish('released', () => this.emit('released', { resource: resource.snapshot(), live: stats.live, summary }));
    return true;
  }

  reportOperation(
    resource: ManagedResource,
    operation: string,
    count: number,
    data?: Record<string, unknown>
  ): void {
    this.publish('operation', () => this.emit('operation', { resource: resource.snapshot(), operation, count, data }));
  }

  reportDiagnostic(resource: ManagedResource, error: ResourceError): void {
    this.publish('diagnostic', () => this.emit('diagnostic', { resource: resource.snapshot(), error }));
  }

  /**
   * Live instances of one kind, or of every kind when omitted
   */
  liveCount(kind?: string): number {
    if (kind === undefined) {
      return this.live.size;
    }
    return this.stats.get(kind)?.live ?? 0;
  }

  getStats(kind: string): KindStats {
    return { ...(this.stats.get(kind) ?? { created: 0, released: 0, live: 0 }) };
  }

  getAllStats(): Record<string, KindStats> {
    const all: Record<string, KindStats> = {};
    for (const [kind, stats] of this.stats) {
      all[kind] = { ...stats };
    }
    return all;
  }

  /**
   * Live resources in creation order
   */
  getLiveResources(kind?: string): ManagedResource[] {
    const resources = Array.from(this.live.values());
    return kind === undefined ? resources : resources.filter(resource => resource.kind === kind);
  }

  /**
   * Resources still live after `thresholdMs`, oldest first
   */
  detectLeaks(thresholdMs: number, now: Date = new Date()): LeakInfo[] {
    const leaks: LeakInfo[] = [];
    for (const resource of this.live.values()) {
      const ageMs = now.getTime() - resource.createdAt.getTime();
      if (ageMs > thresholdMs) {
        leaks.push({ resource: resource.snapshot(), ageMs });
      }
    }
    return leaks.sort((a, b) => b.ageMs - a.ageMs);
  }

  /**
   * Release every live resource, newest first. Returns how many were released.
   */
  releaseAll(kind?: string): number {
    const resources = this.getLiveResources(kind).reverse();
    for (const resource of resources) {
      resource.release();
    }
    if (resources.length > 0) {
      this.logger.info(`released ${resources.length} live resource(s)`, { kind: kind ?? 'all' });
    }
    return resources.length;
  }

  [Symbol.dispose](): void {
    this.releaseAll();
  }

  private statsFor(kind: string): KindStats {
    let stats = this.stats.get(kind);
    if (!stats) {
      stats = { created: 0, released: 0, live: 0 };
      this.stats.set(kind, stats);
    }
    return stats;
  }

  // Listener errors are logged, never rethrown into a constructor or release
  private publish(event: keyof RegistryEventMap, emit: () => void): void {
    try {
      emit();
    } catch (error) {
      this.logger.error(`${event} listener failed`, { error: String(error) });
    }
  }
}
