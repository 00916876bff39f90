/**
 * Abstract managed resource base class with deterministic, idempotent release
 * Supports explicit release() and the Symbol.dispose / Symbol.asyncDispose protocol
 */

import '../memory/using-polyfill';
import {
  ResourceError,
  ResourceErrorCode,
  createResourceError,
  wrapError,
  type ErrorContext,
} from '../errors';
import { createLogger, type DebugLogger } from '../logging/debug';
import type { InstanceRegistry } from '../registry/instance-registry';

/**
 * Lifecycle states shared by every resource kind
 */
export enum ResourceState {
  Uninitialized = 'uninitialized',
  Open = 'open',
  Failed = 'failed',
  Closed = 'closed',
}

export type Clock = () => Date;

export interface ManagedResourceOptions {
  /** Registry that counts this instance while it is live */
  registry: InstanceRegistry;
  /** Time source, injectable for tests */
  clock?: Clock;
  /** Logger, defaults to `lifeguard:<kind>` */
  logger?: DebugLogger;
}

/**
 * Point-in-time view of a resource; never mutates the resource
 */
export interface ResourceSnapshot {
  id: number;
  kind: string;
  identifier: string;
  createdAt: Date;
  state: ResourceState;
  operations: number;
}

/**
 * Base class for everything that holds an external resource.
 *
 * Acquisition happens once, inside the subclass constructor, through
 * {@link acquire}. Release happens at most once; further calls are no-ops.
 * Failures never throw out of public operations: they are stored in
 * {@link lastError}, logged and emitted on the registry as `diagnostic`.
 */
export abstract class ManagedResource implements Disposable, AsyncDisposable {
  readonly kind: string;
  readonly identifier: string;
  readonly id: number;
  readonly createdAt: Date;

  protected readonly registry: InstanceRegistry;
  protected readonly clock: Clock;
  protected readonly logger: DebugLogger;

  private currentState = ResourceState.Uninitialized;
  private operationCount = 0;
  private lastReportedError?: ResourceError;
  private acquisitionFailure?: ResourceError;

  protected constructor(kind: string, identifier: string, options: ManagedResourceOptions) {
    this.kind = kind;
    this.identifier = identifier;
    this.registry = options.registry;
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? createLogger(`lifeguard:${kind}`);
    this.createdAt = this.clock();
    this.id = this.registry.register(this);
  }

  get state(): ResourceState {
    return this.currentState;
  }

  get isOpen(): boolean {
    return this.currentState === ResourceState.Open;
  }

  get isReleased(): boolean {
    return this.currentState === ResourceState.Closed;
  }

  get operations(): number {
    return this.operationCount;
  }

  /**
   * Most recent failure reported by this resource
   */
  get lastError(): ResourceError | undefined {
    return this.lastReportedError;
  }

  /**
   * Why acquisition failed, when it did
   */
  get acquisitionError(): ResourceError | undefined {
    return this.acquisitionFailure;
  }

  snapshot(): ResourceSnapshot {
    return {
      id: this.id,
      kind: this.kind,
      identifier: this.identifier,
      createdAt: this.createdAt,
      state: this.currentState,
      operations: this.operationCount,
    };
  }

  /**
   * Give the resource back. Safe to call any number of times.
   */
  release(): void {
    if (this.currentState === ResourceState.Closed) {
      return;
    }

    const wasOpen = this.currentState === ResourceState.Open;
    const summary = this.describeRelease();
    this.currentState = ResourceState.Closed;

    try {
      if (wasOpen) {
        this.releaseHandle();
      }
    } catch (error) {
      this.report(wrapError(error, ResourceErrorCode.ReleaseFailed, undefined, this.errorContext('release')));
    } finally {
      this.registry.unregister(this, summary);
      this.logger.info(`${this.kind} #${this.id} released`, { identifier: this.identifier, ...summary });
    }
  }

  [Symbol.dispose](): void {
    this.release();
  }

  async [Symbol.asyncDispose](): Promise<void> {
    this.release();
  }

  toString(): string {
    return `${this.kind}#${this.id}(${this.identifier}, ${this.currentState})`;
  }

  /**
   * Run the subclass's acquisition step, recording failure instead of throwing.
   * The registry's `created` event fires here, once the state is settled.
   */
  protected acquire(acquisition: () => void): boolean {
    if (this.currentState !== ResourceState.Uninitialized) {
      return this.rejectOperation('acquire', `already ${this.currentState}`);
    }

    try {
      acquisition();
    } catch (error) {
      this.currentState = ResourceState.Failed;
      this.acquisitionFailure = wrapError(
        error,
        ResourceErrorCode.AcquisitionFailed,
        undefined,
        this.errorContext('acquire', errorMetadata(error))
      );
      this.registry.reportCreated(this);
      this.report(this.acquisitionFailure);
      return false;
    }

    this.currentState = ResourceState.Open;
    this.logger.info(`${this.kind} #${this.id} acquired`, { identifier: this.identifier });
    this.registry.reportCreated(this);
    return true;
  }

  /**
   * Check the resource is open and, when given, that no mode restriction
   * applies. Reports InvalidOperation and returns false otherwise.
   */
  protected checkOperation(operation: string, restriction?: string): boolean {
    if (this.currentState !== ResourceState.Open) {
      return this.rejectOperation(operation, `${this.kind} is ${this.currentState}`);
    }
    if (restriction) {
      return this.rejectOperation(operation, restriction);
    }
    return true;
  }

  /**
   * Count a performed operation and announce it
   */
  protected recordOperation(operation: string, data?: Record<string, unknown>): number {
    this.operationCount++;
    this.registry.reportOperation(this, operation, this.operationCount, data);
    this.logger.debug(`${this.kind} #${this.id} ${operation}`, data);
    return this.operationCount;
  }

  protected report(error: ResourceError): void {
    this.lastReportedError = error;
    this.registry.reportDiagnostic(this, error);
    if (error.code === ResourceErrorCode.InvalidOperation) {
      this.logger.warn(error.message, error.getSanitizedContext());
    } else {
      this.logger.error(error.message, error.getSanitizedContext());
    }
  }

  protected errorContext(operation: string, metadata?: Record<string, unknown>): ErrorContext {
    return {
      operation,
      resourceKind: this.kind,
      resourceId: this.id,
      identifier: this.identifier,
      ...(metadata ? { metadata } : {}),
    };
  }

  /**
   * Figures attached to the `released` event; computed before releaseHandle
   */
  protected describeRelease(): Record<string, unknown> {
    return { operations: this.operationCount };
  }

  /**
   * Close the underlying handle. Called once, only if acquisition succeeded.
   */
  protected abstract releaseHandle(): void;

  private rejectOperation(operation: string, reason: string): false {
    this.report(createResourceError(ResourceErrorCode.InvalidOperation, reason, this.errorContext(operation)));
    return false;
  }
}

function errorMetadata(error: unknown): Record<string, unknown> | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return { errno: error.code };
  }
  return undefined;
}
