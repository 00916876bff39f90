/**
 * Scoped acquisition: release on every exit path from the acquiring code
 */

import { ResourceError, ResourceErrorCode } from '../errors';
import { createLogger } from '../logging/debug';
import { isAsyncDisposable, isDisposable } from '../memory/using-polyfill';

const logger = createLogger('lifeguard:scope');

type ScopeEntry = Disposable | AsyncDisposable;

/**
 * Stack of resources and exit callbacks released in LIFO order
 */
export class ResourceScope implements Disposable, AsyncDisposable {
  private readonly entries: ScopeEntry[] = [];
  private disposed = false;

  /**
   * Add a resource to the scope and hand it back. Entries with only
   * Symbol.asyncDispose need an async exit (withScopeAsync).
   */
  use<T extends ScopeEntry>(resource: T): T {
    this.ensureActive();
    this.entries.push(resource);
    return resource;
  }

  /**
   * Run `onExit` when the scope ends
   */
  defer(onExit: () => void): void {
    this.ensureActive();
    this.entries.push({ [Symbol.dispose]: onExit });
  }

  get size(): number {
    return this.entries.length;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  [Symbol.dispose](): void {
    if (this.disposed) return;
    this.disposed = true;

    const errors: unknown[] = [];
    while (this.entries.length > 0) {
      const entry = this.entries.pop();
      if (!entry) break;
      try {
        if (isDisposable(entry)) {
          entry[Symbol.dispose]();
        } else {
          // Only an async exit can wait for it
          logger.warn('async-only entry reached a synchronous scope exit');
          errors.push(new ResourceError(
            ResourceErrorCode.InvalidOperation,
            'entry can only be disposed asynchronously; use withScopeAsync',
            { context: { operation: 'scope.dispose' } }
          ));
        }
      } catch (error) {
        errors.push(error);
      }
    }
    throwCollected(errors);
  }

  async [Symbol.asyncDispose](): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;

    const errors: unknown[] = [];
    while (this.entries.length > 0) {
      const entry = this.entries.pop();
      if (!entry) break;
      try {
        if (isAsyncDisposable(entry)) {
          await entry[Symbol.asyncDispose]();
        } else {
          entry[Symbol.dispose]();
        }
      } catch (error) {
        errors.push(error);
      }
    }
    throwCollected(errors);
  }

  private ensureActive(): void {
    if (this.disposed) {
      throw new ResourceError(ResourceErrorCode.UseAfterRelease, 'scope has already been disposed', {
        context: { operation: 'scope.use' },
      });
    }
  }
}

function throwCollected(errors: unknown[]): void {
  if (errors.length === 1) {
    throw errors[0];
  } else if (errors.length > 1) {
    throw new AggregateError(errors, 'Multiple disposal errors occurred');
  }
}

/**
 * Execute an operation with a resource that gets released however it exits
 */
export function withResource<T extends Disposable, R>(resource: T, operation: (resource: T) => R): R {
  try {
    return operation(resource);
  } finally {
    resource[Symbol.dispose]();
  }
}

/**
 * Async variant of withResource; release waits for the operation to settle
 */
export async function withResourceAsync<T extends ScopeEntry, R>(
  resource: T,
  operation: (resource: T) => Promise<R>
): Promise<R> {
  try {
    return await operation(resource);
  } finally {
    const entry: ScopeEntry = resource;
    if (isAsyncDisposable(entry)) {
      await entry[Symbol.asyncDispose]();
    } else {
      entry[Symbol.dispose]();
    }
  }
}

/**
 * Open a scope, run `body`, then release everything the body put in it
 */
export function withScope<R>(body: (scope: ResourceScope) => R): R {
  const scope = new ResourceScope();
  try {
    return body(scope);
  } finally {
    scope[Symbol.dispose]();
  }
}

export async function withScopeAsync<R>(body: (scope: ResourceScope) => Promise<R>): Promise<R> {
  const scope = new ResourceScope();
  try {
    return await body(scope);
  } finally {
    await scope[Symbol.asyncDispose]();
  }
}
