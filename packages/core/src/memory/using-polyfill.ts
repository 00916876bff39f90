/**
 * Polyfill for Symbol.dispose and Symbol.asyncDispose
 * Ensures `using` declarations and disposal helpers work on runtimes
 * that predate explicit resource management
 */

import { createLogger } from '../logging/debug';

if (typeof Symbol.dispose !== 'symbol') {
  Object.defineProperty(Symbol, 'dispose', { value: Symbol.for('Symbol.dispose') });
}

if (typeof Symbol.asyncDispose !== 'symbol') {
  Object.defineProperty(Symbol, 'asyncDispose', { value: Symbol.for('Symbol.asyncDispose') });
}

const logger = createLogger('lifeguard:dispose');

/**
 * Utility to check if an object is disposable
 */
export function isDisposable(obj: unknown): obj is Disposable {
  return typeof obj === 'object' && obj !== null &&
    Symbol.dispose in obj && typeof obj[Symbol.dispose] === 'function';
}

/**
 * Utility to check if an object is async disposable
 */
export function isAsyncDisposable(obj: unknown): obj is AsyncDisposable {
  return typeof obj === 'object' && obj !== null &&
    Symbol.asyncDispose in obj && typeof obj[Symbol.asyncDispose] === 'function';
}

/**
 * Dispose a resource if it's disposable; errors are logged, not rethrown
 */
export function safeDispose(resource: unknown): boolean {
  if (!isDisposable(resource)) {
    return false;
  }
  try {
    resource[Symbol.dispose]();
    return true;
  } catch (error) {
    logger.warn('Error during resource disposal', { error: String(error) });
    return false;
  }
}

/**
 * Async variant of safeDispose, preferring Symbol.asyncDispose
 */
export async function safeAsyncDispose(resource: unknown): Promise<boolean> {
  try {
    if (isAsyncDisposable(resource)) {
      await resource[Symbol.asyncDispose]();
      return true;
    }
    if (isDisposable(resource)) {
      resource[Symbol.dispose]();
      return true;
    }
  } catch (error) {
    logger.warn('Error during async resource disposal', { error: String(error) });
  }
  return false;
}
