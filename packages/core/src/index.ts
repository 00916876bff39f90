/**
 * @fileoverview Core lifecycle primitives for lifeguard
 *
 * This module provides the building blocks for resources whose release is
 * deterministic and idempotent:
 *
 * - ManagedResource base class and its state machine
 * - InstanceRegistry live-instance counting and lifecycle events
 * - Scoped acquisition helpers
 * - Error handling, debug logging and configuration
 */

import './memory/using-polyfill';

export * from './errors/index';
export * from './logging/debug';
export * from './config/index';
export { isDisposable, isAsyncDisposable, safeDispose, safeAsyncDispose } from './memory/using-polyfill';
export * from './resource/managed-resource';
export * from './registry/instance-registry';
export * from './scope/resource-scope';

// Version information
export const VERSION = '0.1.0';
export const SDK_NAME = '@lifeguard/core';
