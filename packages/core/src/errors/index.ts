/**
 * @fileoverview Error handling infrastructure for lifeguard
 *
 * Structured error codes and the ResourceError class used to report
 * acquisition, operation and release failures.
 */

export * from './codes';
export * from './resource-error';
