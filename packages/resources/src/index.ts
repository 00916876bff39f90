/**
 * @fileoverview File and connection resources built on @lifeguard/core
 */

export * from './file/managed-file';
export * from './connection/driver';
export * from './connection/managed-connection';
export * from './manager/resource-manager';
