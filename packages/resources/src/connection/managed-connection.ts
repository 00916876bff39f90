/**
 * @fileoverview Connection-backed managed resource
 */

import {
  DEFAULT_CONFIG,
  ManagedResource,
  ResourceErrorCode,
  wrapError,
  type ConnectionDefaults,
  type ManagedResourceOptions,
  type ResourceSnapshot,
} from '@lifeguard/core';
import type { ConnectionDriver, ConnectionSession, ConnectionTarget } from './driver';

export const CONNECTION_KIND = 'connection';

export interface ManagedConnectionOptions extends ManagedResourceOptions {
  driver: ConnectionDriver;
  /** Fallbacks for host, port and user (default localhost:5432 as admin) */
  defaults?: ConnectionDefaults;
}

export interface QueryReport {
  /** 1-based position of this query among the connection's operations */
  sequence: number;
  query: string;
  rows: number;
}

export interface ConnectionDescription extends ResourceSnapshot {
  host: string;
  port: number;
  user: string;
  isConnected: boolean;
  connectedAt?: Date;
}

export class ManagedConnection extends ManagedResource {
  readonly host: string;
  readonly port: number;
  readonly user: string;

  private session: ConnectionSession | undefined;
  private connectedAt: Date | undefined;

  constructor(target: Partial<ConnectionTarget>, options: ManagedConnectionOptions) {
    const defaults = options.defaults ?? DEFAULT_CONFIG.connection;
    const host = target.host ?? defaults.host;
    const port = target.port ?? defaults.port;
    super(CONNECTION_KIND, `${host}:${port}`, options);

    this.host = host;
    this.port = port;
    this.user = target.user ?? defaults.user;

    this.logger.debug(`connecting to ${this.identifier} as ${this.user}`);
    this.acquire(() => {
      this.session = options.driver.open({
        host: this.host,
        port: this.port,
        user: this.user,
        password: target.password,
      });
      this.connectedAt = this.clock();
    });
  }

  get isConnected(): boolean {
    return this.isOpen;
  }

  /**
   * Run a query. Returns undefined when not connected or when the query fails.
   */
  execute(query: string): QueryReport | undefined {
    if (!this.checkOperation('execute') || !this.session) {
      return undefined;
    }

    const sequence = this.recordOperation('execute', { query });
    try {
      const result = this.session.execute(query);
      this.logger.debug(`query ${sequence} completed`, { rows: result.rows });
      return { sequence, query, rows: result.rows };
    } catch (error) {
      this.report(wrapError(error, ResourceErrorCode.OperationFailed, undefined, this.errorContext('execute', { query })));
      return undefined;
    }
  }

  describe(): ConnectionDescription {
    return {
      ...this.snapshot(),
      host: this.host,
      port: this.port,
      user: this.user,
      isConnected: this.isConnected,
      connectedAt: this.connectedAt,
    };
  }

  protected describeRelease(): Record<string, unknown> {
    const summary = super.describeRelease();
    if (this.connectedAt) {
      summary.connectedMs = this.clock().getTime() - this.connectedAt.getTime();
    }
    return summary;
  }

  protected releaseHandle(): void {
    const session = this.session;
    this.session = undefined;
    session?.close();
  }
}
