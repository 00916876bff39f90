/**
 * @fileoverview Connection collaborator contract and an in-process stand-in
 */

export interface ConnectionTarget {
  host: string;
  port: number;
  user: string;
  password?: string;
}

export interface QueryResult {
  rows: number;
}

/**
 * An established session. close() is called at most once by ManagedConnection.
 */
export interface ConnectionSession {
  execute(query: string): QueryResult;
  close(): void;
}

/**
 * Opens sessions against some external service
 */
export interface ConnectionDriver {
  open(target: ConnectionTarget): ConnectionSession;
}

export interface SimulatedDriverOptions {
  /** Hosts that refuse connections */
  refuseHosts?: string[];
  /** Queries matching this pattern fail */
  failQueries?: RegExp;
  /** Make close() throw */
  failOnClose?: boolean;
  /** Row count reported for each query (default 0) */
  rowsFor?: (query: string) => number;
}

/**
 * Driver with no I/O and no timing: records what it is asked to do
 */
export class SimulatedDriver implements ConnectionDriver {
  readonly opened: ConnectionTarget[] = [];
  readonly queries: string[] = [];
  private closedSessions = 0;
  private readonly options: SimulatedDriverOptions;

  constructor(options: SimulatedDriverOptions = {}) {
    this.options = options;
  }

  get closed(): number {
    return this.closedSessions;
  }

  get openSessions(): number {
    return this.opened.length - this.closedSessions;
  }

  open(target: ConnectionTarget): ConnectionSession {
    if (this.options.refuseHosts?.includes(target.host)) {
      throw new Error(`connection refused by ${target.host}:${target.port}`);
    }

    this.opened.push({ ...target });
    let open = true;

    return {
      execute: (query: string): QueryResult => {
        if (!open) {
          throw new Error('session is closed');
        }
        this.queries.push(query);
        if (this.options.failQueries?.test(query)) {
          throw new Error(`query rejected: ${query}`);
        }
        return { rows: this.options.rowsFor?.(query) ?? 0 };
      },
      close: (): void => {
        if (!open) {
          throw new Error('session already closed');
        }
        open = false;
        this.closedSessions++;
        if (this.options.failOnClose) {
          throw new Error('socket hang up');
        }
      },
    };
  }
}
