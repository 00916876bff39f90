/**
 * Debug logging for resource lifecycle events
 * Environment-controlled namespaced logging with console, memory and custom outputs
 */

/**
 * Debug logging levels
 */
export enum DebugLevel {
  Error = 0,
  Warn = 1,
  Info = 2,
  Debug = 3,
  Trace = 4,
}

/**
 * Debug output destinations
 */
export enum DebugOutput {
  Console = 'console',
  Memory = 'memory',
  Custom = 'custom',
}

/**
 * Debug namespace configuration
 */
export interface DebugConfig {
  /** Enable/disable debug logging */
  enabled: boolean;
  /** Namespace filter (e.g., 'lifeguard:file,lifeguard:registry') */
  namespace: string;
  /** Log level threshold */
  level: DebugLevel;
  /** Output destination */
  output: DebugOutput;
  /** Receives entries when output is Custom */
  customOutput?: (entry: DebugLogEntry) => void;
  /** Maximum string size to log before truncation */
  maxArgSize: number;
  /** Redact sensitive fields */
  sanitizeData: boolean;
  /** Number of entries retained in memory */
  retainLogs: number;
}

/**
 * Debug log entry
 */
export interface DebugLogEntry {
  timestamp: Date;
  level: DebugLevel;
  namespace: string;
  message: string;
  data?: unknown;
}

const LEVEL_NAMES: Record<string, DebugLevel> = {
  error: DebugLevel.Error,
  warn: DebugLevel.Warn,
  info: DebugLevel.Info,
  debug: DebugLevel.Debug,
  trace: DebugLevel.Trace,
};

/**
 * Parse a level name ('warn', 'DEBUG', ...) falling back to Info
 */
export function parseDebugLevel(value: string | undefined, fallback = DebugLevel.Info): DebugLevel {
  if (!value) {
    return fallback;
  }
  return LEVEL_NAMES[value.toLowerCase()] ?? fallback;
}

/**
 * Glob-style namespace matcher
 */
class DebugNamespace {
  private readonly pattern: RegExp;

  constructor(namespace: string) {
    const escaped = namespace
      .replace(/[.+^${}()|[\]\\]/g, '\\$&')
      .replace(/\*/g, '.*')
      .replace(/\?/g, '.');
    this.pattern = new RegExp(`^${escaped}$`);
  }

  matches(namespace: string): boolean {
    return this.pattern.test(namespace);
  }
}

/**
 * Lifecycle debug hub: filters, sanitizes and routes log entries
 */
export class LifecycleDebug {
  private static instance: LifecycleDebug | null = null;

  private config: DebugConfig;
  private namespaces: DebugNamespace[] = [];
  private readonly logs: DebugLogEntry[] = [];

  private constructor(config?: Partial<DebugConfig>) {
    this.config = {
      enabled: true,
      namespace: process.env.DEBUG ?? '',
      level: parseDebugLevel(process.env.DEBUG_LEVEL, DebugLevel.Warn),
      output: DebugOutput.Console,
      maxArgSize: 1024,
      sanitizeData: true,
      retainLogs: 1000,
      ...config,
    };
    this.initializeNamespaces();
  }

  static getInstance(config?: Partial<DebugConfig>): LifecycleDebug {
    if (!this.instance) {
      this.instance = new LifecycleDebug(config);
    } else if (config) {
      this.instance.configure(config);
    }
    return this.instance;
  }

  /**
   * Replace parts of the active configuration
   */
  configure(config: Partial<DebugConfig>): void {
    this.config = { ...this.config, ...config };
    this.initializeNamespaces();
  }

  getConfig(): Readonly<DebugConfig> {
    return this.config;
  }

  createLogger(namespace: string): DebugLogger {
    return new DebugLogger(this, namespace);
  }

  log(level: DebugLevel, namespace: string, message: string, data?: unknown): void {
    if (!this.shouldLog(level, namespace)) {
      return;
    }

    const entry: DebugLogEntry = {
      timestamp: new Date(),
      level,
      namespace,
      message,
      data: this.config.sanitizeData ? this.sanitizeData(data) : data,
    };

    this.outputLog(entry);
    this.storeLog(entry);
  }

  /**
   * Get recent logs
   */
  getLogs(count = 100): DebugLogEntry[] {
    return this.logs.slice(-count);
  }

  clear(): void {
    this.logs.length = 0;
  }

  private shouldLog(level: DebugLevel, namespace: string): boolean {
    if (!this.config.enabled || level > this.config.level) {
      return false;
    }

    if (this.namespaces.length === 0) {
      return true;
    }

    return this.namespaces.some(ns => ns.matches(namespace));
  }

  private outputLog(entry: DebugLogEntry): void {
    switch (this.config.output) {
      case DebugOutput.Console:
        this.outputToConsole(entry);
        break;
      case DebugOutput.Custom:
        this.config.customOutput?.(entry);
        break;
      case DebugOutput.Memory:
        // stored below
        break;
    }
  }

  private outputToConsole(entry: DebugLogEntry): void {
    const level = DebugLevel[entry.level].toUpperCase();
    const message = `[${entry.timestamp.toISOString()}] ${level} ${entry.namespace}: ${entry.message}`;
    const args = entry.data === undefined ? [] : [entry.data];

    switch (entry.level) {
      case DebugLevel.Error:
        console.error(message, ...args);
        break;
      case DebugLevel.Warn:
        console.warn(message, ...args);
        break;
      case DebugLevel.Info:
        console.info(message, ...args);
        break;
      default:
        console.debug(message, ...args);
        break;
    }
  }

  private storeLog(entry: DebugLogEntry): void {
    this.logs.push(entry);

    if (this.logs.length > this.config.retainLogs) {
      this.logs.splice(0, this.logs.length - this.config.retainLogs);
    }
  }

  private initializeNamespaces(): void {
    this.namespaces = this.config.namespace
      .split(',')
      .map(ns => ns.trim())
      .filter(ns => ns.length > 0)
      .map(ns => new DebugNamespace(ns));
  }

  private sanitizeData(data: unknown): unknown {
    if (data === undefined || data === null) {
      return data;
    }

    const serialized = JSON.stringify(data, (key: string, value: unknown) => {
      const lower = key.toLowerCase();
      if (
        lower.includes('password') ||
        lower.includes('secret') ||
        lower.includes('token') ||
        lower.includes('key')
      ) {
        return '[REDACTED]';
      }

      if (typeof value === 'string' && value.length > this.config.maxArgSize) {
        return value.substring(0, this.config.maxArgSize) + '...[TRUNCATED]';
      }

      return value;
    });

    return serialized === undefined ? undefined : JSON.parse(serialized);
  }
}

/**
 * Debug logger for specific namespaces
 */
export class DebugLogger {
  constructor(
    private readonly debugInstance: LifecycleDebug,
    readonly namespace: string
  ) {}

  error(message: string, data?: unknown): void {
    this.debugInstance.log(DebugLevel.Error, this.namespace, message, data);
  }

  warn(message: string, data?: unknown): void {
    this.debugInstance.log(DebugLevel.Warn, this.namespace, message, data);
  }

  info(message: string, data?: unknown): void {
    this.debugInstance.log(DebugLevel.Info, this.namespace, message, data);
  }

  debug(message: string, data?: unknown): void {
    this.debugInstance.log(DebugLevel.Debug, this.namespace, message, data);
  }

  trace(message: string, data?: unknown): void {
    this.debugInstance.log(DebugLevel.Trace, this.namespace, message, data);
  }

  /**
   * Derive a logger for a nested namespace
   */
  child(suffix: string): DebugLogger {
    return new DebugLogger(this.debugInstance, `${this.namespace}:${suffix}`);
  }
}

export function getDebug(): LifecycleDebug {
  return LifecycleDebug.getInstance();
}

export function createLogger(namespace: string): DebugLogger {
  return getDebug().createLogger(namespace);
}
