import createDebug from 'debug';
import type { Debugger } from 'debug';
import { ConfigurationManager } from './ConfigurationManager.js';
import type { DebugOutput, LogEntry, LogLevel } from './types.js';

// stdout carries the stdio protocol, so debug output must stay on stderr.
(createDebug as unknown as { useColors: () => boolean }).useColors = () =>
  false;

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 0,
  log: 1,
  warn: 2,
  error: 3,
};

class StderrOutput implements DebugOutput {
  constructor(private readonly debugInstance: Debugger) {}

  write(entry: LogEntry): void {
    // The debug package only prints for namespaces its own DEBUG list
    // enables; our configuration has already made that decision.
    this.debugInstance.enabled = true;
    const prefix = entry.level === 'log' ? '' : `[${entry.level}] `;
    this.debugInstance(`${prefix}${entry.message}`, ...(entry.args ?? []));
  }
}

export class DebugLogger {
  private static instances: Map<string, DebugLogger> = new Map();

  private readonly _namespace: string;
  private readonly _configManager: ConfigurationManager;
  private readonly _output: DebugOutput;
  private _enabled: boolean;
  private _level: LogLevel;
  private readonly boundOnConfigChange: () => void;

  /**
   * Returns the cached logger for a namespace, creating it on first use.
   */
  static getLogger(namespace: string): DebugLogger {
    let logger = DebugLogger.instances.get(namespace);
    if (!logger) {
      logger = new DebugLogger(namespace);
      DebugLogger.instances.set(namespace, logger);
    }
    return logger;
  }

  static disposeAll(): void {
    for (const logger of DebugLogger.instances.values()) {
      logger._configManager.unsubscribe(logger.boundOnConfigChange);
    }
    DebugLogger.instances.clear();
  }

  constructor(
    namespace: string,
    configManager: ConfigurationManager = ConfigurationManager.getInstance(),
    output?: DebugOutput,
  ) {
    this._namespace = namespace;
    this._configManager = configManager;
    this._output = output ?? new StderrOutput(createDebug(namespace));
    this._enabled = this.checkEnabled();
    this._level = configManager.getEffectiveConfig().level;
    this.boundOnConfigChange = () => this.onConfigChange();
    this._configManager.subscribe(this.boundOnConfigChange);
  }

  get namespace(): string {
    return this._namespace;
  }

  get enabled(): boolean {
    return this._enabled;
  }

  set enabled(value: boolean) {
    this._enabled = value;
  }

  get level(): LogLevel {
    return this._level;
  }

  set level(value: LogLevel) {
    this._level = value;
  }

  get output(): DebugOutput {
    return this._output;
  }

  /**
   * Creates a logger for a sub-namespace, e.g. `symbolgate:lsp` → `symbolgate:lsp:rpc`.
   */
  child(suffix: string): DebugLogger {
    return DebugLogger.getLogger(`${this._namespace}:${suffix}`);
  }

  debug(messageOrFn: string | (() => string), ...args: unknown[]): void {
    this.emit('debug', messageOrFn, args);
  }

  log(messageOrFn: string | (() => string), ...args: unknown[]): void {
    this.emit('log', messageOrFn, args);
  }

  warn(messageOrFn: string | (() => string), ...args: unknown[]): void {
    this.emit('warn', messageOrFn, args);
  }

  error(messageOrFn: string | (() => string), ...args: unknown[]): void {
    this.emit('error', messageOrFn, args);
  }

  checkEnabled(): boolean {
    const config = this._configManager.getEffectiveConfig();
    if (!config.enabled) {
      return false;
    }

    return config.namespaces.some((pattern) =>
      this.matchesPattern(this._namespace, pattern),
    );
  }

  dispose(): void {
    this._configManager.unsubscribe(this.boundOnConfigChange);
    if (DebugLogger.instances.get(this._namespace) === this) {
      DebugLogger.instances.delete(this._namespace);
    }
  }

  private emit(
    level: LogLevel,
    messageOrFn: string | (() => string),
    args: unknown[],
  ): void {
    if (!this._enabled || LEVEL_RANK[level] < LEVEL_RANK[this._level]) {
      return;
    }

    let message: string;
    if (typeof messageOrFn === 'function') {
      try {
        message = messageOrFn();
      } catch (_error) {
        message = '[Error evaluating log function]';
      }
    } else {
      message = messageOrFn;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      namespace: this._namespace,
      level,
      message: this.redactSensitive(message),
      args: args.length > 0 ? args : undefined,
      pid: process.pid,
    };

    this._output.write(entry);
  }

  private matchesPattern(namespace: string, pattern: string): boolean {
    if (pattern === namespace) {
      return true;
    }

    if (pattern.includes('*')) {
      const regexPattern = pattern
        .replace(/[.+?^${}()|[\]\\]/g, '\\$&')
        .replace(/\*/g, '.*');
      return new RegExp(`^${regexPattern}$`).test(namespace);
    }

    return false;
  }

  private redactSensitive(message: string): string {
    let result = message;
    for (const pattern of this._configManager.getRedactPatterns()) {
      const regex = new RegExp(`${pattern}["']?:\\s*["']?([^"'\\s]+)`, 'gi');
      result = result.replace(regex, `${pattern}: [REDACTED]`);
    }
    return result;
  }

  private onConfigChange(): void {
    this._enabled = this.checkEnabled();
    this._level = this._configManager.getEffectiveConfig().level;
  }
}
