import type { DebugSettings, LogLevel } from './types.js';

export const DEBUG_NAMESPACE_ROOT = 'symbolgate';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'log', 'warn', 'error'];

export const isLogLevel = (value: string): value is LogLevel =>
  LOG_LEVELS.some((level) => level === value);

/**
 * Resolves the effective debug settings from defaults, the environment and
 * runtime overrides (lowest to highest priority) and notifies subscribers
 * whenever the merged result changes.
 */
export class ConfigurationManager {
  private static instance: ConfigurationManager | undefined;

  private readonly defaultConfig: DebugSettings = {
    enabled: false,
    namespaces: [],
    level: 'debug',
    redactPatterns: ['apiKey', 'token', 'password'],
  };
  private envConfig: Partial<DebugSettings> | null = null;
  private cliConfig: Partial<DebugSettings> | null = null;
  private ephemeralConfig: Partial<DebugSettings> | null = null;
  private mergedConfig: DebugSettings = { ...this.defaultConfig };
  private readonly listeners = new Set<() => void>();

  static getInstance(): ConfigurationManager {
    if (!ConfigurationManager.instance) {
      ConfigurationManager.instance = new ConfigurationManager(process.env);
    }
    return ConfigurationManager.instance;
  }

  static resetForTesting(): void {
    ConfigurationManager.instance = undefined;
  }

  constructor(env: NodeJS.ProcessEnv = {}) {
    this.envConfig = ConfigurationManager.readEnvironment(env);
    this.mergeConfigurations();
  }

  /**
   * `DEBUG` only turns logging on when it names a symbolgate namespace (or
   * `*`); `SYMBOLGATE_DEBUG` always does.
   */
  static readEnvironment(env: NodeJS.ProcessEnv): Partial<DebugSettings> | null {
    let config: Partial<DebugSettings> | null = null;

    if (env.DEBUG) {
      const namespaces = parseNamespaceList(env.DEBUG).filter(
        (ns) => ns.startsWith(DEBUG_NAMESPACE_ROOT) || ns === '*',
      );
      if (namespaces.length > 0) {
        config = { enabled: true, namespaces };
      }
    }

    if (env.SYMBOLGATE_DEBUG) {
      config = {
        enabled: true,
        namespaces: parseNamespaceList(env.SYMBOLGATE_DEBUG),
      };
    }

    if (env.DEBUG_LEVEL && isLogLevel(env.DEBUG_LEVEL)) {
      config = { ...config, level: env.DEBUG_LEVEL };
    }

    return config;
  }

  setCliConfig(config: Partial<DebugSettings>): void {
    this.cliConfig = config;
    this.mergeConfigurations();
  }

  setEphemeralConfig(config: Partial<DebugSettings>): void {
    this.ephemeralConfig = {
      ...this.ephemeralConfig,
      ...config,
    };
    this.mergeConfigurations();
  }

  clearEphemeralConfig(): void {
    this.ephemeralConfig = null;
    this.mergeConfigurations();
  }

  getEffectiveConfig(): DebugSettings {
    return this.mergedConfig;
  }

  getRedactPatterns(): string[] {
    return this.mergedConfig.redactPatterns;
  }

  subscribe(listener: () => void): void {
    this.listeners.add(listener);
  }

  unsubscribe(listener: () => void): void {
    this.listeners.delete(listener);
  }

  private mergeConfigurations(): void {
    const layers = [this.envConfig, this.cliConfig, this.ephemeralConfig];
    let merged: DebugSettings = { ...this.defaultConfig };
    for (const layer of layers) {
      if (layer) {
        merged = { ...merged, ...layer };
      }
    }
    this.mergedConfig = merged;

    this.listeners.forEach((listener) => listener());
  }
}

function parseNamespaceList(value: string): string[] {
  return value
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
}
