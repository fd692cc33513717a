import { afterEach, describe, expect, it, vi } from 'vitest';
import { ConfigurationManager } from './ConfigurationManager.js';
import { DebugLogger } from './DebugLogger.js';
import type { DebugOutput, LogEntry } from './types.js';

function createLogger(
  namespace = 'symbolgate:test',
  env: NodeJS.ProcessEnv = { SYMBOLGATE_DEBUG: 'symbolgate:*' },
): { logger: DebugLogger; entries: LogEntry[]; config: ConfigurationManager } {
  const config = new ConfigurationManager(env);
  const entries: LogEntry[] = [];
  const output: DebugOutput = { write: (entry) => entries.push(entry) };
  return { logger: new DebugLogger(namespace, config, output), entries, config };
}

describe('DebugLogger', () => {
  afterEach(() => {
    DebugLogger.disposeAll();
  });

  it('keeps its namespace', () => {
    const { logger } = createLogger('symbolgate:lsp:rpc');
    expect(logger.namespace).toBe('symbolgate:lsp:rpc');
  });

  /**
   * @scenario Lazy evaluation of log functions
   * @given a logger whose namespace is not enabled
   * @when log is called with a message function
   * @then the function is never evaluated
   */
  it('does not evaluate message functions when disabled', () => {
    const { logger, entries } = createLogger('symbolgate:test', {});
    const expensive = vi.fn(() => 'expensive message');

    logger.log(expensive);

    expect(logger.enabled).toBe(false);
    expect(expensive).not.toHaveBeenCalled();
    expect(entries).toHaveLength(0);
  });

  it('evaluates message functions when enabled', () => {
    const { logger, entries } = createLogger();

    logger.log(() => 'expensive message');

    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      namespace: 'symbolgate:test',
      level: 'log',
      message: 'expensive message',
      pid: process.pid,
    });
  });

  it('substitutes a placeholder when the message function throws', () => {
    const { logger, entries } = createLogger();

    logger.warn(() => {
      throw new Error('boom');
    });

    expect(entries[0]?.message).toBe('[Error evaluating log function]');
    expect(entries[0]?.level).toBe('warn');
  });

  it('passes extra arguments through to the entry', () => {
    const { logger, entries } = createLogger();

    logger.error('failed %s', 'initialize', 42);

    expect(entries[0]?.args).toEqual(['initialize', 42]);
    expect(entries[0]?.level).toBe('error');
  });

  it('drops messages below the configured level', () => {
    const { logger, entries } = createLogger('symbolgate:test', {
      SYMBOLGATE_DEBUG: 'symbolgate:*',
      DEBUG_LEVEL: 'warn',
    });

    logger.debug('noise');
    logger.log('more noise');
    logger.warn('kept');

    expect(entries.map((entry) => entry.message)).toEqual(['kept']);
  });

  it('matches wildcard namespace patterns', () => {
    expect(createLogger('symbolgate:lsp:session').logger.enabled).toBe(true);
    expect(
      createLogger('other:lsp', { SYMBOLGATE_DEBUG: 'symbolgate:*' }).logger
        .enabled,
    ).toBe(false);
    expect(
      createLogger('symbolgate:gateway', {
        SYMBOLGATE_DEBUG: 'symbolgate:gateway',
      }).logger.enabled,
    ).toBe(true);
  });

  it('redacts configured secret keys', () => {
    const { logger, entries } = createLogger();

    logger.log('connecting with token: test-secret');

    expect(entries[0]?.message).toBe('connecting with token: [REDACTED]');
  });

  it('follows configuration changes', () => {
    const { logger, entries, config } = createLogger('symbolgate:test', {});
    expect(logger.enabled).toBe(false);

    config.setEphemeralConfig({ enabled: true, namespaces: ['symbolgate:*'] });
    logger.log('now visible');

    expect(logger.enabled).toBe(true);
    expect(entries.map((entry) => entry.message)).toEqual(['now visible']);
  });

  it('stops following configuration after dispose', () => {
    const { logger, config } = createLogger('symbolgate:test', {});

    logger.dispose();
    config.setEphemeralConfig({ enabled: true, namespaces: ['*'] });

    expect(logger.enabled).toBe(false);
  });

  it('caches one logger per namespace', () => {
    const first = DebugLogger.getLogger('symbolgate:cached');
    const second = DebugLogger.getLogger('symbolgate:cached');

    expect(first).toBe(second);
    expect(first.child('rpc').namespace).toBe('symbolgate:cached:rpc');
  });
});
