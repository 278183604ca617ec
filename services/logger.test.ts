import { afterEach, describe, expect, it } from 'vitest';
import { createLogger, logger, normalizeLogLevel, setLogLevel } from './logger';

describe('normalizeLogLevel', () => {
  it('accepts pino levels in any case', () => {
    expect(normalizeLogLevel(' WARN ')).toBe('warn');
    expect(normalizeLogLevel('silent')).toBe('silent');
  });

  it('rejects anything else', () => {
    expect(normalizeLogLevel('verbose')).toBeUndefined();
    expect(normalizeLogLevel(3)).toBeUndefined();
  });
});

describe('setLogLevel', () => {
  const initial = logger.level;

  afterEach(() => {
    setLogLevel(normalizeLogLevel(initial) ?? 'silent');
  });

  it('applies to scoped loggers created earlier', () => {
    const scoped = createLogger('Test');

    setLogLevel('error');

    expect(logger.level).toBe('error');
    expect(scoped.level).toBe('error');
    expect(scoped.isLevelEnabled('warn')).toBe(false);
  });
});
