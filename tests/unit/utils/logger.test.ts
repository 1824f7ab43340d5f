import { afterEach, describe, it, expect } from 'vitest';
import { pino } from 'pino';
import { createLogger, setRootLogger } from '@/utils/logger.js';

describe('logger', () => {
  afterEach(() => {
    setRootLogger(pino({ level: 'silent' }));
  });

  it('tags child loggers with their component', () => {
    const parent = pino({ level: 'silent', base: null });
    expect(createLogger('LoadTester', parent).bindings()).toEqual({ component: 'LoadTester' });
  });

  it('writes through the root logger that was set', () => {
    const lines: string[] = [];
    setRootLogger(pino({ level: 'info', base: null }, { write: (line: string) => lines.push(line) }));

    createLogger('BenchmarkSuite').info({ scenario: 'Health Check' }, 'Running scenario');

    expect(lines).toHaveLength(1);
    const entry: unknown = JSON.parse(lines[0] ?? '');
    expect(entry).toMatchObject({
      level: 30,
      component: 'BenchmarkSuite',
      scenario: 'Health Check',
      msg: 'Running scenario',
    });
  });

  it('inherits the root level', () => {
    setRootLogger(pino({ level: 'warn' }));
    const logger = createLogger('RequestExecutor');
    expect(logger.level).toBe('warn');
    expect(logger.isLevelEnabled('info')).toBe(false);
  });
});
