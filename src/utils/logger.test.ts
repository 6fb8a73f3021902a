import { describe, it, expect } from 'vitest';
import { createLogger, resolveLogLevel } from './logger.js';
import type { LogData } from './logger.js';

describe('logger', () => {
  const capture = () => {
    const lines: Array<{ line: string; data?: LogData }> = [];
    return { lines, sink: (line: string, data?: LogData) => lines.push({ line, data }) };
  };

  it('should drop messages below the configured level', () => {
    const { lines, sink } = capture();
    const log = createLogger('test', { level: 'warn', sink });

    log.debug('debug message');
    log.info('info message');
    log.warn('warn message');
    log.error('error message', { code: 7 });

    expect(lines).toHaveLength(2);
    expect(lines[0].line.endsWith('warn message')).toBe(true);
    expect(lines[1].data).toEqual({ code: 7 });
  });

  it('should tag lines with level and context', () => {
    const { lines, sink } = capture();

    createLogger('auth', { level: 'debug', sink }).info('hello');

    expect(lines[0].line).toContain('[INFO]');
    expect(lines[0].line).toContain('auth');
  });

  it('should print nothing when silent', () => {
    const { lines, sink } = capture();

    createLogger('test', { level: 'silent', sink }).error('dropped');

    expect(lines).toHaveLength(0);
  });

  it('should resolve unknown levels to info', () => {
    expect(resolveLogLevel(undefined)).toBe('info');
    expect(resolveLogLevel(' DEBUG ')).toBe('debug');
    expect(resolveLogLevel('loud')).toBe('info');
  });
});
