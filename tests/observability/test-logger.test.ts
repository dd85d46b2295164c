import { describe, it, expect } from 'vitest';
import { Logger } from '../../src/observability/logger.js';

function createBufferOutput() {
  const lines: string[] = [];
  return {
    output: { write: (s: string) => lines.push(s) },
    lines,
  };
}

describe('Logger', () => {
  it('creates with defaults', () => {
    const logger = new Logger();
    expect(logger).toBeDefined();
  });

  it('logs JSON format by default', () => {
    const { output, lines } = createBufferOutput();
    const logger = new Logger({ output });
    logger.info('test message', { file: 'app.yaml' });
    expect(lines).toHaveLength(1);
    expect(lines[0].endsWith('\n')).toBe(true);
    const parsed = JSON.parse(lines[0]);
    expect(parsed.level).toBe('info');
    expect(parsed.message).toBe('test message');
    expect(parsed.logger).toBe('nestconf');
    expect(parsed.extra).toEqual({ file: 'app.yaml' });
  });

  it('logs text format', () => {
    const { output, lines } = createBufferOutput();
    const logger = new Logger({ name: 'nestconf.loader', format: 'text', output });
    logger.warn('test message', { reason: 'not_found' });
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2} \[WARN\] \[nestconf\.loader\] test message reason=not_found\n$/);
  });

  it('respects log level filtering', () => {
    const { output, lines } = createBufferOutput();
    const logger = new Logger({ level: 'warn', output });
    logger.trace('should not appear');
    logger.debug('should not appear');
    logger.info('should not appear');
    logger.warn('should appear');
    logger.error('should appear');
    logger.fatal('should appear');
    expect(lines).toHaveLength(3);
  });

  it('redacts _secret_ prefix keys', () => {
    const { output, lines } = createBufferOutput();
    const logger = new Logger({ output });
    logger.info('msg', { _secret_token: 'test-secret', user: 'admin' });
    const parsed = JSON.parse(lines[0]);
    expect(parsed.extra).toEqual({ _secret_token: '***REDACTED***', user: 'admin' });
  });

  it('leaves _secret_ keys alone when redaction is off', () => {
    const { output, lines } = createBufferOutput();
    const logger = new Logger({ output, redactSensitive: false });
    logger.info('msg', { _secret_token: 'test-secret' });
    expect(JSON.parse(lines[0]).extra).toEqual({ _secret_token: 'test-secret' });
  });

  it('writes null extra when none is given', () => {
    const { output, lines } = createBufferOutput();
    new Logger({ output }).error('boom');
    expect(JSON.parse(lines[0]).extra).toBeNull();
  });
});
