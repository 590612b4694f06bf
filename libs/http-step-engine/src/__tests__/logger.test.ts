import { describe, expect, it } from 'vitest';
import pino from 'pino';
import { createLogger, createLoggerOptions, noopLogger } from '../logger';

describe('createLogger', () => {
  it('writes the message and metadata through pino', () => {
    const lines: string[] = [];
    const instance = pino(createLoggerOptions('debug', 'stepwise-test'), {
      write: (line: string) => {
        lines.push(line);
      },
    });
    const logger = createLogger({ instance });

    logger.debug('step.skip', { step: 'login', skipTo: 'search' });
    logger.warn('step.lookup.miss', { step: 'logout' });

    expect(lines).toHaveLength(2);
    expect(JSON.parse(lines[0] ?? '')).toMatchObject({
      level: 20,
      name: 'stepwise-test',
      msg: 'step.skip',
      step: 'login',
      skipTo: 'search',
    });
    expect(JSON.parse(lines[1] ?? '')).toMatchObject({ level: 40, msg: 'step.lookup.miss', step: 'logout' });
  });

  it('drops messages below the configured level', () => {
    const lines: string[] = [];
    const instance = pino(createLoggerOptions('warn'), {
      write: (line: string) => {
        lines.push(line);
      },
    });
    const logger = createLogger({ instance });

    logger.info('step.request.success');
    logger.error('step.request.failed');

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? '')).toMatchObject({ level: 50, msg: 'step.request.failed' });
  });

  it('uses ISO timestamps and no pid or hostname', () => {
    const lines: string[] = [];
    const instance = pino(createLoggerOptions('info'), {
      write: (line: string) => {
        lines.push(line);
      },
    });

    createLogger({ instance }).info('http.redirect');

    const entry = JSON.parse(lines[0] ?? '');
    expect(typeof entry.time).toBe('string');
    expect(entry).not.toHaveProperty('pid');
    expect(entry).not.toHaveProperty('hostname');
  });
});

describe('noopLogger', () => {
  it('accepts every level', () => {
    expect(() => {
      noopLogger.debug('a');
      noopLogger.info('b');
      noopLogger.warn('c');
      noopLogger.error('d', { step: 'x' });
    }).not.toThrow();
  });
});
