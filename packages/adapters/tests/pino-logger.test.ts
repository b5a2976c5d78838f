import { describe, expect, it } from 'vitest';
import { PinoLogger, createLogger } from '../src/index';

function capture() {
  const lines: Array<Record<string, unknown>> = [];
  const destination = {
    write: (line: string) => {
      const parsed: unknown = JSON.parse(line);
      if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
        lines.push(Object.fromEntries(Object.entries(parsed)));
      }
    }
  };
  return { lines, destination };
}

describe('PinoLogger', () => {
  it('writes structured lines at or above the configured level', () => {
    const { lines, destination } = capture();
    const logger = new PinoLogger({ level: 'info', name: 'strata', destination });

    logger.debug('hidden');
    logger.info({ surfaceId: 's1' }, 'Surface created');
    logger.warn('careful');

    expect(lines.map((line) => line['msg'])).toEqual(['Surface created', 'careful']);
    expect(lines[0]).toMatchObject({ level: 30, name: 'strata', surfaceId: 's1' });
    expect(lines[1]).toMatchObject({ level: 40 });
  });

  it('carries child bindings', () => {
    const { lines, destination } = capture();
    const logger = new PinoLogger({ level: 'trace', destination });

    logger.child({ component: 'surface-registry' }).trace({ surfaceId: 's1' }, 'Creating surface');

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatchObject({ level: 10, component: 'surface-registry', surfaceId: 's1', msg: 'Creating surface' });
  });

  it('builds a logger from logging config', () => {
    expect(createLogger({ level: 'warn', prettyPrint: false })).toBeInstanceOf(PinoLogger);
  });
});
