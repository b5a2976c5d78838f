import { describe, expect, it } from 'vitest';
import { FakeLogger } from '../src/index';

describe('FakeLogger', () => {
  it('records entries with their context', () => {
    const logger = new FakeLogger();

    logger.info('plain');
    logger.error({ code: 'E1' }, 'with context');

    expect(logger.logs).toEqual([
      { level: 'info', msg: 'plain', bindings: {} },
      { level: 'error', obj: { code: 'E1' }, msg: 'with context', bindings: {} }
    ]);
  });

  it('shares its log with children', () => {
    const logger = new FakeLogger();

    logger.child({ component: 'a' }).child({ surfaceId: 's1' }).warn('nested');

    expect(logger.entries('warn')).toEqual([
      { level: 'warn', msg: 'nested', bindings: { component: 'a', surfaceId: 's1' } }
    ]);
    expect(logger.messages()).toEqual(['nested']);
  });
});
