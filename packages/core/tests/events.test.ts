import { describe, expect, it } from 'vitest';
import { encodeUserAction, type UserActionEvent } from '../src/index';

const event: UserActionEvent = {
  kind: 'userAction',
  surfaceId: 's1',
  name: 'submit',
  sourceComponentId: 'button',
  timestamp: new Date('2026-01-01T12:00:00.000Z'),
  context: { email: 'ada@example.com' }
};

describe('encodeUserAction', () => {
  it('produces the userAction envelope', () => {
    expect(encodeUserAction(event)).toBe(
      '{"userAction":{"surfaceId":"s1","name":"submit","sourceComponentId":"button",' +
      '"timestamp":"2026-01-01T12:00:00.000Z","isAction":true,"context":{"email":"ada@example.com"}}}'
    );
  });

  it('drops isAction when the event is not an action', () => {
    const parsed: unknown = JSON.parse(encodeUserAction({ ...event, isAction: false }));
    expect(parsed).toEqual({
      userAction: {
        surfaceId: 's1',
        name: 'submit',
        sourceComponentId: 'button',
        timestamp: '2026-01-01T12:00:00.000Z',
        context: { email: 'ada@example.com' }
      }
    });
  });
});
