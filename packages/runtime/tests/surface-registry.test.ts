import { describe, expect, it } from 'vitest';
import { DisposedError, type UserMessage } from '@strata/core';
import { createTextComponent, createUserAction } from '@strata/testing';
import { SurfaceRegistry, type SurfaceLifecycleEvent } from '../src/index';

function track(registry: SurfaceRegistry): string[] {
  const events: string[] = [];
  registry.lifecycle$.subscribe((event: SurfaceLifecycleEvent) => events.push(`${event.type}:${event.surface.surfaceId}`));
  return events;
}

describe('SurfaceRegistry', () => {
  it('creates a surface on first update and announces it once before the update', () => {
    const registry = new SurfaceRegistry();
    const events = track(registry);

    registry.dispatch({ type: 'surfaceUpdate', surfaceId: 's1', components: [createTextComponent('root', 'Hi')] });
    registry.dispatch({ type: 'beginRendering', surfaceId: 's1', root: 'root' });

    expect(events).toEqual(['surfaceAdded:s1', 'surfaceUpdated:s1', 'surfaceUpdated:s1']);
    expect(registry.surfaceIds).toEqual(['s1']);
    expect(registry.get('s1')?.definition?.rootComponentId).toBe('root');
  });

  it('replaces a component bundle without touching the others', () => {
    const registry = new SurfaceRegistry();
    registry.dispatch({
      type: 'surfaceUpdate',
      surfaceId: 's1',
      components: [createTextComponent('a', 'one'), createTextComponent('b', 'two')]
    });
    registry.dispatch({ type: 'surfaceUpdate', surfaceId: 's1', components: [createTextComponent('a', 'uno')] });

    expect(registry.get('s1')?.definition?.components).toEqual({
      a: createTextComponent('a', 'uno'),
      b: createTextComponent('b', 'two')
    });
  });

  it('applies data updates without signalling a definition change', () => {
    const registry = new SurfaceRegistry();
    const events = track(registry);

    registry.dispatch({ type: 'dataModelUpdate', surfaceId: 's1', contents: { a: { b: 1 } } });
    registry.dispatch({ type: 'dataModelUpdate', surfaceId: 's1', path: '/a/b', contents: 2 });

    expect(events).toEqual(['surfaceAdded:s1']);
    expect(registry.get('s1')?.dataModel.getValue('/a')).toEqual({ b: 2 });
  });

  it('removes and disposes deleted surfaces', () => {
    const registry = new SurfaceRegistry();
    const surface = registry.getOrCreate('s1');
    const events = track(registry);

    registry.dispatch({ type: 'surfaceDeletion', surfaceId: 's1' });
    registry.dispatch({ type: 'surfaceDeletion', surfaceId: 'unknown' });

    expect(events).toEqual(['surfaceRemoved:s1']);
    expect(registry.has('s1')).toBe(false);
    expect(surface.isDisposed).toBe(true);
  });

  it('returns the same surface for the same id', () => {
    const registry = new SurfaceRegistry();
    expect(registry.getOrCreate('s1')).toBe(registry.getOrCreate('s1'));
  });

  it('turns user actions into interaction messages', () => {
    const registry = new SurfaceRegistry();
    const messages: UserMessage[] = [];
    registry.userMessages$.subscribe((message) => messages.push(message));

    registry.getOrCreate('s1').dispatchEvent(createUserAction({ context: { email: 'ada@example.com' } }));
    registry.handleInteraction({
      kind: 'valueChange',
      surfaceId: 's1',
      sourceComponentId: 'field',
      timestamp: new Date('2026-01-01T00:00:00.000Z'),
      value: 'typed'
    });

    expect(messages).toEqual([{
      role: 'user',
      source: 'interaction',
      content:
        '{"userAction":{"surfaceId":"s1","name":"submit","sourceComponentId":"button",' +
        '"timestamp":"2026-01-01T00:00:00.000Z","isAction":true,"context":{"email":"ada@example.com"}}}'
    }]);
  });

  it('does not replay events to late subscribers', () => {
    const registry = new SurfaceRegistry();
    registry.getOrCreate('s1');
    const events = track(registry);
    expect(events).toEqual([]);
  });

  it('tears everything down on dispose', () => {
    const registry = new SurfaceRegistry();
    const surface = registry.getOrCreate('s1');
    let completed = 0;
    registry.lifecycle$.subscribe({ complete: () => { completed += 1; } });
    registry.userMessages$.subscribe({ complete: () => { completed += 1; } });

    registry.dispose();
    registry.dispose();

    expect(completed).toBe(2);
    expect(surface.isDisposed).toBe(true);
    expect(registry.surfaceIds).toEqual([]);
    expect(() => registry.getOrCreate('s2')).toThrow(DisposedError);
    expect(() => registry.dispatch({ type: 'surfaceDeletion', surfaceId: 's1' })).toThrow(DisposedError);
    expect(() => registry.handleInteraction(createUserAction())).toThrow(DisposedError);
  });
});
