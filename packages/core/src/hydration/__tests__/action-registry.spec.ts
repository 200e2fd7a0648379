// @vitest-environment jsdom
import { ValidationError, toggleAction } from 'tessel-shared';
import { ActionRegistry } from '../action-registry';
import type { ActionContext } from '../action-registry';

function setup(): { trigger: HTMLElement; target: HTMLElement } {
  document.body.innerHTML = `
    <button id="trigger">Open</button>
    <div id="panel" style="display: none"></div>
  `;
  const trigger = document.getElementById('trigger');
  const target = document.getElementById('panel');
  if (!trigger || !target) throw new Error('fixture missing');
  return { trigger, target };
}

describe('ActionRegistry', () => {
  afterEach(() => {
    document.body.innerHTML = '';
  });

  it('registers toggle by default', () => {
    expect(new ActionRegistry().types()).toEqual(['toggle']);
    expect(new ActionRegistry({ defaults: false }).types()).toEqual([]);
  });

  it('validates registrations', () => {
    const registry = new ActionRegistry();

    expect(() => registry.register('', () => undefined)).toThrow(ValidationError);
    expect(() => registry.register('  ', () => undefined)).toThrow(ValidationError);
    expect(() => registry.register('dismiss', JSON.parse('null'))).toThrow(ValidationError);
    expect(() => registry.register('toggle', () => undefined)).toThrow(/already registered/);
  });

  it('replaces a handler only when asked', () => {
    const registry = new ActionRegistry();
    const custom = vi.fn();
    const { trigger, target } = setup();

    registry.register('toggle', custom, { replace: true });
    const handled = registry.dispatch(toggleAction('panel'), { trigger, target, document });

    expect(handled).toBe(true);
    expect(custom).toHaveBeenCalledTimes(1);
    expect(target.style.display).toBe('none');
  });

  it('passes the descriptor and elements to the handler', () => {
    const registry = new ActionRegistry();
    const seen: ActionContext[] = [];
    const { trigger, target } = setup();
    registry.register('dismiss', (context) => {
      seen.push(context);
    });

    registry.dispatch({ type: 'dismiss', targetId: 'panel', params: { reason: 'done' } }, { trigger, target, document });

    expect(seen).toHaveLength(1);
    expect(seen[0]?.descriptor).toEqual({ type: 'dismiss', targetId: 'panel', params: { reason: 'done' } });
    expect(seen[0]?.trigger).toBe(trigger);
    expect(seen[0]?.target).toBe(target);
  });

  it('runs the default toggle', () => {
    const { trigger, target } = setup();

    expect(new ActionRegistry().dispatch(toggleAction('panel'), { trigger, target, document })).toBe(true);
    expect(target.style.display).toBe('block');
  });

  it('returns false for unknown types and failing handlers', () => {
    const registry = new ActionRegistry();
    const { trigger, target } = setup();
    registry.register('explode', () => {
      throw new Error('boom');
    });

    expect(registry.dispatch({ type: 'missing', targetId: 'panel' }, { trigger, target, document })).toBe(false);
    expect(registry.dispatch({ type: 'explode', targetId: 'panel' }, { trigger, target, document })).toBe(false);
  });

  it('unregisters', () => {
    const registry = new ActionRegistry();

    expect(registry.unregister('toggle')).toBe(true);
    expect(registry.has('toggle')).toBe(false);
    expect(registry.unregister('toggle')).toBe(false);
  });
});
