// @vitest-environment jsdom
import { StateError } from 'tessel-shared';
import { HamburgerMenu } from '../components/hamburger-menu';
import { useOnUnmount } from '../composer/hooks';
import { getGuard } from '../hydration/activation-guard';
import { HYDRATION_READY_ATTRIBUTE, createRuntime } from '../runtime';
import type { Runtime } from '../runtime';
import { cell } from '../state/cell';

function byId(id: string): HTMLElement {
  const element = document.getElementById(id);
  if (!element) throw new Error(`missing #${id}`);
  return element;
}

function resetWindow(): void {
  delete window.__TESSEL_HYDRATION_ACTIVE__;
  delete window.__TESSEL_HYDRATION_GUARD__;
  delete window.__TESSEL_QUEUE__;
}

describe('Runtime', () => {
  let runtime: Runtime | null = null;

  beforeEach(() => {
    resetWindow();
    document.body.innerHTML = '<div id="tessel-app"></div>';
  });

  afterEach(() => {
    runtime?.dispose();
    runtime = null;
    document.head.innerHTML = '';
    document.body.innerHTML = '';
    resetWindow();
  });

  it('needs a root element', () => {
    document.body.innerHTML = '';

    expect(() => createRuntime({ window })).toThrow(StateError);
  });

  it('mounts into the root and hydrates once', () => {
    const app = createRuntime({ window });
    runtime = app;
    app.mount(<HamburgerMenu id="menu">Links</HamburgerMenu>);

    const report = app.hydrate();

    expect(report).toEqual({ bound: 1, inert: 0, unmatched: 0 });
    expect(app.hydrate()).toBe(report);
    expect(byId('tessel-app').getAttribute(HYDRATION_READY_ATTRIBUTE)).toBe('true');
    expect(byId('menu').style.display).toBe('none');
  });

  it('owns the guard when no bootloader ran and toggles on click', () => {
    const app = createRuntime({ window });
    runtime = app;
    app.mount(<HamburgerMenu id="menu">Links</HamburgerMenu>);
    app.hydrate();

    expect(getGuard(window)).toMatchObject({ active: true, owner: 'runtime', attempts: 1 });
    expect(window.__TESSEL_HYDRATION_ACTIVE__).toBe(true);

    const trigger = byId('tessel-app').querySelector('[data-hamburger-toggle]');
    if (!(trigger instanceof HTMLElement)) throw new Error('trigger missing');
    trigger.click();

    expect(byId('menu').style.display).toBe('block');
    expect(trigger.getAttribute('aria-expanded')).toBe('true');
    expect(trigger.getAttribute('aria-label')).toBe('Close menu');
  });

  it('keeps server markup that matches the composed tree', () => {
    byId('tessel-app').innerHTML = '<p>Hello</p>';
    const serverNode = byId('tessel-app').firstChild;
    const app = createRuntime({ window });
    runtime = app;

    app.mount(<p>Hello</p>);

    expect(byId('tessel-app').firstChild).toBe(serverNode);
  });

  it('commits recomposition passes to the root', () => {
    const count = cell(0);
    const Counter = () => <output>{count.value}</output>;
    const app = createRuntime({ window, config: { scheduler: 'manual' } });
    runtime = app;
    app.mount(<Counter />);
    expect(byId('tessel-app').innerHTML).toBe('<output>0</output>');

    count.set(1);
    count.set(2);
    expect(app.scheduler.isPending).toBe(true);
    app.scheduler.flush();

    expect(byId('tessel-app').innerHTML).toBe('<output>2</output>');
    expect(app.scheduler.passCount).toBe(1);
  });

  it('inserts head markup into the live document', () => {
    document.head.innerHTML = '<link rel="stylesheet" href="/app.css">';
    const app = createRuntime({ window });
    runtime = app;

    app.mount(<HamburgerMenu id="menu" />);
    app.head.addHeadElement('<link rel="stylesheet" href="/app.css">');
    app.head.setTitle('Menu');

    expect(document.head.querySelectorAll('link')).toHaveLength(1);
    expect(document.title).toBe('Menu');
  });

  it('runs cleanups and releases the guard on dispose', () => {
    const left = vi.fn();
    const Leaving = () => {
      useOnUnmount(left);
      return <p>bye</p>;
    };
    const app = createRuntime({ window });
    app.mount(<Leaving />);
    app.hydrate();

    app.dispose();

    expect(left).toHaveBeenCalledTimes(1);
    expect(getGuard(window)).toMatchObject({ active: false, owner: null });
    expect(() => app.mount(<Leaving />)).toThrow(StateError);
  });

  it('uses the configured action attribute', () => {
    byId('tessel-app').innerHTML = `
      <button id="open" data-act='{"type":"toggle","targetId":"panel"}'>Open</button>
      <div id="panel" style="display: none"></div>
    `;
    const app = createRuntime({ window, config: { actionAttribute: 'data-act' } });
    runtime = app;

    expect(app.hydrate()).toEqual({ bound: 1, inert: 0, unmatched: 0 });
    byId('open').click();

    expect(byId('panel').style.display).toBe('block');
  });
});
