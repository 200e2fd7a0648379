// @vitest-environment jsdom
import { HamburgerMenu } from '../../components/hamburger-menu';
import { createElement } from '../../jsx/jsx-runtime';
import { createRuntime } from '../../runtime';
import type { Runtime } from '../../runtime';
import { getGuard, releaseGuard, tryActivate } from '../activation-guard';
import { installBootloader } from '../bootloader';
import type { Bootloader } from '../bootloader';
import type { CallbackContext } from '../event-queue';
import { renderToString } from '../../ssr/render-to-string';

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

const PAGE = `
  <div id="tessel-app">
    <div id="menu-trigger" role="button" tabindex="0" aria-controls="menu" aria-expanded="false"
         data-action='{"type":"toggle","targetId":"menu"}'>Menu</div>
    <div id="menu" style="display: none">Links</div>
    <button id="dismiss" data-action='{"type":"dismiss","targetId":"banner"}'>x</button>
    <div id="banner">Sale</div>
    <button id="save" data-sid="save">Save</button>
  </div>
`;

describe('activation guard', () => {
  beforeEach(resetWindow);
  afterEach(resetWindow);

  it('lets exactly one owner activate', () => {
    expect(tryActivate(window, 'bootloader')).toBe(true);
    expect(tryActivate(window, 'runtime')).toBe(false);
    expect(tryActivate(window, 'runtime')).toBe(false);

    expect(getGuard(window)).toMatchObject({ active: true, owner: 'bootloader', attempts: 3 });
    expect(window.__TESSEL_HYDRATION_ACTIVE__).toBe(true);
  });

  it('respects a bare active flag set by other code', () => {
    window.__TESSEL_HYDRATION_ACTIVE__ = true;

    expect(tryActivate(window, 'runtime')).toBe(false);
    expect(getGuard(window).owner).toBe('unknown');
  });

  it('is released only by its holder', () => {
    tryActivate(window, 'runtime');

    expect(releaseGuard(window, 'bootloader')).toBe(false);
    expect(releaseGuard(window, 'runtime')).toBe(true);
    expect(window.__TESSEL_HYDRATION_ACTIVE__).toBe(false);
    expect(tryActivate(window, 'bootloader')).toBe(true);
  });
});

describe('bootloader', () => {
  let boot: Bootloader | null = null;
  let runtime: Runtime | null = null;

  beforeEach(() => {
    resetWindow();
    document.body.innerHTML = PAGE;
    boot = installBootloader(window);
  });

  afterEach(() => {
    runtime?.dispose();
    runtime = null;
    boot?.dispose();
    boot = null;
    document.body.innerHTML = '';
    resetWindow();
  });

  it('holds the guard and refuses a second install', () => {
    expect(boot).not.toBeNull();
    expect(installBootloader(window)).toBeNull();
    expect(getGuard(window)).toMatchObject({ active: true, owner: 'bootloader', attempts: 2 });
  });

  it('keeps toggle targets hidden until interaction', () => {
    expect(byId('menu').style.display).toBe('none');
    expect(byId('menu-trigger').getAttribute('aria-expanded')).toBe('false');
  });

  it('toggles before the runtime loads', () => {
    byId('menu-trigger').click();

    expect(byId('menu').style.display).toBe('block');
    expect(byId('menu-trigger').getAttribute('aria-expanded')).toBe('true');
  });

  it('toggles on Enter for role="button" triggers', () => {
    byId('menu-trigger').dispatchEvent(new KeyboardEvent('keydown', { key: 'Enter', bubbles: true }));

    expect(byId('menu').style.display).toBe('block');
  });

  it('ignores action types it does not know', () => {
    byId('dismiss').click();

    expect(document.getElementById('banner')).not.toBeNull();
  });

  it('queues data-sid clicks', () => {
    const event = new MouseEvent('click', { bubbles: true, cancelable: true });
    byId('save').dispatchEvent(event);

    expect(event.defaultPrevented).toBe(true);
    expect(window.__TESSEL_QUEUE__).toHaveLength(1);
    expect(window.__TESSEL_QUEUE__?.[0]).toMatchObject({ type: 'click', targetId: 'save' });
  });

  describe('when the runtime arrives', () => {
    it('keeps a single registration and upgrades the dispatcher', () => {
      runtime = createRuntime({ window });
      runtime.registry.register('dismiss', ({ target }) => target.remove());

      runtime.hydrate();

      expect(getGuard(window)).toMatchObject({ active: true, owner: 'bootloader', attempts: 2 });
      expect(getGuard(window).handler).toBe(runtime.handleEvent);

      byId('dismiss').click();
      expect(document.getElementById('banner')).toBeNull();
    });

    it('toggles once per click after the upgrade', () => {
      runtime = createRuntime({ window });
      runtime.hydrate();

      byId('menu-trigger').click();

      expect(byId('menu').style.display).toBe('block');
    });

    it('replays queued clicks to registered callbacks and clears the queue', () => {
      byId('save').click();
      byId('save').click();
      const seen: CallbackContext[] = [];

      runtime = createRuntime({ window });
      runtime.registerCallback('save', (context) => {
        seen.push(context);
      });
      runtime.hydrate();

      expect(seen).toHaveLength(2);
      expect(seen[0]?.queued).toMatchObject({ type: 'click', targetId: 'save' });
      expect(window.__TESSEL_QUEUE__).toEqual([]);

      byId('save').click();
      expect(seen).toHaveLength(3);
      expect(seen[2]?.event?.type).toBe('click');
      expect(window.__TESSEL_QUEUE__).toEqual([]);
    });

    it('hands events back to the bootloader when the runtime is disposed', () => {
      runtime = createRuntime({ window });
      runtime.hydrate();
      runtime.dispose();
      runtime = null;

      expect(getGuard(window).handler).toBeUndefined();
      byId('menu-trigger').click();
      expect(byId('menu').style.display).toBe('block');
    });
  });
});

describe('runtime mount over server markup', () => {
  let boot: Bootloader | null = null;
  let runtime: Runtime | null = null;

  const menu = (text: string) => createElement(HamburgerMenu, { id: 'menu' }, text);

  function serve(text: string): void {
    document.body.innerHTML = `<div id="tessel-app">${renderToString(menu(text))}</div>`;
  }

  function trigger(): HTMLElement {
    const element = document.querySelector('[data-hamburger-toggle]');
    if (!(element instanceof HTMLElement)) throw new Error('trigger missing');
    return element;
  }

  beforeEach(resetWindow);

  afterEach(() => {
    runtime?.dispose();
    runtime = null;
    boot?.dispose();
    boot = null;
    document.body.innerHTML = '';
    resetWindow();
  });

  it('keeps a menu the bootloader opened', () => {
    serve('Links');
    boot = installBootloader(window);
    trigger().click();
    const panel = byId('menu');
    expect(panel.style.display).toBe('block');

    runtime = createRuntime({ window });
    runtime.mount(menu('Links'));

    expect(byId('menu')).toBe(panel);
    expect(panel.style.display).toBe('block');
    expect(trigger().getAttribute('aria-expanded')).toBe('true');

    runtime.hydrate();
    trigger().click();

    expect(panel.style.display).toBe('none');
    expect(trigger().getAttribute('aria-expanded')).toBe('false');
  });

  it('keeps server nodes whose text serializes differently', () => {
    serve("Don't panic");
    const panel = byId('menu');

    runtime = createRuntime({ window });
    runtime.mount(menu("Don't panic"));

    expect(byId('menu')).toBe(panel);
    expect(panel.textContent).toBe("Don't panic");
  });
});
