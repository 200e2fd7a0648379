// @vitest-environment jsdom
import { ORIGINAL_DISPLAY_ATTRIBUTE, applyToggle, isHidden } from '../toggle';

function byId(id: string): HTMLElement {
  const element = document.getElementById(id);
  if (!element) throw new Error(`missing #${id}`);
  return element;
}

describe('toggle', () => {
  afterEach(() => {
    document.head.innerHTML = '';
    document.body.innerHTML = '';
  });

  it('restores the original display after an even number of toggles', () => {
    document.body.innerHTML = `
      <button id="trigger" aria-controls="panel" aria-expanded="true">Menu</button>
      <div id="panel" style="display: flex">Items</div>
    `;
    const panel = byId('panel');
    const trigger = byId('trigger');

    for (let i = 1; i <= 10; i++) {
      applyToggle(panel, trigger);
      expect(panel.style.display).toBe(i % 2 === 1 ? 'none' : 'flex');
    }
    expect(panel.getAttribute(ORIGINAL_DISPLAY_ATTRIBUTE)).toBe('flex');
    expect(trigger.getAttribute('aria-expanded')).toBe('true');
  });

  it('shows an initially hidden target with the default display', () => {
    document.body.innerHTML = `
      <button id="trigger" aria-expanded="false">Menu</button>
      <div id="panel" style="display: none">Items</div>
    `;
    const panel = byId('panel');
    const trigger = byId('trigger');

    expect(isHidden(panel)).toBe(true);
    expect(applyToggle(panel, trigger)).toBe(true);
    expect(panel.style.display).toBe('block');
    expect(trigger.getAttribute('aria-expanded')).toBe('true');

    expect(applyToggle(panel, trigger)).toBe(false);
    expect(panel.style.display).toBe('none');
    expect(panel.getAttribute(ORIGINAL_DISPLAY_ATTRIBUTE)).toBe('block');
    expect(trigger.getAttribute('aria-expanded')).toBe('false');
  });

  it('uses the configured display when none was recorded', () => {
    document.body.innerHTML = '<div id="panel" style="display: none"></div>';
    const panel = byId('panel');

    applyToggle(panel, null, { defaultShowDisplay: 'grid' });

    expect(panel.style.display).toBe('grid');
  });

  it('treats a stylesheet display of none as hidden', () => {
    document.head.innerHTML = '<style>#panel { display: none; }</style>';
    document.body.innerHTML = '<div id="panel"></div>';
    const panel = byId('panel');

    expect(isHidden(panel)).toBe(true);
    applyToggle(panel, null);
    expect(panel.style.display).toBe('block');
  });

  it('updates every trigger that controls the target', () => {
    document.body.innerHTML = `
      <button id="a" aria-controls="panel">A</button>
      <button id="b" aria-controls="other panel">B</button>
      <button id="c" aria-controls="other">C</button>
      <div id="panel" style="display: none"></div>
    `;

    applyToggle(byId('panel'), byId('a'));

    expect(byId('a').getAttribute('aria-expanded')).toBe('true');
    expect(byId('b').getAttribute('aria-expanded')).toBe('true');
    expect(byId('c').hasAttribute('aria-expanded')).toBe(false);
  });

  it('swaps hamburger label and icon', () => {
    document.body.innerHTML = `
      <div id="trigger" role="button" data-hamburger-toggle="true" aria-label="Open menu" aria-expanded="false">
        <span class="material-icons">menu</span>
      </div>
      <div id="panel" style="display: none"></div>
    `;
    const trigger = byId('trigger');

    applyToggle(byId('panel'), trigger);
    expect(trigger.getAttribute('aria-label')).toBe('Close menu');
    expect(trigger.querySelector('.material-icons')?.textContent).toBe('close');

    applyToggle(byId('panel'), trigger);
    expect(trigger.getAttribute('aria-label')).toBe('Open menu');
    expect(trigger.querySelector('.material-icons')?.textContent).toBe('menu');
  });

  it('flips a disclosure glyph', () => {
    document.body.innerHTML = `
      <div id="trigger" role="button"><span>+</span>Details</div>
      <div id="panel" style="display: none"></div>
    `;
    const glyph = byId('trigger').querySelector('span');

    applyToggle(byId('panel'), byId('trigger'));
    expect(glyph?.textContent).toBe('−');
    applyToggle(byId('panel'), byId('trigger'));
    expect(glyph?.textContent).toBe('+');
  });

  it('leaves aria attributes alone when syncAria is off', () => {
    document.body.innerHTML = `
      <div id="trigger" data-hamburger-toggle="true" aria-label="Open menu" aria-expanded="false">
        <span class="material-icons">menu</span>
      </div>
      <div id="panel" style="display: none"></div>
    `;
    const trigger = byId('trigger');

    applyToggle(byId('panel'), trigger, { syncAria: false });

    expect(byId('panel').style.display).toBe('block');
    expect(trigger.getAttribute('aria-expanded')).toBe('false');
    expect(trigger.getAttribute('aria-label')).toBe('Open menu');
    expect(trigger.querySelector('.material-icons')?.textContent).toBe('close');
  });
});
