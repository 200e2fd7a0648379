import { toggleAction } from 'tessel-shared';
import { useId } from '../composer/hooks';
import type { Renderable } from '../jsx/jsx-runtime';

export interface HamburgerMenuProps {
  /** Id of the menu panel; generated as `hamburger-menu-<n>` when omitted */
  id?: string;
  /** Accessible label for the trigger while closed */
  label?: string;
  /** Render the panel open */
  open?: boolean;
  children?: Renderable;
}

/**
 * Menu button plus the panel it controls. Works from server markup alone:
 * the bootloader toggles it before the runtime loads.
 *
 * @example
 * ```tsx
 * <HamburgerMenu>
 *   <a href="/">Home</a>
 *   <a href="/docs">Docs</a>
 * </HamburgerMenu>
 * ```
 */
export function HamburgerMenu({ id, label = 'Open menu', open = false, children }: HamburgerMenuProps) {
  const generated = useId('hamburger-menu');
  const menuId = id ?? generated;

  return (
    <div class="tessel-hamburger">
      <div
        role="button"
        tabindex="0"
        aria-label={open ? 'Close menu' : label}
        aria-controls={menuId}
        aria-expanded={String(open)}
        data-hamburger-toggle="true"
        data-action={toggleAction(menuId)}
      >
        <span class="material-icons" aria-hidden="true">
          {open ? 'close' : 'menu'}
        </span>
      </div>
      <div id={menuId} class="tessel-hamburger-menu" style={{ display: open ? 'block' : 'none' }}>
        {children}
      </div>
    </div>
  );
}
