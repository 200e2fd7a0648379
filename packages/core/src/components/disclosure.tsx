import { toggleAction } from 'tessel-shared';
import type { Renderable } from '../jsx/jsx-runtime';

export interface DisclosureProps {
  /** Id of the panel */
  id: string;
  summary: Renderable;
  /** Accessible label; defaults to `summary` when it is a string */
  label?: string;
  open?: boolean;
  children?: Renderable;
}

/**
 * A summary line with a `+`/`−` glyph that shows and hides its panel.
 */
export function Disclosure({ id, summary, label, open = false, children }: DisclosureProps) {
  const accessibleLabel = label ?? (typeof summary === 'string' ? summary : undefined);

  return (
    <div class="tessel-disclosure">
      <div
        role="button"
        tabindex="0"
        aria-label={accessibleLabel}
        aria-controls={id}
        aria-expanded={String(open)}
        data-action={toggleAction(id)}
      >
        <span aria-hidden="true">{open ? '−' : '+'}</span>
        {summary}
      </div>
      <div id={id} style={{ display: open ? 'block' : 'none' }}>
        {children}
      </div>
    </div>
  );
}
