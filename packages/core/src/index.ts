/**
 * # Tessel
 *
 * A declarative UI runtime. Components are plain functions returning JSX;
 * state lives in cells whose writes schedule recomposition of just the nodes
 * that read them. Pages render on the server and hydrate against the markup
 * they were sent.
 *
 * ## Key Features
 *
 * - **Composer** - positional identity, keyed reconciliation and skipping
 * - **Cells and hooks** - `useCell`, `useState`, `useEffect`, `useId` and more
 * - **Scheduler** - one pass per task, never re-entrant
 * - **Hydration** - `data-action` triggers, a bootloader for early clicks and
 *   a page-global activation guard
 * - **SSR** - `renderToString` and `renderDocument` with collected head markup
 *
 * ## Quick Start
 *
 * ```tsx
 * import { HamburgerMenu, renderDocument } from 'tessel';
 *
 * const App = () => (
 *   <HamburgerMenu>
 *     <a href="/">Home</a>
 *   </HamburgerMenu>
 * );
 *
 * const html = renderDocument(<App />, { title: 'Home', bootloaderSrc: '/boot.js' });
 * ```
 *
 * @module tessel
 */

export * from './jsx';
export * from './state';
export * from './composer';
export * from './effects';
export * from './scheduler';
export * from './renderers';
export * from './head';
export * from './hydration';
export * from './ssr';
export * from './components';
export * from './config';
export * from './runtime';
// Re-export the kernel pieces applications configure directly
export { Context, Logger, type KernelContext, type LogLevel } from 'tessel-kernel';
