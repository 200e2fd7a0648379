/**
 * Runtime
 *
 * Wires the pieces a page needs: a Composer driven by a Recomposer, a head
 * manager bound to the live document, the action registry and the hydration
 * engine.
 *
 * @example
 * ```typescript
 * const runtime = createRuntime({ window });
 * runtime.mount(<App />);
 * runtime.hydrate();
 * runtime.registerCallback('save', () => save());
 * ```
 */

import { Logger } from 'tessel-kernel';
import { StateError } from 'tessel-shared';
import type { CompositionError } from 'tessel-shared';
import { Composer } from './composer/composer';
import { resolveRuntimeConfig } from './config';
import type { RuntimeConfig, RuntimeConfigOptions } from './config';
import { HeadManager } from './head/head-manager';
import { getGuard, releaseGuard, tryActivate, upgradeHandler } from './hydration/activation-guard';
import { ActionRegistry } from './hydration/action-registry';
import { CallbackRegistry, drainEventQueue } from './hydration/event-queue';
import type { SidCallback } from './hydration/event-queue';
import { HydrationEngine } from './hydration/hydration-engine';
import type { HydrationReport } from './hydration/hydration-engine';
import type { Renderable } from './jsx/jsx-runtime';
import { HtmlRenderer } from './renderers/html-renderer';
import { Recomposer } from './scheduler/recomposer';

const log = Logger.for('Runtime');

export const HYDRATION_READY_ATTRIBUTE = 'data-hydration-ready';

export interface RuntimeOptions {
  window: Window;
  /** Hydration root; defaults to the element with the configured root id */
  root?: Element;
  registry?: ActionRegistry;
  config?: RuntimeConfigOptions;
  onError?: (error: CompositionError) => void;
}

export class Runtime {
  readonly config: RuntimeConfig;
  readonly window: Window;
  readonly root: Element;
  readonly composer: Composer;
  readonly scheduler: Recomposer;
  readonly head: HeadManager;
  readonly registry: ActionRegistry;
  readonly callbacks = new CallbackRegistry();
  readonly engine: HydrationEngine;

  private committed = '';
  /** Server markup in the root is adopted by the first commit, not rewritten */
  private adoptServerMarkup: boolean;
  private mounted = false;
  private report: HydrationReport | undefined;
  private ownsGuard = false;
  private upgraded = false;
  private isDisposed = false;

  constructor(options: RuntimeOptions) {
    this.config = resolveRuntimeConfig(options.config);
    if (options.config?.logLevel !== undefined) {
      Logger.setLevel(options.config.logLevel);
    }

    this.window = options.window;
    const doc = this.window.document;
    const root = options.root ?? doc.getElementById(this.config.rootElementId);
    if (!root) {
      throw StateError.notReady('Runtime', `no element with id '${this.config.rootElementId}'`);
    }
    this.root = root;
    this.adoptServerMarkup = root.hasChildNodes();

    this.registry =
      options.registry ??
      new ActionRegistry({
        toggle: { syncAria: this.config.syncAria, defaultShowDisplay: this.config.defaultShowDisplay },
      });
    this.engine = new HydrationEngine(this.registry, {
      attribute: this.config.actionAttribute,
      callbacks: this.callbacks,
      syncAria: this.config.syncAria,
    });

    this.head = new HeadManager({ document: doc });
    this.composer = new Composer({ head: this.head, onError: options.onError });
    this.scheduler = new Recomposer(
      { recompose: () => this.recompose() },
      { strategy: this.config.scheduler, maxPassesPerFlush: this.config.maxPassesPerFlush },
    );
    this.composer.attachScheduler(this.scheduler);
  }

  get isHydrated(): boolean {
    return this.report !== undefined;
  }

  /**
   * Compose `element` into the root. Calling it again recomposes against the
   * existing tree.
   */
  mount(element: Renderable): void {
    this.assertLive('mount');
    if (!this.mounted) {
      // Markup the server already wrote counts as added
      this.head.seedFromDocument(this.window.document);
    }
    this.mounted = true;
    this.composer.compose(element);
    this.commit();
  }

  /**
   * Bind the root's markup. Takes the activation guard, or upgrades the
   * bootloader when it already holds it, then replays buffered clicks.
   * Calling it again returns the first report.
   */
  hydrate(): HydrationReport {
    this.assertLive('hydrate');
    if (this.report) return this.report;

    const report = this.engine.scan(this.root);

    if (tryActivate(this.window, 'runtime')) {
      this.engine.attach(this.root);
      this.ownsGuard = true;
    } else {
      const guard = getGuard(this.window);
      if (guard.owner === 'bootloader' && guard.handler === undefined) {
        upgradeHandler(this.window, this.handleEvent);
        this.upgraded = true;
      } else {
        log.warn({ owner: guard.owner }, 'Another handler set is active; runtime events are not delegated');
      }
    }

    const replayed = this.callbacks.replay(drainEventQueue(this.window));
    this.root.setAttribute(HYDRATION_READY_ATTRIBUTE, 'true');
    this.report = report;
    log.info({ ...report, replayed, upgraded: this.upgraded }, 'Hydrated');
    return report;
  }

  /**
   * Handle clicks on `data-sid` elements, including ones buffered before
   * hydration.
   */
  registerCallback(sid: string, callback: SidCallback): () => void {
    return this.callbacks.register(sid, callback);
  }

  handleEvent = (event: Event): void => {
    if (this.isDisposed) return;
    this.engine.handleEvent(event);
  };

  /**
   * Unmount the tree, running every cleanup, and release what this runtime
   * installed.
   */
  dispose(): void {
    if (this.isDisposed) return;
    this.isDisposed = true;

    this.scheduler.dispose();
    this.composer.dispose();
    this.engine.detach();

    if (this.ownsGuard) {
      releaseGuard(this.window, 'runtime');
      this.ownsGuard = false;
    }
    if (this.upgraded && getGuard(this.window).handler === this.handleEvent) {
      upgradeHandler(this.window, undefined);
    }
    this.upgraded = false;
    this.callbacks.clear();
  }

  private recompose(): void {
    this.composer.recompose();
    this.commit();
  }

  /**
   * Write the tree to the root when its markup changed. The first commit over
   * server markup keeps the existing nodes, including state the bootloader
   * toggled. Rescans afterwards so new triggers get inert marking and
   * `aria-expanded` normalization.
   */
  private commit(): void {
    const markup = this.composer.renderTree(new HtmlRenderer()).join('');
    if (this.adoptServerMarkup) {
      this.adoptServerMarkup = false;
      this.committed = markup;
      return;
    }
    if (markup === this.committed) return;
    this.root.innerHTML = markup;
    this.committed = markup;
    if (this.report) {
      this.engine.scan(this.root);
    }
  }

  private assertLive(operation: string): void {
    if (this.isDisposed) {
      throw StateError.disposed(`Runtime.${operation}`);
    }
  }
}

export function createRuntime(options: RuntimeOptions): Runtime {
  return new Runtime(options);
}
