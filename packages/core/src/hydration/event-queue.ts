import { Logger } from 'tessel-kernel';
import { ValidationError, ensureError } from 'tessel-shared';

const log = Logger.for('EventQueue');

/** Marks an element whose clicks go to a registered callback */
export const SID_ATTRIBUTE = 'data-sid';

/** A click buffered by the bootloader before the runtime was ready */
export interface QueuedEvent {
  type: 'click';
  targetId: string;
  timestamp: number;
}

export interface CallbackContext {
  sid: string;
  /** The live event, when the callback runs from a delegated listener */
  event?: Event;
  /** The buffered event, when the callback runs from a replay */
  queued?: QueuedEvent;
}

export type SidCallback = (context: CallbackContext) => void;

export function getEventQueue(win: Window): QueuedEvent[] {
  const existing = win.__TESSEL_QUEUE__;
  if (existing) return existing;
  const queue: QueuedEvent[] = [];
  win.__TESSEL_QUEUE__ = queue;
  return queue;
}

export function enqueueEvent(win: Window, event: QueuedEvent): void {
  getEventQueue(win).push(event);
}

/**
 * Take every buffered event and leave the queue empty.
 */
export function drainEventQueue(win: Window): QueuedEvent[] {
  const queue = getEventQueue(win);
  return queue.splice(0, queue.length);
}

export class CallbackRegistry {
  private callbacks = new Map<string, SidCallback>();

  register(sid: string, callback: SidCallback): () => void {
    if (typeof sid !== 'string' || sid.trim() === '') {
      throw ValidationError.required('sid');
    }
    if (typeof callback !== 'function') {
      throw ValidationError.type('callback', 'function', typeof callback);
    }
    this.callbacks.set(sid, callback);
    return () => {
      if (this.callbacks.get(sid) === callback) this.callbacks.delete(sid);
    };
  }

  has(sid: string): boolean {
    return this.callbacks.has(sid);
  }

  /**
   * Run the callback for `sid`. Returns false when none is registered or it
   * threw; errors are logged.
   */
  invoke(context: CallbackContext): boolean {
    const callback = this.callbacks.get(context.sid);
    if (!callback) {
      log.debug({ sid: context.sid }, 'No callback for sid');
      return false;
    }
    try {
      callback(context);
      return true;
    } catch (error) {
      log.error({ err: ensureError(error), sid: context.sid }, 'Callback failed');
      return false;
    }
  }

  /**
   * Deliver buffered events in arrival order. Returns how many reached a
   * callback.
   */
  replay(events: readonly QueuedEvent[]): number {
    let delivered = 0;
    for (const queued of events) {
      if (this.invoke({ sid: queued.targetId, queued })) delivered++;
    }
    return delivered;
  }

  clear(): void {
    this.callbacks.clear();
  }
}
