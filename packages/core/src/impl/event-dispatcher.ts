/**
 * EventDispatcher: fans resource lifecycle hooks out to subscribed listeners.
 *
 * Implements ResourceEventBus, so it can be handed to any linked service,
 * dataset or registry that accepts one. Listeners run on a microtask by
 * default (`mode: 'sync'` runs them inline) and a throwing listener is
 * reported to `onError` instead of the resource that emitted the event.
 *
 * ```typescript
 * const dispatcher = new EventDispatcher();
 * dispatcher.on('operation.failed', (e) => alerts.notify(e.kind, e.error));
 * const dataset = new MemoryDataset({ linkedService, settings, events: dispatcher });
 * ```
 */

import type { ResourceEventBus } from '../interfaces/event-bus';
import { now } from '../utils/id';

// ── Event Types ─────────────────────────────────────────────────

export type EventType =
  | 'linked_service.connected'
  | 'linked_service.closed'
  | 'operation.started'
  | 'operation.completed'
  | 'operation.failed'
  | 'resource.registered';

/** Every dispatched event carries its type and a millisecond timestamp. */
export interface DispatchedEvent {
  readonly type: EventType;
  readonly timestamp: number;
  readonly [key: string]: unknown;
}

export type EventListener = (event: DispatchedEvent) => void;

type EventPayload<K extends keyof ResourceEventBus> = Parameters<NonNullable<ResourceEventBus[K]>>[0];

// ── Options ─────────────────────────────────────────────────────

export interface EventDispatcherOptions {
  /**
   * Dispatch mode.
   * - `'async'` (default): listeners fire on the next microtask.
   * - `'sync'`: listeners fire inline. Use for testing.
   */
  mode?: 'sync' | 'async';

  /** Called when a listener throws. */
  onError?: (error: unknown, event: DispatchedEvent) => void;
}

// ── EventDispatcher ─────────────────────────────────────────────

export class EventDispatcher implements ResourceEventBus {
  private readonly _listeners = new Map<EventType | '*', Set<EventListener>>();
  private readonly _mode: 'sync' | 'async';
  private readonly _onError?: (error: unknown, event: DispatchedEvent) => void;

  constructor(options: EventDispatcherOptions = {}) {
    this._mode = options.mode ?? 'async';
    this._onError = options.onError;
  }

  // ── ResourceEventBus ────────────────────────────────────────────

  onConnected(e: EventPayload<'onConnected'>): void {
    this._dispatch('linked_service.connected', e);
  }

  onConnectionClosed(e: EventPayload<'onConnectionClosed'>): void {
    this._dispatch('linked_service.closed', e);
  }

  onOperationStarted(e: EventPayload<'onOperationStarted'>): void {
    this._dispatch('operation.started', e);
  }

  onOperationCompleted(e: EventPayload<'onOperationCompleted'>): void {
    this._dispatch('operation.completed', e);
  }

  onOperationFailed(e: EventPayload<'onOperationFailed'>): void {
    this._dispatch('operation.failed', e);
  }

  onResourceRegistered(e: EventPayload<'onResourceRegistered'>): void {
    this._dispatch('resource.registered', e);
  }

  // ── Public API ──────────────────────────────────────────────────

  /**
   * Subscribe to one event type, or `'*'` for all of them.
   * Returns the unsubscribe function.
   */
  on(type: EventType | '*', listener: EventListener): () => void {
    const listeners = this._listeners.get(type) ?? new Set<EventListener>();
    this._listeners.set(type, listeners);
    listeners.add(listener);
    return () => {
      listeners.delete(listener);
    };
  }

  /** Resolves once pending async dispatches have run. */
  async flush(): Promise<void> {
    await new Promise<void>(resolve => queueMicrotask(resolve));
  }

  // ── Internal ────────────────────────────────────────────────────

  private _dispatch(type: EventType, payload: object): void {
    // Snapshot now so listeners added during dispatch wait for the next event.
    const targets = [...(this._listeners.get(type) ?? []), ...(this._listeners.get('*') ?? [])];
    if (targets.length === 0) return;

    const event: DispatchedEvent = Object.freeze({ ...payload, type, timestamp: now() });
    const deliver = (): void => {
      for (const listener of targets) {
        try {
          listener(event);
        } catch (err) {
          this._onError?.(err, event);
        }
      }
    };

    if (this._mode === 'sync') {
      deliver();
    } else {
      queueMicrotask(deliver);
    }
  }
}
