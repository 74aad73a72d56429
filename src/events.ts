/**
 * Observable state of a FlySight session.
 */

import type { FlySightError } from './exceptions';
import type { DirectoryState } from './exchanges/directory-listing';
import type { PeripheralInfo } from './models/peripheral';
import type { StartStatus } from './models/start';

/**
 * Event name to payload map published by FlySightManager.
 */
export interface FlySightEventMap {
  peripheralsChanged: PeripheralInfo[];
  connectionChanged: PeripheralInfo | null;
  directoryChanged: DirectoryState;
  downloadProgress: number;
  startStateChanged: StartStatus;
  exchangeError: FlySightError;
}

export type EventHandler<T> = (payload: T) => void;

type HandlerSets<Events> = { [E in keyof Events]?: Set<EventHandler<Events[E]>> };

// Type-safe event emitter
export class TypedEventEmitter<Events extends object> {
  private handlers: HandlerSets<Events> = {};

  // Register event handler, returns an unsubscribe function
  on<E extends keyof Events>(event: E, handler: EventHandler<Events[E]>): () => void {
    const handlers = this.handlers[event] ?? new Set<EventHandler<Events[E]>>();
    handlers.add(handler);
    this.handlers[event] = handlers;
    return () => this.off(event, handler);
  }

  // Remove event handler
  off<E extends keyof Events>(event: E, handler: EventHandler<Events[E]>): void {
    const handlers = this.handlers[event];
    if (handlers) {
      handlers.delete(handler);
      if (handlers.size === 0) {
        delete this.handlers[event];
      }
    }
  }

  // Register one-time event handler
  once<E extends keyof Events>(event: E, handler: EventHandler<Events[E]>): () => void {
    const wrappedHandler: EventHandler<Events[E]> = (payload) => {
      this.off(event, wrappedHandler);
      handler(payload);
    };
    return this.on(event, wrappedHandler);
  }

  // Emit event with payload
  emit<E extends keyof Events>(event: E, payload: Events[E]): void {
    const handlers = this.handlers[event];
    if (!handlers) {
      return;
    }
    for (const handler of [...handlers]) {
      try {
        handler(payload);
      } catch (error) {
        console.error(`Error in event handler for ${String(event)}:`, error);
      }
    }
  }

  // Remove all handlers
  removeAllListeners(event?: keyof Events): void {
    if (event !== undefined) {
      delete this.handlers[event];
    } else {
      this.handlers = {};
    }
  }

  listenerCount(event: keyof Events): number {
    return this.handlers[event]?.size ?? 0;
  }
}
