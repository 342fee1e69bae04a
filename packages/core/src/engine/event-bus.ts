// packages/core/src/engine/event-bus.ts

import { EventEmitter } from 'eventemitter3';
import type { EngineEvent } from '../types/events.js';

interface EventBusEvents {
  event: (event: EngineEvent) => void;
}

export type EngineEventOf<T extends EngineEvent['type']> = Extract<EngineEvent, { type: T }>;

/**
 * Typed event bus for sequencer events.
 * Wraps eventemitter3 with typed EngineEvent emission.
 */
export class EventBus extends EventEmitter<EventBusEvents> {
  /** Emit an event, filling in the timestamp when it is empty. */
  emitEvent(event: EngineEvent): void {
    const timestamped =
      'timestamp' in event && !event.timestamp
        ? { ...event, timestamp: new Date().toISOString() }
        : event;
    this.emit('event', timestamped);
  }

  /** Subscribe to one event type. Returns the unsubscribe function. */
  onType<T extends EngineEvent['type']>(
    type: T,
    handler: (event: EngineEventOf<T>) => void,
  ): () => void {
    const listener = (event: EngineEvent): void => {
      if (isEventOf(event, type)) handler(event);
    };
    this.on('event', listener);
    return () => {
      this.off('event', listener);
    };
  }
}

export function isEventOf<T extends EngineEvent['type']>(
  event: EngineEvent,
  type: T,
): event is EngineEventOf<T> {
  return event.type === type;
}
