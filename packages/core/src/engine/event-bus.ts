// packages/core/src/engine/event-bus.ts

import { EventEmitter } from 'eventemitter3';
import type { EngineEvent } from '../types/events.js';

interface EventBusEvents {
  event: (event: EngineEvent) => void;
}

/**
 * Typed event bus for pipeline events.
 * Wraps eventemitter3 with typed EngineEvent emission.
 */
export class EventBus extends EventEmitter<EventBusEvents> {
  /** Emit a typed event, filling in the timestamp when left empty. */
  emitEvent(event: EngineEvent): void {
    const timestamped = event.timestamp ? event : { ...event, timestamp: new Date().toISOString() };
    this.emit('event', timestamped);
  }
}
