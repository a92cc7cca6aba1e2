// packages/core/src/engine/event-bus.ts

import { EventEmitter } from 'eventemitter3';
import type { PipelineEvent, PipelineEventInput } from '../types/events.js';

interface EventBusEvents {
  event: (event: PipelineEvent) => void;
}

/**
 * Typed event bus for pipeline progress.
 * Wraps eventemitter3 with typed PipelineEvent emission.
 */
export class EventBus extends EventEmitter<EventBusEvents> {
  /** Emit a typed event, injecting the timestamp if missing. */
  emitEvent(event: PipelineEventInput): void {
    const timestamp = event.timestamp ?? new Date().toISOString();
    const stamped: PipelineEvent = { ...event, timestamp };
    this.emit('event', stamped);
  }
}
