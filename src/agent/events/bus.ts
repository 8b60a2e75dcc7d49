/**
 * Investigation Event Bus
 *
 * Synchronous, ordered fan-out of investigation events to presentation
 * collaborators. A failing listener is logged and never reaches the
 * orchestrator.
 */

import { EventEmitter } from 'eventemitter3';

import type { Logger } from '../../core/logger.js';
import type {
  InvestigationBusEvents,
  InvestigationEvent,
  InvestigationEventInput,
} from './types.js';

export class InvestigationEventBus extends EventEmitter<InvestigationBusEvents> {
  private seq = 0;

  constructor(private logger?: Logger) {
    super();
  }

  get lastSeq(): number {
    return this.seq;
  }

  publish(input: InvestigationEventInput): InvestigationEvent {
    this.seq += 1;
    const event: InvestigationEvent = {
      ...input,
      seq: this.seq,
      timestamp: new Date().toISOString(),
    };

    // Listeners attached with `on` directly still stop the fan-out when they throw.
    try {
      this.emit('event', event);
    } catch (error) {
      this.reportListenerError(event, error);
    }

    return event;
  }

  /**
   * Subscribe to every event. A throwing subscriber is logged and the rest
   * still receive the event. Returns an unsubscribe function.
   */
  subscribe(listener: (event: InvestigationEvent) => void): () => void {
    const isolated = (event: InvestigationEvent) => {
      try {
        listener(event);
      } catch (error) {
        this.reportListenerError(event, error);
      }
    };
    this.on('event', isolated);
    return () => {
      this.off('event', isolated);
    };
  }

  private reportListenerError(event: InvestigationEvent, error: unknown): void {
    this.logger?.warn('Investigation event listener failed', {
      seq: event.seq,
      type: event.type,
      error: error instanceof Error ? error.message : String(error),
    });
  }
}

/**
 * Render an event as a Server-Sent Events frame.
 */
export function toServerSentEvent(event: InvestigationEvent): string {
  return `id: ${event.seq}\nevent: ${event.type}\ndata: ${JSON.stringify(event)}\n\n`;
}
