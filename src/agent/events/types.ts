/**
 * Investigation Event Types
 */

import type { InvestigationPhase } from '../orchestrator/types.js';

export type InvestigationEventType =
  | 'started'
  | 'iteration'
  | 'phase'
  | 'reasoner'
  | 'hypothesis'
  | 'decision'
  | 'tool'
  | 'finding'
  | 'confidence'
  | 'warning'
  | 'complete';

/**
 * A discrete, ordered record of something the harness did or learned.
 */
export interface InvestigationEvent {
  /** Strictly increasing per bus */
  seq: number;
  type: InvestigationEventType;
  /** Phase that produced the event; null outside the phase cycle */
  phase: InvestigationPhase | null;
  iteration: number;
  message: string;
  content?: Record<string, unknown>;
  timestamp: string;
}

export type InvestigationEventInput = Omit<InvestigationEvent, 'seq' | 'timestamp'>;

export interface InvestigationBusEvents {
  event: (event: InvestigationEvent) => void;
}
