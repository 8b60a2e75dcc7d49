/**
 * Tool Selection Types
 *
 * A selection policy decides which evidence sources ACT invokes. Decisions are
 * plain data so they can be logged, emitted and asserted on.
 */

import type { ToolCall } from '../tools/types.js';

export type SelectionStrategy = 'schedule' | 'directed';

export interface SelectionContext {
  iteration: number;
  /** Plan from the most recent THINK phase */
  nextActions: string[];
}

export interface SelectionDecision {
  strategy: SelectionStrategy;
  calls: ToolCall[];
  rationale: string;
}

export interface SelectionPolicy {
  readonly name: SelectionStrategy;
  select(context: SelectionContext): SelectionDecision;
  /** Every tool name the policy can ever select */
  referencedTools(): string[];
}

export interface SelectionRoute {
  /** Matched case-insensitively at the start of a word in a next action */
  keywords: string[];
  call: ToolCall;
}
