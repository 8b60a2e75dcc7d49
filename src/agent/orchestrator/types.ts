/**
 * Orchestrator Types
 *
 * Defines the investigation record and the context structures for the
 * investigation orchestrator.
 */

import type { Logger } from '../../core/logger.js';
import type { InvestigationEventBus } from '../events/bus.js';
import type {
  ConfidenceThresholds,
  InvestigationStatus,
  TerminalStatus,
} from '../policy/confidence.js';
import type {
  FallbackReason,
  ProposedFinding,
  ProposedHypothesis,
  ProposedResolution,
  Reasoner,
  ReasonerPhase,
} from '../reasoner/types.js';
import type { SelectionPolicy } from '../selection/types.js';
import type { ExecuteOptions, ToolContext, ToolExecution, ToolParameters } from '../tools/types.js';

export type InvestigationPhase = 'think' | 'act' | 'observe' | 'evaluate';

export interface Hypothesis extends ProposedHypothesis {
  /** Iteration that produced it */
  iteration: number;
}

export interface Finding extends ProposedFinding {
  iteration: number;
}

export type Resolution = ProposedResolution;

export interface ToolInvocation {
  toolName: string;
  parameters: ToolParameters;
  /** Raw data returned by the source; null when the call failed */
  rawResult: unknown;
  /** One-line summary, or the failure reason */
  summary: string;
  status: 'ok' | 'failed';
  error?: string;
  iteration: number;
  durationMs: number;
  cached: boolean;
}

export interface ReasonerCall {
  phase: ReasonerPhase;
  iteration: number;
  fallback: FallbackReason | null;
  reasoning?: string;
}

/**
 * The single unit of state for one investigation.
 */
export interface InvestigationRecord {
  /** Unique investigation identifier */
  readonly id: string;

  /** Problem under investigation; immutable */
  readonly subject: string;

  /** Completed EVALUATE phases */
  iteration: number;

  /** Fixed at start */
  readonly iterationLimit: number;

  hypotheses: Hypothesis[];
  findings: Finding[];
  toolInvocations: ToolInvocation[];

  /** Overall assessment (0-100), overwritten each EVALUATE */
  confidence: number;

  rootCause: string | null;
  resolution: Resolution | null;
  status: InvestigationStatus;

  /** Plan from the latest THINK phase */
  nextActions: string[];

  reasonerCalls: ReasonerCall[];

  /** Recovered problems (fallback payloads, failed tools, listener errors) */
  warnings: string[];

  startedAt: string;
  updatedAt: string;
}

/**
 * Registry surface the orchestrator needs.
 */
export interface InvestigationToolRegistry {
  execute: (
    name: string,
    input: ToolParameters,
    ctx: ToolContext,
    options?: ExecuteOptions
  ) => Promise<ToolExecution>;
  listNames: () => string[];
}

export interface ContextWindows {
  /** Most recent findings given to THINK */
  thinkFindings: number;
  /** Most recent successful tool invocations given to OBSERVE */
  observeToolResults: number;
  /** Most recent hypotheses given to OBSERVE */
  observeHypotheses: number;
}

/**
 * Context needed to run an investigation.
 */
export interface InvestigationContext {
  reasoner: Reasoner | null;

  /** Tool registry */
  toolRegistry: InvestigationToolRegistry;

  /** Decides which sources ACT invokes */
  selection: SelectionPolicy;

  thresholds?: Partial<ConfidenceThresholds>;

  /** Lowest status that ends the loop (default: awaiting_approval) */
  stopAt?: TerminalStatus;

  windows?: Partial<ContextWindows>;

  /** Per tool call; 0 disables */
  toolTimeoutMs?: number;

  events?: InvestigationEventBus;

  logger?: Logger;

  /** Called after every phase with the updated record */
  onUpdate?: (record: InvestigationRecord, phase: InvestigationPhase) => void;
}

/**
 * Options for a single run.
 */
export interface InvestigationOptions {
  /** Override max iterations (default 5) */
  iterationLimit?: number;

  /** Checked before every phase */
  signal?: AbortSignal;
}

export type StopReason = 'confidence_threshold' | 'iteration_limit' | 'cancelled';

/**
 * Final output of an investigation.
 */
export interface InvestigationSummary {
  subject: string;
  iterations: number;
  confidence: number;
  status: InvestigationStatus;
  rootCause: string | null;
  resolution: Resolution | null;
  findings: Finding[];
  toolCalls: number;
  failedToolCalls: number;
  fallbacks: number;
}

/**
 * Result of orchestrator execution.
 */
export interface InvestigationResult {
  /** Terminal record */
  record: InvestigationRecord;

  summary: InvestigationSummary;

  stopReason: StopReason;

  /** Metadata for debugging */
  metadata: {
    startedAt: string;
    completedAt: string;
    durationMs: number;
  };
}
