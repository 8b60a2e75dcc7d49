/**
 * Reasoner Types
 *
 * The narrow request/response contract between the harness and the oracle that
 * turns phase context into hypotheses, findings, or a resolution assessment.
 */

import type { ToolParameters } from '../tools/types.js';

export type ReasonerPhase = 'think' | 'observe' | 'evaluate';

export type Severity = 'critical' | 'high' | 'medium' | 'low';

export type RiskLevel = 'low' | 'medium' | 'high';

export interface ProposedHypothesis {
  text: string;
  /** 0-100 */
  confidence: number;
  evidenceNeeded: string[];
}

export interface ProposedFinding {
  text: string;
  severity: Severity;
  /** 0-100 */
  confidence: number;
}

export interface ProposedResolution {
  actionDescription: string;
  commandOrStep?: string;
  riskLevel: RiskLevel;
  expectedRecovery?: string;
}

export interface HypothesisSet {
  phase: 'think';
  hypotheses: ProposedHypothesis[];
  nextActions: string[];
  reasoning?: string;
}

export interface FindingSet {
  phase: 'observe';
  findings: ProposedFinding[];
  patterns: string[];
  correlations: string[];
  reasoning?: string;
}

export interface ResolutionAssessment {
  phase: 'evaluate';
  rootCauseIdentified: boolean;
  rootCause: string | null;
  confidence: number;
  resolution: ProposedResolution | null;
  alternativeActions: Array<{ action: string; risk?: string }>;
  reasoning?: string;
}

export type ReasonerPayload = HypothesisSet | FindingSet | ResolutionAssessment;

/**
 * Tool output as presented to the reasoner during OBSERVE.
 */
export interface ObservedToolResult {
  toolName: string;
  parameters: ToolParameters;
  result: unknown;
  summary: string;
  iteration: number;
}

export interface ThinkContext {
  recentFindings: ProposedFinding[];
  availableTools: string[];
}

export interface ObserveContext {
  toolResults: ObservedToolResult[];
  recentHypotheses: ProposedHypothesis[];
}

export interface EvaluateContext {
  findings: ProposedFinding[];
  hypotheses: ProposedHypothesis[];
}

interface BaseRequest {
  subject: string;
  iteration: number;
  signal?: AbortSignal;
}

export type ReasonerRequest =
  | (BaseRequest & { phase: 'think'; context: ThinkContext })
  | (BaseRequest & { phase: 'observe'; context: ObserveContext })
  | (BaseRequest & { phase: 'evaluate'; context: EvaluateContext });

export type FallbackReason =
  | 'empty_response'
  | 'no_json'
  | 'invalid_json'
  | 'schema_mismatch'
  | 'phase_mismatch'
  | 'reasoner_error';

export interface FallbackInfo {
  reason: FallbackReason;
  detail?: string;
}

export interface ReasonerResult {
  payload: ReasonerPayload;
  /** Set when the payload was synthesized instead of decoded */
  fallback: FallbackInfo | null;
}

/**
 * Stateless oracle. Implementations may hold a connection but no
 * investigation state.
 */
export interface Reasoner {
  readonly name: string;
  generate(request: ReasonerRequest): Promise<ReasonerResult>;
}
