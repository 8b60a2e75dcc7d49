/**
 * Agent Module
 *
 * Confidence-gated investigation harness: the orchestrator loop, its record,
 * the confidence policy, and the reasoner and evidence-source contracts.
 *
 * @example
 * ```typescript
 * import { buildHarness, loadConfig } from 'rootcause';
 *
 * const harness = buildHarness(loadConfig());
 * harness.events.subscribe((event) => console.log(event.message));
 *
 * const result = await harness.investigator.run('checkout returns intermittent 504s', {
 *   iterationLimit: harness.iterationLimit,
 * });
 *
 * console.log(result.summary.status, result.summary.rootCause);
 * ```
 */

// === Orchestrator (main entry point) ===
export {
  runInvestigation,
  createInvestigator,
  validateInvestigation,
  summarizeInvestigation,
  DEFAULT_ITERATION_LIMIT,
  DEFAULT_WINDOWS,
  PHASE_ORDER,
} from './orchestrator/orchestrator.js';

export {
  createInvestigationRecord,
  appendHypotheses,
  appendFindings,
  appendToolInvocations,
  setNextActions,
  recordReasonerCall,
  applyAssessment,
  incrementIteration,
  addWarning,
  checkRecordInvariants,
  snapshotRecord,
} from './orchestrator/state.js';

export { buildHarness, type Harness, type HarnessOverrides } from './harness.js';
export { InvestigationConfigError } from './errors.js';

// === Confidence Policy ===
export {
  DEFAULT_THRESHOLDS,
  resolveStatus,
  statusRank,
  isTerminalStatus,
  mergeThresholds,
  clampConfidence,
  describeAction,
} from './policy/confidence.js';

// === Reasoners ===
export { LlmReasoner } from './reasoner/llm-reasoner.js';
export { HeuristicReasoner, HEURISTIC_CONFIDENCE } from './reasoner/heuristic.js';
export { decodePayload, extractJson } from './reasoner/decode.js';
export { fallbackPayload, FALLBACK_CONFIDENCE } from './reasoner/fallback.js';

// === Tools ===
export {
  AgentToolRegistry,
  createToolRegistry,
  ToolTimeoutError,
  DEFAULT_CACHE_TTL_MS,
} from './tools/registry.js';
export { summarizeToolResult } from './tools/summarize.js';
export {
  loadEvidenceFixtures,
  parseEvidenceFixtures,
  DEFAULT_FIXTURES_PATH,
} from './tools/fixtures.js';
export {
  registerEvidenceTools,
  createLogSearchTool,
  createActiveIncidentsTool,
  createDeploymentHistoryTool,
  createInfraMetricsTool,
  EVIDENCE_TOOL_NAMES,
} from './tools/adapters/evidence-tools.js';

// === Selection ===
export {
  createSelectionPolicy,
  ScheduleSelectionPolicy,
  DirectedSelectionPolicy,
  DEFAULT_SCHEDULE,
  DEFAULT_ROUTES,
} from './selection/index.js';

// === Events ===
export { InvestigationEventBus, toServerSentEvent } from './events/bus.js';

// === Types ===
export type {
  InvestigationPhase,
  InvestigationRecord,
  InvestigationContext,
  InvestigationOptions,
  InvestigationResult,
  InvestigationSummary,
  InvestigationToolRegistry,
  Hypothesis,
  Finding,
  Resolution,
  ToolInvocation,
  ReasonerCall,
  ContextWindows,
  StopReason,
} from './orchestrator/types.js';
export type {
  InvestigationStatus,
  TerminalStatus,
  ConfidenceThresholds,
  ActionDescription,
} from './policy/confidence.js';
export type {
  Reasoner,
  ReasonerPhase,
  ReasonerRequest,
  ReasonerResult,
  ReasonerPayload,
  HypothesisSet,
  FindingSet,
  ResolutionAssessment,
  FallbackReason,
  Severity,
  RiskLevel,
} from './reasoner/types.js';
export type {
  ToolDefinition,
  ToolResult,
  ToolContext,
  ToolCall,
  ToolExecution,
  ToolParameters,
} from './tools/types.js';
export type {
  SelectionPolicy,
  SelectionDecision,
  SelectionContext,
  SelectionRoute,
  SelectionStrategy,
} from './selection/types.js';
export type { InvestigationEvent, InvestigationEventType } from './events/types.js';
export type { EvidenceFixtures } from './tools/fixtures.js';
