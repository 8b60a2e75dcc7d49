/**
 * Investigation Orchestrator
 *
 * Main loop that drives one investigation through the phase cycle:
 *   (think -> act -> observe -> evaluate)* -> summary
 * until the confidence policy reports a terminating status, the iteration
 * budget is spent, or the caller cancels.
 */

import { InvestigationConfigError } from '../errors.js';
import type { InvestigationEventInput } from '../events/types.js';
import {
  describeAction,
  isTerminalStatus,
  mergeThresholds,
  type ConfidenceThresholds,
  type TerminalStatus,
} from '../policy/confidence.js';
import { emptyFindingSet, emptyHypothesisSet, fallbackAssessment, fallbackPayload } from '../reasoner/fallback.js';
import type {
  FallbackInfo,
  FindingSet,
  HypothesisSet,
  ObservedToolResult,
  Reasoner,
  ReasonerPhase,
  ReasonerRequest,
  ReasonerResult,
  ResolutionAssessment,
} from '../reasoner/types.js';
import { summarizeToolResult } from '../tools/summarize.js';
import type { ToolCall, ToolExecution } from '../tools/types.js';
import {
  addWarning,
  appendFindings,
  appendHypotheses,
  appendToolInvocations,
  applyAssessment,
  createInvestigationRecord,
  incrementIteration,
  recordReasonerCall,
  setNextActions,
  snapshotRecord,
} from './state.js';
import type {
  ContextWindows,
  InvestigationContext,
  InvestigationOptions,
  InvestigationPhase,
  InvestigationRecord,
  InvestigationResult,
  InvestigationSummary,
  StopReason,
  ToolInvocation,
} from './types.js';

export const DEFAULT_ITERATION_LIMIT = 5;

export const DEFAULT_WINDOWS: Readonly<ContextWindows> = Object.freeze({
  thinkFindings: 3,
  observeToolResults: 4,
  observeHypotheses: 3,
});

export const PHASE_ORDER: readonly InvestigationPhase[] = ['think', 'act', 'observe', 'evaluate'];

const PHASE_TITLES: Record<InvestigationPhase, string> = {
  think: 'THINK - Forming hypotheses',
  act: 'ACT - Gathering evidence',
  observe: 'OBSERVE - Analyzing evidence',
  evaluate: 'EVALUATE - Assessing confidence',
};

interface RunState {
  record: InvestigationRecord;
  readonly reasoner: Reasoner;
  readonly ctx: InvestigationContext;
  readonly thresholds: ConfidenceThresholds;
  readonly stopAt: TerminalStatus;
  readonly windows: ContextWindows;
  readonly signal?: AbortSignal;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function lastN<T>(items: readonly T[], n: number): T[] {
  return n > 0 ? items.slice(-n) : [];
}

function publish(run: RunState, input: InvestigationEventInput): void {
  run.ctx.events?.publish(input);
}

function warn(run: RunState, phase: InvestigationPhase, message: string): void {
  run.record = addWarning(run.record, message);
  run.ctx.logger?.warn(message, { investigation: run.record.id, phase });
  publish(run, { type: 'warning', phase, iteration: run.record.iteration, message });
}

function notify(run: RunState, phase: InvestigationPhase): void {
  try {
    run.ctx.onUpdate?.(snapshotRecord(run.record), phase);
  } catch (error) {
    run.ctx.logger?.warn('onUpdate callback failed', { phase, error: errorMessage(error) });
  }
}

/**
 * Validate everything an investigation needs before the first iteration.
 * Returns the reasoner so callers get it non-null.
 */
export function validateInvestigation(
  subject: string,
  ctx: InvestigationContext,
  iterationLimit: number
): Reasoner {
  if (!subject.trim()) {
    throw new InvestigationConfigError('Investigation subject must not be empty');
  }
  if (!Number.isInteger(iterationLimit) || iterationLimit < 1) {
    throw new InvestigationConfigError(
      `Iteration limit must be an integer >= 1 (got ${iterationLimit})`
    );
  }
  if (!ctx.reasoner) {
    throw new InvestigationConfigError('No reasoner configured');
  }

  const tools = ctx.toolRegistry.listNames();
  if (tools.length === 0) {
    throw new InvestigationConfigError('No evidence sources registered');
  }
  const missing = ctx.selection.referencedTools().filter((name) => !tools.includes(name));
  if (missing.length > 0) {
    throw new InvestigationConfigError(
      `Selection policy references unregistered tools: ${missing.join(', ')}`
    );
  }

  const thresholds = mergeThresholds(ctx.thresholds);
  for (const [name, value] of Object.entries(thresholds)) {
    if (!Number.isFinite(value) || value < 0 || value > 100) {
      throw new InvestigationConfigError(`Threshold ${name} must be within [0, 100] (got ${value})`);
    }
  }

  return ctx.reasoner;
}

// ============================================================================
// Reasoner calls
// ============================================================================

async function consultReasoner(run: RunState, request: ReasonerRequest): Promise<ReasonerResult> {
  try {
    return await run.reasoner.generate(request);
  } catch (error) {
    return {
      payload: fallbackPayload(request.phase),
      fallback: { reason: 'reasoner_error', detail: errorMessage(error) },
    };
  }
}

function phaseMismatch(expected: ReasonerPhase, actual: ReasonerPhase): FallbackInfo {
  return { reason: 'phase_mismatch', detail: `Expected a ${expected} payload, got ${actual}` };
}

function asHypothesisSet(result: ReasonerResult): { payload: HypothesisSet; fallback: FallbackInfo | null } {
  const { payload } = result;
  if (payload.phase === 'think') return { payload, fallback: result.fallback };
  return { payload: emptyHypothesisSet(), fallback: phaseMismatch('think', payload.phase) };
}

function asFindingSet(result: ReasonerResult): { payload: FindingSet; fallback: FallbackInfo | null } {
  const { payload } = result;
  if (payload.phase === 'observe') return { payload, fallback: result.fallback };
  return { payload: emptyFindingSet(), fallback: phaseMismatch('observe', payload.phase) };
}

function asAssessment(result: ReasonerResult): { payload: ResolutionAssessment; fallback: FallbackInfo | null } {
  const { payload } = result;
  if (payload.phase === 'evaluate') return { payload, fallback: result.fallback };
  return { payload: fallbackAssessment(), fallback: phaseMismatch('evaluate', payload.phase) };
}

function settleReasonerCall(
  run: RunState,
  phase: ReasonerPhase,
  reasoning: string | undefined,
  fallback: FallbackInfo | null
): void {
  const iteration = run.record.iteration;
  run.record = recordReasonerCall(run.record, {
    phase,
    iteration,
    fallback: fallback?.reason ?? null,
    reasoning,
  });

  if (fallback) {
    const detail = fallback.detail ? `: ${fallback.detail}` : '';
    warn(run, phase, `${phase.toUpperCase()} used a fallback payload (${fallback.reason})${detail}`);
  }

  publish(run, {
    type: 'reasoner',
    phase,
    iteration,
    message: reasoning ?? `${run.reasoner.name} responded`,
    content: { reasoner: run.reasoner.name, fallback: fallback?.reason ?? null },
  });
}

// ============================================================================
// Phases
// ============================================================================

async function think(run: RunState): Promise<void> {
  const { record } = run;
  const result = await consultReasoner(run, {
    phase: 'think',
    subject: record.subject,
    iteration: record.iteration,
    signal: run.signal,
    context: {
      recentFindings: lastN(record.findings, run.windows.thinkFindings),
      availableTools: run.ctx.toolRegistry.listNames(),
    },
  });
  const { payload, fallback } = asHypothesisSet(result);
  settleReasonerCall(run, 'think', payload.reasoning, fallback);

  const hypotheses = payload.hypotheses.map((h) => ({ ...h, iteration: record.iteration }));
  run.record = appendHypotheses(run.record, hypotheses);
  run.record = setNextActions(run.record, payload.nextActions);

  for (const h of hypotheses) {
    publish(run, {
      type: 'hypothesis',
      phase: 'think',
      iteration: record.iteration,
      message: h.text,
      content: { confidence: h.confidence, evidenceNeeded: h.evidenceNeeded },
    });
  }
}

function toInvocation(execution: ToolExecution, iteration: number): ToolInvocation {
  const base = {
    toolName: execution.toolName,
    parameters: execution.input,
    iteration,
    durationMs: execution.durationMs,
    cached: execution.cached,
  };
  if (execution.result.success) {
    return {
      ...base,
      rawResult: execution.result.data,
      summary: summarizeToolResult(execution.result.data),
      status: 'ok',
    };
  }
  return {
    ...base,
    rawResult: null,
    summary: execution.result.error,
    status: 'failed',
    error: execution.result.error,
  };
}

async function executeCall(run: RunState, call: ToolCall, iteration: number): Promise<ToolExecution> {
  const startTime = Date.now();
  try {
    return await run.ctx.toolRegistry.execute(
      call.tool,
      call.params,
      { iteration, signal: run.signal },
      { timeoutMs: run.ctx.toolTimeoutMs }
    );
  } catch (error) {
    return {
      toolName: call.tool,
      input: call.params,
      result: { success: false, error: errorMessage(error) },
      timestamp: new Date().toISOString(),
      durationMs: Date.now() - startTime,
      cached: false,
    };
  }
}

async function act(run: RunState): Promise<void> {
  const iteration = run.record.iteration;
  const decision = run.ctx.selection.select({
    iteration,
    nextActions: run.record.nextActions,
  });

  publish(run, {
    type: 'decision',
    phase: 'act',
    iteration,
    message: decision.rationale,
    content: { strategy: decision.strategy, calls: decision.calls },
  });
  run.ctx.logger?.debug('Tool selection', {
    investigation: run.record.id,
    strategy: decision.strategy,
    tools: decision.calls.map((c) => c.tool),
  });

  // Sources are independent; OBSERVE waits for all of them.
  const executions = await Promise.all(decision.calls.map((call) => executeCall(run, call, iteration)));
  const invocations = executions.map((execution) => toInvocation(execution, iteration));
  run.record = appendToolInvocations(run.record, invocations);

  for (const invocation of invocations) {
    publish(run, {
      type: 'tool',
      phase: 'act',
      iteration,
      message: `${invocation.toolName}: ${invocation.summary}`,
      content: {
        toolName: invocation.toolName,
        parameters: invocation.parameters,
        status: invocation.status,
        durationMs: invocation.durationMs,
        cached: invocation.cached,
      },
    });
    if (invocation.status === 'failed') {
      warn(run, 'act', `Tool ${invocation.toolName} failed: ${invocation.summary}`);
    }
  }
}

async function observe(run: RunState): Promise<void> {
  const { record } = run;
  const successful = record.toolInvocations.filter((i) => i.status === 'ok');
  const toolResults: ObservedToolResult[] = lastN(successful, run.windows.observeToolResults).map(
    (i) => ({
      toolName: i.toolName,
      parameters: i.parameters,
      result: i.rawResult,
      summary: i.summary,
      iteration: i.iteration,
    })
  );

  const result = await consultReasoner(run, {
    phase: 'observe',
    subject: record.subject,
    iteration: record.iteration,
    signal: run.signal,
    context: {
      toolResults,
      recentHypotheses: lastN(record.hypotheses, run.windows.observeHypotheses),
    },
  });
  const { payload, fallback } = asFindingSet(result);
  settleReasonerCall(run, 'observe', payload.reasoning, fallback);

  const findings = payload.findings.map((f) => ({ ...f, iteration: record.iteration }));
  run.record = appendFindings(run.record, findings);

  for (const f of findings) {
    publish(run, {
      type: 'finding',
      phase: 'observe',
      iteration: record.iteration,
      message: f.text,
      content: { severity: f.severity, confidence: f.confidence },
    });
  }
}

async function evaluate(run: RunState): Promise<void> {
  const { record } = run;
  const result = await consultReasoner(run, {
    phase: 'evaluate',
    subject: record.subject,
    iteration: record.iteration,
    signal: run.signal,
    context: {
      findings: [...record.findings],
      hypotheses: [...record.hypotheses],
    },
  });
  const { payload, fallback } = asAssessment(result);
  settleReasonerCall(run, 'evaluate', payload.reasoning, fallback);

  run.record = applyAssessment(run.record, payload, run.thresholds);
  run.record = incrementIteration(run.record);

  const action = describeAction(run.record.status);
  publish(run, {
    type: 'confidence',
    phase: 'evaluate',
    iteration: record.iteration,
    message: `Confidence ${run.record.confidence}% - ${action.label}`,
    content: {
      confidence: run.record.confidence,
      status: run.record.status,
      action: action.label,
      rootCause: run.record.rootCause,
      resolution: run.record.resolution,
      alternativeActions: payload.alternativeActions,
    },
  });
}

const PHASE_HANDLERS: Record<InvestigationPhase, (run: RunState) => Promise<void>> = {
  think,
  act,
  observe,
  evaluate,
};

async function driveLoop(run: RunState): Promise<StopReason> {
  for (;;) {
    publish(run, {
      type: 'iteration',
      phase: null,
      iteration: run.record.iteration,
      message: `Iteration ${run.record.iteration + 1} of ${run.record.iterationLimit}`,
    });

    for (const phase of PHASE_ORDER) {
      if (run.signal?.aborted) return 'cancelled';
      publish(run, { type: 'phase', phase, iteration: run.record.iteration, message: PHASE_TITLES[phase] });
      await PHASE_HANDLERS[phase](run);
      notify(run, phase);
    }

    if (isTerminalStatus(run.record.status, run.stopAt)) return 'confidence_threshold';
    if (run.record.iteration >= run.record.iterationLimit) return 'iteration_limit';
  }
}

/**
 * Final output of an investigation, read off the terminal record.
 */
export function summarizeInvestigation(record: InvestigationRecord): InvestigationSummary {
  return {
    subject: record.subject,
    iterations: record.iteration,
    confidence: record.confidence,
    status: record.status,
    rootCause: record.rootCause,
    resolution: record.resolution,
    findings: [...record.findings],
    toolCalls: record.toolInvocations.length,
    failedToolCalls: record.toolInvocations.filter((i) => i.status === 'failed').length,
    fallbacks: record.reasonerCalls.filter((c) => c.fallback !== null).length,
  };
}

/**
 * Run one investigation to a terminal record.
 *
 * Throws `InvestigationConfigError` before any iteration when the context
 * cannot support a run; every later problem is recovered and recorded.
 */
export async function runInvestigation(
  subject: string,
  ctx: InvestigationContext,
  options: InvestigationOptions = {}
): Promise<InvestigationResult> {
  const startTime = Date.now();
  const iterationLimit = options.iterationLimit ?? DEFAULT_ITERATION_LIMIT;
  const reasoner = validateInvestigation(subject, ctx, iterationLimit);

  const run: RunState = {
    record: createInvestigationRecord(subject.trim(), iterationLimit),
    reasoner,
    ctx,
    thresholds: mergeThresholds(ctx.thresholds),
    stopAt: ctx.stopAt ?? 'awaiting_approval',
    windows: { ...DEFAULT_WINDOWS, ...ctx.windows },
    signal: options.signal,
  };

  ctx.logger?.info('Investigation started', {
    investigation: run.record.id,
    reasoner: reasoner.name,
    iterationLimit,
  });
  publish(run, {
    type: 'started',
    phase: null,
    iteration: 0,
    message: run.record.subject,
    content: {
      id: run.record.id,
      reasoner: reasoner.name,
      iterationLimit,
      stopAt: run.stopAt,
      thresholds: run.thresholds,
    },
  });

  const stopReason = await driveLoop(run);
  const summary = summarizeInvestigation(run.record);
  const completedAt = new Date().toISOString();

  ctx.logger?.info('Investigation complete', {
    investigation: run.record.id,
    stopReason,
    iterations: summary.iterations,
    confidence: summary.confidence,
    status: summary.status,
  });
  publish(run, {
    type: 'complete',
    phase: null,
    iteration: run.record.iteration,
    message: `Investigation finished (${stopReason}) with status ${summary.status}`,
    content: { stopReason, summary },
  });

  return {
    record: run.record,
    summary,
    stopReason,
    metadata: {
      startedAt: run.record.startedAt,
      completedAt,
      durationMs: Date.now() - startTime,
    },
  };
}

/**
 * Create an investigator with bound context.
 */
export function createInvestigator(ctx: InvestigationContext) {
  return {
    run: (subject: string, options?: InvestigationOptions) => runInvestigation(subject, ctx, options),
    ctx,
  };
}

// Re-export types
export type {
  InvestigationContext,
  InvestigationOptions,
  InvestigationRecord,
  InvestigationResult,
  InvestigationSummary,
  StopReason,
} from './types.js';
