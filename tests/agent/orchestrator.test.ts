import { describe, expect, it, vi } from 'vitest';
import { z } from 'zod';

import type { LlmClient } from '../../src/core/llm.js';
import { InvestigationConfigError } from '../../src/agent/errors.js';
import { InvestigationEventBus } from '../../src/agent/events/bus.js';
import type { InvestigationEvent } from '../../src/agent/events/types.js';
import { runInvestigation } from '../../src/agent/orchestrator/orchestrator.js';
import { checkRecordInvariants } from '../../src/agent/orchestrator/state.js';
import type {
  InvestigationContext,
  InvestigationRecord,
} from '../../src/agent/orchestrator/types.js';
import { LlmReasoner } from '../../src/agent/reasoner/llm-reasoner.js';
import type {
  FindingSet,
  HypothesisSet,
  ObserveContext,
  Reasoner,
  ReasonerRequest,
  ReasonerResult,
  ResolutionAssessment,
} from '../../src/agent/reasoner/types.js';
import { ScheduleSelectionPolicy } from '../../src/agent/selection/schedule.js';
import type { SelectionPolicy } from '../../src/agent/selection/types.js';
import { registerEvidenceTools } from '../../src/agent/tools/adapters/evidence-tools.js';
import { DEFAULT_FIXTURES_PATH, loadEvidenceFixtures } from '../../src/agent/tools/fixtures.js';
import { AgentToolRegistry } from '../../src/agent/tools/registry.js';
import type { ToolResult } from '../../src/agent/tools/types.js';

const fixtures = loadEvidenceFixtures(DEFAULT_FIXTURES_PATH);

function evidenceRegistry(): AgentToolRegistry {
  const registry = new AgentToolRegistry();
  registerEvidenceTools(registry, fixtures);
  return registry;
}

function assessment(confidence: number, identified = false): ResolutionAssessment {
  return {
    phase: 'evaluate',
    rootCauseIdentified: identified,
    rootCause: identified ? 'Connection pool shrunk by the last release' : null,
    confidence,
    resolution: identified
      ? { actionDescription: 'Roll back rel-2291', commandOrStep: 'deploy rollback rel-2291', riskLevel: 'low' }
      : null,
    alternativeActions: [],
  };
}

const hypotheses: HypothesisSet = {
  phase: 'think',
  hypotheses: [{ text: 'Pool misconfigured', confidence: 50, evidenceNeeded: ['database metrics'] }],
  nextActions: ['Check database metrics'],
};

const findings: FindingSet = {
  phase: 'observe',
  findings: [{ text: 'Pool saturated', severity: 'critical', confidence: 85 }],
  patterns: [],
  correlations: [],
};

/**
 * Reasoner answering from fixed payloads; EVALUATE walks a confidence script
 * and repeats its last entry.
 */
class ScriptedReasoner implements Reasoner {
  readonly name = 'scripted';
  readonly requests: ReasonerRequest[] = [];
  private evaluations = 0;

  constructor(
    private confidences: number[],
    private overrides: Partial<Record<ReasonerRequest['phase'], () => Promise<ReasonerResult>>> = {}
  ) {}

  async generate(request: ReasonerRequest): Promise<ReasonerResult> {
    this.requests.push(request);
    const override = this.overrides[request.phase];
    if (override) return override();
    switch (request.phase) {
      case 'think':
        return { payload: hypotheses, fallback: null };
      case 'observe':
        return { payload: findings, fallback: null };
      case 'evaluate': {
        const index = Math.min(this.evaluations, this.confidences.length - 1);
        this.evaluations += 1;
        const confidence = this.confidences[index] ?? 0;
        return { payload: assessment(confidence, confidence >= 70), fallback: null };
      }
    }
  }
}

function context(reasoner: Reasoner | null, overrides: Partial<InvestigationContext> = {}): InvestigationContext {
  return {
    reasoner,
    toolRegistry: evidenceRegistry(),
    selection: new ScheduleSelectionPolicy(),
    ...overrides,
  };
}

describe('runInvestigation', () => {
  it('stops once confidence reaches the approval threshold', async () => {
    const result = await runInvestigation('Checkout requests fail with 504', context(new ScriptedReasoner([40, 75])));

    expect(result.stopReason).toBe('confidence_threshold');
    expect(result.record.iteration).toBe(2);
    expect(result.summary).toMatchObject({
      iterations: 2,
      confidence: 75,
      status: 'awaiting_approval',
      rootCause: 'Connection pool shrunk by the last release',
      toolCalls: 4,
      failedToolCalls: 0,
      fallbacks: 0,
    });
    expect(result.summary.resolution?.actionDescription).toBe('Roll back rel-2291');
  });

  it('spends the whole budget when confidence stays low', async () => {
    const reasoner = new ScriptedReasoner([30]);
    const result = await runInvestigation('Checkout requests fail with 504', context(reasoner));

    expect(result.stopReason).toBe('iteration_limit');
    expect(result.record.iteration).toBe(5);
    expect(result.record.status).toBe('investigating');
    expect(result.record.resolution).toBeNull();
    expect(reasoner.requests.filter((r) => r.phase === 'evaluate')).toHaveLength(5);
  });

  it('finishes in one cycle on high confidence', async () => {
    const result = await runInvestigation('Checkout requests fail with 504', context(new ScriptedReasoner([96])));

    expect(result.stopReason).toBe('confidence_threshold');
    expect(result.record.iteration).toBe(1);
    expect(result.record.status).toBe('auto_executing');
    expect(result.record.resolution?.commandOrStep).toBe('deploy rollback rel-2291');
  });

  it('honours the iteration limit option', async () => {
    const result = await runInvestigation('Checkout requests fail with 504', context(new ScriptedReasoner([10])), {
      iterationLimit: 2,
    });
    expect(result.record.iteration).toBe(2);
    expect(result.record.iterationLimit).toBe(2);
    expect(result.stopReason).toBe('iteration_limit');
  });

  it('keeps running below a stricter stop status', async () => {
    const result = await runInvestigation(
      'Checkout requests fail with 504',
      context(new ScriptedReasoner([90]), { stopAt: 'auto_executing' }),
      { iterationLimit: 2 }
    );
    expect(result.stopReason).toBe('iteration_limit');
    expect(result.record.status).toBe('executing_with_review');
  });

  it('applies custom thresholds', async () => {
    const result = await runInvestigation(
      'Checkout requests fail with 504',
      context(new ScriptedReasoner([60]), { thresholds: { requireApproval: 55 } })
    );
    expect(result.record.iteration).toBe(1);
    expect(result.record.status).toBe('awaiting_approval');
  });

  it('only ever grows the record between phases', async () => {
    const snapshots: InvestigationRecord[] = [];
    const result = await runInvestigation(
      '  Checkout requests fail with 504  ',
      context(new ScriptedReasoner([20, 50, 80]), {
        onUpdate: (record) => snapshots.push(record),
      })
    );

    expect(result.record.subject).toBe('Checkout requests fail with 504');
    expect(snapshots).toHaveLength(12);
    snapshots.forEach((record, i) => {
      expect(checkRecordInvariants(record, snapshots[i - 1])).toEqual([]);
    });
  });

  it('keeps the record intact when the reasoner mutates its context', async () => {
    const scripted = new ScriptedReasoner([10]);
    const meddling: Reasoner = {
      name: 'meddling',
      generate: (request) => {
        if (request.phase === 'evaluate') {
          request.context.findings.length = 0;
          request.context.hypotheses.reverse();
        }
        return scripted.generate(request);
      },
    };

    const result = await runInvestigation('Checkout requests fail with 504', context(meddling), {
      iterationLimit: 2,
    });

    expect(result.record.findings).toHaveLength(2);
    expect(result.record.hypotheses.map((h) => h.iteration)).toEqual([0, 1]);
  });

  it('keeps the record intact when an update callback mutates it', async () => {
    const result = await runInvestigation(
      'Checkout requests fail with 504',
      context(new ScriptedReasoner([10]), {
        onUpdate: (record) => {
          record.findings.length = 0;
          record.toolInvocations.pop();
        },
      }),
      { iterationLimit: 2 }
    );

    expect(result.record.findings).toHaveLength(2);
    expect(result.record.toolInvocations).toHaveLength(4);
  });

  it('runs selected tools concurrently and observes once all have settled', async () => {
    const started: string[] = [];
    const release = new Map<string, () => void>();
    const deferredTool = (name: string) => ({
      name,
      description: `${name} answers when released`,
      schema: z.object({}),
      cacheTtlMs: 0,
      execute: () =>
        new Promise<ToolResult>((resolve) => {
          started.push(name);
          release.set(name, () => resolve({ success: true, data: { active: [name] } }));
        }),
    });
    const registry = new AgentToolRegistry();
    registry.register(deferredTool('pager'));
    registry.register(deferredTool('audit'));
    const selection: SelectionPolicy = {
      name: 'schedule',
      select: () => ({
        strategy: 'schedule',
        calls: [
          { tool: 'pager', params: {} },
          { tool: 'audit', params: {} },
        ],
        rationale: 'both',
      }),
      referencedTools: () => ['pager', 'audit'],
    };
    const scripted = new ScriptedReasoner([10]);
    const observed: ObserveContext[] = [];
    const reasoner: Reasoner = {
      name: 'spy',
      generate: (request) => {
        if (request.phase === 'observe') observed.push(request.context);
        return scripted.generate(request);
      },
    };

    const running = runInvestigation(
      'Checkout requests fail with 504',
      context(reasoner, { toolRegistry: registry, selection }),
      { iterationLimit: 1 }
    );

    await vi.waitFor(() => expect(started).toEqual(['pager', 'audit']));
    expect(observed).toEqual([]);

    release.get('audit')?.();
    await new Promise((resolve) => setImmediate(resolve));
    expect(observed).toEqual([]);

    release.get('pager')?.();
    const result = await running;

    expect(observed).toHaveLength(1);
    expect(observed[0]?.toolResults.map((t) => t.toolName)).toEqual(['pager', 'audit']);
    expect(result.record.toolInvocations.map((i) => i.toolName)).toEqual(['pager', 'audit']);
  });

  it('passes windowed context to the reasoner', async () => {
    const reasoner = new ScriptedReasoner([10]);
    await runInvestigation('Checkout requests fail with 504', context(reasoner, { windows: { observeToolResults: 2 } }), {
      iterationLimit: 3,
    });

    const thinks = reasoner.requests.flatMap((r) => (r.phase === 'think' ? [r] : []));
    expect(thinks.map((r) => r.context.recentFindings.length)).toEqual([0, 1, 2]);
    expect(thinks[0]?.context.availableTools).toEqual([
      'log_search',
      'active_incidents',
      'deployment_history',
      'infra_metrics',
    ]);

    const observes = reasoner.requests.flatMap((r) => (r.phase === 'observe' ? [r] : []));
    expect(observes.map((r) => r.context.toolResults.map((t) => t.toolName))).toEqual([
      ['log_search', 'active_incidents'],
      ['deployment_history', 'infra_metrics'],
      ['infra_metrics', 'infra_metrics'],
    ]);
  });

  it('recovers from malformed reasoner output', async () => {
    const client: LlmClient = {
      meta: { provider: 'anthropic', model: 'claude-test' },
      complete: async () => ({ content: 'Root cause unclear, need more data.', model: 'claude-test' }),
    };
    const result = await runInvestigation('Checkout requests fail with 504', context(new LlmReasoner(client)), {
      iterationLimit: 1,
    });

    expect(result.stopReason).toBe('iteration_limit');
    expect(result.record.hypotheses).toEqual([]);
    expect(result.record.confidence).toBe(30);
    expect(result.summary.fallbacks).toBe(3);
    expect(result.summary.toolCalls).toBe(2);
    expect(result.record.warnings[0]).toBe(
      'THINK used a fallback payload (no_json): No JSON object found in response'
    );
  });

  it('keeps failed tool calls out of OBSERVE', async () => {
    const registry = new AgentToolRegistry();
    const Empty = z.object({});
    registry.register({
      name: 'healthy',
      description: 'always answers',
      schema: Empty,
      execute: async () => ({ success: true, data: { active: [] } }),
      cacheTtlMs: 0,
    });
    registry.register({
      name: 'flaky',
      description: 'always throws',
      schema: Empty,
      execute: async () => {
        throw new Error('boom');
      },
      cacheTtlMs: 0,
    });
    const selection: SelectionPolicy = {
      name: 'schedule',
      select: () => ({
        strategy: 'schedule',
        calls: [
          { tool: 'healthy', params: {} },
          { tool: 'flaky', params: {} },
        ],
        rationale: 'both',
      }),
      referencedTools: () => ['healthy', 'flaky'],
    };
    const observed: ObserveContext[] = [];
    const reasoner = new ScriptedReasoner([10], {
      observe: async () => ({ payload: findings, fallback: null }),
    });
    const spy: Reasoner = {
      name: 'spy',
      generate: (request) => {
        if (request.phase === 'observe') observed.push(request.context);
        return reasoner.generate(request);
      },
    };

    const result = await runInvestigation(
      'Checkout requests fail with 504',
      context(spy, { toolRegistry: registry, selection }),
      { iterationLimit: 1 }
    );

    expect(observed[0]?.toolResults.map((t) => t.toolName)).toEqual(['healthy']);
    expect(result.record.toolInvocations.map((i) => [i.toolName, i.status])).toEqual([
      ['healthy', 'ok'],
      ['flaky', 'failed'],
    ]);
    expect(result.record.toolInvocations[1]?.error).toBe('boom');
    expect(result.record.warnings).toEqual(['Tool flaky failed: boom']);
    expect(result.summary.failedToolCalls).toBe(1);
  });

  it('substitutes a fallback when the reasoner throws', async () => {
    const reasoner = new ScriptedReasoner([90], {
      evaluate: async () => {
        throw new Error('model offline');
      },
    });
    const result = await runInvestigation('Checkout requests fail with 504', context(reasoner), {
      iterationLimit: 1,
    });

    expect(result.record.confidence).toBe(30);
    expect(result.record.warnings).toEqual([
      'EVALUATE used a fallback payload (reasoner_error): model offline',
    ]);
    expect(result.record.reasonerCalls.map((c) => c.fallback)).toEqual([null, null, 'reasoner_error']);
  });

  it('rejects a payload for the wrong phase', async () => {
    const reasoner = new ScriptedReasoner([10], {
      think: async () => ({ payload: findings, fallback: null }),
    });
    const result = await runInvestigation('Checkout requests fail with 504', context(reasoner), {
      iterationLimit: 1,
    });

    expect(result.record.hypotheses).toEqual([]);
    expect(result.record.warnings).toEqual([
      'THINK used a fallback payload (phase_mismatch): Expected a think payload, got observe',
    ]);
  });

  it('stops between phases when cancelled', async () => {
    const controller = new AbortController();
    const result = await runInvestigation(
      'Checkout requests fail with 504',
      context(new ScriptedReasoner([10]), {
        onUpdate: (_record, phase) => {
          if (phase === 'think') controller.abort();
        },
      }),
      { signal: controller.signal }
    );

    expect(result.stopReason).toBe('cancelled');
    expect(result.record.iteration).toBe(0);
    expect(result.record.hypotheses).toHaveLength(1);
    expect(result.record.toolInvocations).toEqual([]);
  });

  it('survives a throwing update callback', async () => {
    const result = await runInvestigation(
      'Checkout requests fail with 504',
      context(new ScriptedReasoner([96]), {
        onUpdate: () => {
          throw new Error('ui gone');
        },
      })
    );
    expect(result.record.status).toBe('auto_executing');
  });

  it('publishes events in order', async () => {
    const events = new InvestigationEventBus();
    const seen: InvestigationEvent[] = [];
    events.subscribe((event) => seen.push(event));

    await runInvestigation('Checkout requests fail with 504', context(new ScriptedReasoner([96]), { events }));

    expect(seen.map((e) => e.type)).toEqual([
      'started',
      'iteration',
      'phase',
      'reasoner',
      'hypothesis',
      'phase',
      'decision',
      'tool',
      'tool',
      'phase',
      'reasoner',
      'finding',
      'phase',
      'reasoner',
      'confidence',
      'complete',
    ]);
    expect(seen.map((e) => e.seq)).toEqual(seen.map((_e, i) => i + 1));
    expect(seen[1]?.message).toBe('Iteration 1 of 5');
    expect(seen[14]?.message).toBe('Confidence 96% - AUTO-EXECUTE');
  });

  describe('configuration errors', () => {
    const subject = 'Checkout requests fail with 504';

    it('rejects an empty subject', async () => {
      await expect(runInvestigation('   ', context(new ScriptedReasoner([10])))).rejects.toThrow(
        'Investigation subject must not be empty'
      );
    });

    it('rejects a bad iteration limit', async () => {
      await expect(
        runInvestigation(subject, context(new ScriptedReasoner([10])), { iterationLimit: 0 })
      ).rejects.toThrow('Iteration limit must be an integer >= 1 (got 0)');
    });

    it('requires a reasoner', async () => {
      await expect(runInvestigation(subject, context(null))).rejects.toBeInstanceOf(InvestigationConfigError);
    });

    it('requires evidence sources', async () => {
      await expect(
        runInvestigation(subject, context(new ScriptedReasoner([10]), { toolRegistry: new AgentToolRegistry() }))
      ).rejects.toThrow('No evidence sources registered');
    });

    it('requires every selected source to be registered', async () => {
      const registry = new AgentToolRegistry();
      registerEvidenceTools(registry, fixtures);
      const selection = new ScheduleSelectionPolicy([[{ tool: 'pager_history', params: {} }]]);
      await expect(
        runInvestigation(subject, context(new ScriptedReasoner([10]), { toolRegistry: registry, selection }))
      ).rejects.toThrow('Selection policy references unregistered tools: pager_history');
    });

    it('rejects thresholds outside the score range', async () => {
      await expect(
        runInvestigation(subject, context(new ScriptedReasoner([10]), { thresholds: { autoExecute: 150 } }))
      ).rejects.toThrow('Threshold autoExecute must be within [0, 100] (got 150)');
    });
  });
});
