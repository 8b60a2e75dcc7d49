/**
 * Heuristic Reasoner
 *
 * Offline, rule-based reasoner used when no model provider is configured.
 * Hypotheses follow the investigation stage, findings are read off the tool
 * summaries of the current iteration, and confidence is a step function of how
 * many findings have accumulated.
 */

import type {
  EvaluateContext,
  FindingSet,
  HypothesisSet,
  ObserveContext,
  ProposedFinding,
  ProposedHypothesis,
  Reasoner,
  ReasonerRequest,
  ReasonerResult,
  ResolutionAssessment,
  Severity,
} from './types.js';

export const HEURISTIC_CONFIDENCE = {
  conclusive: 94,
  partial: 75,
  insufficient: 40,
} as const;

const INITIAL_HYPOTHESES: ProposedHypothesis[] = [
  {
    text: 'A recent deployment changed configuration on the failing request path',
    confidence: 60,
    evidenceNeeded: ['deployment history', 'configuration changes'],
  },
  {
    text: 'Degraded database connectivity is stalling upstream requests',
    confidence: 50,
    evidenceNeeded: ['database metrics', 'connection counts'],
  },
  {
    text: 'Serving tier is hitting resource limits under current load',
    confidence: 40,
    evidenceNeeded: ['infrastructure metrics'],
  },
];

const SEVERITY_RULES: Array<{ pattern: RegExp; severity: Severity }> = [
  { pattern: /exhaust|outage|unavailable|circuit breaker/i, severity: 'critical' },
  { pattern: /error|fail|timeout|incident/i, severity: 'high' },
  { pattern: /^Retrieved /, severity: 'low' },
];

const SEVERITY_RANK: Record<Severity, number> = { critical: 0, high: 1, medium: 2, low: 3 };

function classifySeverity(summary: string): Severity {
  return SEVERITY_RULES.find((rule) => rule.pattern.test(summary))?.severity ?? 'medium';
}

function hypothesize(iteration: number): HypothesisSet {
  if (iteration === 0) {
    return {
      phase: 'think',
      hypotheses: INITIAL_HYPOTHESES.map((h) => ({ ...h, evidenceNeeded: [...h.evidenceNeeded] })),
      nextActions: ['Search error logs', 'Check active incidents'],
      reasoning: 'Forming broad hypotheses before any evidence is available.',
    };
  }
  if (iteration === 1) {
    return {
      phase: 'think',
      hypotheses: [
        {
          text: 'Correlating the error onset with the deployment timeline',
          confidence: 65,
          evidenceNeeded: ['deployment history', 'gateway metrics'],
        },
      ],
      nextActions: ['Query deployment history', 'Check gateway metrics'],
      reasoning: 'Narrowing toward change-related causes.',
    };
  }
  return {
    phase: 'think',
    hypotheses: [
      {
        text: 'Validating the leading hypothesis against database metrics',
        confidence: 75,
        evidenceNeeded: ['database metrics'],
      },
    ],
    nextActions: ['Check database metrics'],
    reasoning: 'Converging on a single explanation.',
  };
}

function analyze(iteration: number, context: ObserveContext): FindingSet {
  const findings: ProposedFinding[] = context.toolResults
    .filter((r) => r.iteration === iteration)
    .map((r) => ({
      text: `${r.toolName}: ${r.summary}`,
      severity: classifySeverity(r.summary),
      confidence: 80,
    }));
  return {
    phase: 'observe',
    findings,
    patterns: [],
    correlations: [],
    reasoning: `Extracted ${findings.length} finding(s) from this iteration's evidence.`,
  };
}

function assess(context: EvaluateContext): ResolutionAssessment {
  const count = context.findings.length;

  if (count >= 3) {
    const leading = [...context.findings].sort(
      (a, b) => SEVERITY_RANK[a.severity] - SEVERITY_RANK[b.severity]
    )[0];
    return {
      phase: 'evaluate',
      rootCauseIdentified: true,
      rootCause: leading?.text ?? null,
      confidence: HEURISTIC_CONFIDENCE.conclusive,
      resolution: {
        actionDescription: 'Roll back the most recent deployment and confirm the error rate recovers',
        riskLevel: 'low',
        expectedRecovery: 'A few minutes after rollback',
      },
      alternativeActions: [],
      reasoning: `Root cause identified from ${count} corroborating findings.`,
    };
  }

  if (count === 2) {
    return {
      phase: 'evaluate',
      rootCauseIdentified: false,
      rootCause: null,
      confidence: HEURISTIC_CONFIDENCE.partial,
      resolution: null,
      alternativeActions: [],
      reasoning: 'Partial evidence: two findings point the same way but do not confirm a cause.',
    };
  }

  return {
    phase: 'evaluate',
    rootCauseIdentified: false,
    rootCause: null,
    confidence: HEURISTIC_CONFIDENCE.insufficient,
    resolution: null,
    alternativeActions: [],
    reasoning: 'Insufficient evidence to identify a root cause.',
  };
}

export class HeuristicReasoner implements Reasoner {
  readonly name = 'heuristic';

  async generate(request: ReasonerRequest): Promise<ReasonerResult> {
    switch (request.phase) {
      case 'think':
        return { payload: hypothesize(request.iteration), fallback: null };
      case 'observe':
        return { payload: analyze(request.iteration, request.context), fallback: null };
      case 'evaluate':
        return { payload: assess(request.context), fallback: null };
    }
  }
}
