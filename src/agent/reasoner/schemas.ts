/**
 * Wire schemas for reasoner output.
 *
 * The oracle answers in snake_case JSON. Collections are validated item by
 * item so one bad entry does not discard the rest of the answer. Only a
 * phase's primary field (hypotheses, findings, confidence) can reject it.
 */

import { z } from 'zod';

import { clampConfidence } from '../policy/confidence.js';
import { FALLBACK_CONFIDENCE } from './fallback.js';
import type {
  FindingSet,
  HypothesisSet,
  ProposedFinding,
  ProposedHypothesis,
  ResolutionAssessment,
} from './types.js';

const ConfidenceSchema = z.coerce
  .number()
  .refine((value) => Number.isFinite(value), 'confidence must be a number')
  .transform(clampConfidence);

const lowercase = (value: unknown): unknown =>
  typeof value === 'string' ? value.trim().toLowerCase() : value;

const SeveritySchema = z
  .preprocess(lowercase, z.enum(['critical', 'high', 'medium', 'low']))
  .catch('medium');

const RiskLevelSchema = z.preprocess(lowercase, z.enum(['low', 'medium', 'high'])).catch('medium');

// Side collections: null, missing or malformed reads as empty.
const LooseListSchema = z
  .array(z.unknown())
  .nullish()
  .catch([])
  .transform((items) => items ?? []);

const StringListSchema = LooseListSchema.transform((items) =>
  items.filter((item): item is string => typeof item === 'string' && item.trim().length > 0)
);

const HypothesisWireSchema = z.object({
  hypothesis: z.string().trim().min(1),
  confidence: ConfidenceSchema.default(50),
  evidence_needed: StringListSchema,
});

const FindingWireSchema = z.object({
  finding: z.string().trim().min(1),
  severity: SeveritySchema,
  confidence: ConfidenceSchema.default(50),
});

const ResolutionWireSchema = z.object({
  immediate_action: z.string().trim().min(1),
  command: z.string().optional(),
  risk_level: RiskLevelSchema,
  expected_recovery_time: z.string().optional(),
});

const AlternativeActionWireSchema = z.object({
  action: z.string().min(1),
  risk: z.string().optional(),
});

const ReasoningSchema = z.string().optional().catch(undefined);

export const HypothesisSetWireSchema = z.object({
  hypotheses: z.array(z.unknown()).default([]),
  next_actions: StringListSchema,
  reasoning: ReasoningSchema,
});

export const FindingSetWireSchema = z.object({
  findings: z.array(z.unknown()).default([]),
  patterns: StringListSchema,
  correlations: StringListSchema,
  reasoning: ReasoningSchema,
});

export const ResolutionAssessmentWireSchema = z.object({
  root_cause_identified: z.boolean().catch(false),
  root_cause: z.string().nullish().catch(null),
  confidence: ConfidenceSchema.default(FALLBACK_CONFIDENCE),
  resolution: ResolutionWireSchema.nullable().optional().catch(null),
  alternative_actions: LooseListSchema,
  reasoning: ReasoningSchema,
});

function parseItems<T extends z.ZodTypeAny>(schema: T, items: unknown[]): Array<z.output<T>> {
  const parsed: Array<z.output<T>> = [];
  for (const item of items) {
    const result = schema.safeParse(item);
    if (result.success) {
      parsed.push(result.data);
    }
  }
  return parsed;
}

export function toHypothesisSet(wire: z.output<typeof HypothesisSetWireSchema>): HypothesisSet {
  const hypotheses: ProposedHypothesis[] = parseItems(HypothesisWireSchema, wire.hypotheses).map(
    (h) => ({
      text: h.hypothesis,
      confidence: h.confidence,
      evidenceNeeded: h.evidence_needed,
    })
  );
  return {
    phase: 'think',
    hypotheses,
    nextActions: wire.next_actions,
    reasoning: wire.reasoning,
  };
}

export function toFindingSet(wire: z.output<typeof FindingSetWireSchema>): FindingSet {
  const findings: ProposedFinding[] = parseItems(FindingWireSchema, wire.findings).map((f) => ({
    text: f.finding,
    severity: f.severity,
    confidence: f.confidence,
  }));
  return {
    phase: 'observe',
    findings,
    patterns: wire.patterns,
    correlations: wire.correlations,
    reasoning: wire.reasoning,
  };
}

export function toResolutionAssessment(
  wire: z.output<typeof ResolutionAssessmentWireSchema>
): ResolutionAssessment {
  const resolution = wire.resolution
    ? {
        actionDescription: wire.resolution.immediate_action,
        commandOrStep: wire.resolution.command,
        riskLevel: wire.resolution.risk_level,
        expectedRecovery: wire.resolution.expected_recovery_time,
      }
    : null;
  const rootCause = wire.root_cause?.trim() ? wire.root_cause.trim() : null;

  return {
    phase: 'evaluate',
    rootCauseIdentified: wire.root_cause_identified,
    rootCause,
    confidence: wire.confidence,
    resolution,
    alternativeActions: parseItems(AlternativeActionWireSchema, wire.alternative_actions),
    reasoning: wire.reasoning,
  };
}
