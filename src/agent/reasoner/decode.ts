import { fallbackPayload } from './fallback.js';
import {
  FindingSetWireSchema,
  HypothesisSetWireSchema,
  ResolutionAssessmentWireSchema,
  toFindingSet,
  toHypothesisSet,
  toResolutionAssessment,
} from './schemas.js';
import type { FallbackReason, ReasonerPayload, ReasonerPhase } from './types.js';

export type DecodeOutcome =
  | { kind: 'structured'; payload: ReasonerPayload }
  | { kind: 'fallback'; payload: ReasonerPayload; reason: FallbackReason; detail: string };

type JsonExtraction =
  | { ok: true; value: unknown }
  | { ok: false; reason: 'empty_response' | 'no_json' | 'invalid_json'; detail: string };

/**
 * Pull a JSON object out of model text: a ```json fenced block if present,
 * otherwise the span between the first `{` and the last `}`.
 */
export function extractJson(text: string): JsonExtraction {
  if (!text.trim()) {
    return { ok: false, reason: 'empty_response', detail: 'Reasoner returned no text' };
  }
  const fenced = text.match(/```(?:json)?\s*([\s\S]*?)```/i);
  const candidate = fenced?.[1] ?? text;
  const start = candidate.indexOf('{');
  const end = candidate.lastIndexOf('}');
  if (start === -1 || end === -1 || end <= start) {
    return { ok: false, reason: 'no_json', detail: 'No JSON object found in response' };
  }
  try {
    return { ok: true, value: JSON.parse(candidate.slice(start, end + 1)) };
  } catch (error) {
    return {
      ok: false,
      reason: 'invalid_json',
      detail: error instanceof Error ? error.message : 'Unparseable JSON',
    };
  }
}

function decodeStructured(
  phase: ReasonerPhase,
  value: unknown
): { ok: true; payload: ReasonerPayload } | { ok: false; detail: string } {
  switch (phase) {
    case 'think': {
      const parsed = HypothesisSetWireSchema.safeParse(value);
      return parsed.success
        ? { ok: true, payload: toHypothesisSet(parsed.data) }
        : { ok: false, detail: parsed.error.message };
    }
    case 'observe': {
      const parsed = FindingSetWireSchema.safeParse(value);
      return parsed.success
        ? { ok: true, payload: toFindingSet(parsed.data) }
        : { ok: false, detail: parsed.error.message };
    }
    case 'evaluate': {
      const parsed = ResolutionAssessmentWireSchema.safeParse(value);
      return parsed.success
        ? { ok: true, payload: toResolutionAssessment(parsed.data) }
        : { ok: false, detail: parsed.error.message };
    }
  }
}

/**
 * Decode raw reasoner text into the phase's payload. Never throws: anything
 * unusable becomes the phase's fallback payload, with the raw text kept as
 * its reasoning.
 */
export function decodePayload(phase: ReasonerPhase, text: string): DecodeOutcome {
  const extracted = extractJson(text);
  if (!extracted.ok) {
    return {
      kind: 'fallback',
      payload: fallbackPayload(phase, text.trim() || undefined),
      reason: extracted.reason,
      detail: extracted.detail,
    };
  }

  const decoded = decodeStructured(phase, extracted.value);
  if (!decoded.ok) {
    return {
      kind: 'fallback',
      payload: fallbackPayload(phase, text.trim()),
      reason: 'schema_mismatch',
      detail: decoded.detail,
    };
  }

  return { kind: 'structured', payload: decoded.payload };
}
