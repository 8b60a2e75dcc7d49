import type {
  FindingSet,
  HypothesisSet,
  ReasonerPayload,
  ReasonerPhase,
  ResolutionAssessment,
} from './types.js';

/**
 * Confidence assumed when an evaluation could not be decoded.
 */
export const FALLBACK_CONFIDENCE = 30;

export function emptyHypothesisSet(reasoning?: string): HypothesisSet {
  return { phase: 'think', hypotheses: [], nextActions: [], reasoning };
}

export function emptyFindingSet(reasoning?: string): FindingSet {
  return { phase: 'observe', findings: [], patterns: [], correlations: [], reasoning };
}

export function fallbackAssessment(reasoning?: string): ResolutionAssessment {
  return {
    phase: 'evaluate',
    rootCauseIdentified: false,
    rootCause: null,
    confidence: FALLBACK_CONFIDENCE,
    resolution: null,
    alternativeActions: [],
    reasoning,
  };
}

/**
 * Minimal payload substituted for an unusable reasoner answer.
 */
export function fallbackPayload(phase: ReasonerPhase, reasoning?: string): ReasonerPayload {
  switch (phase) {
    case 'think':
      return emptyHypothesisSet(reasoning);
    case 'observe':
      return emptyFindingSet(reasoning);
    case 'evaluate':
      return fallbackAssessment(reasoning);
  }
}
