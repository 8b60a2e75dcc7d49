/**
 * Investigation Record Management
 *
 * Creates and updates the investigation record. Every helper returns a new
 * record; collections are only ever appended to.
 */

import { randomUUID } from 'node:crypto';

import {
  clampConfidence,
  DEFAULT_THRESHOLDS,
  resolveStatus,
  type ConfidenceThresholds,
} from '../policy/confidence.js';
import type { ResolutionAssessment } from '../reasoner/types.js';
import type {
  Finding,
  Hypothesis,
  InvestigationRecord,
  ReasonerCall,
  ToolInvocation,
} from './types.js';

/**
 * Create the record for a new investigation.
 */
export function createInvestigationRecord(
  subject: string,
  iterationLimit: number
): InvestigationRecord {
  const now = new Date().toISOString();
  return {
    id: randomUUID(),
    subject,
    iteration: 0,
    iterationLimit,
    hypotheses: [],
    findings: [],
    toolInvocations: [],
    confidence: 0,
    rootCause: null,
    resolution: null,
    status: 'investigating',
    nextActions: [],
    reasonerCalls: [],
    warnings: [],
    startedAt: now,
    updatedAt: now,
  };
}

function touch(record: InvestigationRecord, patch: Partial<InvestigationRecord>): InvestigationRecord {
  return { ...record, ...patch, updatedAt: new Date().toISOString() };
}

/**
 * Copy of the record whose collections can be mutated without touching the
 * original. Entries are shared.
 */
export function snapshotRecord(record: InvestigationRecord): InvestigationRecord {
  return {
    ...record,
    hypotheses: [...record.hypotheses],
    findings: [...record.findings],
    toolInvocations: [...record.toolInvocations],
    nextActions: [...record.nextActions],
    reasonerCalls: [...record.reasonerCalls],
    warnings: [...record.warnings],
  };
}

export function appendHypotheses(
  record: InvestigationRecord,
  hypotheses: Hypothesis[]
): InvestigationRecord {
  if (hypotheses.length === 0) return record;
  return touch(record, { hypotheses: [...record.hypotheses, ...hypotheses] });
}

export function appendFindings(
  record: InvestigationRecord,
  findings: Finding[]
): InvestigationRecord {
  if (findings.length === 0) return record;
  return touch(record, { findings: [...record.findings, ...findings] });
}

export function appendToolInvocations(
  record: InvestigationRecord,
  invocations: ToolInvocation[]
): InvestigationRecord {
  if (invocations.length === 0) return record;
  return touch(record, { toolInvocations: [...record.toolInvocations, ...invocations] });
}

export function setNextActions(
  record: InvestigationRecord,
  nextActions: string[]
): InvestigationRecord {
  return touch(record, { nextActions: [...nextActions] });
}

export function recordReasonerCall(
  record: InvestigationRecord,
  call: ReasonerCall
): InvestigationRecord {
  return touch(record, { reasonerCalls: [...record.reasonerCalls, call] });
}

export function addWarning(record: InvestigationRecord, warning: string): InvestigationRecord {
  return touch(record, { warnings: [...record.warnings, warning] });
}

/**
 * Overwrite confidence, root cause and resolution from an assessment and derive
 * the status. A resolution is kept only when the reasoner identified a root
 * cause and the status has left `investigating`.
 */
export function applyAssessment(
  record: InvestigationRecord,
  assessment: ResolutionAssessment,
  thresholds: ConfidenceThresholds = DEFAULT_THRESHOLDS
): InvestigationRecord {
  const confidence = clampConfidence(assessment.confidence);
  const status = resolveStatus(confidence, thresholds);
  const identified = assessment.rootCauseIdentified;
  const resolution =
    identified && status !== 'investigating' && assessment.resolution
      ? { ...assessment.resolution }
      : null;

  return touch(record, {
    confidence,
    status,
    rootCause: identified ? assessment.rootCause : null,
    resolution,
  });
}

export function incrementIteration(record: InvestigationRecord): InvestigationRecord {
  if (record.iteration >= record.iterationLimit) {
    throw new Error(
      `Iteration ${record.iteration + 1} would exceed the limit of ${record.iterationLimit}`
    );
  }
  return touch(record, { iteration: record.iteration + 1 });
}

/**
 * List every violated record invariant (empty when the record is consistent).
 * Pass the previous record to also check that collections only grew.
 */
export function checkRecordInvariants(
  record: InvestigationRecord,
  previous?: InvestigationRecord
): string[] {
  const violations: string[] = [];

  if (!Number.isInteger(record.iteration) || record.iteration < 0) {
    violations.push(`iteration must be a non-negative integer (got ${record.iteration})`);
  }
  if (record.iteration > record.iterationLimit) {
    violations.push(`iteration ${record.iteration} exceeds limit ${record.iterationLimit}`);
  }
  if (!(record.confidence >= 0 && record.confidence <= 100)) {
    violations.push(`confidence ${record.confidence} outside [0, 100]`);
  }
  if (record.resolution !== null && record.status === 'investigating') {
    violations.push('resolution set while status is investigating');
  }

  if (previous) {
    if (record.subject !== previous.subject) {
      violations.push('subject changed');
    }
    if (record.iteration < previous.iteration) {
      violations.push('iteration decreased');
    }
    checkAppendOnly('hypotheses', previous.hypotheses, record.hypotheses, violations);
    checkAppendOnly('findings', previous.findings, record.findings, violations);
    checkAppendOnly('toolInvocations', previous.toolInvocations, record.toolInvocations, violations);
  }

  return violations;
}

function checkAppendOnly<T>(
  key: string,
  before: readonly T[],
  after: readonly T[],
  violations: string[]
): void {
  if (after.length < before.length) {
    violations.push(`${key} shrank from ${before.length} to ${after.length}`);
  } else if (before.some((item, i) => after[i] !== item)) {
    violations.push(`${key} reordered or rewritten`);
  }
}
