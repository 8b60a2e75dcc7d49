/**
 * Confidence Policy
 *
 * Maps a 0-100 confidence score to one of four ordered investigation statuses.
 * Every boundary is inclusive: a score exactly on a threshold resolves to the
 * higher-action status.
 */

export type InvestigationStatus =
  | 'investigating'
  | 'awaiting_approval'
  | 'executing_with_review'
  | 'auto_executing';

export type TerminalStatus = Exclude<InvestigationStatus, 'investigating'>;

export interface ConfidenceThresholds {
  autoExecute: number;
  executeReview: number;
  requireApproval: number;
}

export const DEFAULT_THRESHOLDS: Readonly<ConfidenceThresholds> = Object.freeze({
  autoExecute: 95,
  executeReview: 85,
  requireApproval: 70,
});

const STATUS_ORDER: readonly InvestigationStatus[] = [
  'investigating',
  'awaiting_approval',
  'executing_with_review',
  'auto_executing',
];

export function clampConfidence(value: number): number {
  if (!Number.isFinite(value)) {
    return 0;
  }
  return Math.max(0, Math.min(100, value));
}

export function resolveStatus(
  confidence: number,
  thresholds: ConfidenceThresholds = DEFAULT_THRESHOLDS
): InvestigationStatus {
  if (confidence >= thresholds.autoExecute) return 'auto_executing';
  if (confidence >= thresholds.executeReview) return 'executing_with_review';
  if (confidence >= thresholds.requireApproval) return 'awaiting_approval';
  return 'investigating';
}

export function statusRank(status: InvestigationStatus): number {
  return STATUS_ORDER.indexOf(status);
}

/**
 * Whether a status ends the loop. With the default `stopAt` every status from
 * `awaiting_approval` upward terminates.
 */
export function isTerminalStatus(
  status: InvestigationStatus,
  stopAt: TerminalStatus = 'awaiting_approval'
): boolean {
  return statusRank(status) >= statusRank(stopAt);
}

export function mergeThresholds(
  overrides?: Partial<ConfidenceThresholds>
): ConfidenceThresholds {
  return {
    autoExecute: overrides?.autoExecute ?? DEFAULT_THRESHOLDS.autoExecute,
    executeReview: overrides?.executeReview ?? DEFAULT_THRESHOLDS.executeReview,
    requireApproval: overrides?.requireApproval ?? DEFAULT_THRESHOLDS.requireApproval,
  };
}

export interface ActionDescription {
  label: string;
  description: string;
}

const ACTIONS: Record<InvestigationStatus, ActionDescription> = {
  auto_executing: {
    label: 'AUTO-EXECUTE',
    description: 'Resolution executes automatically',
  },
  executing_with_review: {
    label: 'EXECUTE WITH REVIEW',
    description: 'Resolution executes and the team is notified for post-action review',
  },
  awaiting_approval: {
    label: 'REQUIRE APPROVAL',
    description: 'Resolution waits for human approval',
  },
  investigating: {
    label: 'CONTINUE INVESTIGATION',
    description: 'More evidence is needed; escalate to an operator if the budget runs out',
  },
};

export function describeAction(status: InvestigationStatus): ActionDescription {
  return ACTIONS[status];
}
