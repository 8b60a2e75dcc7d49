/**
 * Plain-text rendering of investigation events and results for the terminal.
 */

import type { InvestigationEvent } from '../agent/events/types.js';
import type { InvestigationResult } from '../agent/orchestrator/types.js';
import {
  describeAction,
  resolveStatus,
  type ConfidenceThresholds,
} from '../agent/policy/confidence.js';

const RULE = '─'.repeat(60);

function numberField(content: Record<string, unknown> | undefined, key: string): number | undefined {
  const value = content?.[key];
  return typeof value === 'number' ? value : undefined;
}

function stringField(content: Record<string, unknown> | undefined, key: string): string | undefined {
  const value = content?.[key];
  return typeof value === 'string' ? value : undefined;
}

export function renderConfidenceBar(confidence: number, width = 40): string {
  const bounded = Math.max(0, Math.min(100, confidence));
  const filled = Math.floor((bounded / 100) * width);
  return `[${'█'.repeat(filled)}${'░'.repeat(width - filled)}] ${confidence}%`;
}

/**
 * One or more lines for a live event, or null for events that stay silent.
 */
export function renderEvent(event: InvestigationEvent): string | null {
  const { content } = event;
  switch (event.type) {
    case 'started':
      return `Investigating: ${event.message}\nReasoner: ${stringField(content, 'reasoner') ?? 'unknown'} | Budget: ${numberField(content, 'iterationLimit') ?? '?'} iteration(s)`;
    case 'iteration':
      return `\n${RULE}\n${event.message}\n${RULE}`;
    case 'phase':
      return `\n[${event.message}]`;
    case 'reasoner':
      return stringField(content, 'fallback') ? null : `  Reasoning: ${event.message}`;
    case 'hypothesis': {
      const confidence = numberField(content, 'confidence');
      return `  ? ${event.message}${confidence === undefined ? '' : ` (${confidence}%)`}`;
    }
    case 'decision':
      return `  Selection (${stringField(content, 'strategy') ?? 'unknown'}): ${event.message}`;
    case 'tool':
      return `  ${stringField(content, 'status') === 'failed' ? 'x' : '>'} ${event.message}`;
    case 'finding': {
      const severity = (stringField(content, 'severity') ?? 'medium').toUpperCase();
      const confidence = numberField(content, 'confidence');
      return `  [${severity}] ${event.message}${confidence === undefined ? '' : ` (${confidence}%)`}`;
    }
    case 'confidence': {
      const confidence = numberField(content, 'confidence') ?? 0;
      return `  ${renderConfidenceBar(confidence)}\n  ${event.message}`;
    }
    case 'warning':
      return `  ! ${event.message}`;
    case 'complete':
      return null;
  }
}

export function renderSummary(result: InvestigationResult): string[] {
  const { summary, record } = result;
  const action = describeAction(summary.status);
  const lines = [
    '',
    'INVESTIGATION SUMMARY',
    RULE,
    `Subject: ${summary.subject}`,
    `Iterations: ${summary.iterations} of ${record.iterationLimit}`,
    `Confidence: ${renderConfidenceBar(summary.confidence)}`,
    `Status: ${summary.status} (${action.label})`,
    `Stop reason: ${result.stopReason}`,
  ];

  if (summary.rootCause) {
    lines.push(`Root cause: ${summary.rootCause}`);
  }

  if (summary.resolution) {
    lines.push(`Resolution: ${summary.resolution.actionDescription}`);
    if (summary.resolution.commandOrStep) {
      lines.push(`  Command: ${summary.resolution.commandOrStep}`);
    }
    lines.push(`  Risk: ${summary.resolution.riskLevel}`);
    if (summary.resolution.expectedRecovery) {
      lines.push(`  Expected recovery: ${summary.resolution.expectedRecovery}`);
    }
  }

  lines.push(`Findings (${summary.findings.length}):`);
  summary.findings.forEach((f, i) => {
    lines.push(`  ${i + 1}. [${f.severity.toUpperCase()}] ${f.text}`);
  });

  lines.push(
    `Tool calls: ${summary.toolCalls} (${summary.failedToolCalls} failed) | Fallbacks: ${summary.fallbacks}`
  );
  lines.push(`Next: ${action.description}`);
  return lines;
}

export function renderPolicy(confidence: number, thresholds: ConfidenceThresholds): string[] {
  const status = resolveStatus(confidence, thresholds);
  const action = describeAction(status);
  const rows: Array<[string, number]> = [
    ['Auto Execute', thresholds.autoExecute],
    ['Execute Review', thresholds.executeReview],
    ['Require Approval', thresholds.requireApproval],
  ];
  return [
    renderConfidenceBar(confidence),
    ...rows.map(([label, threshold]) => `  ${confidence >= threshold ? '✓' : '○'} ${threshold}% - ${label}`),
    `${action.label}: ${status}`,
    action.description,
  ];
}
