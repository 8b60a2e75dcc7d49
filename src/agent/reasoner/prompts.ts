/**
 * Phase prompts for model-backed reasoning.
 */

import type {
  EvaluateContext,
  ObserveContext,
  ReasonerRequest,
  ThinkContext,
} from './types.js';

export const THINK_SYSTEM_PROMPT = `You are an incident investigation agent. Form hypotheses about the root cause of the reported problem.

Respond with a single JSON object and nothing else:
{
  "hypotheses": [
    { "hypothesis": "...", "confidence": 0-100, "evidence_needed": ["..."] }
  ],
  "next_actions": ["short imperative naming the evidence to gather"],
  "reasoning": "..."
}`;

export const OBSERVE_SYSTEM_PROMPT = `You are an incident observation agent. Analyze the gathered evidence and extract findings.

Respond with a single JSON object and nothing else:
{
  "findings": [
    { "finding": "...", "severity": "critical|high|medium|low", "confidence": 0-100 }
  ],
  "patterns": ["..."],
  "correlations": ["..."],
  "reasoning": "..."
}`;

export const EVALUATE_SYSTEM_PROMPT = `You are an incident evaluation agent. Decide whether the root cause has been identified and how confident you are.

Respond with a single JSON object and nothing else:
{
  "root_cause_identified": true,
  "root_cause": "...",
  "confidence": 0-100,
  "resolution": {
    "immediate_action": "...",
    "command": "...",
    "risk_level": "low|medium|high",
    "expected_recovery_time": "..."
  },
  "alternative_actions": [{ "action": "...", "risk": "low|medium|high" }],
  "reasoning": "..."
}

Only include "resolution" when the root cause is identified.`;

function json(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

function buildThinkPrompt(subject: string, iteration: number, context: ThinkContext): string {
  const sections = [
    `## Ticket (iteration ${iteration + 1})\n${subject}`,
    `## Previous Findings\n${context.recentFindings.length > 0 ? json(context.recentFindings) : 'None yet.'}`,
  ];
  if (context.availableTools.length > 0) {
    sections.push(`## Evidence Sources\n${context.availableTools.map((t) => `- ${t}`).join('\n')}`);
  }
  sections.push('Form hypotheses about what is causing this issue.');
  return sections.join('\n\n');
}

function buildObservePrompt(subject: string, context: ObserveContext): string {
  const outputs = context.toolResults.map((r) => ({
    tool: r.toolName,
    parameters: r.parameters,
    result: r.result,
  }));
  return [
    `## Ticket\n${subject}`,
    `## Tool Outputs\n${outputs.length > 0 ? json(outputs) : 'No tool output available.'}`,
    `## Hypotheses\n${json(context.recentHypotheses)}`,
    'Extract key findings, patterns, and correlations.',
  ].join('\n\n');
}

function buildEvaluatePrompt(subject: string, context: EvaluateContext): string {
  return [
    `## Ticket\n${subject}`,
    `## Findings\n${json(context.findings)}`,
    `## Hypotheses\n${json(context.hypotheses)}`,
    'Is the root cause identified? What is the confidence level? What action should be taken?',
  ].join('\n\n');
}

export function buildPhasePrompt(request: ReasonerRequest): { system: string; user: string } {
  switch (request.phase) {
    case 'think':
      return {
        system: THINK_SYSTEM_PROMPT,
        user: buildThinkPrompt(request.subject, request.iteration, request.context),
      };
    case 'observe':
      return {
        system: OBSERVE_SYSTEM_PROMPT,
        user: buildObservePrompt(request.subject, request.context),
      };
    case 'evaluate':
      return {
        system: EVALUATE_SYSTEM_PROMPT,
        user: buildEvaluatePrompt(request.subject, request.context),
      };
  }
}
