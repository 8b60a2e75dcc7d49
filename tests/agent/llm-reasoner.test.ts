import { describe, expect, it, vi } from 'vitest';

import type { ChatMessage, LlmClient, LlmClientOptions } from '../../src/core/llm.js';
import { Logger } from '../../src/core/logger.js';
import { LlmReasoner } from '../../src/agent/reasoner/llm-reasoner.js';
import { EVALUATE_SYSTEM_PROMPT, THINK_SYSTEM_PROMPT } from '../../src/agent/reasoner/prompts.js';

function scriptedClient(content: string) {
  const calls: Array<{ messages: ChatMessage[]; options?: LlmClientOptions }> = [];
  const client: LlmClient = {
    meta: { provider: 'anthropic', model: 'claude-test' },
    complete: async (messages, options) => {
      calls.push({ messages, options });
      return { content, model: 'claude-test' };
    },
  };
  return { client, calls };
}

describe('LlmReasoner', () => {
  it('names itself after the provider and model', () => {
    const { client } = scriptedClient('{}');
    expect(new LlmReasoner(client).name).toBe('anthropic:claude-test');
  });

  it('sends the phase prompt with the windowed context', async () => {
    const { client, calls } = scriptedClient(
      '{"hypotheses": [{"hypothesis": "Pool exhausted", "confidence": 70}], "next_actions": []}'
    );
    const reasoner = new LlmReasoner(client, { temperature: 0.1, maxTokens: 256 });

    const result = await reasoner.generate({
      phase: 'think',
      subject: 'gateway errors',
      iteration: 1,
      context: {
        recentFindings: [{ text: 'Pool at 4/4', severity: 'critical', confidence: 90 }],
        availableTools: ['log_search'],
      },
    });

    expect(result.fallback).toBeNull();
    expect(result.payload).toMatchObject({ phase: 'think', hypotheses: [{ text: 'Pool exhausted' }] });
    expect(calls).toHaveLength(1);
    const [call] = calls;
    expect(call?.messages[0]).toEqual({ role: 'system', content: THINK_SYSTEM_PROMPT });
    expect(call?.messages[1]?.content).toContain('## Ticket (iteration 2)\ngateway errors');
    expect(call?.messages[1]?.content).toContain('"text": "Pool at 4/4"');
    expect(call?.messages[1]?.content).toContain('## Evidence Sources\n- log_search');
    expect(call?.options).toMatchObject({ temperature: 0.1, maxTokens: 256 });
  });

  it('substitutes the fallback payload for malformed output and logs it', async () => {
    const { client, calls } = scriptedClient('Root cause unclear, need more data.');
    const lines: string[] = [];
    const logger = new Logger('warn', (line) => lines.push(line));
    const reasoner = new LlmReasoner(client, { logger });

    const result = await reasoner.generate({
      phase: 'evaluate',
      subject: 'gateway errors',
      iteration: 0,
      context: { findings: [], hypotheses: [] },
    });

    expect(calls[0]?.messages[0]?.content).toBe(EVALUATE_SYSTEM_PROMPT);
    expect(result.fallback).toEqual({ reason: 'no_json', detail: 'No JSON object found in response' });
    expect(result.payload).toMatchObject({
      phase: 'evaluate',
      confidence: 30,
      reasoning: 'Root cause unclear, need more data.',
    });
    expect(lines).toHaveLength(1);
    expect(lines[0]).toContain('[WARN] Reasoner output for evaluate could not be decoded');
  });

  it('passes the cancellation signal through', async () => {
    const complete = vi.fn<LlmClient['complete']>(async () => ({ content: '{}', model: 'm' }));
    const reasoner = new LlmReasoner({ complete });
    const controller = new AbortController();

    await reasoner.generate({
      phase: 'observe',
      subject: 'gateway errors',
      iteration: 0,
      signal: controller.signal,
      context: { toolResults: [], recentHypotheses: [] },
    });

    expect(reasoner.name).toBe('llm');
    expect(complete.mock.calls[0]?.[1]?.signal).toBe(controller.signal);
  });
});
