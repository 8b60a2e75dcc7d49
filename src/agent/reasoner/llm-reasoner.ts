/**
 * LLM Reasoner
 *
 * Adapts a chat-completion client to the reasoner contract: builds the phase
 * prompt, calls the model, and decodes its JSON answer. Malformed answers are
 * replaced by the phase's fallback payload instead of raising.
 */

import type { ChatMessage, LlmClient } from '../../core/llm.js';
import type { Logger } from '../../core/logger.js';
import { decodePayload } from './decode.js';
import { buildPhasePrompt } from './prompts.js';
import type { Reasoner, ReasonerRequest, ReasonerResult } from './types.js';

export interface LlmReasonerOptions {
  temperature?: number;
  maxTokens?: number;
  logger?: Logger;
}

export class LlmReasoner implements Reasoner {
  readonly name: string;

  constructor(
    private llm: LlmClient,
    private options: LlmReasonerOptions = {}
  ) {
    this.name = llm.meta ? `${llm.meta.provider}:${llm.meta.model}` : 'llm';
  }

  async generate(request: ReasonerRequest): Promise<ReasonerResult> {
    const prompt = buildPhasePrompt(request);
    const messages: ChatMessage[] = [
      { role: 'system', content: prompt.system },
      { role: 'user', content: prompt.user },
    ];

    const response = await this.llm.complete(messages, {
      temperature: this.options.temperature ?? 0.2,
      maxTokens: this.options.maxTokens,
      signal: request.signal,
    });

    const decoded = decodePayload(request.phase, response.content);
    if (decoded.kind === 'fallback') {
      this.options.logger?.warn(`Reasoner output for ${request.phase} could not be decoded`, {
        reason: decoded.reason,
        detail: decoded.detail,
        model: response.model,
      });
      return {
        payload: decoded.payload,
        fallback: { reason: decoded.reason, detail: decoded.detail },
      };
    }

    return { payload: decoded.payload, fallback: null };
  }
}
