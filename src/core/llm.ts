import Anthropic from '@anthropic-ai/sdk';
import fetch from 'node-fetch';
import { z } from 'zod';

import type { RootcauseConfig } from './config.js';
import { Logger } from './logger.js';
import { InvestigationConfigError } from '../agent/errors.js';

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface LlmResponse {
  content: string;
  model: string;
}

export type LlmClientOptions = {
  temperature?: number;
  timeoutMs?: number;
  maxTokens?: number;
  signal?: AbortSignal;
};

export type LlmProvider = 'anthropic' | 'openai' | 'local';

export type LlmClientMeta = {
  provider: LlmProvider;
  model: string;
};

export interface LlmClient {
  complete(messages: ChatMessage[], options?: LlmClientOptions): Promise<LlmResponse>;
  meta?: LlmClientMeta;
}

function resolveOpenAiBaseUrl(config: RootcauseConfig): string {
  if (config.agent.useProxy) {
    return config.agent.proxyBaseUrl;
  }
  return config.agent.apiBaseUrl ?? 'https://api.openai.com';
}

function resolveAnthropicBaseUrl(config: RootcauseConfig): string | undefined {
  if (config.agent.useProxy) {
    return config.agent.proxyBaseUrl;
  }
  return undefined;
}

function resolveLocalBaseUrl(config: RootcauseConfig): string {
  return config.agent.localBaseUrl ?? 'http://localhost:11434';
}

/**
 * Abort controller that fires on the caller's signal or after `timeoutMs`.
 */
function linkAbort(
  signal: AbortSignal | undefined,
  timeoutMs: number | undefined
): { controller: AbortController; dispose: () => void } {
  const controller = new AbortController();
  const onAbort = () => controller.abort(signal?.reason);
  if (signal?.aborted) {
    controller.abort(signal.reason);
  } else {
    signal?.addEventListener('abort', onAbort, { once: true });
  }
  const timeout =
    timeoutMs && timeoutMs > 0 ? setTimeout(() => controller.abort(), timeoutMs) : null;
  return {
    controller,
    dispose: () => {
      if (timeout) clearTimeout(timeout);
      signal?.removeEventListener('abort', onAbort);
    },
  };
}

const ErrorBodySchema = z.object({
  error: z.union([z.string(), z.object({ message: z.string().optional() }).passthrough()]).optional(),
});

const ChatCompletionSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullish() }).passthrough().optional() }).passthrough())
    .optional(),
});

const ResponsesApiSchema = z.object({
  output: z
    .array(
      z
        .object({
          content: z.array(z.object({ type: z.string(), text: z.string().optional() }).passthrough()).optional(),
        })
        .passthrough()
    )
    .optional(),
});

function parseProxyError(detail: string): string {
  let raw: unknown;
  try {
    raw = JSON.parse(detail);
  } catch {
    return detail.slice(0, 500);
  }
  const parsed = ErrorBodySchema.safeParse(raw);
  if (parsed.success) {
    const { error } = parsed.data;
    if (typeof error === 'string') return error;
    if (error?.message) return error.message;
  }
  return detail.slice(0, 500);
}

function chatCompletionText(body: unknown): string {
  const parsed = ChatCompletionSchema.safeParse(body);
  if (!parsed.success) return '';
  return (parsed.data.choices?.[0]?.message?.content ?? '').trim();
}

function responsesApiText(body: unknown): string {
  const parsed = ResponsesApiSchema.safeParse(body);
  if (!parsed.success) return '';
  return (parsed.data.output ?? [])
    .flatMap((item) => item.content ?? [])
    .filter((part) => part.type === 'output_text')
    .map((part) => part.text ?? '')
    .join('')
    .trim();
}

export class AnthropicClient implements LlmClient {
  private client: Anthropic;
  private model: string;
  meta?: LlmClientMeta;

  constructor(config: RootcauseConfig, modelOverride?: string) {
    this.client = new Anthropic({
      apiKey: process.env.ANTHROPIC_API_KEY ?? '',
      baseURL: resolveAnthropicBaseUrl(config),
    });
    this.model = modelOverride ?? config.agent.model;
    this.meta = { provider: 'anthropic', model: this.model };
  }

  async complete(messages: ChatMessage[], options?: LlmClientOptions): Promise<LlmResponse> {
    const system = messages
      .filter((msg) => msg.role === 'system')
      .map((msg) => msg.content)
      .join('\n\n');
    const converted = messages
      .filter((msg): msg is ChatMessage & { role: 'user' | 'assistant' } => msg.role !== 'system')
      .map((msg) => ({ role: msg.role, content: msg.content }));

    const response = await this.client.messages.create(
      {
        model: this.model,
        max_tokens: options?.maxTokens ?? 1024,
        temperature: options?.temperature ?? 0.2,
        system,
        messages: converted,
      },
      {
        signal: options?.signal,
        ...(options?.timeoutMs ? { timeout: options.timeoutMs } : {}),
      }
    );

    const text = response.content
      .map((block) => (block.type === 'text' ? block.text : ''))
      .join('')
      .trim();

    return { content: text, model: this.model };
  }
}

export class OpenAiClient implements LlmClient {
  private model: string;
  private baseUrl: string;
  private includeTemperature: boolean;
  private useResponsesApi: boolean;
  meta?: LlmClientMeta;

  constructor(config: RootcauseConfig, modelOverride?: string) {
    this.model = modelOverride ?? config.agent.openaiModel;
    this.baseUrl = resolveOpenAiBaseUrl(config);
    this.includeTemperature = !config.agent.useProxy;
    this.useResponsesApi = config.agent.useProxy;
    this.meta = { provider: 'openai', model: this.model };
  }

  async complete(messages: ChatMessage[], options?: LlmClientOptions): Promise<LlmResponse> {
    const maxTokens = options?.maxTokens;
    const { controller, dispose } = linkAbort(options?.signal, options?.timeoutMs);

    try {
      const response = await fetch(
        `${this.baseUrl}${this.useResponsesApi ? '/v1/responses' : '/v1/chat/completions'}`,
        {
          method: 'POST',
          headers: {
            Authorization: `Bearer ${process.env.OPENAI_API_KEY ?? ''}`,
            'Content-Type': 'application/json',
          },
          signal: controller.signal,
          body: JSON.stringify(
            this.useResponsesApi
              ? {
                  model: this.model,
                  ...(typeof maxTokens === 'number' ? { max_output_tokens: maxTokens } : {}),
                  input: messages.map((msg) => ({
                    role: msg.role,
                    content: [{ type: 'input_text', text: msg.content }],
                  })),
                }
              : {
                  model: this.model,
                  ...(this.includeTemperature ? { temperature: options?.temperature ?? 0.2 } : {}),
                  ...(typeof maxTokens === 'number' ? { max_tokens: maxTokens } : {}),
                  messages,
                }
          ),
        }
      );

      if (!response.ok) {
        const detail = await response.text();
        const errorMsg = detail ? parseProxyError(detail) : `status ${response.status}`;
        throw Object.assign(new Error(`LLM request failed: ${errorMsg}`), {
          status: response.status,
        });
      }

      const data: unknown = await response.json();
      const text = this.useResponsesApi ? responsesApiText(data) : chatCompletionText(data);
      return { content: text, model: this.model };
    } finally {
      dispose();
    }
  }
}

export class LocalClient implements LlmClient {
  private model: string;
  private baseUrl: string;
  meta?: LlmClientMeta;

  constructor(config: RootcauseConfig, modelOverride?: string) {
    this.model = modelOverride ?? config.agent.model;
    this.baseUrl = resolveLocalBaseUrl(config);
    this.meta = { provider: 'local', model: this.model };
  }

  async complete(messages: ChatMessage[], options?: LlmClientOptions): Promise<LlmResponse> {
    const { controller, dispose } = linkAbort(options?.signal, options?.timeoutMs);

    try {
      const response = await fetch(`${this.baseUrl}/v1/chat/completions`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
        },
        signal: controller.signal,
        body: JSON.stringify({
          model: this.model,
          temperature: options?.temperature ?? 0.2,
          ...(typeof options?.maxTokens === 'number' ? { max_tokens: options.maxTokens } : {}),
          messages,
        }),
      });

      if (!response.ok) {
        throw new Error(`Local model request failed: ${response.status}`);
      }

      const data: unknown = await response.json();
      return { content: chatCompletionText(data), model: this.model };
    } finally {
      dispose();
    }
  }
}

export class FallbackLlmClient implements LlmClient {
  meta?: LlmClientMeta;

  constructor(
    private primary: LlmClient,
    private fallback: LlmClient,
    private shouldFallback: (error: unknown) => boolean,
    private logger?: Logger
  ) {
    this.meta = primary.meta;
  }

  async complete(messages: ChatMessage[], options?: LlmClientOptions): Promise<LlmResponse> {
    try {
      return await this.primary.complete(messages, options);
    } catch (error) {
      if (!this.shouldFallback(error) || options?.signal?.aborted) {
        throw error;
      }
      this.logger?.warn('Primary LLM unavailable; using fallback model', {
        primary: this.primary.meta?.model,
        fallback: this.fallback.meta?.model,
        error: error instanceof Error ? error.message : String(error),
      });
      return this.fallback.complete(messages, options);
    }
  }
}

/**
 * Rejects a call that outlives its budget. Providers that honour the signal
 * stop work as well.
 */
export class TimeoutLlmClient implements LlmClient {
  meta?: LlmClientMeta;

  constructor(
    private inner: LlmClient,
    private defaultTimeoutMs: number
  ) {
    this.meta = inner.meta;
  }

  async complete(messages: ChatMessage[], options?: LlmClientOptions): Promise<LlmResponse> {
    const timeoutMs = options?.timeoutMs ?? this.defaultTimeoutMs;
    if (!timeoutMs || timeoutMs <= 0) {
      return this.inner.complete(messages, options);
    }

    const { controller, dispose } = linkAbort(options?.signal, undefined);
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new Error(`LLM request timed out after ${timeoutMs}ms`));
      }, timeoutMs);
    });

    try {
      return await Promise.race([
        this.inner.complete(messages, { ...options, timeoutMs, signal: controller.signal }),
        timeout,
      ]);
    } finally {
      clearTimeout(timer);
      dispose();
    }
  }
}

export function isRateLimitError(error: unknown): boolean {
  if (typeof error !== 'object' || error === null) {
    return false;
  }
  const status = 'status' in error && typeof error.status === 'number' ? error.status : undefined;
  if (status !== undefined && (status === 429 || (status >= 500 && status <= 599))) {
    return true;
  }
  const message = error instanceof Error ? error.message.toLowerCase() : '';
  return (
    message.includes('rate limit') ||
    message.includes('too many requests') ||
    message.includes('429') ||
    message.includes('overloaded') ||
    message.includes('quota')
  );
}

/**
 * Build the configured model client, or `null` for the offline provider.
 */
export function createLlmClient(config: RootcauseConfig, logger?: Logger): LlmClient | null {
  const log = logger ?? new Logger(config.logging.level);
  const timeoutMs = config.agent.timeoutMs;

  switch (config.agent.provider) {
    case 'offline':
      return null;
    case 'anthropic': {
      if (!process.env.ANTHROPIC_API_KEY && !config.agent.useProxy) {
        throw new InvestigationConfigError(
          'agent.provider is "anthropic" but ANTHROPIC_API_KEY is not set'
        );
      }
      const primary = new AnthropicClient(config);
      if (!process.env.OPENAI_API_KEY && !config.agent.useProxy) {
        return new TimeoutLlmClient(primary, timeoutMs);
      }
      const fallback = new OpenAiClient(config, config.agent.fallbackModel);
      return new TimeoutLlmClient(
        new FallbackLlmClient(primary, fallback, isRateLimitError, log),
        timeoutMs
      );
    }
    case 'openai':
      if (!process.env.OPENAI_API_KEY && !config.agent.useProxy) {
        throw new InvestigationConfigError(
          'agent.provider is "openai" but OPENAI_API_KEY is not set'
        );
      }
      return new TimeoutLlmClient(new OpenAiClient(config), timeoutMs);
    case 'local':
      return new TimeoutLlmClient(new LocalClient(config), timeoutMs);
  }
}
