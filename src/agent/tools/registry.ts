/**
 * Tool Registry
 *
 * Explicit lookup of evidence sources keyed by name, with input validation,
 * per-call timeouts and result caching. `execute` never rejects: every failure
 * comes back as a failed `ToolExecution`.
 */

import { createHash } from 'node:crypto';

import type {
  ExecuteOptions,
  ToolCacheEntry,
  ToolContext,
  ToolDefinition,
  ToolExecution,
  ToolParameters,
  ToolResult,
} from './types.js';

/**
 * Default cache TTL for read-only tools (30 seconds).
 */
const DEFAULT_CACHE_TTL_MS = 30_000;

export interface ToolSummary {
  name: string;
  description: string;
  cacheTtlMs: number;
}

interface RegisteredTool extends ToolSummary {
  invoke: (input: unknown, ctx: ToolContext) => Promise<ToolResult>;
}

export class ToolTimeoutError extends Error {
  constructor(
    readonly toolName: string,
    readonly timeoutMs: number
  ) {
    super(`Tool ${toolName} timed out after ${timeoutMs}ms`);
    this.name = 'ToolTimeoutError';
  }
}

/**
 * Agent Tool Registry
 */
export class AgentToolRegistry {
  private tools: Map<string, RegisteredTool> = new Map();
  private cache: Map<string, ToolCacheEntry> = new Map();

  /**
   * Register a tool with the registry.
   */
  register<TInput>(tool: ToolDefinition<TInput>): void {
    if (this.tools.has(tool.name)) {
      throw new Error(`Tool already registered: ${tool.name}`);
    }
    this.tools.set(tool.name, {
      name: tool.name,
      description: tool.description,
      cacheTtlMs: tool.cacheTtlMs,
      invoke: async (input, ctx) => {
        const parsed = tool.schema.safeParse(input);
        if (!parsed.success) {
          return { success: false, error: `Invalid input: ${parsed.error.message}` };
        }
        return tool.execute(parsed.data, ctx);
      },
    });
  }

  get(name: string): ToolSummary | undefined {
    const tool = this.tools.get(name);
    return tool ? { name: tool.name, description: tool.description, cacheTtlMs: tool.cacheTtlMs } : undefined;
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  get size(): number {
    return this.tools.size;
  }

  list(): ToolSummary[] {
    return Array.from(this.tools.keys()).flatMap((name) => {
      const summary = this.get(name);
      return summary ? [summary] : [];
    });
  }

  listNames(): string[] {
    return Array.from(this.tools.keys());
  }

  /**
   * Execute a tool with validation, timeout, and caching.
   */
  async execute(
    name: string,
    input: ToolParameters,
    ctx: ToolContext,
    options: ExecuteOptions = {}
  ): Promise<ToolExecution> {
    const tool = this.tools.get(name);
    if (!tool) {
      return {
        toolName: name,
        input,
        result: { success: false, error: `Unknown tool: ${name}` },
        timestamp: new Date().toISOString(),
        durationMs: 0,
        cached: false,
      };
    }

    const cacheKey = this.getCacheKey(name, input);
    if (tool.cacheTtlMs > 0) {
      const cached = this.getFromCache(cacheKey, tool.cacheTtlMs);
      if (cached) {
        return {
          toolName: name,
          input,
          result: cached,
          timestamp: new Date().toISOString(),
          durationMs: 0,
          cached: true,
        };
      }
    }

    const startTime = Date.now();
    let result: ToolResult;

    try {
      result = await this.invokeWithTimeout(tool, input, ctx, options.timeoutMs ?? 0);
    } catch (error) {
      result = {
        success: false,
        error: error instanceof Error ? error.message : 'Unknown error',
      };
    }

    const durationMs = Date.now() - startTime;

    if (result.success && tool.cacheTtlMs > 0) {
      this.setCache(cacheKey, result);
    }

    return {
      toolName: name,
      input,
      result,
      timestamp: new Date().toISOString(),
      durationMs,
      cached: false,
    };
  }

  clearCache(): void {
    this.cache.clear();
  }

  getCacheStats(): { size: number; keys: string[] } {
    return {
      size: this.cache.size,
      keys: Array.from(this.cache.keys()),
    };
  }

  private async invokeWithTimeout(
    tool: RegisteredTool,
    input: ToolParameters,
    ctx: ToolContext,
    timeoutMs: number
  ): Promise<ToolResult> {
    if (ctx.signal?.aborted) {
      return { success: false, error: 'Investigation cancelled' };
    }

    const controller = new AbortController();
    let rejectCancelled: ((error: Error) => void) | undefined;
    const onAbort = () => {
      rejectCancelled?.(new Error('Investigation cancelled'));
      controller.abort(ctx.signal?.reason);
    };
    ctx.signal?.addEventListener('abort', onAbort, { once: true });

    let timer: NodeJS.Timeout | undefined;
    const pending: Array<Promise<ToolResult>> = [
      tool.invoke(input, { ...ctx, signal: controller.signal }),
    ];
    // Cancellation does not wait for a tool that ignores its signal.
    if (ctx.signal) {
      pending.push(
        new Promise<ToolResult>((_, reject) => {
          rejectCancelled = reject;
        })
      );
    }
    if (timeoutMs > 0) {
      pending.push(
        new Promise<ToolResult>((_, reject) => {
          timer = setTimeout(() => {
            const error = new ToolTimeoutError(tool.name, timeoutMs);
            controller.abort(error);
            reject(error);
          }, timeoutMs);
        })
      );
    }

    try {
      return await Promise.race(pending);
    } finally {
      clearTimeout(timer);
      ctx.signal?.removeEventListener('abort', onAbort);
    }
  }

  private getCacheKey(name: string, input: ToolParameters): string {
    const sorted = Object.fromEntries(
      Object.entries(input).sort(([a], [b]) => a.localeCompare(b))
    );
    const inputHash = createHash('sha256')
      .update(JSON.stringify(sorted))
      .digest('hex')
      .slice(0, 16);
    return `${name}:${inputHash}`;
  }

  private getFromCache(key: string, ttlMs: number): ToolResult | null {
    const entry = this.cache.get(key);
    if (!entry) return null;

    const age = Date.now() - entry.cachedAt;
    if (age > ttlMs) {
      this.cache.delete(key);
      return null;
    }

    return entry.result;
  }

  private setCache(key: string, result: ToolResult): void {
    this.cache.set(key, {
      result,
      cachedAt: Date.now(),
      key,
    });
  }
}

export function createToolRegistry(): AgentToolRegistry {
  return new AgentToolRegistry();
}

export { DEFAULT_CACHE_TTL_MS };
