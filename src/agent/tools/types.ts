/**
 * Tool Types
 *
 * Defines the evidence-source interface and the registry's execution records.
 */

import type { z } from 'zod';

/**
 * Parameters passed to an evidence source: a flat map of scalars.
 */
export type ToolParameters = Record<string, string | number | boolean>;

/**
 * Result of a tool execution.
 */
export type ToolResult =
  | { success: true; data: unknown }
  | { success: false; error: string };

/**
 * Context passed to tool execution.
 */
export interface ToolContext {
  /** Iteration of the investigation issuing the call */
  iteration: number;
  /** Aborted on timeout or investigation cancellation */
  signal?: AbortSignal;
}

/**
 * Definition of an evidence source the harness can invoke during ACT.
 */
export interface ToolDefinition<TInput = unknown> {
  /** Unique tool name, used as the registry key */
  name: string;

  /** Human-readable description (observability only) */
  description: string;

  /** Zod schema for input validation */
  schema: z.ZodType<TInput, z.ZodTypeDef, unknown>;

  /** Execute the tool */
  execute: (input: TInput, ctx: ToolContext) => Promise<ToolResult>;

  /** Cache TTL in milliseconds (0 = no caching) */
  cacheTtlMs: number;
}

/**
 * A tool selected for execution, with explicit parameters.
 */
export interface ToolCall {
  tool: string;
  params: ToolParameters;
}

/**
 * Record of a tool execution.
 */
export interface ToolExecution {
  /** Tool name */
  toolName: string;

  /** Input provided */
  input: ToolParameters;

  /** Result returned */
  result: ToolResult;

  /** Timestamp of execution */
  timestamp: string;

  /** Execution duration in ms */
  durationMs: number;

  /** Whether result was from cache */
  cached: boolean;
}

/**
 * Cache entry for tool results.
 */
export interface ToolCacheEntry {
  result: ToolResult;
  cachedAt: number;
  key: string;
}

export interface ExecuteOptions {
  /** Abort the call and record a failure after this many ms (0 = no limit) */
  timeoutMs?: number;
}
