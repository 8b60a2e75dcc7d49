/**
 * Directed Selection
 *
 * Maps the reasoner's `next_actions` onto tool calls through keyword routes.
 * Each action takes the first route that matches it; duplicate calls collapse.
 * When no action matches, the fallback policy decides.
 */

import type { ToolCall } from '../tools/types.js';
import type {
  SelectionContext,
  SelectionDecision,
  SelectionPolicy,
  SelectionRoute,
} from './types.js';

export const DEFAULT_ROUTES: ReadonlyArray<SelectionRoute> = [
  {
    keywords: ['log', 'error', 'exception'],
    call: { tool: 'log_search', params: { query: 'service:api-gateway level:error', timeframe: '1h' } },
  },
  {
    keywords: ['incident', 'page', 'alert', 'on-call'],
    call: { tool: 'active_incidents', params: {} },
  },
  {
    keywords: ['deploy', 'release', 'rollout', 'change', 'commit'],
    call: { tool: 'deployment_history', params: { repo: 'main-service', limit: 5 } },
  },
  {
    keywords: ['database', 'db', 'query', 'pool'],
    call: { tool: 'infra_metrics', params: { service: 'database' } },
  },
  {
    keywords: ['gateway', 'cpu', 'memory', 'metric', 'latency', 'resource'],
    call: { tool: 'infra_metrics', params: { service: 'api-gateway' } },
  },
];

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

function callKey(call: ToolCall): string {
  const params = Object.entries(call.params).sort(([a], [b]) => a.localeCompare(b));
  return `${call.tool}:${JSON.stringify(params)}`;
}

interface CompiledRoute {
  patterns: RegExp[];
  call: ToolCall;
}

export class DirectedSelectionPolicy implements SelectionPolicy {
  readonly name = 'directed';
  private routes: CompiledRoute[];

  constructor(
    routes: ReadonlyArray<SelectionRoute>,
    private fallback: SelectionPolicy
  ) {
    this.routes = routes.map((route) => ({
      patterns: route.keywords.map((k) => new RegExp(`(^|[^a-z0-9])${escapeRegExp(k.toLowerCase())}`, 'i')),
      call: { tool: route.call.tool, params: { ...route.call.params } },
    }));
  }

  /** First route matching the action, if any. */
  route(action: string): ToolCall | undefined {
    const match = this.routes.find((r) => r.patterns.some((p) => p.test(action)));
    return match ? { tool: match.call.tool, params: { ...match.call.params } } : undefined;
  }

  select(context: SelectionContext): SelectionDecision {
    const calls: ToolCall[] = [];
    const seen = new Set<string>();
    const matched: string[] = [];

    for (const action of context.nextActions) {
      const call = this.route(action);
      if (!call) continue;
      matched.push(action);
      const key = callKey(call);
      if (seen.has(key)) continue;
      seen.add(key);
      calls.push(call);
    }

    if (calls.length === 0) {
      const fallback = this.fallback.select(context);
      return {
        ...fallback,
        rationale: `No next action matched a route; ${fallback.rationale}`,
      };
    }

    return {
      strategy: 'directed',
      calls,
      rationale: `Routed ${matched.length} of ${context.nextActions.length} next action(s)`,
    };
  }

  referencedTools(): string[] {
    return [
      ...new Set([...this.routes.map((r) => r.call.tool), ...this.fallback.referencedTools()]),
    ];
  }
}
