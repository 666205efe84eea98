/**
 * Tool Registry: the fixed table of domain tools the agent may call.
 *
 * `dispatch` never throws: unknown names, unparsable or missing arguments,
 * handler exceptions and handler timeouts all come back as `{ error: CODE, ... }`
 * results so the model can see them and react within the same turn.
 */
import { randomUUID } from 'node:crypto';
import {
  logger,
  withSpan,
  deadline,
  raceAbort,
  errorMessage,
  type ToolDefinition,
  type ToolResult,
} from '@rxdesk/shared';
import type { ToolStats } from './tool-stats.js';

const log = logger.child({ module: 'tool-registry' });

export type ToolHandler = (args: Record<string, unknown>) => ToolResult | Promise<ToolResult>;

export interface ToolDescriptor {
  /** Name, description and argument schema; `input_schema.required` is enforced before the handler runs */
  definition: ToolDefinition;
  handler: ToolHandler;
}

export interface ToolInvocation {
  name: string;
  invocationId: string;
  result: ToolResult;
  /** True when the result carries an `error` code, from the registry or the handler */
  isError: boolean;
}

export interface DispatchOptions {
  /** Provider call id; generated when absent */
  invocationId?: string;
  /** Set when the provider's argument text could not be parsed; the handler is skipped */
  argumentsError?: string;
}

export interface ToolRegistryOptions {
  stats: ToolStats;
  /** Per-handler timeout (default 10s) */
  timeoutMs?: number;
}

export class ToolRegistry {
  private readonly tools: ReadonlyMap<string, ToolDescriptor>;
  private readonly stats: ToolStats;
  private readonly timeoutMs: number;

  constructor(tools: ToolDescriptor[], opts: ToolRegistryOptions) {
    const table = new Map<string, ToolDescriptor>();
    for (const tool of tools) {
      const { name } = tool.definition;
      if (table.has(name)) {
        throw new Error(`duplicate tool registration: ${name}`);
      }
      table.set(name, tool);
    }
    this.tools = table;
    this.stats = opts.stats;
    this.timeoutMs = opts.timeoutMs ?? 10_000;
    log.info({ tools: [...table.keys()] }, 'tool registry ready');
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  get size(): number {
    return this.tools.size;
  }

  /** What the model is shown: names and schemas, never handlers */
  definitions(): ToolDefinition[] {
    return [...this.tools.values()].map((t) => t.definition);
  }

  async dispatch(name: string, args: Record<string, unknown>, opts: DispatchOptions = {}): Promise<ToolInvocation> {
    const invocationId = opts.invocationId ?? randomUUID();
    this.stats.increment(name);

    const tool = this.tools.get(name);
    if (!tool) {
      log.warn({ tool: name, invocationId }, 'model requested unknown tool');
      return toInvocation(name, invocationId, { error: 'UNKNOWN_TOOL', tool: name });
    }

    if (opts.argumentsError !== undefined) {
      log.warn({ tool: name, invocationId, error: opts.argumentsError }, 'tool call with unparsable arguments');
      return toInvocation(name, invocationId, {
        error: 'INVALID_ARGUMENTS',
        tool: name,
        message: opts.argumentsError,
      });
    }

    const required = tool.definition.input_schema.required ?? [];
    const missing = required.find((key) => !Object.hasOwn(args, key) || args[key] === undefined);
    if (missing !== undefined) {
      log.warn({ tool: name, invocationId, argument: missing }, 'tool call missing required argument');
      return toInvocation(name, invocationId, {
        error: 'MISSING_REQUIRED_ARGUMENT',
        tool: name,
        argument: missing,
        message: `missing required argument '${missing}'`,
      });
    }

    const result = await withSpan(`tool.${name}`, { 'tool.name': name, 'tool.invocation_id': invocationId }, () =>
      this.runHandler(name, tool.handler, args),
    );
    const invocation = toInvocation(name, invocationId, result);
    log.info({ tool: name, invocationId, isError: invocation.isError }, 'tool dispatched');
    return invocation;
  }

  private async runHandler(name: string, handler: ToolHandler, args: Record<string, unknown>): Promise<ToolResult> {
    const timer = deadline(this.timeoutMs);
    const start = Date.now();
    try {
      return await raceAbort(Promise.resolve().then(() => handler(args)), timer.signal);
    } catch (err) {
      if (timer.expired) {
        log.error({ tool: name, timeoutMs: this.timeoutMs }, 'tool handler timed out');
        return { error: 'TOOL_TIMEOUT', tool: name, timeoutMs: this.timeoutMs };
      }
      log.error({ err, tool: name, durationMs: Date.now() - start }, 'tool handler threw');
      return { error: 'TOOL_FAILED', tool: name, message: errorMessage(err) };
    } finally {
      timer.clear();
    }
  }
}

function toInvocation(name: string, invocationId: string, result: ToolResult): ToolInvocation {
  return { name, invocationId, result, isError: typeof result.error === 'string' };
}
