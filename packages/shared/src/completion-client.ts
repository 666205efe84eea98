/**
 * Completion client: the single pluggable model capability of the agent.
 *
 * Supports:
 *   - Anthropic (messages streaming API)
 *   - OpenAI, Ollama and any OpenAI-compatible endpoint (chat completions
 *     streaming API, custom baseURL)
 *
 * Adapters translate the flat user/assistant/tool history into the
 * provider's format and normalise the streamed answer into
 * provider-agnostic CompletionEvents.
 */

import Anthropic from '@anthropic-ai/sdk';
import OpenAI from 'openai';
import { logger } from './logger.js';
import { CircuitBreaker } from './circuit-breaker.js';
import { CompletionError, MalformedCompletionError, errorMessage } from './errors.js';
import type { ModelConfig } from './model-config.js';
import type {
  CompletionClient,
  CompletionEvent,
  CompletionRequest,
  Message,
  ToolCallRequest,
  ToolDefinition,
} from './model-types.js';

const log = logger.child({ module: 'completion-client' });

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export interface ParsedToolArguments {
  arguments: Record<string, unknown>;
  /** Set when the text was unusable; `arguments` is then empty */
  error?: string;
}

/**
 * Parse streamed tool-call argument text; an empty string means no
 * arguments. Unusable text comes back as `error` with empty arguments.
 */
export function parseToolArguments(name: string, raw: string): ParsedToolArguments {
  if (raw.trim() === '') return { arguments: {} };
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return { arguments: {}, error: `arguments for tool '${name}' are not valid JSON` };
  }
  if (!isRecord(parsed)) {
    return { arguments: {}, error: `arguments for tool '${name}' are not a JSON object` };
  }
  return { arguments: parsed };
}

/** A tool call whose arguments could not be used, flagged for the registry */
function toolCall(id: string, name: string, parsed: ParsedToolArguments): ToolCallRequest {
  if (parsed.error === undefined) return { id, name, arguments: parsed.arguments };
  log.warn({ tool: name, error: parsed.error }, 'model sent unusable tool arguments');
  return { id, name, arguments: parsed.arguments, argumentsError: parsed.error };
}

// ---------------------------------------------------------------------------
// Provider adapter interface
// ---------------------------------------------------------------------------

export interface ProviderAdapter {
  readonly provider: string;
  stream(request: CompletionRequest, signal?: AbortSignal): AsyncGenerator<CompletionEvent>;
}

// ---------------------------------------------------------------------------
// Anthropic adapter
// ---------------------------------------------------------------------------

type AnthropicBlock =
  | Anthropic.Messages.TextBlockParam
  | Anthropic.Messages.ToolUseBlockParam
  | Anthropic.Messages.ToolResultBlockParam;

interface AnthropicTurn {
  role: 'user' | 'assistant';
  content: AnthropicBlock[];
}

/** Tool results travel as tool_result blocks inside a user turn */
export function toAnthropicMessages(messages: Message[]): Anthropic.Messages.MessageParam[] {
  const turns: AnthropicTurn[] = [];

  const push = (role: AnthropicTurn['role'], blocks: AnthropicBlock[]) => {
    if (blocks.length === 0) return;
    const last = turns[turns.length - 1];
    if (last && last.role === role) {
      last.content.push(...blocks);
    } else {
      turns.push({ role, content: blocks });
    }
  };

  for (const msg of messages) {
    if (msg.role === 'tool') {
      push('user', [{ type: 'tool_result', tool_use_id: msg.tool_call_id ?? '', content: msg.content }]);
      continue;
    }

    const blocks: AnthropicBlock[] = [];
    if (msg.content) blocks.push({ type: 'text', text: msg.content });
    if (msg.role === 'assistant') {
      for (const call of msg.tool_calls ?? []) {
        blocks.push({ type: 'tool_use', id: call.id, name: call.name, input: call.arguments });
      }
    }
    push(msg.role, blocks);
  }

  return turns;
}

function toAnthropicTools(tools: ToolDefinition[]): Anthropic.Messages.Tool[] {
  return tools.map((t) => ({
    name: t.name,
    description: t.description,
    input_schema: {
      type: 'object',
      properties: t.input_schema.properties ?? {},
      required: t.input_schema.required ?? [],
    },
  }));
}

function createAnthropicAdapter(config: ModelConfig): ProviderAdapter {
  const client = new Anthropic({ apiKey: config.apiKey, baseURL: config.baseURL });
  log.info({ model: config.model }, 'anthropic adapter: initialized');

  return {
    provider: 'anthropic',

    async *stream(request: CompletionRequest, signal?: AbortSignal): AsyncGenerator<CompletionEvent> {
      const stream = client.messages.stream(
        {
          model: config.model,
          max_tokens: config.maxTokens,
          system: request.system,
          tools: request.tools.length > 0 ? toAnthropicTools(request.tools) : undefined,
          messages: toAnthropicMessages(request.messages),
        },
        { signal },
      );

      for await (const event of stream) {
        if (event.type === 'content_block_delta' && event.delta.type === 'text_delta') {
          yield { type: 'text_delta', text: event.delta.text };
        }
      }

      const finalMessage = await stream.finalMessage();
      let text = '';
      const toolCalls: ToolCallRequest[] = [];
      for (const block of finalMessage.content) {
        if (block.type === 'text') {
          text += block.text;
        } else if (block.type === 'tool_use') {
          const parsed: ParsedToolArguments = isRecord(block.input)
            ? { arguments: block.input }
            : { arguments: {}, error: `arguments for tool '${block.name}' are not a JSON object` };
          toolCalls.push(toolCall(block.id, block.name, parsed));
        }
      }

      yield {
        type: 'message_done',
        response: {
          text,
          toolCalls,
          stopReason: finalMessage.stop_reason ?? 'end_turn',
          model: finalMessage.model,
          usage: {
            inputTokens: finalMessage.usage.input_tokens,
            outputTokens: finalMessage.usage.output_tokens,
          },
        },
      };
    },
  };
}

// ---------------------------------------------------------------------------
// OpenAI / Ollama / OpenAI-compatible adapter
// ---------------------------------------------------------------------------

export function toOpenAIMessages(request: CompletionRequest): OpenAI.Chat.ChatCompletionMessageParam[] {
  const out: OpenAI.Chat.ChatCompletionMessageParam[] = [];

  if (request.system) {
    out.push({ role: 'system', content: request.system });
  }

  for (const msg of request.messages) {
    switch (msg.role) {
      case 'user':
        out.push({ role: 'user', content: msg.content });
        break;
      case 'tool':
        out.push({ role: 'tool', tool_call_id: msg.tool_call_id ?? '', content: msg.content });
        break;
      case 'assistant':
        if (msg.tool_calls && msg.tool_calls.length > 0) {
          out.push({
            role: 'assistant',
            content: msg.content || null,
            tool_calls: msg.tool_calls.map((call) => ({
              id: call.id,
              type: 'function' as const,
              function: { name: call.name, arguments: JSON.stringify(call.arguments) },
            })),
          });
        } else {
          out.push({ role: 'assistant', content: msg.content });
        }
        break;
    }
  }

  return out;
}

function toOpenAITools(tools: ToolDefinition[]): OpenAI.Chat.ChatCompletionTool[] {
  return tools.map((t) => ({
    type: 'function' as const,
    function: {
      name: t.name,
      description: t.description,
      parameters: {
        type: 'object',
        properties: t.input_schema.properties ?? {},
        required: t.input_schema.required ?? [],
      },
    },
  }));
}

interface PartialToolCall {
  id: string;
  name: string;
  args: string;
}

function createOpenAICompatibleAdapter(config: ModelConfig): ProviderAdapter {
  const client = new OpenAI({
    apiKey: config.apiKey ?? 'not-needed',
    baseURL: config.baseURL,
  });
  log.info({ model: config.model, provider: config.provider, baseURL: config.baseURL }, 'openai-compatible adapter: initialized');

  return {
    provider: config.provider,

    async *stream(request: CompletionRequest, signal?: AbortSignal): AsyncGenerator<CompletionEvent> {
      const stream = await client.chat.completions.create(
        {
          model: config.model,
          max_tokens: config.maxTokens,
          messages: toOpenAIMessages(request),
          tools: request.tools.length > 0 ? toOpenAITools(request.tools) : undefined,
          stream: true,
        },
        { signal },
      );

      let text = '';
      let finishReason: string | undefined;
      let model = config.model;
      const partials = new Map<number, PartialToolCall>();

      for await (const chunk of stream) {
        model = chunk.model || model;
        const choice = chunk.choices[0];
        if (!choice) continue;

        if (choice.delta.content) {
          text += choice.delta.content;
          yield { type: 'text_delta', text: choice.delta.content };
        }

        for (const delta of choice.delta.tool_calls ?? []) {
          const partial = partials.get(delta.index) ?? { id: '', name: '', args: '' };
          if (delta.id) partial.id = delta.id;
          if (delta.function?.name) partial.name = delta.function.name;
          if (delta.function?.arguments) partial.args += delta.function.arguments;
          partials.set(delta.index, partial);
        }

        if (choice.finish_reason) finishReason = choice.finish_reason;
      }

      if (!finishReason) {
        throw new MalformedCompletionError('completion stream ended without a finish reason');
      }

      const toolCalls: ToolCallRequest[] = [...partials.entries()]
        .sort(([a], [b]) => a - b)
        .map(([, partial]) => {
          if (!partial.name) {
            throw new MalformedCompletionError('tool call without a function name');
          }
          return toolCall(partial.id, partial.name, parseToolArguments(partial.name, partial.args));
        });

      yield {
        type: 'message_done',
        response: {
          text,
          toolCalls,
          stopReason: toolCalls.length > 0 ? 'tool_use' : finishReason === 'stop' ? 'end_turn' : finishReason,
          model,
        },
      };
    },
  };
}

// ---------------------------------------------------------------------------
// ProviderCompletionClient
// ---------------------------------------------------------------------------

export class ProviderCompletionClient implements CompletionClient {
  private readonly adapter: ProviderAdapter;
  private readonly breaker: CircuitBreaker;
  private readonly config: ModelConfig;

  constructor(config: ModelConfig, adapter?: ProviderAdapter) {
    this.config = config;
    this.adapter =
      adapter ??
      (config.provider === 'anthropic' ? createAnthropicAdapter(config) : createOpenAICompatibleAdapter(config));
    this.breaker = new CircuitBreaker({
      name: `completion-${this.adapter.provider}`,
      failureThreshold: 5,
      resetTimeoutMs: 30_000,
    });
  }

  get model(): string {
    return this.config.model;
  }

  async *stream(request: CompletionRequest, signal?: AbortSignal): AsyncGenerator<CompletionEvent> {
    const start = Date.now();
    log.info(
      { model: this.config.model, provider: this.adapter.provider, messages: request.messages.length },
      'routing streaming completion request',
    );

    try {
      yield* this.breaker.stream(() => this.adapter.stream(request, signal));
      log.debug({ durationMs: Date.now() - start }, 'completion finished');
    } catch (err) {
      log.warn({ err, durationMs: Date.now() - start, provider: this.adapter.provider }, 'completion failed');
      if (err instanceof CompletionError) throw err;
      throw new CompletionError(`${this.adapter.provider} completion failed: ${errorMessage(err)}`, { cause: err });
    }
  }
}

export function createCompletionClient(config: ModelConfig): CompletionClient {
  return new ProviderCompletionClient(config);
}
