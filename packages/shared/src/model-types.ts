/**
 * Provider-agnostic conversation, tool and completion types.
 *
 * The conversation shape is the one clients send over HTTP: flat messages
 * with user / assistant / tool roles. Provider adapters translate it into
 * whatever their API expects.
 */

// ---------------------------------------------------------------------------
// Conversation
// ---------------------------------------------------------------------------

export type MessageRole = 'user' | 'assistant' | 'tool';

/** A tool invocation requested by the model, arguments not yet validated */
export interface ToolCallRequest {
  /** Provider call id (or a generated one); pairs the call with its result */
  id: string;
  name: string;
  arguments: Record<string, unknown>;
  /** The provider's argument text was unusable; `arguments` is empty */
  argumentsError?: string;
}

export interface Message {
  role: MessageRole;
  content: string;
  /** Only on assistant messages that requested tools */
  tool_calls?: ToolCallRequest[];
  /** Only on tool messages: the invocation this result answers */
  tool_call_id?: string;
}

// ---------------------------------------------------------------------------
// Tools
// ---------------------------------------------------------------------------

/** JSON-schema description of a tool as shown to the model (no handler) */
export interface ToolDefinition {
  name: string;
  description: string;
  input_schema: {
    type: 'object';
    properties?: Record<string, unknown>;
    required?: string[];
  };
}

/** Structured tool output. Failures carry an `error` code, never a throw. */
export type ToolResult = Record<string, unknown>;

// ---------------------------------------------------------------------------
// Completion
// ---------------------------------------------------------------------------

export interface CompletionRequest {
  /** System instructions, sent ahead of the conversation */
  system?: string;
  messages: Message[];
  tools: ToolDefinition[];
}

export interface CompletionUsage {
  inputTokens: number;
  outputTokens: number;
}

/** Final state of one completion call */
export interface CompletionResponse {
  /** All text the model produced in this call */
  text: string;
  /** Requested tool invocations, in request order */
  toolCalls: ToolCallRequest[];
  stopReason: 'end_turn' | 'tool_use' | 'max_tokens' | string;
  /** Model that actually answered */
  model: string;
  usage?: CompletionUsage;
}

export type CompletionEvent =
  | { type: 'text_delta'; text: string }
  | { type: 'message_done'; response: CompletionResponse };

/**
 * The single pluggable completion capability. Implementations stream text
 * increments in receipt order and finish with exactly one `message_done`.
 * Any failure (network, provider, timeout, malformed output) is thrown.
 */
export interface CompletionClient {
  stream(request: CompletionRequest, signal?: AbortSignal): AsyncIterable<CompletionEvent>;
}
