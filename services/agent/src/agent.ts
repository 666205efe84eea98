/**
 * Agent loop: one user turn of model -> tool calls -> tool results -> model.
 *
 * chatStream() yields Stream Events as they are produced and returns the
 * TurnResult. Every turn that is not cancelled ends with `done`; a
 * completion failure ends it with `error` then `done`.
 */
import { randomUUID } from 'node:crypto';
import { SpanStatusCode } from '@opentelemetry/api';
import {
  logger,
  getTracer,
  deadline,
  raceAbort,
  errorMessage,
  textDelta,
  doneEvent,
  errorEvent,
  CompletionError,
  CompletionTimeoutError,
  MalformedCompletionError,
  type CompletionClient,
  type CompletionEvent,
  type CompletionResponse,
  type Message,
  type StreamEvent,
  type ToolCallRequest,
} from '@rxdesk/shared';
import type { ToolRegistry } from './tool-registry.js';

const log = logger.child({ module: 'agent' });

export type TurnStatus = 'completed' | 'max_rounds' | 'aborted' | 'cancelled';

export interface TurnResult {
  /** All assistant text produced during the turn */
  message: Message;
  /** Caller history plus everything this turn appended */
  messages: Message[];
  /** Completion calls made */
  rounds: number;
  toolCallCount: number;
  status: TurnStatus;
  /** Set when status is 'aborted' */
  error?: string;
}

export interface ChatOptions {
  /** Abort when the client goes away */
  signal?: AbortSignal;
}

export interface Agent {
  chatStream(messages: Message[], opts?: ChatOptions): AsyncGenerator<StreamEvent, TurnResult>;
  chat(messages: Message[], opts?: ChatOptions): Promise<TurnResult>;
}

export interface AgentOptions {
  completionClient: CompletionClient;
  registry: ToolRegistry;
  systemPrompt?: string;
  maxToolRounds: number;
  completionTimeoutMs: number;
}

type RoundOutcome =
  | { ok: true; response: CompletionResponse; text: string }
  | { ok: false; cancelled: true }
  | { ok: false; cancelled: false; error: CompletionError };

export function createAgent(opts: AgentOptions): Agent {
  const { completionClient, registry, systemPrompt, maxToolRounds, completionTimeoutMs } = opts;
  if (!Number.isInteger(maxToolRounds) || maxToolRounds < 1) {
    throw new Error(`maxToolRounds must be a positive integer, got ${maxToolRounds}`);
  }
  const tracer = getTracer();

  /**
   * One completion call. Text increments are yielded as they arrive; the
   * call is bounded by the completion timeout and the turn's signal.
   */
  async function* completionRound(
    history: Message[],
    round: number,
    signal: AbortSignal | undefined,
  ): AsyncGenerator<StreamEvent, RoundOutcome> {
    const span = tracer.startSpan('agent.completion', {
      attributes: { 'agent.round': round, 'agent.history_length': history.length },
    });
    const timer = deadline(completionTimeoutMs, signal);
    let iterator: AsyncIterator<CompletionEvent> | undefined;
    let text = '';
    let response: CompletionResponse | undefined;
    let finished = false;

    log.info({ round, history: history.length }, 'requesting completion');
    try {
      iterator = completionClient
        .stream({ system: systemPrompt, messages: [...history], tools: registry.definitions() }, timer.signal)
        [Symbol.asyncIterator]();
      for (;;) {
        const next = await raceAbort(iterator.next(), timer.signal);
        if (next.done) break;
        const event = next.value;
        if (event.type === 'text_delta') {
          if (!event.text) continue;
          text += event.text;
          yield textDelta(event.text);
        } else {
          response = event.response;
        }
      }
      finished = true;

      if (!response) {
        throw new MalformedCompletionError('completion stream ended without a final message');
      }
      span.setStatus({ code: SpanStatusCode.OK });
      return { ok: true, response, text };
    } catch (err) {
      span.setStatus({ code: SpanStatusCode.ERROR, message: errorMessage(err) });
      if (signal?.aborted && !timer.expired) {
        return { ok: false, cancelled: true };
      }
      const error = timer.expired
        ? new CompletionTimeoutError(completionTimeoutMs)
        : err instanceof CompletionError
          ? err
          : new CompletionError(errorMessage(err), { cause: err });
      span.recordException(error);
      return { ok: false, cancelled: false, error };
    } finally {
      timer.clear();
      span.end();
      if (iterator && !finished) {
        // The provider stream may still be pending; release it in the background
        void iterator.return?.().then(undefined, (err: unknown) => log.debug({ err }, 'completion stream cleanup failed'));
      }
    }
  }

  async function* chatStream(history: Message[], chatOpts: ChatOptions = {}): AsyncGenerator<StreamEvent, TurnResult> {
    const { signal } = chatOpts;
    const messages: Message[] = [...history];
    let text = '';
    let rounds = 0;
    let toolRounds = 0;
    let toolCallCount = 0;
    const start = Date.now();

    const finish = (status: TurnStatus, error?: string): TurnResult => {
      log.info({ status, rounds, toolCallCount, durationMs: Date.now() - start }, 'turn finished');
      return { message: { role: 'assistant', content: text }, messages, rounds, toolCallCount, status, error };
    };

    log.info({ messages: history.length, maxToolRounds }, 'turn started');

    for (;;) {
      if (signal?.aborted) return finish('cancelled');

      rounds++;
      const outcome = yield* completionRound(messages, rounds, signal);

      if (!outcome.ok) {
        if (outcome.cancelled) {
          log.info({ round: rounds }, 'turn cancelled during completion');
          return finish('cancelled');
        }
        log.error({ err: outcome.error, round: rounds }, 'completion failed, aborting turn');
        yield errorEvent(outcome.error.message);
        yield doneEvent();
        return finish('aborted', outcome.error.message);
      }

      const { response } = outcome;
      let roundText = outcome.text;
      if (!roundText && response.text) {
        // Client did not stream increments; surface the text as one delta
        roundText = response.text;
        yield textDelta(roundText);
      }
      text += roundText;

      if (response.toolCalls.length === 0) {
        messages.push({ role: 'assistant', content: roundText });
        yield doneEvent();
        return finish('completed');
      }

      const calls: ToolCallRequest[] = response.toolCalls.map((call) => ({ ...call, id: call.id || randomUUID() }));
      messages.push({ role: 'assistant', content: roundText, tool_calls: calls });

      for (const call of calls) {
        if (signal?.aborted) {
          log.info({ round: rounds, tool: call.name }, 'turn cancelled before tool dispatch');
          return finish('cancelled');
        }

        toolCallCount++;
        yield { type: 'tool_call', name: call.name, call_id: call.id, arguments: call.arguments };

        const invocation = await registry.dispatch(call.name, call.arguments, {
          invocationId: call.id,
          argumentsError: call.argumentsError,
        });

        if (signal?.aborted) {
          log.info({ tool: call.name, invocationId: call.id, isError: invocation.isError }, 'discarding tool result of cancelled turn');
          return finish('cancelled');
        }

        yield { type: 'tool_result', name: call.name, call_id: call.id, result: invocation.result };
        messages.push({ role: 'tool', content: JSON.stringify(invocation.result), tool_call_id: call.id });
      }

      toolRounds++;
      if (toolRounds >= maxToolRounds) {
        log.warn({ maxToolRounds, toolCallCount }, 'tool round limit reached, ending turn');
        yield doneEvent();
        return finish('max_rounds');
      }
    }
  }

  async function chat(history: Message[], chatOpts?: ChatOptions): Promise<TurnResult> {
    const stream = chatStream(history, chatOpts);
    for (;;) {
      const next = await stream.next();
      if (next.done) return next.value;
    }
  }

  return { chatStream, chat };
}
