import { z } from 'zod';

/**
 * Client-facing stream protocol. One event per record; the client rebuilds
 * the assistant message by concatenating every `text_delta` before `done`.
 */
export const streamEventSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('text_delta'), delta: z.string() }),
  z.object({
    type: z.literal('tool_call'),
    name: z.string(),
    call_id: z.string().optional(),
    arguments: z.record(z.unknown()),
  }),
  z.object({
    type: z.literal('tool_result'),
    name: z.string(),
    call_id: z.string().optional(),
    result: z.record(z.unknown()),
  }),
  z.object({ type: z.literal('error'), error: z.object({ message: z.string() }) }),
  z.object({ type: z.literal('done') }),
]);

export type StreamEvent = z.infer<typeof streamEventSchema>;
export type StreamEventType = StreamEvent['type'];

export const textDelta = (delta: string): StreamEvent => ({ type: 'text_delta', delta });
export const doneEvent = (): StreamEvent => ({ type: 'done' });
export const errorEvent = (message: string): StreamEvent => ({ type: 'error', error: { message } });
