/**
 * Event Stream Encoder and its decoder.
 *
 * Wire format: one `data: <json>` line per event followed by a blank line.
 * JSON.stringify never emits a raw newline, so every payload fits on the
 * marked line.
 */
import type { ServerResponse } from 'node:http';
import { logger } from './logger.js';
import { streamEventSchema, type StreamEvent } from './stream-events.js';

const log = logger.child({ module: 'sse' });

const DATA_PREFIX = 'data:';
const RECORD_DELIMITER = /\r?\n\r?\n/;

export function encodeEvent(event: StreamEvent): string {
  return `${DATA_PREFIX} ${JSON.stringify(event)}\n\n`;
}

/** Parse one delimited record; undefined when it carries no valid event */
export function decodeRecord(record: string): StreamEvent | undefined {
  const dataLines = record
    .split(/\r?\n/)
    .filter((line) => line.startsWith(DATA_PREFIX))
    .map((line) => line.slice(DATA_PREFIX.length).replace(/^ /, ''));
  if (dataLines.length === 0) return undefined;

  let payload: unknown;
  try {
    payload = JSON.parse(dataLines.join('\n'));
  } catch {
    log.debug({ record: record.slice(0, 200) }, 'skipping record with unparsable payload');
    return undefined;
  }

  const parsed = streamEventSchema.safeParse(payload);
  if (!parsed.success) {
    log.debug({ issues: parsed.error.issues }, 'skipping record that is not a stream event');
    return undefined;
  }
  return parsed.data;
}

/**
 * Incremental decoder. Feed it chunks cut at arbitrary points; it returns
 * the events whose records are complete and keeps the remainder.
 */
export class SseDecoder {
  private buffer = '';

  push(chunk: string): StreamEvent[] {
    this.buffer += chunk;
    const records = this.buffer.split(RECORD_DELIMITER);
    this.buffer = records.pop() ?? '';
    return this.decodeAll(records);
  }

  /** Decode whatever is left once the transport has ended */
  flush(): StreamEvent[] {
    const rest = this.buffer;
    this.buffer = '';
    return rest.trim() ? this.decodeAll([rest]) : [];
  }

  private decodeAll(records: string[]): StreamEvent[] {
    const events: StreamEvent[] = [];
    for (const record of records) {
      const event = decodeRecord(record);
      if (event) events.push(event);
    }
    return events;
  }
}

/** Decode a byte or text stream (e.g. a fetch body) into typed events */
export async function* decodeEventStream(
  chunks: AsyncIterable<Uint8Array | string>,
): AsyncGenerator<StreamEvent> {
  const decoder = new SseDecoder();
  const text = new TextDecoder();

  for await (const chunk of chunks) {
    const piece = typeof chunk === 'string' ? chunk : text.decode(chunk, { stream: true });
    yield* decoder.push(piece);
  }
  yield* decoder.push(text.decode());
  yield* decoder.flush();
}

/** Start an event-stream response */
export function openEventStream(res: ServerResponse): void {
  res.statusCode = 200;
  res.setHeader('Content-Type', 'text/event-stream');
  res.setHeader('Cache-Control', 'no-cache');
  res.setHeader('Connection', 'keep-alive');
  res.setHeader('X-Accel-Buffering', 'no');
  res.flushHeaders();
}

/** Resolves once the response can take more data or has closed */
function drained(res: ServerResponse): Promise<void> {
  return new Promise((resolve) => {
    const settle = () => {
      res.off('drain', settle);
      res.off('close', settle);
      resolve();
    };
    res.on('drain', settle);
    res.on('close', settle);
  });
}

/**
 * Write each event the moment it is produced. Returns the number of events
 * written; stops pulling from the source once the response is closed and
 * waits for `drain` while the socket buffer is full.
 */
export async function writeEventStream(
  res: ServerResponse,
  events: AsyncIterable<StreamEvent>,
): Promise<number> {
  let written = 0;
  for await (const event of events) {
    if (res.writableEnded || res.destroyed) {
      log.debug({ type: event.type }, 'response closed, dropping event');
      break;
    }
    const flushed = res.write(encodeEvent(event));
    written++;
    if (!flushed && !res.destroyed) {
      await drained(res);
    }
  }
  if (!res.writableEnded) res.end();
  return written;
}
