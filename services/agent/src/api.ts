import express from 'express';
import type { Request, Response, NextFunction } from 'express';
import type { Span } from '@opentelemetry/api';
import { timingSafeEqual } from 'node:crypto';
import { z } from 'zod';
import {
  logger,
  withSpan,
  traceIdOf,
  openEventStream,
  writeEventStream,
  encodeEvent,
  errorEvent,
  doneEvent,
  type StreamEvent,
} from '@rxdesk/shared';
import type { Agent, TurnResult } from './agent.js';
import type { ToolRegistry } from './tool-registry.js';
import type { ToolStats } from './tool-stats.js';

const log = logger.child({ module: 'api' });

export interface ApiOptions {
  agent: Agent;
  registry: ToolRegistry;
  stats: ToolStats;
  /** undefined = every origin allowed */
  corsOrigins?: string[];
  /** undefined = no authentication */
  authToken?: string;
}

// ---------------------------------------------------------------------------
// Request validation
// ---------------------------------------------------------------------------

const toolCallSchema = z.object({
  id: z.string(),
  name: z.string().min(1),
  arguments: z.record(z.unknown()),
});

const messageSchema = z.object({
  role: z.enum(['user', 'assistant', 'tool']),
  content: z.string(),
  tool_calls: z.array(toolCallSchema).optional(),
  tool_call_id: z.string().optional(),
});

const chatRequestSchema = z.object({
  messages: z.array(messageSchema).min(1, 'messages must not be empty'),
});

// ---------------------------------------------------------------------------
// Middleware
// ---------------------------------------------------------------------------

function safeCompare(a: string, b: string): boolean {
  if (a.length !== b.length) return false;
  return timingSafeEqual(Buffer.from(a), Buffer.from(b));
}

function authMiddleware(token: string | undefined) {
  if (!token) {
    log.warn('AUTH_TOKEN not configured - running without authentication');
  }

  return (req: Request, res: Response, next: NextFunction): void => {
    // Health checks bypass auth
    if (!token || req.path === '/ping') {
      next();
      return;
    }

    const authHeader = req.headers.authorization;
    if (!authHeader || !authHeader.startsWith('Bearer ') || !safeCompare(authHeader.slice(7), token)) {
      res.status(401).json({ error: 'unauthorized' });
      return;
    }
    next();
  };
}

function corsMiddleware(allowedOrigins: string[] | undefined) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const origin = req.headers.origin;
    if (!allowedOrigins || (origin && allowedOrigins.includes(origin))) {
      res.setHeader('Access-Control-Allow-Origin', origin ?? '*');
    }
    res.setHeader('Vary', 'Origin');
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type, Authorization');
    if (req.method === 'OPTIONS') {
      res.status(204).end();
      return;
    }
    next();
  };
}

/** An AbortSignal that fires when the client disconnects before the response is complete */
function disconnectSignal(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableFinished) {
      controller.abort(new Error('client disconnected'));
    }
  });
  return controller.signal;
}

function setTraceHeader(res: Response, span: Span): void {
  const traceId = traceIdOf(span);
  if (traceId) res.setHeader('X-Trace-Id', traceId);
}

function parseBody(req: Request, res: Response): z.infer<typeof chatRequestSchema> | undefined {
  const parsed = chatRequestSchema.safeParse(req.body);
  if (!parsed.success) {
    res.status(400).json({
      error: parsed.error.issues.map((i) => `${i.path.join('.') || 'body'}: ${i.message}`).join('; '),
    });
    return undefined;
  }
  return parsed.data;
}

// ---------------------------------------------------------------------------
// Application
// ---------------------------------------------------------------------------

export function createApi(opts: ApiOptions) {
  const { agent, registry, stats } = opts;
  const app = express();
  app.use(express.json({ limit: '1mb' }));
  app.use(corsMiddleware(opts.corsOrigins));

  app.use(authMiddleware(opts.authToken));

  app.get('/ping', (_req, res) => {
    res.json({ status: 'ok', service: 'agent', timestamp: new Date().toISOString() });
  });

  app.post('/api/chat/stream', async (req, res) => {
    const body = parseBody(req, res);
    if (!body) return;

    log.info({ messages: body.messages.length }, 'chat stream request');
    await withSpan('agent.turn', { 'chat.messages': body.messages.length, 'chat.stream': true }, async (span) => {
      setTraceHeader(res, span);
      const signal = disconnectSignal(res);
      const turn = agent.chatStream(body.messages, { signal });

      try {
        openEventStream(res);
        const written = await writeEventStream(res, turn);
        span.setAttribute('chat.events_written', written);
        log.debug({ events: written, cancelled: signal.aborted }, 'chat stream closed');
      } catch (err) {
        log.error({ err }, 'chat stream error');
        if (!res.headersSent) {
          res.status(500).json({ error: 'internal server error' });
        } else if (!res.writableEnded) {
          const tail: StreamEvent[] = [errorEvent('internal server error'), doneEvent()];
          res.end(tail.map(encodeEvent).join(''));
        }
      }
    });
  });

  app.post('/api/chat', async (req, res) => {
    const body = parseBody(req, res);
    if (!body) return;

    log.info({ messages: body.messages.length }, 'chat request');
    await withSpan('agent.turn', { 'chat.messages': body.messages.length, 'chat.stream': false }, async (span) => {
      setTraceHeader(res, span);
      try {
        const result: TurnResult = await agent.chat(body.messages, { signal: disconnectSignal(res) });
        span.setAttributes({ 'agent.turn_status': result.status, 'agent.rounds': result.rounds });
        if (result.status === 'cancelled') {
          log.info('client left before the turn finished');
          return;
        }
        if (result.status === 'aborted') {
          res.status(502).json({ error: result.error ?? 'completion failed' });
          return;
        }
        res.json({
          message: result.message,
          messages: result.messages,
          rounds: result.rounds,
          toolCallCount: result.toolCallCount,
          status: result.status,
        });
      } catch (err) {
        log.error({ err }, 'chat error');
        res.status(500).json({ error: 'internal server error' });
      }
    });
  });

  app.get('/api/tools', (_req, res) => {
    res.json({ tools: registry.definitions() });
  });

  app.get('/api/tools/stats', (_req, res) => {
    res.json({
      tools: stats.snapshot().map((e) => ({ tool_name: e.toolName, call_count: e.callCount })),
    });
  });

  return app;
}
