import { describe, it, expect, vi } from 'vitest';

// ---------------------------------------------------------------------------
// Mock the OpenAI SDK underneath the real completion client
// ---------------------------------------------------------------------------

const { mockCreate } = vi.hoisted(() => ({ mockCreate: vi.fn() }));

vi.mock('openai', () => ({
  default: vi.fn().mockImplementation(function () {
    return { chat: { completions: { create: mockCreate } } };
  }),
}));

// ---------------------------------------------------------------------------
// Import after mocks
// ---------------------------------------------------------------------------

import { ProviderCompletionClient, type StreamEvent } from '@rxdesk/shared';
import { createAgent } from '../agent.js';
import { ToolRegistry, type ToolHandler } from '../tool-registry.js';
import { ToolStats } from '../tool-stats.js';

function chunks(items: unknown[]) {
  return {
    async *[Symbol.asyncIterator]() {
      for (const item of items) yield item;
    },
  };
}

describe('agent over the OpenAI-compatible client', () => {
  it('keeps the turn alive when the model sends truncated tool arguments', async () => {
    mockCreate
      .mockResolvedValueOnce(
        chunks([
          {
            model: 'gpt-test',
            choices: [
              {
                index: 0,
                delta: {
                  tool_calls: [
                    { index: 0, id: 'call_1', function: { name: 'check_stock_availability', arguments: '{"med_id": "MED0' } },
                  ],
                },
                finish_reason: 'tool_calls',
              },
            ],
          },
        ]),
      )
      .mockResolvedValueOnce(
        chunks([
          { model: 'gpt-test', choices: [{ index: 0, delta: { content: 'Which medication did you mean?' }, finish_reason: 'stop' }] },
        ]),
      );

    const stockHandler = vi.fn<ToolHandler>(() => ({ quantity: 25 }));
    const stats = new ToolStats();
    const registry = new ToolRegistry(
      [
        {
          definition: {
            name: 'check_stock_availability',
            description: 'Check stock',
            input_schema: { type: 'object', properties: {}, required: ['med_id', 'store_id'] },
          },
          handler: stockHandler,
        },
      ],
      { stats },
    );
    const agent = createAgent({
      completionClient: new ProviderCompletionClient({ provider: 'openai', model: 'gpt-test', apiKey: 'test-key', maxTokens: 256 }),
      registry,
      maxToolRounds: 3,
      completionTimeoutMs: 5_000,
    });

    const events: StreamEvent[] = [];
    for await (const event of agent.chatStream([{ role: 'user', content: 'Is Acamol in stock?' }])) {
      events.push(event);
    }

    expect(events.map((e) => e.type)).toEqual(['tool_call', 'tool_result', 'text_delta', 'done']);
    expect(events[1]).toEqual({
      type: 'tool_result',
      name: 'check_stock_availability',
      call_id: 'call_1',
      result: {
        error: 'INVALID_ARGUMENTS',
        tool: 'check_stock_availability',
        message: "arguments for tool 'check_stock_availability' are not valid JSON",
      },
    });
    expect(stockHandler).not.toHaveBeenCalled();
    expect(stats.get('check_stock_availability')).toBe(1);

    const [secondBody] = mockCreate.mock.calls[1];
    expect(secondBody.messages.slice(-2)).toEqual([
      {
        role: 'assistant',
        content: null,
        tool_calls: [{ id: 'call_1', type: 'function', function: { name: 'check_stock_availability', arguments: '{}' } }],
      },
      {
        role: 'tool',
        tool_call_id: 'call_1',
        content: JSON.stringify({
          error: 'INVALID_ARGUMENTS',
          tool: 'check_stock_availability',
          message: "arguments for tool 'check_stock_availability' are not valid JSON",
        }),
      },
    ]);
  });
});
