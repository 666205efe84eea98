import { describe, it, expect, vi } from 'vitest';
import { CircuitBreaker, CircuitBreakerOpenError } from '../circuit-breaker.js';
import { CompletionError } from '../errors.js';

function clock(start = 1_000) {
  let t = start;
  return {
    now: () => t,
    advance: (ms: number) => {
      t += ms;
    },
  };
}

async function* items(values: number[], failAfter?: number): AsyncGenerator<number> {
  for (const [i, value] of values.entries()) {
    if (i === failAfter) throw new Error('stream broke');
    yield value;
  }
}

const broken = () => items([1], 0);

async function drain(breaker: CircuitBreaker, source: () => AsyncIterable<number>): Promise<number[]> {
  const seen: number[] = [];
  for await (const n of breaker.stream(source)) seen.push(n);
  return seen;
}

describe('CircuitBreaker', () => {
  it('passes items through and records success at the end', async () => {
    const breaker = new CircuitBreaker({ name: 'test', failureThreshold: 1 });

    expect(await drain(breaker, () => items([1, 2, 3]))).toEqual([1, 2, 3]);
    expect(breaker.currentState).toBe('closed');
  });

  it('counts a mid-stream throw as a failure', async () => {
    const breaker = new CircuitBreaker({ name: 'test', failureThreshold: 1 });
    const seen: number[] = [];

    await expect(
      (async () => {
        for await (const n of breaker.stream(() => items([1, 2, 3], 2))) seen.push(n);
      })(),
    ).rejects.toThrow('stream broke');

    expect(seen).toEqual([1, 2]);
    expect(breaker.currentState).toBe('open');
  });

  it('opens after the failure threshold and fails fast without starting the source', async () => {
    const breaker = new CircuitBreaker({ name: 'test', failureThreshold: 2 });
    const source = vi.fn(broken);

    await expect(drain(breaker, source)).rejects.toThrow('stream broke');
    await expect(drain(breaker, source)).rejects.toThrow('stream broke');
    expect(breaker.currentState).toBe('open');

    await expect(breaker.stream(source).next()).rejects.toBeInstanceOf(CircuitBreakerOpenError);
    expect(source).toHaveBeenCalledTimes(2);
  });

  it('reports the open state as a completion error', () => {
    const err = new CircuitBreakerOpenError('completion-openai');
    expect(err).toBeInstanceOf(CompletionError);
    expect(err.message).toBe("circuit breaker 'completion-openai' is open");
  });

  it('a success resets the consecutive failure count', async () => {
    const breaker = new CircuitBreaker({ name: 'test', failureThreshold: 2 });

    await expect(drain(breaker, broken)).rejects.toThrow();
    await drain(breaker, () => items([1]));
    await expect(drain(breaker, broken)).rejects.toThrow();

    expect(breaker.currentState).toBe('closed');
  });

  it('records nothing when the consumer stops early', async () => {
    const breaker = new CircuitBreaker({ name: 'test', failureThreshold: 1 });

    for await (const n of breaker.stream(() => items([1, 2, 3]))) {
      if (n === 1) break;
    }

    expect(breaker.currentState).toBe('closed');
  });

  it('half-opens after the reset timeout and closes on success', async () => {
    const c = clock();
    const changes: string[] = [];
    const breaker = new CircuitBreaker({
      name: 'test',
      failureThreshold: 1,
      resetTimeoutMs: 500,
      now: c.now,
      onStateChange: (from, to) => changes.push(`${from}->${to}`),
    });

    await expect(drain(breaker, broken)).rejects.toThrow();
    c.advance(499);
    await expect(drain(breaker, broken)).rejects.toBeInstanceOf(CircuitBreakerOpenError);

    c.advance(1);
    expect(await drain(breaker, () => items([42]))).toEqual([42]);
    expect(changes).toEqual(['closed->open', 'open->half-open', 'half-open->closed']);
  });

  it('reopens when the half-open attempt fails', async () => {
    const c = clock();
    const breaker = new CircuitBreaker({ name: 'test', failureThreshold: 1, resetTimeoutMs: 100, now: c.now });

    await expect(drain(breaker, broken)).rejects.toThrow();
    c.advance(100);
    await expect(drain(breaker, broken)).rejects.toThrow('stream broke');

    expect(breaker.currentState).toBe('open');
  });
});
