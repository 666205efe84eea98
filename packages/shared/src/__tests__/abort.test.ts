import { describe, it, expect, vi, afterEach } from 'vitest';
import { deadline, raceAbort } from '../abort.js';

afterEach(() => {
  vi.useRealTimers();
});

describe('deadline()', () => {
  it('aborts once the time is up and marks itself expired', () => {
    vi.useFakeTimers();
    const d = deadline(1_000);

    vi.advanceTimersByTime(999);
    expect(d.signal.aborted).toBe(false);

    vi.advanceTimersByTime(1);
    expect(d.signal.aborted).toBe(true);
    expect(d.expired).toBe(true);
    expect(d.signal.reason).toEqual(new Error('deadline of 1000ms exceeded'));
  });

  it('follows a linked signal without counting as expired', () => {
    vi.useFakeTimers();
    const parent = new AbortController();
    const d = deadline(1_000, undefined, parent.signal);

    parent.abort(new Error('client went away'));

    expect(d.signal.aborted).toBe(true);
    expect(d.expired).toBe(false);
    expect(d.signal.reason).toEqual(new Error('client went away'));
    d.clear();
  });

  it('starts aborted when a linked signal already is', () => {
    const parent = new AbortController();
    parent.abort();
    const d = deadline(1_000, parent.signal);

    expect(d.signal.aborted).toBe(true);
    d.clear();
  });

  it('clear() cancels the timer', () => {
    vi.useFakeTimers();
    const d = deadline(100);
    d.clear();

    vi.advanceTimersByTime(500);
    expect(d.signal.aborted).toBe(false);
  });
});

describe('raceAbort()', () => {
  it('resolves with the promise when it settles first', async () => {
    const controller = new AbortController();
    await expect(raceAbort(Promise.resolve('value'), controller.signal)).resolves.toBe('value');
  });

  it('rejects with the abort reason when the signal fires first', async () => {
    const controller = new AbortController();
    const never = new Promise<string>(() => undefined);
    const raced = raceAbort(never, controller.signal);

    controller.abort(new Error('stop'));

    await expect(raced).rejects.toThrow('stop');
  });

  it('rejects immediately on an already aborted signal', async () => {
    const controller = new AbortController();
    controller.abort(new Error('already'));

    await expect(raceAbort(Promise.resolve(1), controller.signal)).rejects.toThrow('already');
  });

  it('passes through rejections of the promise', async () => {
    const controller = new AbortController();
    await expect(raceAbort(Promise.reject(new Error('inner')), controller.signal)).rejects.toThrow('inner');
  });
});
