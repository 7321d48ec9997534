import { describe, it, expect, vi } from 'vitest';
import { ProgressChannel, isTerminal } from '../agents/runtime/progress-channel.js';
import type { ProgressEvent, ProgressStatus } from '../agents/types.js';

function event(runId: string, index: number, status: ProgressStatus = 'processing'): ProgressEvent {
  return {
    run_id: runId,
    stage: `stage-${index}`,
    stage_index: index,
    total_stages: 3,
    status,
    message: `step ${index}`,
  };
}

describe('ProgressChannel', () => {
  it('delivers events only to listeners of the same run', () => {
    const channel = new ProgressChannel();
    const a = vi.fn();
    const b = vi.fn();
    channel.subscribe('run-a', a);
    channel.subscribe('run-b', b);

    channel.publish(event('run-a', 1));

    expect(a).toHaveBeenCalledWith(event('run-a', 1));
    expect(b).not.toHaveBeenCalled();
  });

  it('retains the latest event per run', () => {
    const channel = new ProgressChannel();

    channel.publish(event('run-a', 1));
    channel.publish(event('run-a', 2));

    expect(channel.last('run-a')?.stage_index).toBe(2);
    expect(channel.last('run-missing')).toBeUndefined();
  });

  it('evicts the stalest retained run beyond the limit', () => {
    const channel = new ProgressChannel(2);

    channel.publish(event('run-a', 1));
    channel.publish(event('run-b', 1));
    channel.publish(event('run-a', 2));
    channel.publish(event('run-c', 1));

    expect(channel.last('run-b')).toBeUndefined();
    expect(channel.last('run-a')?.stage_index).toBe(2);
    expect(channel.last('run-c')?.stage_index).toBe(1);
  });

  it('prunes a listener that throws and keeps publishing to the rest', () => {
    const channel = new ProgressChannel();
    const healthy = vi.fn();
    channel.subscribe('run-a', () => {
      throw new Error('listener broke');
    });
    channel.subscribe('run-a', healthy);

    channel.publish(event('run-a', 1));
    channel.publish(event('run-a', 2));

    expect(healthy).toHaveBeenCalledTimes(2);
    expect(channel.subscriberCount('run-a')).toBe(1);
  });

  it('prunes a listener that reports itself closed', () => {
    const channel = new ProgressChannel();
    const listener = Object.assign(vi.fn(), { closed: () => true });
    channel.subscribe('run-a', listener);

    channel.publish(event('run-a', 1));

    expect(listener).not.toHaveBeenCalled();
    expect(channel.subscriberCount('run-a')).toBe(0);
  });

  it('drops all listeners after a terminal event', () => {
    const channel = new ProgressChannel();
    channel.subscribe('run-a', vi.fn());

    channel.publish(event('run-a', 3, 'completed'));

    expect(channel.subscriberCount('run-a')).toBe(0);
  });

  it('unsubscribes cleanly', () => {
    const channel = new ProgressChannel();
    const listener = vi.fn();
    const unsubscribe = channel.subscribe('run-a', listener);

    unsubscribe();
    channel.publish(event('run-a', 1));

    expect(listener).not.toHaveBeenCalled();
    expect(channel.subscriberCount('run-a')).toBe(0);
  });

  it('classifies terminal statuses', () => {
    expect(isTerminal(event('r', 1, 'processing'))).toBe(false);
    expect(isTerminal(event('r', 3, 'completed'))).toBe(true);
    expect(isTerminal(event('r', 2, 'failed'))).toBe(true);
  });
});

describe('ProgressChannel.stream', () => {
  it('yields the retained event, then live events, and ends at the terminal one', async () => {
    const channel = new ProgressChannel();
    channel.publish(event('run-a', 1));

    const stream = channel.stream('run-a');
    const first = await stream.next();
    expect(first.value).toEqual(event('run-a', 1));
    expect(channel.subscriberCount('run-a')).toBe(1);

    channel.publish(event('run-a', 2));
    channel.publish(event('run-a', 3, 'completed'));

    const rest: ProgressEvent[] = [];
    for await (const next of stream) rest.push(next);

    expect(rest.map((e) => [e.stage_index, e.status])).toEqual([[2, 'processing'], [3, 'completed']]);
    expect(channel.subscriberCount('run-a')).toBe(0);
  });

  it('replays only the terminal event for a finished run', async () => {
    const channel = new ProgressChannel();
    channel.publish(event('run-a', 2, 'failed'));

    const seen: ProgressEvent[] = [];
    for await (const next of channel.stream('run-a')) seen.push(next);

    expect(seen).toEqual([event('run-a', 2, 'failed')]);
    expect(channel.subscriberCount('run-a')).toBe(0);
  });

  it('waits for the first event when nothing is retained', async () => {
    const channel = new ProgressChannel();
    const stream = channel.stream('run-a');
    const pending = stream.next();

    await Promise.resolve();
    channel.publish(event('run-a', 3, 'completed'));

    const result = await pending;
    expect(result.value).toEqual(event('run-a', 3, 'completed'));
    expect((await stream.next()).done).toBe(true);
  });

  it('ends and unsubscribes when its signal aborts while waiting', async () => {
    const channel = new ProgressChannel();
    const disconnect = new AbortController();
    const stream = channel.stream('run-a', disconnect.signal);
    const pending = stream.next();
    expect(channel.subscriberCount('run-a')).toBe(1);

    disconnect.abort();

    expect((await pending).done).toBe(true);
    expect(channel.subscriberCount('run-a')).toBe(0);
  });

  it('yields nothing for an already aborted signal', async () => {
    const channel = new ProgressChannel();
    channel.publish(event('run-a', 1));
    const disconnect = new AbortController();
    disconnect.abort();

    const seen: ProgressEvent[] = [];
    for await (const next of channel.stream('run-a', disconnect.signal)) seen.push(next);

    expect(seen).toEqual([]);
    expect(channel.subscriberCount('run-a')).toBe(0);
  });

  it('unsubscribes when the consumer stops early', async () => {
    const channel = new ProgressChannel();
    channel.publish(event('run-a', 1));

    const stream = channel.stream('run-a');
    await stream.next();
    await stream.return(undefined);

    expect(channel.subscriberCount('run-a')).toBe(0);
  });
});
