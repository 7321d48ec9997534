/**
 * ProgressChannel: in-memory fan-out of run progress events.
 *
 * Keyed by run id. Every publish also updates a retained last-event cache so
 * a subscriber joining mid-run (or after it ended) sees the latest state at
 * once. Listeners that throw or report themselves closed are pruned on the
 * next publish; the publisher never waits on them.
 */

import type { ProgressEvent } from '../types.js';
import logger from '../../lib/logger.js';

export interface ProgressListener {
  (event: ProgressEvent): void;
  /** When present and true, the listener is pruned instead of called. */
  closed?: () => boolean;
}

export function isTerminal(event: ProgressEvent): boolean {
  return event.status === 'completed' || event.status === 'failed';
}

export class ProgressChannel {
  private readonly listeners = new Map<string, Set<ProgressListener>>();
  private readonly lastEvents = new Map<string, ProgressEvent>();

  constructor(private readonly maxRetained = 1000) {}

  publish(event: ProgressEvent): void {
    this.retain(event);

    const listeners = this.listeners.get(event.run_id);
    if (!listeners) return;

    for (const listener of [...listeners]) {
      if (listener.closed?.()) {
        listeners.delete(listener);
        continue;
      }
      try {
        listener(event);
      } catch (err) {
        logger.warn({ err, runId: event.run_id }, 'ProgressChannel: listener failed, pruning');
        listeners.delete(listener);
      }
    }

    if (listeners.size === 0 || isTerminal(event)) {
      this.listeners.delete(event.run_id);
    }
  }

  /** Register a listener. Returns the unsubscribe function. */
  subscribe(runId: string, listener: ProgressListener): () => void {
    let listeners = this.listeners.get(runId);
    if (!listeners) {
      listeners = new Set();
      this.listeners.set(runId, listeners);
    }
    listeners.add(listener);

    return () => {
      const current = this.listeners.get(runId);
      if (!current) return;
      current.delete(listener);
      if (current.size === 0) this.listeners.delete(runId);
    };
  }

  last(runId: string): ProgressEvent | undefined {
    return this.lastEvents.get(runId);
  }

  subscriberCount(runId: string): number {
    return this.listeners.get(runId)?.size ?? 0;
  }

  /**
   * Async stream of a run's events: the retained event first (if any), then
   * live events, ending after the first terminal event or when `signal`
   * aborts.
   */
  async *stream(runId: string, signal?: AbortSignal): AsyncGenerator<ProgressEvent, void, undefined> {
    if (signal?.aborted) return;
    const queue: ProgressEvent[] = [];
    let wake: (() => void) | null = null;

    const retained = this.lastEvents.get(runId);
    if (retained && isTerminal(retained)) {
      yield retained;
      return;
    }

    // Subscribe before the first yield so nothing published while the
    // consumer is paused is lost.
    const unsubscribe = this.subscribe(runId, (event) => {
      queue.push(event);
      wake?.();
    });
    const onAbort = () => wake?.();
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      if (retained) yield retained;
      while (!signal?.aborted) {
        const next = queue.shift();
        if (!next) {
          await new Promise<void>((resolve) => { wake = resolve; });
          wake = null;
          continue;
        }
        yield next;
        if (isTerminal(next)) return;
      }
    } finally {
      signal?.removeEventListener('abort', onAbort);
      unsubscribe();
    }
  }

  private retain(event: ProgressEvent): void {
    this.lastEvents.delete(event.run_id);
    this.lastEvents.set(event.run_id, event);
    while (this.lastEvents.size > this.maxRetained) {
      const stalest = this.lastEvents.keys().next();
      if (stalest.done) break;
      this.lastEvents.delete(stalest.value);
    }
  }
}
