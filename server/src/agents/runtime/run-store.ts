/**
 * RunStore: the run-lifecycle table, owned by the process and injected into
 * the coordinator and routes.
 *
 * Bounded by least-recently-updated eviction: every write moves the run to the
 * back of the Map's insertion order, so the front is always the stalest.
 */

import type { RunRecord } from '../types.js';

export class RunStore {
  private readonly runs = new Map<string, RunRecord>();

  constructor(private readonly maxRuns = 1000) {}

  get size(): number {
    return this.runs.size;
  }

  get(runId: string): RunRecord | undefined {
    return this.runs.get(runId);
  }

  has(runId: string): boolean {
    return this.runs.has(runId);
  }

  create(record: RunRecord): RunRecord {
    this.write(record);
    return record;
  }

  /** Apply a patch to an existing run. Returns the updated record, or undefined if it was evicted. */
  update(runId: string, patch: Partial<Omit<RunRecord, 'run_id' | 'created_at'>>): RunRecord | undefined {
    const current = this.runs.get(runId);
    if (!current) return undefined;
    const next: RunRecord = { ...current, ...patch, updated_at: new Date().toISOString() };
    this.write(next);
    return next;
  }

  list(): RunRecord[] {
    return [...this.runs.values()];
  }

  private write(record: RunRecord): void {
    this.runs.delete(record.run_id);
    this.runs.set(record.run_id, record);
    while (this.runs.size > this.maxRuns) {
      const stalest = this.runs.keys().next();
      if (stalest.done) break;
      this.runs.delete(stalest.value);
    }
  }
}
