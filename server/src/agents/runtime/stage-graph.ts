/**
 * StageGraph: a fixed, ordered, non-branching list of stages executed against
 * one state bag.
 *
 * Merge rules after every stage:
 * - only keys listed in the stage's `writes` are applied; any other key is
 *   dropped and an entry is appended to `errors`
 * - `errors` from the update is appended, never replaces
 * - `current_stage` is always set to the stage name
 *
 * The host callback is awaited after each merge, so the next stage never
 * starts before the host has observed the previous one.
 */

import type { Logger } from '../../lib/logger.js';
import type { FlowSettings } from '../../lib/config.js';
import type { ReasoningPort, RetrievalPort } from '../ports.js';
import type { BaseFlowState } from '../types.js';

export interface StageContext {
  runId: string;
  log: Logger;
  reasoning: ReasoningPort;
  retrieval: RetrievalPort;
  settings: FlowSettings;
}

export interface Stage<S extends BaseFlowState> {
  name: string;
  /** Progress message shown to observers while this stage is current. */
  label: string;
  writes: ReadonlyArray<keyof S>;
  run(state: Readonly<S>, ctx: StageContext): Promise<Partial<S>>;
}

export interface ExecuteOptions<S extends BaseFlowState> {
  onStageComplete?: (stage: Stage<S>, index: number, state: Readonly<S>) => Promise<void> | void;
}

export class StageGraph<S extends BaseFlowState> {
  constructor(readonly stages: ReadonlyArray<Stage<S>>) {
    const names = new Set<string>();
    for (const stage of stages) {
      if (names.has(stage.name)) {
        throw new Error(`Duplicate stage name: ${stage.name}`);
      }
      names.add(stage.name);
    }
  }

  get size(): number {
    return this.stages.length;
  }

  merge(state: S, stage: Stage<S>, update: Partial<S>): S {
    const owned = new Set<PropertyKey>(stage.writes);
    const accepted: Partial<S> = { ...update };
    const errors = [...state.errors];

    for (const key of Object.keys(accepted)) {
      if (key === 'errors' || key === 'current_stage') {
        Reflect.deleteProperty(accepted, key);
      } else if (!owned.has(key)) {
        Reflect.deleteProperty(accepted, key);
        errors.push(`Stage "${stage.name}" attempted to write unowned key "${key}"; ignored`);
      } else if (Reflect.get(accepted, key) === undefined) {
        Reflect.deleteProperty(accepted, key);
      }
    }

    if (update.errors) {
      errors.push(...update.errors);
    }
    return { ...state, ...accepted, errors, current_stage: stage.name };
  }

  async execute(initial: S, ctx: StageContext, options: ExecuteOptions<S> = {}): Promise<S> {
    let state = initial;
    for (const [offset, stage] of this.stages.entries()) {
      const index = offset + 1;
      ctx.log.debug({ stage: stage.name, index }, 'Stage starting');
      const update = await stage.run(state, ctx);
      state = this.merge(state, stage, update);
      ctx.log.info({ stage: stage.name, index, errors: state.errors.length }, 'Stage complete');
      await options.onStageComplete?.(stage, index, state);
    }
    return state;
  }
}
