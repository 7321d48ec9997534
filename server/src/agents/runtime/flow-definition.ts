import type { Logger } from '../../lib/logger.js';
import type { FlowSettings } from '../../lib/config.js';
import type {
  AlertNotifier,
  AssignmentStore,
  CommunicationsSource,
  DealRepository,
  ReasoningPort,
  RetrievalPort,
  RosterSource,
  RunResultSink,
} from '../ports.js';
import type { BaseFlowState, FlowType } from '../types.js';
import { StageGraph, type Stage } from './stage-graph.js';

export interface FlowDependencies {
  deals: DealRepository;
  roster: RosterSource;
  assignments: AssignmentStore;
  retrieval: RetrievalPort;
  communications: CommunicationsSource;
  reasoning: ReasoningPort;
  settings: FlowSettings;
  notifier?: AlertNotifier;
  results?: RunResultSink;
}

export interface FlowRequest {
  run_id: string;
  deal_id: string;
  document_id?: string;
}

export interface FlowOutcome {
  message: string;
  summary: Record<string, unknown>;
}

export interface FlowHooks {
  onInputResolved?: () => void;
  onStageComplete?: (stage: string, label: string, index: number) => Promise<void> | void;
}

/**
 * One flow type: how to assemble its initial state, its stages, and what to
 * do with the final state.
 */
export interface FlowDefinition<S extends BaseFlowState> {
  type: FlowType;
  stages: ReadonlyArray<Stage<S>>;
  /** Throws InputResolutionError when the run's prerequisites are missing. */
  resolveInput(request: FlowRequest, deps: FlowDependencies, log: Logger): Promise<S>;
  finalize(state: S, deps: FlowDependencies, log: Logger): Promise<FlowOutcome>;
}

/** A flow with its state type erased, so the registry can hold all three. */
export interface RunnableFlow {
  readonly type: FlowType;
  readonly stageNames: readonly string[];
  run(request: FlowRequest, deps: FlowDependencies, log: Logger, hooks?: FlowHooks): Promise<FlowOutcome>;
}

export function defineFlow<S extends BaseFlowState>(definition: FlowDefinition<S>): RunnableFlow {
  const graph = new StageGraph(definition.stages);

  return {
    type: definition.type,
    stageNames: graph.stages.map((stage) => stage.name),
    async run(request, deps, log, hooks = {}) {
      const initial = await definition.resolveInput(request, deps, log);
      hooks.onInputResolved?.();

      const final = await graph.execute(
        initial,
        {
          runId: request.run_id,
          log,
          reasoning: deps.reasoning,
          retrieval: deps.retrieval,
          settings: deps.settings,
        },
        {
          onStageComplete: (stage, index) => hooks.onStageComplete?.(stage.name, stage.label, index),
        },
      );

      return definition.finalize(final, deps, log);
    },
  };
}
