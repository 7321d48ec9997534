/**
 * RunCoordinator: owns each run's lifecycle (queued → running →
 * completed | failed), drives its flow in the background and relays stage
 * transitions to the ProgressChannel.
 *
 * Event indices strictly increase within a run. Every stage but the last
 * publishes a `processing` event after its merge; the last stage's event is
 * held back until finalization succeeds and goes out as `completed` with
 * stage_index = total_stages. A failure after k stages publishes `failed` at
 * index k + 1 (capped at total_stages), or 0 when inputs never resolved.
 */

import { randomUUID } from 'node:crypto';
import { createRunLogger } from '../../lib/logger.js';
import { captureError } from '../../lib/sentry.js';
import { errorMessage, InputResolutionError, UnknownFlowError } from '../../lib/errors.js';
import { trackUsage, type TokenUsage } from '../../lib/llm-provider.js';
import { FLOW_TYPES, type FlowType, type ProgressEvent, type RunRecord } from '../types.js';
import type { FlowDependencies, FlowRequest, RunnableFlow } from './flow-definition.js';
import type { ProgressChannel } from './progress-channel.js';
import type { RunStore } from './run-store.js';

export interface StartArgs {
  document_id?: string;
}

export interface RunStatusView {
  run_id: string;
  flow_type: FlowType;
  status: RunRecord['status'];
  stage: string | null;
  stage_index: number;
  total_stages: number;
  result_summary?: Record<string, unknown>;
  error?: string;
  token_usage: TokenUsage;
}

export interface RunCoordinatorOptions {
  store: RunStore;
  channel: ProgressChannel;
  flows: Readonly<Record<FlowType, RunnableFlow>>;
  deps: FlowDependencies;
  idFactory?: () => string;
}

function isFlowType(value: string): value is FlowType {
  return FLOW_TYPES.some((type) => type === value);
}

export class RunCoordinator {
  private readonly store: RunStore;
  private readonly channel: ProgressChannel;
  private readonly flows: Readonly<Record<FlowType, RunnableFlow>>;
  private readonly deps: FlowDependencies;
  private readonly idFactory: () => string;
  private readonly inFlight = new Map<string, Promise<void>>();

  constructor(options: RunCoordinatorOptions) {
    this.store = options.store;
    this.channel = options.channel;
    this.flows = options.flows;
    this.deps = options.deps;
    this.idFactory = options.idFactory ?? randomUUID;
  }

  /**
   * Create a queued run and schedule it. Returns the run id immediately.
   * Throws UnknownFlowError synchronously for an unrecognised flow type.
   */
  start(flowType: string, dealId: string, args: StartArgs = {}): string {
    if (!isFlowType(flowType)) {
      throw new UnknownFlowError(flowType);
    }
    const flow = this.flows[flowType];
    const runId = this.idFactory();
    const now = new Date().toISOString();

    this.store.create({
      run_id: runId,
      deal_id: dealId,
      flow_type: flowType,
      status: 'queued',
      stage: null,
      stage_index: 0,
      total_stages: flow.stageNames.length,
      token_usage: { input_tokens: 0, output_tokens: 0 },
      created_at: now,
      updated_at: now,
    });

    const request: FlowRequest = { run_id: runId, deal_id: dealId, document_id: args.document_id };
    const task = Promise.resolve()
      .then(() => this.execute(flow, request))
      .finally(() => {
        this.inFlight.delete(runId);
      });
    this.inFlight.set(runId, task);

    return runId;
  }

  getStatus(runId: string): RunStatusView | undefined {
    const run = this.store.get(runId);
    if (!run) return undefined;
    return {
      run_id: run.run_id,
      flow_type: run.flow_type,
      status: run.status,
      stage: run.stage,
      stage_index: run.stage_index,
      total_stages: run.total_stages,
      token_usage: run.token_usage,
      ...(run.result_summary ? { result_summary: run.result_summary } : {}),
      ...(run.error ? { error: run.error } : {}),
    };
  }

  /** Resolves once the run reaches a terminal status (immediately if it already has, or is unknown). */
  async settle(runId: string): Promise<void> {
    await this.inFlight.get(runId);
  }

  /** Wait for every in-flight run. Used on shutdown. */
  async drain(): Promise<void> {
    await Promise.allSettled([...this.inFlight.values()]);
  }

  get activeRuns(): number {
    return this.inFlight.size;
  }

  private async execute(flow: RunnableFlow, request: FlowRequest): Promise<void> {
    const runId = request.run_id;
    const total = flow.stageNames.length;
    const log = createRunLogger(runId, { flowType: flow.type, dealId: request.deal_id });
    const usage: TokenUsage = { input_tokens: 0, output_tokens: 0 };
    let inputResolved = false;
    let completedStages = 0;

    this.store.update(runId, { status: 'running' });
    log.info({ totalStages: total }, 'Run started');

    try {
      const outcome = await trackUsage(usage, () => flow.run(request, this.deps, log, {
        onInputResolved: () => {
          inputResolved = true;
        },
        onStageComplete: (stage, label, index) => {
          completedStages = index;
          this.store.update(runId, { stage, stage_index: index, token_usage: { ...usage } });
          if (index < total) {
            this.emit({ run_id: runId, stage, stage_index: index, total_stages: total, status: 'processing', message: label });
          }
        },
      }));

      const lastStage = flow.stageNames[total - 1] ?? 'complete';
      this.store.update(runId, {
        status: 'completed',
        stage: lastStage,
        stage_index: total,
        result_summary: outcome.summary,
        token_usage: { ...usage },
      });
      this.emit({
        run_id: runId,
        stage: lastStage,
        stage_index: total,
        total_stages: total,
        status: 'completed',
        message: outcome.message,
        data: outcome.summary,
      });
      log.info({ usage }, 'Run completed');
    } catch (err) {
      const message = errorMessage(err);
      const stageIndex = inputResolved ? Math.min(completedStages + 1, total) : 0;
      const stage = stageIndex === 0 ? 'input' : (flow.stageNames[stageIndex - 1] ?? 'unknown');

      if (err instanceof InputResolutionError) {
        log.warn({ error: message }, 'Run inputs could not be resolved');
      } else {
        log.error({ err, stage }, 'Run failed');
        captureError(err, { runId, flowType: flow.type, dealId: request.deal_id, stage });
      }

      this.store.update(runId, {
        status: 'failed',
        stage,
        stage_index: stageIndex,
        error: message,
        token_usage: { ...usage },
      });
      this.emit({
        run_id: runId,
        stage,
        stage_index: stageIndex,
        total_stages: total,
        status: 'failed',
        message: `Error: ${message}`,
        data: { error: message },
      });
    }
  }

  private emit(event: ProgressEvent): void {
    this.channel.publish(event);
  }
}
