import type { RunnableFlow } from './runtime/flow-definition.js';
import type { FlowType } from './types.js';
import { monitoringFlow } from './monitoring/flow.js';
import { proposalFlow } from './proposal/flow.js';
import { qualificationFlow } from './qualification/flow.js';

export const flows: Readonly<Record<FlowType, RunnableFlow>> = {
  qualification: qualificationFlow,
  proposal: proposalFlow,
  monitoring: monitoringFlow,
};
