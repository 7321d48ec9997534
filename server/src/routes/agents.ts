import { Hono } from 'hono';
import { streamSSE } from 'hono/streaming';
import { z } from 'zod';
import { FLOW_TYPES } from '../agents/types.js';
import type { ProgressChannel } from '../agents/runtime/progress-channel.js';
import type { RunCoordinator } from '../agents/runtime/run-coordinator.js';
import { validateBody } from '../lib/validate.js';
import logger from '../lib/logger.js';

const runRequestSchema = z.object({
  deal_id: z.string().min(1).max(200),
  flow_type: z.enum(FLOW_TYPES),
  document_id: z.string().min(1).max(200).optional(),
});

const RUN_MESSAGES: Record<(typeof FLOW_TYPES)[number], string> = {
  qualification: 'Qualification started',
  proposal: 'Proposal generation started',
  monitoring: 'Monitoring started',
};

export interface AgentRouteDeps {
  coordinator: RunCoordinator;
  channel: ProgressChannel;
}

export function createAgentRoutes({ coordinator, channel }: AgentRouteDeps): Hono {
  const agents = new Hono();

  agents.post('/run', async (c) => {
    const body: unknown = await c.req.json().catch(() => null);
    const parsed = validateBody(runRequestSchema, body);
    if (!parsed.success) {
      return c.json({ error: 'Invalid request', details: parsed.details }, 400);
    }

    const { deal_id, flow_type, document_id } = parsed.data;
    const runId = coordinator.start(flow_type, deal_id, { document_id });
    logger.info({ runId, dealId: deal_id, flowType: flow_type, requestId: c.get('requestId') }, 'Run queued');

    return c.json({ run_id: runId, status: 'queued', message: RUN_MESSAGES[flow_type] }, 202);
  });

  agents.get('/status/:runId', (c) => {
    const status = coordinator.getStatus(c.req.param('runId'));
    if (!status) {
      return c.json({ error: 'Run not found' }, 404);
    }
    return c.json(status);
  });

  agents.get('/:runId/progress', (c) => {
    const runId = c.req.param('runId');
    if (!coordinator.getStatus(runId) && !channel.last(runId)) {
      return c.json({ error: 'Run not found' }, 404);
    }

    return streamSSE(c, async (stream) => {
      const disconnect = new AbortController();
      stream.onAbort(() => disconnect.abort());

      for await (const event of channel.stream(runId, disconnect.signal)) {
        await stream.writeSSE({ event: 'progress', data: JSON.stringify(event) });
      }
    });
  });

  return agents;
}
