import { Hono } from 'hono';
import { serve } from '@hono/node-server';
import { fileURLToPath } from 'node:url';
import path from 'node:path';
import { flows } from './agents/flows.js';
import type { FlowDependencies } from './agents/runtime/flow-definition.js';
import { ProgressChannel } from './agents/runtime/progress-channel.js';
import { RunCoordinator } from './agents/runtime/run-coordinator.js';
import { RunStore } from './agents/runtime/run-store.js';
import { requestId } from './middleware/request-id.js';
import { createAgentRoutes } from './routes/agents.js';
import { loadConfig, type ServerConfig } from './lib/config.js';
import { InMemoryDealStore } from './lib/in-memory-deal-store.js';
import { createProvider, createReasoningPort } from './lib/llm.js';
import { loadOrganizationProfile } from './lib/organization-profile.js';
import { SupabaseDealStore } from './lib/supabase-deal-store.js';
import { getSupabaseAdmin, isSupabaseConfigured } from './lib/supabase.js';
import logger from './lib/logger.js';
import { initSentry, captureError, flushSentry } from './lib/sentry.js';

export interface AppContext {
  coordinator: RunCoordinator;
  channel: ProgressChannel;
  store: RunStore;
}

export function createApp({ coordinator, channel, store }: AppContext): Hono {
  const app = new Hono();

  app.use('*', requestId());

  app.get('/health', (c) => {
    c.header('Cache-Control', 'no-store');
    return c.json({
      status: 'ok',
      active_runs: coordinator.activeRuns,
      retained_runs: store.size,
      timestamp: new Date().toISOString(),
    });
  });

  app.route('/api/agents', createAgentRoutes({ coordinator, channel }));

  app.notFound((c) => {
    return c.json({ error: 'Not found' }, 404);
  });

  app.onError((err, c) => {
    captureError(err, { path: c.req.path, method: c.req.method });
    logger.error({ err, path: c.req.path, requestId: c.get('requestId') }, 'Unhandled error');
    return c.json({ error: 'Internal server error' }, 500);
  });

  return app;
}

export function createContext(config: ServerConfig, deps: FlowDependencies): AppContext {
  const store = new RunStore(config.maxRetainedRuns);
  const channel = new ProgressChannel(config.maxRetainedRuns);
  const coordinator = new RunCoordinator({ store, channel, flows, deps });
  return { coordinator, channel, store };
}

async function buildDependencies(config: ServerConfig): Promise<FlowDependencies> {
  const profile = await loadOrganizationProfile(config.orgProfilePath);
  const reasoning = createReasoningPort(createProvider(config.provider));

  if (isSupabaseConfigured()) {
    const db = new SupabaseDealStore(getSupabaseAdmin(), { profile });
    return {
      deals: db,
      roster: db,
      assignments: db,
      retrieval: db,
      communications: db,
      notifier: db,
      results: db,
      reasoning,
      settings: config.flow,
    };
  }

  logger.warn('Supabase not configured, using an empty in-memory deal store');
  const memory = new InMemoryDealStore({ profile });
  return {
    deals: memory,
    roster: memory,
    assignments: memory,
    retrieval: memory,
    communications: memory,
    notifier: memory,
    results: memory,
    reasoning,
    settings: config.flow,
  };
}

export async function startServer(config: ServerConfig = loadConfig()) {
  initSentry();

  const context = createContext(config, await buildDependencies(config));
  const app = createApp(context);
  let shuttingDown = false;

  logger.info({ port: config.port, provider: config.provider }, 'Deal pipeline server starting');
  const server = serve({ fetch: app.fetch, port: config.port });
  logger.info({ port: config.port }, `Server running at http://localhost:${config.port}`);

  function shutdown(signal: string) {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal, activeRuns: context.coordinator.activeRuns }, 'Graceful shutdown initiated');

    // Force exit if in-flight runs don't settle
    setTimeout(() => {
      logger.warn('Forcing exit after shutdown timeout');
      process.exit(1);
    }, 30_000).unref();

    server.close(() => {
      void context.coordinator.drain()
        .then(() => flushSentry(2000))
        .finally(() => {
          logger.info('HTTP server closed');
          process.exit(0);
        });
    });
  }

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('unhandledRejection', (reason) => {
    captureError(reason, { source: 'unhandledRejection' });
    logger.error({ reason }, 'Unhandled promise rejection');
    shutdown('UNHANDLED_REJECTION');
  });
  process.on('uncaughtException', (err) => {
    captureError(err, { source: 'uncaughtException' });
    logger.error({ err }, 'Uncaught exception');
    shutdown('UNCAUGHT_EXCEPTION');
  });

  return server;
}

function isMainModule(): boolean {
  const current = fileURLToPath(import.meta.url);
  const entry = process.argv[1];
  if (!entry) return false;
  return path.resolve(entry) === path.resolve(current);
}

if (isMainModule()) {
  startServer().catch((err: unknown) => {
    logger.fatal({ err }, 'Server failed to start');
    process.exit(1);
  });
}
