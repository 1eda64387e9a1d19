/**
 * AutoDiag HTTP API server
 *
 * Supports two modes:
 * 1. Standalone: `npm start` (loads config from AUTODIAG_CONFIG or cwd and listens)
 * 2. Embedded: `createApiApp(options)` returns a Fastify instance for the CLI and tests
 */

import Fastify, { type FastifyInstance, type FastifyError } from 'fastify';
import cors from '@fastify/cors';
import {
  AutoDiagConfigSchema,
  AutoDiagError,
  BUILT_IN_KNOWLEDGE_BASE,
  DiagnosisService,
  ScoringEngine,
  createDocumentStore,
  loadConfig,
  loadKnowledgeBase,
  type AutoDiagConfig,
  type DocumentStore,
  type KnowledgeBase,
  type LoadedConfig,
} from 'autodiag-core';
import type { AppState } from './app-state.js';
import { statusRoutes } from './routes/status.js';
import { diagnoseRoutes } from './routes/diagnose.js';
import { historyRoutes } from './routes/history.js';

// =====================================================================
// Factory Options
// =====================================================================

export interface ApiOptions {
  config?: AutoDiagConfig;
  configDir?: string;
  configPath?: string | null;
  /** Overrides `config.knowledge.path` and the built-in tables. */
  knowledge?: KnowledgeBase;
  /** Injected store; the app does not close it. */
  store?: DocumentStore;
}

// =====================================================================
// Factory: createApiApp
// =====================================================================

export async function createApiApp(options?: ApiOptions): Promise<{ app: FastifyInstance; appState: AppState }> {
  const config = options?.config ?? AutoDiagConfigSchema.parse({});
  const configDir = options?.configDir ?? process.cwd();

  const knowledge = options?.knowledge
    ?? (config.knowledge.path ? await loadKnowledgeBase(config.knowledge.path) : BUILT_IN_KNOWLEDGE_BASE);
  const store = options?.store ?? createDocumentStore(config.database, configDir);

  const app = Fastify({ logger: { level: config.server.logLevel } });

  const appState: AppState = {
    config,
    configDir,
    configPath: options?.configPath ?? null,
    knowledge,
    store,
    service: new DiagnosisService(new ScoringEngine(knowledge), store, app.log),
  };

  if (!options?.store) {
    app.addHook('onClose', async () => {
      store.close();
    });
  }

  app.setErrorHandler((err: FastifyError, request, reply) => {
    if (err instanceof AutoDiagError) {
      if (err.category === 'validation') {
        return reply.status(400).send({
          ...err.structuredError.details,
          error: err.message,
          code: err.code,
        });
      }

      if (err.severity === 'fatal') request.log.error(err);
      else request.log.warn(err);
      return reply.status(500).send({
        ...err.structuredError.details,
        error: err.message,
        code: err.code,
        severity: err.severity,
      });
    }

    const statusCode = err.statusCode ?? 500;
    if (statusCode >= 500) request.log.error(err);
    return reply.status(statusCode).send({ error: err.message, code: err.code ?? 'INTERNAL_ERROR' });
  });

  await app.register(cors, {
    origin: config.server.corsOrigin === '*' ? true : config.server.corsOrigin,
    credentials: true,
  });

  await app.register(statusRoutes, { appState });
  await app.register(diagnoseRoutes, { prefix: '/api', appState });
  await app.register(historyRoutes, { prefix: '/api', appState });

  return { app, appState };
}

/** Load configuration, build the app and start listening. */
export async function startApiServer(
  configPath?: string,
  portOverride?: number,
): Promise<{ app: FastifyInstance; loaded: LoadedConfig }> {
  const loaded = await loadConfig(configPath);
  const { app } = await createApiApp(loaded);

  const { host } = loaded.config.server;
  const port = portOverride ?? loaded.config.server.port;
  try {
    await app.listen({ port, host });
  } catch (err) {
    await app.close();
    throw err;
  }
  return { app, loaded };
}

// =====================================================================
// Standalone entrypoint (when run directly)
// =====================================================================

const entryScript = process.argv[1];
const isMainModule = entryScript !== undefined && (
  import.meta.url.endsWith(entryScript.replace(/\\/g, '/')) ||
  entryScript.endsWith('api/server/index.js')
);

if (isMainModule) {
  try {
    const { app } = await startApiServer(process.env['AUTODIAG_CONFIG'] || undefined);
    app.log.info('AutoDiag API ready');
  } catch (err) {
    console.error('Failed to start AutoDiag API:', err);
    process.exit(1);
  }
}

export type { AppState, RouteOptions } from './app-state.js';
