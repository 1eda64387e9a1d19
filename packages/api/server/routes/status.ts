/**
 * Service liveness (`GET /`) and database status report (`GET /test`).
 */

import { type FastifyPluginAsync } from 'fastify';
import { errorMessage } from 'autodiag-core';
import type { RouteOptions } from '../app-state.js';

/** Maximum number of collection names listed by the status report. */
export const STATUS_COLLECTION_LIMIT = 10;

export interface StatusReport {
  backend: string;
  database: string;
  database_url: string;
  database_name: string;
  connection_status: string;
  collections: string[];
}

export const statusRoutes: FastifyPluginAsync<RouteOptions> = async (app, { appState }) => {
  app.get('/', async () => ({ message: 'AutoDiag backend running' }));

  app.get('/test', async (): Promise<StatusReport> => {
    const { config, store } = appState;

    const report: StatusReport = {
      backend: 'Running',
      database: 'Not Available',
      database_url: config.database.path ? 'Set' : 'Not Set',
      database_name: config.database.name ? 'Set' : 'Not Set',
      connection_status: 'Not Connected',
      collections: [],
    };

    try {
      const status = store.describe();
      if (status.connected) {
        report.database = 'Connected & Working';
        report.connection_status = 'Connected';
        report.collections = status.collections.slice(0, STATUS_COLLECTION_LIMIT);
      }
    } catch (err) {
      report.database = `Connected but Error: ${errorMessage(err).slice(0, 50)}`;
      report.connection_status = 'Connected';
    }

    return report;
  });
};
