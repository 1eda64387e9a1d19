/**
 * POST /api/diagnose: score a fault report and record it.
 */

import { type FastifyPluginAsync } from 'fastify';
import { AutoDiagError, DiagnoseRequestSchema } from 'autodiag-core';
import type { RouteOptions } from '../app-state.js';

export const diagnoseRoutes: FastifyPluginAsync<RouteOptions> = async (app, { appState }) => {
  app.post('/diagnose', async (request) => {
    const parsed = DiagnoseRequestSchema.safeParse(request.body);
    if (!parsed.success) {
      throw new AutoDiagError('INVALID_REQUEST', 'Invalid diagnose request', {
        issues: parsed.error.issues.map((issue) => ({
          path: issue.path.join('.'),
          message: issue.message,
        })),
      });
    }

    return appState.service.diagnose(parsed.data);
  });
};
