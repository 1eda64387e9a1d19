/**
 * GET /api/history: most recent diagnoses, newest first.
 */

import { type FastifyPluginAsync } from 'fastify';
import { DEFAULT_HISTORY_LIMIT, type DocumentFilter } from 'autodiag-core';
import type { RouteOptions } from '../app-state.js';

export const MAX_HISTORY_LIMIT = 100;

/** Query parameters usable as equality filters on stored records. */
const FILTER_FIELDS = ['name', 'model', 'fault_code'] as const;

type HistoryQuerystring = {
  limit?: string;
} & Partial<Record<(typeof FILTER_FIELDS)[number], string>>;

export function parseLimit(raw: string | undefined): number {
  const n = parseInt(raw || String(DEFAULT_HISTORY_LIMIT), 10);
  if (Number.isNaN(n)) return DEFAULT_HISTORY_LIMIT;
  return Math.min(Math.max(n, 1), MAX_HISTORY_LIMIT);
}

export const historyRoutes: FastifyPluginAsync<RouteOptions> = async (app, { appState }) => {
  app.get<{ Querystring: HistoryQuerystring }>('/history', async (request) => {
    const query = request.query;

    const filter: DocumentFilter = {};
    for (const field of FILTER_FIELDS) {
      const value = query[field];
      if (value !== undefined && value !== '') filter[field] = value;
    }

    return appState.service.history({ limit: parseLimit(query.limit), filter });
  });
};
