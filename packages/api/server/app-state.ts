/**
 * Per-app state handed to every route plugin as options.
 */

import type {
  AutoDiagConfig,
  DiagnosisService,
  DocumentStore,
  KnowledgeBase,
} from 'autodiag-core';

export interface AppState {
  config: AutoDiagConfig;
  configDir: string;
  configPath: string | null;
  knowledge: KnowledgeBase;
  store: DocumentStore;
  service: DiagnosisService;
}

/** Options accepted by the route plugins. */
export interface RouteOptions {
  appState: AppState;
}
