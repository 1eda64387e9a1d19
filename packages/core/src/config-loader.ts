/**
 * @module config-loader
 * Configuration loader for AutoDiag.
 *
 * Loads an optional `autodiag.yaml`, merges variables from a `.env` file
 * beside it and the process environment, and validates the result with Zod.
 */

import { z } from 'zod';
import yaml from 'js-yaml';
import fs from 'node:fs/promises';
import path from 'node:path';
import dotenv from 'dotenv';
import { AutoDiagError, errorMessage } from './errors.js';

// =====================================================================
// Zod Sub-Schemas
// =====================================================================

/** HTTP server configuration schema */
export const ServerSchema = z.object({
  host: z.string().default('0.0.0.0').describe('Interface the HTTP server binds to'),
  port: z.number().int().min(0).max(65535).default(8000).describe('HTTP port'),
  logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info').describe('Server log level'),
  corsOrigin: z.string().default('*').describe('Allowed CORS origin ("*" allows all)'),
}).default({}).describe('HTTP server configuration');

/** Database configuration schema */
export const DatabaseSchema = z.object({
  storage: z.enum(['sqlite', 'memory', 'none']).default('none').describe('Storage backend; "none" disables persistence'),
  path: z.string().optional().describe('SQLite database file (relative to the config file directory)'),
  name: z.string().optional().describe('Database name reported by the status endpoint'),
}).default({}).describe('Diagnosis record persistence');

/** Knowledge base configuration schema */
export const KnowledgeSchema = z.object({
  path: z.string().optional().describe('YAML/JSON knowledge base replacing the built-in tables'),
}).default({}).describe('Knowledge base source');

// =====================================================================
// Complete Configuration Schema
// =====================================================================

export const AutoDiagConfigSchema = z.object({
  version: z.string().default('1').describe('Configuration schema version'),
  server: ServerSchema,
  database: DatabaseSchema,
  knowledge: KnowledgeSchema,
}).describe('AutoDiag service configuration');

export type AutoDiagConfig = z.infer<typeof AutoDiagConfigSchema>;

/** Validated configuration together with where it was loaded from. */
export interface LoadedConfig {
  config: AutoDiagConfig;
  /** Directory relative paths resolve against (cwd when no file was found). */
  configDir: string;
  configPath: string | null;
}

export const CONFIG_FILE_NAMES = ['autodiag.yaml', 'autodiag.yml'] as const;

// =====================================================================
// Config Loader
// =====================================================================

/**
 * Load and validate the service configuration.
 *
 * Steps:
 * 1. Resolve the config file (explicit path, else `autodiag.yaml`/`.yml` in cwd, else none)
 * 2. Parse YAML
 * 3. Merge `.env` from the config directory under the given environment
 * 4. Apply environment overrides (PORT, HOST, LOG_LEVEL, DATABASE_URL, DATABASE_NAME, AUTODIAG_KNOWLEDGE_BASE)
 * 5. Validate with Zod and resolve relative paths
 *
 * @throws {AutoDiagError} CONFIG_INVALID if the explicit file is missing, YAML is malformed or validation fails
 */
export async function loadConfig(
  configPath?: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<LoadedConfig> {
  const resolvedPath = await resolveConfigPath(configPath);
  const configDir = resolvedPath ? path.dirname(resolvedPath) : process.cwd();

  const raw = resolvedPath ? await readConfigFile(resolvedPath) : {};
  const vars = { ...(await readDotenv(configDir)), ...env };
  const merged = applyEnvOverrides(raw, vars);

  const result = AutoDiagConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new AutoDiagError('CONFIG_INVALID', `Configuration validation failed:\n${issues}`, {
      configPath: resolvedPath,
    });
  }

  const config = result.data;
  if (config.database.path && config.database.path !== ':memory:') {
    config.database.path = path.resolve(configDir, config.database.path);
  }
  if (config.knowledge.path) {
    config.knowledge.path = path.resolve(configDir, config.knowledge.path);
  }

  return { config, configDir, configPath: resolvedPath };
}

// =====================================================================
// Internal Helpers
// =====================================================================

/**
 * Resolve the configuration file path.
 * An explicit path must exist; otherwise a missing default file means "no file".
 */
async function resolveConfigPath(configPath?: string): Promise<string | null> {
  if (configPath) {
    const explicit = path.resolve(configPath);
    try {
      await fs.access(explicit);
    } catch {
      throw new AutoDiagError('CONFIG_INVALID', `Configuration file not found: ${explicit}`, { configPath: explicit });
    }
    return explicit;
  }

  for (const name of CONFIG_FILE_NAMES) {
    const candidate = path.resolve(process.cwd(), name);
    try {
      await fs.access(candidate);
      return candidate;
    } catch {
      // Try the next name
    }
  }
  return null;
}

async function readConfigFile(resolvedPath: string): Promise<Record<string, unknown>> {
  const rawContent = await fs.readFile(resolvedPath, 'utf-8');

  let parsed: unknown;
  try {
    parsed = yaml.load(rawContent);
  } catch (err) {
    throw new AutoDiagError('CONFIG_INVALID', `YAML syntax error in ${resolvedPath}: ${errorMessage(err)}`, {
      configPath: resolvedPath,
    });
  }

  // An empty file is a valid "all defaults" config
  if (parsed === null || parsed === undefined) return {};
  if (!isRecord(parsed)) {
    throw new AutoDiagError('CONFIG_INVALID', `Configuration file is not a valid object: ${resolvedPath}`, {
      configPath: resolvedPath,
    });
  }
  return parsed;
}

async function readDotenv(configDir: string): Promise<Record<string, string>> {
  try {
    return dotenv.parse(await fs.readFile(path.resolve(configDir, '.env'), 'utf-8'));
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') return {};
    throw err;
  }
}

function applyEnvOverrides(
  raw: Record<string, unknown>,
  env: NodeJS.ProcessEnv,
): Record<string, unknown> {
  const server = isRecord(raw['server']) ? { ...raw['server'] } : {};
  const database = isRecord(raw['database']) ? { ...raw['database'] } : {};
  const knowledge = isRecord(raw['knowledge']) ? { ...raw['knowledge'] } : {};

  if (env['PORT']) server['port'] = Number(env['PORT']);
  if (env['HOST']) server['host'] = env['HOST'];
  if (env['LOG_LEVEL']) server['logLevel'] = env['LOG_LEVEL'];
  if (env['DATABASE_URL']) {
    database['storage'] = 'sqlite';
    database['path'] = env['DATABASE_URL'];
  }
  if (env['DATABASE_NAME']) database['name'] = env['DATABASE_NAME'];
  if (env['AUTODIAG_KNOWLEDGE_BASE']) knowledge['path'] = env['AUTODIAG_KNOWLEDGE_BASE'];

  return { ...raw, server, database, knowledge };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}
