/**
 * Configuration loading
 * JSON file + env overrides, validated against ConfigSchema.
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { fileURLToPath } from 'url';

import { ConfigSchema, type Config } from './types.js';
import { ConfigurationError } from './errors.js';

export const DEFAULT_CONFIG_PATH = fileURLToPath(new URL('../../config/default.json', import.meta.url));

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate a raw config object. Cross-field rules that the schema cannot
 * express (references between sections) are checked here as well.
 */
export function parseConfig(raw: unknown): Config {
  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.') || '<root>'}: ${i.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, { issues });
  }
  const config = parsed.data;

  if (config.domains.length === 0) {
    throw new ConfigurationError('No domains registered');
  }

  const seen = new Set<string>();
  for (const domain of config.domains) {
    if (seen.has(domain.id)) {
      throw new ConfigurationError(`Duplicate domain id "${domain.id}"`);
    }
    seen.add(domain.id);
  }

  const { highConfidenceThreshold, mediumConfidenceThreshold, manualReviewDomainId } = config.router;
  if (mediumConfidenceThreshold > highConfidenceThreshold) {
    throw new ConfigurationError(
      `router.mediumConfidenceThreshold (${mediumConfidenceThreshold}) exceeds highConfidenceThreshold (${highConfidenceThreshold})`
    );
  }
  if (manualReviewDomainId && !seen.has(manualReviewDomainId)) {
    throw new ConfigurationError(`router.manualReviewDomainId "${manualReviewDomainId}" is not a registered domain`);
  }

  const { fallbackDomainId } = config.consolidation;
  if (fallbackDomainId && !seen.has(fallbackDomainId)) {
    throw new ConfigurationError(`consolidation.fallbackDomainId "${fallbackDomainId}" is not a registered domain`);
  }

  return config;
}

/**
 * Load configuration from disk.
 * Path precedence: explicit argument, KNOWLEDGE_ROUTER_CONFIG, shipped default.
 */
export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): Config {
  const file = configPath ?? env.KNOWLEDGE_ROUTER_CONFIG ?? DEFAULT_CONFIG_PATH;
  if (!fs.existsSync(file)) {
    throw new ConfigurationError(`Config file not found: ${file}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, 'utf8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Config file ${file} is not valid JSON: ${reason}`);
  }
  if (!isRecord(raw)) {
    throw new ConfigurationError(`Config file ${file} must contain a JSON object`);
  }

  const storage = isRecord(raw.storage) ? { ...raw.storage } : {};
  if (env.KNOWLEDGE_ROUTER_STORAGE) {
    storage.path = env.KNOWLEDGE_ROUTER_STORAGE;
  }
  const server = isRecord(raw.server) ? { ...raw.server } : {};
  if (env.PORT) {
    server.port = parseInt(env.PORT, 10);
  }

  return parseConfig({ ...raw, storage, server });
}

/**
 * Resolve the SQLite file for a config, expanding "~"
 */
export function resolveDatabasePath(config: Config): string {
  if (config.storage.path === ':memory:') return ':memory:';
  const base = config.storage.path.startsWith('~')
    ? path.join(os.homedir(), config.storage.path.slice(1))
    : config.storage.path;
  return path.join(path.resolve(base), config.storage.dbFile);
}
