import { readFileSync } from 'node:fs';
import { dirname, isAbsolute, resolve } from 'node:path';
import { parse } from 'yaml';
import { sqlDeskConfigSchema, type SqlDeskConfigParsed } from './schema.js';

const ENV_PLACEHOLDER = /\$\{([A-Z0-9_]+)\}/gi;

/**
 * Replace `${VAR}` placeholders in every string of a parsed YAML document.
 * Throws if a referenced variable is not set.
 */
export function resolveEnvPlaceholders(value: unknown): unknown {
  if (typeof value === 'string') {
    return value.replace(ENV_PLACEHOLDER, (_, name: string) => {
      const resolved = process.env[name];
      if (resolved === undefined) {
        throw new Error(`Environment variable ${name} is not set`);
      }
      return resolved;
    });
  }
  if (Array.isArray(value)) {
    return value.map(resolveEnvPlaceholders);
  }
  if (value !== null && typeof value === 'object') {
    return Object.fromEntries(
      Object.entries(value).map(([k, v]) => [k, resolveEnvPlaceholders(v)]),
    );
  }
  return value;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function readConfigDocument(configPath: string): Record<string, unknown> {
  const doc: unknown = parse(readFileSync(configPath, 'utf-8'));
  if (doc === null || doc === undefined) return {};
  const resolved = resolveEnvPlaceholders(doc);
  if (!isPlainObject(resolved)) {
    throw new Error(`Config file ${configPath} must contain a YAML mapping`);
  }
  return resolved;
}

function mergeDocuments(base: Record<string, unknown>, next: Record<string, unknown>): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(next)) {
    const current = merged[key];
    merged[key] = isPlainObject(current) && isPlainObject(value) ? mergeDocuments(current, value) : value;
  }
  return merged;
}

/**
 * Resolve a relative database path against the directory of the config file
 * that declared it, so the hub works regardless of the process cwd.
 */
function anchorDatabasePath(config: SqlDeskConfigParsed, configDir: string): SqlDeskConfigParsed {
  if (isAbsolute(config.database.path)) return config;
  return { ...config, database: { ...config.database, path: resolve(configDir, config.database.path) } };
}

export function loadConfig(configPath: string): SqlDeskConfigParsed {
  const parsed = sqlDeskConfigSchema.parse(readConfigDocument(configPath));
  return anchorDatabasePath(parsed, dirname(resolve(configPath)));
}

/**
 * Load several config files and deep-merge them in order; later files win.
 * A relative database path is anchored at the directory of the last file.
 */
export function loadConfigFiles(configPaths: string[]): SqlDeskConfigParsed {
  let merged: Record<string, unknown> = {};
  for (const path of configPaths) {
    merged = mergeDocuments(merged, readConfigDocument(path));
  }
  const parsed = sqlDeskConfigSchema.parse(merged);
  if (configPaths.length === 0) return parsed;
  return anchorDatabasePath(parsed, dirname(resolve(configPaths[configPaths.length - 1])));
}
