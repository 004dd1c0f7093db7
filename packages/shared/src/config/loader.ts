import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import yaml from 'js-yaml';
import type { z } from 'zod';
import { HOSTPULSE_CONFIG_FILES } from '../constants.js';
import {
  collectorConfigSchema,
  ingestionConfigSchema,
  type CollectorConfig,
  type IngestionConfig,
} from '../schemas/config.schema.js';
import { formatIssues } from '../schemas/snapshot.schema.js';
import { ConfigLoadError, ConfigValidationError } from '../utils/errors.js';

type RawConfig = Record<string, unknown>;

const ENV_OVERRIDES: ReadonlyArray<[envVar: string, path: string[], numeric?: boolean]> = [
  ['HOSTPULSE_ENDPOINT_URL', ['endpoint', 'url']],
  ['HOSTPULSE_INTERVAL_SECONDS', ['interval_seconds'], true],
  ['HOSTPULSE_STORAGE_BACKEND', ['storage', 'backend']],
  ['HOSTPULSE_SQLITE_PATH', ['storage', 'sqlite', 'path']],
  ['HOSTPULSE_INFLUXDB_URL', ['storage', 'influxdb', 'url']],
  ['HOSTPULSE_INFLUXDB_TOKEN', ['storage', 'influxdb', 'token']],
  ['HOSTPULSE_INFLUXDB_ORG', ['storage', 'influxdb', 'org']],
  ['HOSTPULSE_INFLUXDB_BUCKET', ['storage', 'influxdb', 'bucket']],
  ['HOSTPULSE_PORT', ['server', 'port'], true],
];

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Find the config file: explicit path, then HOSTPULSE_CONFIG, then the
 * default file names in `cwd`.
 */
export function resolveConfigPath(
  explicit?: string,
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd(),
): string {
  const candidate = explicit ?? env.HOSTPULSE_CONFIG;
  if (candidate) {
    const fullPath = resolve(cwd, candidate);
    if (!existsSync(fullPath)) {
      throw new ConfigLoadError(`Configuration file not found: ${fullPath}`);
    }
    return fullPath;
  }

  for (const name of HOSTPULSE_CONFIG_FILES) {
    const fullPath = resolve(cwd, name);
    if (existsSync(fullPath)) return fullPath;
  }

  throw new ConfigLoadError(
    `No configuration file found (looked for ${HOSTPULSE_CONFIG_FILES.join(', ')} in ${cwd})`,
  );
}

/** Read a YAML or JSON config file. An empty file yields `{}`. */
export function readConfigFile(path: string): RawConfig {
  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (err) {
    throw new ConfigLoadError(`Cannot read configuration file ${path}`, err);
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(text);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new ConfigLoadError(`Cannot parse configuration file ${path}: ${detail}`, err);
  }

  if (parsed === undefined || parsed === null) return {};
  if (!isRecord(parsed)) {
    throw new ConfigLoadError(`Configuration file ${path} must contain a mapping at the top level`);
  }
  return parsed;
}

function setPath(target: RawConfig, path: string[], value: unknown): void {
  let node = target;
  for (const segment of path.slice(0, -1)) {
    const next = node[segment];
    if (isRecord(next)) {
      node = next;
    } else {
      const created: RawConfig = {};
      node[segment] = created;
      node = created;
    }
  }
  node[path[path.length - 1]] = value;
}

/** Returns a copy of `raw` with HOSTPULSE_* environment variables applied. */
export function applyEnvOverrides(raw: RawConfig, env: NodeJS.ProcessEnv = process.env): RawConfig {
  const merged: RawConfig = structuredClone(raw);
  for (const [envVar, path, numeric] of ENV_OVERRIDES) {
    const value = env[envVar];
    if (value === undefined || value === '') continue;
    setPath(merged, path, numeric ? Number(value) : value);
  }
  return merged;
}

export function parseConfig<S extends z.ZodTypeAny>(
  schema: S,
  raw: unknown,
  source?: string,
): z.output<S> {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new ConfigValidationError(formatIssues(result.error), source);
  }
  return result.data;
}

export function loadCollectorConfig(
  path?: string,
  env: NodeJS.ProcessEnv = process.env,
): CollectorConfig {
  const file = resolveConfigPath(path, env);
  return parseConfig(collectorConfigSchema, applyEnvOverrides(readConfigFile(file), env), file);
}

export function loadIngestionConfig(
  path?: string,
  env: NodeJS.ProcessEnv = process.env,
): IngestionConfig {
  const file = resolveConfigPath(path, env);
  return parseConfig(ingestionConfigSchema, applyEnvOverrides(readConfigFile(file), env), file);
}
