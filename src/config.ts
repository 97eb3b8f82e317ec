import fs from 'node:fs';
import path from 'node:path';

import { z } from 'zod';

import type { HarnessConfiguration } from './types.js';

import { DEFAULT_FIELD_SEPARATOR, DEFAULT_TYPE_SEPARATOR } from './dataset/schema.js';
import { ConfigError } from './errors.js';
import { DEFAULT_TEST_DATA_DIR } from './scratch-space.js';

export const CONFIG_FILE_NAME = '.dataset-harness.json';

const LogFormatSchema = z.enum(['logfmt', 'json', 'console', 'none']);

const HarnessConfigSchema = z.object({
  testDataDir: z.string().min(1).default(DEFAULT_TEST_DATA_DIR),
  parallelism: z.number().int().positive().default(2),
  disableLogging: z.boolean().default(false),
  logFormat: LogFormatSchema.default('logfmt'),
  schemaFieldSeparator: z.string().min(1).default(DEFAULT_FIELD_SEPARATOR),
  schemaTypeSeparator: z.string().min(1).default(DEFAULT_TYPE_SEPARATOR),
}).strict();

function expandEnv(str: string, env: NodeJS.ProcessEnv): string {
  return str.replace(/\$\{([^}]+)\}/g, (_m: string, name: string) => (env[name] ?? ''));
}

function expandDeep(obj: unknown, env: NodeJS.ProcessEnv): unknown {
  if (typeof obj === 'string') return expandEnv(obj, env);
  if (Array.isArray(obj)) return obj.map((v) => expandDeep(v, env));
  if (obj !== null && typeof obj === 'object') {
    return Object.entries(obj).reduce<Record<string, unknown>>((acc, [k, v]) => {
      acc[k] = expandDeep(v, env);
      return acc;
    }, {});
  }
  return obj;
}

function resolveConfigPath(configPath: string | undefined, cwd: string): string | undefined {
  if (typeof configPath === 'string' && configPath.length > 0) {
    if (!fs.existsSync(configPath)) throw new ConfigError(`Configuration file not found: ${configPath}`);
    return configPath;
  }
  const local = path.join(cwd, CONFIG_FILE_NAME);
  return fs.existsSync(local) ? local : undefined;
}

function readConfigJson(resolved: string): unknown {
  let raw: string;
  try {
    raw = fs.readFileSync(resolved, 'utf-8');
  } catch (e) {
    throw new ConfigError(`Failed to read configuration file ${resolved}: ${e instanceof Error ? e.message : String(e)}`);
  }
  try {
    return JSON.parse(raw);
  } catch (e) {
    throw new ConfigError(`Invalid JSON in configuration file ${resolved}: ${e instanceof Error ? e.message : String(e)}`);
  }
}

function applyEnvOverrides(json: Record<string, unknown>, env: NodeJS.ProcessEnv): Record<string, unknown> {
  const out = { ...json };
  const format = env.HARNESS_LOG_FORMAT;
  if (typeof format === 'string' && format.length > 0) out.logFormat = format;
  const dataDir = env.HARNESS_TEST_DATA_DIR;
  if (typeof dataDir === 'string' && dataDir.length > 0) out.testDataDir = dataDir;
  return out;
}

export interface LoadHarnessConfigOptions {
  configPath?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Reads `.dataset-harness.json` (or an explicit file), expands `${VAR}` references
 * and validates it. A missing default file yields the defaults.
 */
export function loadHarnessConfig(options: LoadHarnessConfigOptions = {}): HarnessConfiguration {
  const env = options.env ?? process.env;
  const resolved = resolveConfigPath(options.configPath, options.cwd ?? process.cwd());
  const json = resolved !== undefined ? expandDeep(readConfigJson(resolved), env) : {};
  if (json === null || typeof json !== 'object' || Array.isArray(json)) {
    throw new ConfigError(`Configuration in ${resolved ?? CONFIG_FILE_NAME} must be a JSON object`);
  }
  const parsed = HarnessConfigSchema.safeParse(applyEnvOverrides({ ...json }, env));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
    throw new ConfigError(`Invalid harness configuration: ${issues.join('; ')}`);
  }
  return parsed.data;
}
