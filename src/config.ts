import fs from 'node:fs';
import path from 'node:path';

import yaml from 'js-yaml';
import { z } from 'zod';

import { ConfigurationError } from './errors.js';

const constituentName = z.string().regex(/^[A-Za-z0-9]+$/, 'constituent names are alphanumeric');

export const pipelineConfigSchema = z.object({
  files: z
    .object({
      mesh: z.string().min(1).default('hgrid.gr3'),
      mask: z.string().min(1).default('include.gr3')
    })
    .default({}),
  inclusionThreshold: z.number().default(0.1),
  constituents: z.array(constituentName).min(1).default(['M2', 'K1']),
  sentinel: z.number().default(-9999),
  polling: z
    .object({
      intervalMs: z.number().int().min(1).default(10_000),
      maxWaitMs: z.number().int().min(1).default(48 * 60 * 60 * 1000),
      completionMarker: z.string().min(1).default('Done ha_sub')
    })
    .default({}),
  worker: z
    .object({
      command: z.string().min(1).default('./ha_sub.pl'),
      entrypointMarkers: z.array(z.string().min(1)).default(['mvp', '~/bin']),
      jobNamePrefix: z.string().min(1).default('EXTRACT_')
    })
    .default({}),
  scheduler: z
    .object({
      submit: z.string().min(1).default('qsub'),
      cancel: z.string().min(1).default('qdel')
    })
    .default({})
});

export type PipelineConfig = z.infer<typeof pipelineConfigSchema>;
export type PipelineConfigInput = z.input<typeof pipelineConfigSchema>;

export const CONFIG_FILE_NAMES = ['harmonic.config.yml', 'harmonic.config.yaml', 'harmonic.config.json'] as const;

type ConfigInput = Record<string, unknown>;

function isRecord(value: unknown): value is ConfigInput {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function mergeDeep(target: ConfigInput, source: ConfigInput): ConfigInput {
  const result: ConfigInput = { ...target };
  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = result[key];
    if (isRecord(sourceValue) && isRecord(targetValue)) {
      result[key] = mergeDeep(targetValue, sourceValue);
    } else if (sourceValue !== undefined) {
      result[key] = sourceValue;
    }
  }
  return result;
}

function readConfigFile(location: string): ConfigInput {
  const raw = fs.readFileSync(location, 'utf-8');
  const extension = path.extname(location).toLowerCase();
  let parsed: unknown;
  try {
    parsed = extension === '.json' ? JSON.parse(raw) : yaml.load(raw);
  } catch (error) {
    throw new ConfigurationError(`Failed to parse configuration (${location}): ${error instanceof Error ? error.message : String(error)}`, {
      cause: error
    });
  }
  if (parsed === undefined || parsed === null) {
    return {};
  }
  if (!isRecord(parsed)) {
    throw new ConfigurationError(`Configuration (${location}) must be a mapping`);
  }
  return parsed;
}

function integerFromEnv(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  const value = Number.parseInt(raw, 10);
  if (Number.isNaN(value)) {
    throw new ConfigurationError(`${name} must be an integer, got "${raw}"`);
  }
  return value;
}

function envOverrides(env: NodeJS.ProcessEnv): ConfigInput {
  return {
    polling: {
      intervalMs: integerFromEnv(env, 'HA_POLL_INTERVAL_MS'),
      maxWaitMs: integerFromEnv(env, 'HA_MAX_WAIT_MS')
    },
    scheduler: {
      submit: env.HA_SCHEDULER_SUBMIT || undefined,
      cancel: env.HA_SCHEDULER_CANCEL || undefined
    }
  };
}

export interface LoadConfigOptions {
  /** Directory searched for `harmonic.config.*`. */
  readonly workDir?: string;
  /** Explicit config file; replaces the directory search. */
  readonly configPath?: string;
  readonly env?: NodeJS.ProcessEnv;
  readonly overrides?: PipelineConfigInput;
}

export function locateConfigFile(workDir: string): string | undefined {
  return CONFIG_FILE_NAMES.map((name) => path.join(workDir, name)).find((location) => fs.existsSync(location));
}

/**
 * Defaults, then the config file, then environment variables, then explicit overrides
 * (the CLI flags).
 */
export function loadPipelineConfig(options: LoadConfigOptions = {}): PipelineConfig {
  const workDir = options.workDir ?? process.cwd();
  let merged: ConfigInput = {};

  const location = options.configPath ? path.resolve(workDir, options.configPath) : locateConfigFile(workDir);
  if (location) {
    if (!fs.existsSync(location)) {
      throw new ConfigurationError(`Configuration file not found: ${location}`);
    }
    merged = mergeDeep(merged, readConfigFile(location));
  }

  merged = mergeDeep(merged, envOverrides(options.env ?? process.env));
  if (options.overrides) {
    merged = mergeDeep(merged, options.overrides);
  }

  const result = pipelineConfigSchema.safeParse(merged);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration${location ? ` (${location})` : ''}: ${issues.join('; ')}`);
  }
  return result.data;
}
