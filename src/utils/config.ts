import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { ContainerConfig, OrchestratorConfig } from '../types.js';
import { ConfigError, errorMessage } from '../errors.js';
import { DEFAULT_LOG_PREFIX, planArtifacts } from './artifact-name.js';

export const DEFAULT_CONFIG_FILE = 'modular-tests.json';
export const DEFAULT_THREADS = 2;
export const DEFAULT_CONTAINER_WORKDIR = '/workspace';

// Exit codes above this would collide with INFRASTRUCTURE_EXIT_CODE.
export const MAX_MODULES = 254;

export function loadConfig(configPath: string): OrchestratorConfig {
  const resolved = path.resolve(configPath);

  let content: string;
  try {
    content = fs.readFileSync(resolved, 'utf-8');
  } catch (error) {
    throw new ConfigError(
      `Cannot read configuration file ${resolved}: ${errorMessage(error)}`,
      { cause: error },
    );
  }

  return parseConfig(content, path.dirname(resolved));
}

export function parseConfig(
  content: string,
  baseDir: string,
): OrchestratorConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new ConfigError(
      `Invalid JSON in configuration file: ${errorMessage(error)}`,
      { cause: error },
    );
  }

  if (!isRecord(parsed)) {
    throw new ConfigError('Configuration file must contain a JSON object');
  }

  if (!('modules' in parsed)) {
    throw new ConfigError('Configuration missing required "modules" field');
  }
  const modules = readStringArray(parsed, 'modules');
  for (const moduleId of modules) {
    if (moduleId.trim() === '') {
      throw new ConfigError('"modules" must not contain empty identifiers');
    }
  }
  if (modules.length > MAX_MODULES) {
    throw new ConfigError(
      `Catalogue has ${modules.length} modules; at most ${MAX_MODULES} are supported`,
    );
  }

  const command = parsed.command;
  if (typeof command !== 'string' || command.trim() === '') {
    throw new ConfigError('Configuration missing required "command" field');
  }

  const logDir = path.resolve(
    baseDir,
    readOptionalString(parsed, 'logDir') ?? os.tmpdir(),
  );
  const logPrefix = readOptionalString(parsed, 'logPrefix') ?? DEFAULT_LOG_PREFIX;

  // Reject colliding artifact names before anything runs.
  planArtifacts(modules, logDir, logPrefix);

  const config: OrchestratorConfig = {
    modules,
    command,
    args: 'args' in parsed ? readStringArray(parsed, 'args') : ['{module}'],
    threads: readPositiveInt(parsed, 'threads') ?? DEFAULT_THREADS,
    maxConcurrent: readPositiveInt(parsed, 'maxConcurrent') ?? 1,
    logDir,
    logPrefix,
    cwd: path.resolve(baseDir, readOptionalString(parsed, 'cwd') ?? '.'),
    env: readEnv(parsed),
  };

  const container = readContainer(parsed);
  if (container) {
    config.container = container;
  }

  return config;
}

export function parsePositiveInt(value: string, name: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new ConfigError(`${name} must be a positive integer, got "${value}"`);
  }
  return n;
}

export function parseNonNegativeInt(value: string, name: string): number {
  if (!/^\d+$/.test(value.trim())) {
    throw new ConfigError(
      `${name} must be a non-negative integer, got "${value}"`,
    );
  }
  return Number(value.trim());
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readStringArray(obj: Record<string, unknown>, field: string): string[] {
  const value = obj[field];
  if (!Array.isArray(value)) {
    throw new ConfigError(`"${field}" must be an array of strings`);
  }
  const result: string[] = [];
  for (const item of value) {
    if (typeof item !== 'string') {
      throw new ConfigError(`"${field}" must be an array of strings`);
    }
    result.push(item);
  }
  return result;
}

function readOptionalString(
  obj: Record<string, unknown>,
  field: string,
): string | undefined {
  const value = obj[field];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    throw new ConfigError(`"${field}" must be a string`);
  }
  return value;
}

function readPositiveInt(
  obj: Record<string, unknown>,
  field: string,
): number | undefined {
  const value = obj[field];
  if (value === undefined) return undefined;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
    throw new ConfigError(`"${field}" must be a positive integer`);
  }
  return value;
}

function readEnv(obj: Record<string, unknown>): Record<string, string> {
  const value = obj.env;
  if (value === undefined) return {};
  if (!isRecord(value)) {
    throw new ConfigError('"env" must be an object of strings');
  }
  const env: Record<string, string> = {};
  for (const [key, v] of Object.entries(value)) {
    if (typeof v !== 'string') {
      throw new ConfigError(`"env.${key}" must be a string`);
    }
    env[key] = v;
  }
  return env;
}

function readContainer(
  obj: Record<string, unknown>,
): ContainerConfig | undefined {
  const value = obj.container;
  if (value === undefined) return undefined;
  if (!isRecord(value)) {
    throw new ConfigError('"container" must be an object');
  }
  const image = value.image;
  if (typeof image !== 'string' || image.trim() === '') {
    throw new ConfigError('"container.image" must be a non-empty string');
  }
  const workDir = readOptionalString(value, 'workDir');
  return {
    image,
    workDir: workDir ?? DEFAULT_CONTAINER_WORKDIR,
  };
}
