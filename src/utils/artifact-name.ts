import * as path from 'path';
import { ConfigError } from '../errors.js';

export const DEFAULT_LOG_PREFIX = 'test-';

/**
 * Map a module id to the file name of its log artifact.
 * `::`, `/` and `\` become `-`; anything else outside [A-Za-z0-9._-] becomes `_`.
 */
export function artifactName(
  moduleId: string,
  prefix: string = DEFAULT_LOG_PREFIX,
): string {
  const safe = moduleId
    .replace(/::|[/\\]/g, '-')
    .replace(/[^A-Za-z0-9._-]/g, '_');
  return `${prefix}${safe}.log`;
}

export function artifactPath(
  logDir: string,
  moduleId: string,
  prefix: string = DEFAULT_LOG_PREFIX,
): string {
  return path.join(logDir, artifactName(moduleId, prefix));
}

/**
 * Resolve every module's artifact path, rejecting catalogues in which two
 * ids would share a file. Names are compared case-insensitively.
 */
export function planArtifacts(
  modules: readonly string[],
  logDir: string,
  prefix: string = DEFAULT_LOG_PREFIX,
): Map<string, string> {
  const plan = new Map<string, string>();
  const owners = new Map<string, string>();

  for (const moduleId of modules) {
    if (plan.has(moduleId)) {
      throw new ConfigError(`Duplicate module in catalogue: "${moduleId}"`);
    }

    const name = artifactName(moduleId, prefix);
    const key = name.toLowerCase();
    const owner = owners.get(key);
    if (owner !== undefined) {
      throw new ConfigError(
        `Modules "${owner}" and "${moduleId}" would share the log file ${name}`,
      );
    }

    owners.set(key, moduleId);
    plan.set(moduleId, path.join(logDir, name));
  }

  return plan;
}
