import { readFile } from 'node:fs/promises';
import path from 'node:path';

import { parse } from 'yaml';
import { z } from 'zod';

import { ConfigurationError, isErrnoCode, toErrorMessage } from './errors';
import { buildExecutionLevels } from './scheduler/plan';
import { checkListSchema, type CheckDefinition } from './schemas/checks';
import { settingsInputSchema } from './schemas/settings';
import { resolveSettings, type EngineSettings } from './settings';

export type EngineConfig = {
  settings: EngineSettings;
  checks: readonly CheckDefinition[];
};

const configFileSchema = z
  .object({
    settings: settingsInputSchema.default({}),
    checks: checkListSchema,
  })
  .strict();

/**
 * Validates a parsed config document. The check set is frozen and its dependency graph
 * checked, so nothing runs when any definition is unusable.
 */
export function parseConfig(raw: unknown, baseDir: string): EngineConfig {
  const r = configFileSchema.safeParse(raw);
  if (!r.success) {
    throw new ConfigurationError(`Invalid config: ${toErrorMessage(r.error)}`, { cause: r.error });
  }

  buildExecutionLevels(r.data.checks);

  return {
    settings: resolveSettings(r.data.settings, baseDir),
    checks: Object.freeze(r.data.checks.map((c) => Object.freeze(c))),
  };
}

export async function loadConfig(configPath: string): Promise<EngineConfig> {
  const absolute = path.resolve(configPath);

  let content: string;
  try {
    content = await readFile(absolute, 'utf-8');
  } catch (err) {
    if (isErrnoCode(err, 'ENOENT')) {
      throw new ConfigurationError(`Config file not found: ${absolute}`, { cause: err });
    }
    throw new ConfigurationError(`Failed to read config ${absolute}: ${toErrorMessage(err)}`, {
      cause: err,
    });
  }

  let raw: unknown;
  try {
    raw = parse(content) as unknown;
  } catch (err) {
    throw new ConfigurationError(`Failed to parse YAML in ${absolute}: ${toErrorMessage(err)}`, {
      cause: err,
    });
  }

  return parseConfig(raw, path.dirname(absolute));
}
