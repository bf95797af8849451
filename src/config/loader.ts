import { readFile } from 'node:fs/promises';

import { parse as parseYaml } from 'yaml';
import { ZodError } from 'zod';

import { ConfigError } from '../core/errors.js';
import { fileConfigSchema } from '../schema/config.js';
import type { FileConfig } from '../schema/config.js';

// ── Public API ──────────────────────────────────────────────

export interface LoadConfigOptions {
  /** A missing file yields the defaults instead of an error. */
  optional?: boolean | undefined;
}

/**
 * Load and validate a `.bootstrap.yaml` (or JSON) config file.
 * Throws a ConfigError if the file is unreadable or invalid.
 */
export async function loadConfigFile(
  configPath: string,
  options: LoadConfigOptions = {},
): Promise<FileConfig> {
  let raw: string;
  try {
    raw = await readFile(configPath, 'utf-8');
  } catch (err) {
    if (options.optional === true && isMissingFile(err)) {
      return fileConfigSchema.parse({});
    }
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Cannot read config ${configPath}: ${message}`, { cause: err });
  }

  return parseConfig(raw, configPath);
}

export function parseConfig(raw: string, configPath: string): FileConfig {
  try {
    const parsed: unknown = configPath.endsWith('.json')
      ? JSON.parse(raw)
      : parseYaml(raw);
    return fileConfigSchema.parse(parsed ?? {});
  } catch (err) {
    throw new ConfigError(
      `Invalid config ${configPath}: ${describeConfigError(err)}`,
      { cause: err },
    );
  }
}

// ── Helpers ─────────────────────────────────────────────────

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

function describeConfigError(err: unknown): string {
  if (err instanceof ZodError) {
    return err.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
  }
  return err instanceof Error ? err.message : String(err);
}
