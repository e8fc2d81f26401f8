import { readFile } from 'node:fs/promises';

import { parse as parseYaml } from 'yaml';

import { fileConfigSchema } from '../schema/config.js';
import type { FileConfig } from '../schema/config.js';

// ── Public API ──────────────────────────────────────────────

/**
 * Load and validate a `.planloop.yaml` (or JSON) config file.
 * A missing file yields the defaults; an invalid one throws a descriptive error.
 */
export async function loadConfigFile(configPath: string): Promise<FileConfig> {
  let raw: string;
  try {
    raw = await readFile(configPath, 'utf-8');
  } catch (err) {
    if (isMissingFile(err)) return fileConfigSchema.parse({});
    throw err;
  }

  const parsed: unknown = configPath.endsWith('.json')
    ? JSON.parse(raw)
    : parseYaml(raw);

  const result = fileConfigSchema.safeParse(parsed ?? {});
  if (!result.success) {
    throw new Error(`Invalid config file ${configPath}: ${result.error.message}`);
  }

  return result.data;
}

function isMissingFile(err: unknown): boolean {
  return (
    typeof err === 'object' &&
    err !== null &&
    'code' in err &&
    err.code === 'ENOENT'
  );
}
