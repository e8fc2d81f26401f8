import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

// ── Template paths ───────────────────────────────────────────

const THIS_DIR = path.dirname(fileURLToPath(import.meta.url));
const PROMPTS_DIR = path.join(THIS_DIR, '..', '..', 'prompts');

export type PromptName =
  | 'planner'
  | 'execute_step'
  | 'resolve_args'
  | 'decide'
  | 'replan'
  | 'final_answer';

const cache = new Map<PromptName, string>();

async function loadTemplate(name: PromptName): Promise<string> {
  const cached = cache.get(name);
  if (cached !== undefined) return cached;

  const template = await readFile(path.join(PROMPTS_DIR, `${name}.txt`), 'utf-8');
  cache.set(name, template);
  return template;
}

// ── Rendering ────────────────────────────────────────────────

/**
 * Fill every `{{key}}` placeholder. Values are inserted literally, so `$`
 * sequences in model output stay as they are.
 */
export function renderTemplate(
  template: string,
  values: Readonly<Record<string, string>>,
): string {
  return template.replace(/\{\{(\w+)\}\}/g, (placeholder, key: string) =>
    Object.hasOwn(values, key) ? (values[key] ?? '') : placeholder,
  );
}

export async function buildPrompt(
  name: PromptName,
  values: Readonly<Record<string, string>>,
): Promise<string> {
  return renderTemplate(await loadTemplate(name), values);
}
