import type { ToolArgs } from '../schema/index.js';
import type { ToolSchema } from '../tools/catalog.js';

// ── Alias table ──────────────────────────────────────────────
// Argument names the resolver tends to translate, mapped back to the
// canonical registry names.

export type ArgumentAliases = Readonly<Record<string, string>>;

export const DEFAULT_ARGUMENT_ALIASES: ArgumentAliases = {
  用户需求: 'user_requirement',
  报告内容: 'report_content',
  查询: 'query',
  数量: 'n_results',
  过滤条件: 'filters',
  股票代码: 'stock_code',
  数据类型: 'data_type',
  开始日期: 'start_date',
  结束日期: 'end_date',
  时间格式: 'time_format',
  加数1: 'add1',
  加数2: 'add2',
};

export function applyAliases(args: ToolArgs, aliases: ArgumentAliases): ToolArgs {
  const renamed: ToolArgs = {};
  for (const [key, value] of Object.entries(args)) {
    renamed[Object.hasOwn(aliases, key) ? (aliases[key] ?? key) : key] = value;
  }
  return renamed;
}

// ── Normalization ────────────────────────────────────────────
// tool → argument → synonym → canonical value

export type ValueCoercions = Readonly<
  Record<string, Readonly<Record<string, Readonly<Record<string, string>>>>>
>;

export const DEFAULT_VALUE_COERCIONS: ValueCoercions = {
  stock_search: {
    data_type: {
      daily_history: 'history',
      stock_history: 'history',
      historical: 'history',
      daily: 'history',
      quote: 'realtime',
      real_time: 'realtime',
    },
  },
};

export function normalizeArgs(
  tool: string,
  args: ToolArgs,
  coercions: ValueCoercions,
): ToolArgs {
  const rules = Object.hasOwn(coercions, tool) ? coercions[tool] : undefined;
  if (!rules) return args;

  const normalized: ToolArgs = { ...args };
  for (const [key, synonyms] of Object.entries(rules)) {
    const value = normalized[key];
    if (typeof value !== 'string') continue;
    const canonical = Object.hasOwn(synonyms, value) ? synonyms[value] : undefined;
    if (canonical !== undefined) normalized[key] = canonical;
  }
  return normalized;
}

// ── Validation ───────────────────────────────────────────────

/** Arguments that legitimately carry prose. */
export const FREE_TEXT_ARGUMENTS: ReadonlySet<string> = new Set([
  'user_requirement',
  'report_content',
  'query',
]);

/** Words that show up when the resolver describes a value instead of giving one. */
export const PLACEHOLDER_KEYWORDS: readonly string[] = [
  '提取',
  '列表',
  '步骤',
  '根据',
  '执行结果',
  '分析',
  '获取',
  'extract',
  'step',
  'result',
  'according to',
  'placeholder',
];

/** Values shorter than this are never treated as placeholder prose. */
export const PLACEHOLDER_MIN_LENGTH = 5;

export type ArgumentCheck =
  | { ok: true }
  | { ok: false; key: string; message: string };

/**
 * Check arguments before invocation. With a schema, required parameters
 * must be present and enumerated parameters must take one of their values.
 */
export function validateArgs(args: ToolArgs, schema?: ToolSchema): ArgumentCheck {
  if (schema) {
    const missing = Object.entries(schema.parameters).find(
      ([key, param]) => param.required === true && (args[key] === undefined || args[key] === null),
    );
    if (missing) {
      const [key] = missing;
      return {
        ok: false,
        key,
        message: `Argument validation failed: "${key}" is required by ${schema.name} but was not provided. Check that earlier steps produced the data it needs.`,
      };
    }
  }

  for (const [key, value] of Object.entries(args)) {
    if (FREE_TEXT_ARGUMENTS.has(key)) continue;

    if (value === null || value === undefined) {
      return { ok: false, key, message: emptyMessage(key) };
    }
    if (typeof value !== 'string') continue;

    const trimmed = value.trim();
    if (trimmed === '' || trimmed.toLowerCase() === 'none') {
      return { ok: false, key, message: emptyMessage(key) };
    }

    if (trimmed.length >= PLACEHOLDER_MIN_LENGTH && containsPlaceholder(trimmed)) {
      return {
        ok: false,
        key,
        message: `Argument validation failed: "${key}" value "${value}" looks like descriptive text rather than a concrete value. Check that earlier steps produced the data it needs.`,
      };
    }

    const choices = schema?.parameters[key]?.enum;
    if (choices && !choices.some((choice) => choice.value === trimmed)) {
      return {
        ok: false,
        key,
        message: `Argument validation failed: "${key}" value "${value}" is not one of ${choices.map((choice) => choice.value).join(', ')}.`,
      };
    }
  }

  return { ok: true };
}

function containsPlaceholder(value: string): boolean {
  const lowered = value.toLowerCase();
  return PLACEHOLDER_KEYWORDS.some((keyword) => lowered.includes(keyword));
}

function emptyMessage(key: string): string {
  return `Argument validation failed: "${key}" is empty. Check that earlier steps produced the data it needs.`;
}
