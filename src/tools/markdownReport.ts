import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { z } from 'zod';

import { TOOL_CATALOG } from './catalog.js';
import type { ToolDefinition } from './registry.js';
import { formatTime } from './currentTime.js';

// ── Public types ─────────────────────────────────────────────

export interface MarkdownReportOptions {
  reportsDir: string;
  now?: () => Date;
}

export interface MarkdownReportResult {
  markdown: string;
  savedTo?: string;
}

// ── Argument validation ──────────────────────────────────────

const booleanish = z.union([
  z.boolean(),
  z.enum(['true', 'false']).transform((value) => value === 'true'),
]);

const reportArgsSchema = z.object({
  user_requirement: z.string().min(1),
  report_content: z.string().min(1),
  save_to_file: booleanish.optional().default(false),
});

// ── Rendering ────────────────────────────────────────────────

const TITLE_RULES: readonly { keywords: readonly string[]; title: string; slug: string }[] = [
  { keywords: ['股票', 'stock'], title: 'Stock Analysis Report', slug: 'stock_analysis' },
  { keywords: ['基金', 'fund'], title: 'Fund Analysis Report', slug: 'fund_analysis' },
  { keywords: ['财务', 'financial'], title: 'Financial Data Report', slug: 'financial_analysis' },
  { keywords: ['投资', 'invest'], title: 'Investment Analysis Report', slug: 'investment_analysis' },
];

function matchTitleRule(requirement: string) {
  const lowered = requirement.toLowerCase();
  return TITLE_RULES.find((rule) => rule.keywords.some((k) => lowered.includes(k)));
}

export function reportTitle(requirement: string): string {
  return matchTitleRule(requirement)?.title ?? 'Analysis Report';
}

export function reportFileStem(requirement: string): string {
  const rule = matchTitleRule(requirement);
  if (rule) return rule.slug;

  const safe = Array.from(requirement.slice(0, 20))
    .filter((c) => /[\p{L}\p{N} _-]/u.test(c))
    .join('')
    .trim()
    .replace(/ +/g, '_');
  return safe || 'analysis_report';
}

function parseContent(content: string): Record<string, unknown> | string {
  try {
    const parsed: unknown = JSON.parse(content);
    if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
      return Object.fromEntries(Object.entries(parsed));
    }
  } catch {
    // Plain text content
  }
  return content;
}

function formatContentSection(content: Record<string, unknown> | string): string {
  if (typeof content === 'string') return content;

  const rows = Object.entries(content).map(
    ([key, value]) =>
      `| ${escapeCell(key)} | ${escapeCell(typeof value === 'string' ? value : JSON.stringify(value))} |`,
  );
  return ['| Field | Value |', '|-------|-------|', ...rows].join('\n');
}

function escapeCell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\n/g, ' ');
}

export function renderMarkdownReport(
  requirement: string,
  content: string,
  generatedAt: Date,
): string {
  const lines = [
    `# ${reportTitle(requirement)}`,
    '',
    `> Generated: ${String(formatTime(generatedAt, 'standard'))}`,
    '',
    '## Overview',
    '',
    requirement,
    '',
    '## Findings',
    '',
    formatContentSection(parseContent(content)),
    '',
    '## Risk Notice',
    '',
    '- This report is for reference only and is not investment advice.',
    '- Past performance does not indicate future results.',
    '',
    '---',
    '*Generated automatically by planloop*',
  ];
  return lines.join('\n');
}

// ── Tool ─────────────────────────────────────────────────────

export function createMarkdownReportTool(
  options: MarkdownReportOptions,
): ToolDefinition {
  const now = options.now ?? (() => new Date());

  return {
    schema: TOOL_CATALOG.generate_markdown_report,
    async handler(args): Promise<MarkdownReportResult> {
      const parsed = reportArgsSchema.parse(args);
      const generatedAt = now();
      const markdown = renderMarkdownReport(
        parsed.user_requirement,
        parsed.report_content,
        generatedAt,
      );

      if (!parsed.save_to_file) return { markdown };

      const stamp = String(formatTime(generatedAt, 'standard')).replace(/[-: ]/g, '');
      const fileName = `${reportFileStem(parsed.user_requirement)}_${stamp}.md`;
      const savedTo = path.join(options.reportsDir, fileName);
      await mkdir(options.reportsDir, { recursive: true });
      await writeFile(savedTo, markdown, 'utf-8');

      return { markdown, savedTo };
    },
  };
}
