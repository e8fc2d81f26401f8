import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { describe, it, expect, afterEach } from 'vitest';

import { ToolRegistry } from './registry.js';
import { createAddTool } from './add.js';
import { createCurrentTimeTool, formatTime } from './currentTime.js';
import {
  createMarkdownReportTool,
  renderMarkdownReport,
  reportFileStem,
  reportTitle,
} from './markdownReport.js';

// Local time, so the formatted fields do not depend on the machine's zone.
const FIXED = new Date(2024, 0, 2, 3, 4, 5);

// ── add ──────────────────────────────────────────────────────

describe('add', () => {
  const registry = new ToolRegistry().register(createAddTool());

  it('adds integers given as numbers or numeric strings', async () => {
    expect((await registry.invoke('add', { add1: '40', add2: 2 })).content).toBe(42);
  });

  it('rejects non-numeric input', async () => {
    await expect(registry.invoke('add', { add1: 'one', add2: 2 })).rejects.toThrow();
  });
});

// ── get_current_time ─────────────────────────────────────────

describe('formatTime', () => {
  it('formats the standard and chinese layouts', () => {
    expect(formatTime(FIXED, 'standard')).toBe('2024-01-02 03:04:05');
    expect(formatTime(FIXED, 'chinese')).toBe('2024年01月02日 03时04分05秒');
  });

  it('formats a unix timestamp in seconds', () => {
    expect(formatTime(FIXED, 'timestamp')).toBe(String(Math.floor(FIXED.getTime() / 1000)));
  });

  it('breaks the date down with a Monday-based weekday', () => {
    expect(formatTime(FIXED, 'detailed')).toMatchObject({
      year: 2024,
      month: 1,
      day: 2,
      hour: 3,
      minute: 4,
      second: 5,
      weekday: 1,
    });
  });
});

describe('get_current_time', () => {
  it('defaults to the standard format', async () => {
    const registry = new ToolRegistry().register(createCurrentTimeTool(() => FIXED));
    expect((await registry.invoke('get_current_time', {})).content).toBe('2024-01-02 03:04:05');
  });
});

// ── generate_markdown_report ─────────────────────────────────

describe('report titles', () => {
  it('derives the title from the requirement', () => {
    expect(reportTitle('NVDA stock outlook')).toBe('Stock Analysis Report');
    expect(reportTitle('基金持仓分析')).toBe('Fund Analysis Report');
    expect(reportTitle('Quarterly summary')).toBe('Analysis Report');
  });

  it('derives a file-safe stem', () => {
    expect(reportFileStem('Investment ideas')).toBe('investment_analysis');
    expect(reportFileStem('Quarterly summary!')).toBe('Quarterly_summary');
    expect(reportFileStem('!!!')).toBe('analysis_report');
  });
});

describe('renderMarkdownReport', () => {
  it('renders plain text content as-is', () => {
    const markdown = renderMarkdownReport('Quarterly summary', 'Revenue grew.', FIXED);

    expect(markdown.split('\n').slice(0, 11)).toEqual([
      '# Analysis Report',
      '',
      '> Generated: 2024-01-02 03:04:05',
      '',
      '## Overview',
      '',
      'Quarterly summary',
      '',
      '## Findings',
      '',
      'Revenue grew.',
    ]);
    expect(markdown.endsWith('*Generated automatically by planloop*')).toBe(true);
  });

  it('renders JSON object content as a table', () => {
    const markdown = renderMarkdownReport(
      'NVDA stock outlook',
      '{"price": 10, "note": "a|b"}',
      FIXED,
    );

    expect(markdown).toContain('| Field | Value |\n|-------|-------|\n| price | 10 |\n| note | a\\|b |');
  });
});

describe('generate_markdown_report', () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir !== undefined) await rm(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it('returns the markdown without saving by default', async () => {
    const registry = new ToolRegistry().register(
      createMarkdownReportTool({ reportsDir: 'unused', now: () => FIXED }),
    );

    const result = await registry.invoke('generate_markdown_report', {
      user_requirement: 'Quarterly summary',
      report_content: 'Revenue grew.',
    });

    expect(result.content).toEqual({
      markdown: renderMarkdownReport('Quarterly summary', 'Revenue grew.', FIXED),
    });
  });

  it('saves the report under the reports directory when asked', async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'planloop-report-'));
    const registry = new ToolRegistry().register(
      createMarkdownReportTool({ reportsDir: dir, now: () => FIXED }),
    );

    const result = await registry.invoke('generate_markdown_report', {
      user_requirement: 'Fund review',
      report_content: 'Steady.',
      save_to_file: 'true',
    });

    const expectedPath = path.join(dir, 'fund_analysis_20240102030405.md');
    const markdown = renderMarkdownReport('Fund review', 'Steady.', FIXED);
    expect(result.content).toEqual({ markdown, savedTo: expectedPath });
    expect(await readFile(expectedPath, 'utf-8')).toBe(markdown);
  });
});
