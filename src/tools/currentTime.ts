import { z } from 'zod';

import { TOOL_CATALOG } from './catalog.js';
import type { ToolDefinition } from './registry.js';

// ── Formats ──────────────────────────────────────────────────

const timeFormatSchema = z.enum(['standard', 'timestamp', 'detailed', 'chinese']);

export type TimeFormat = z.infer<typeof timeFormatSchema>;

const currentTimeArgsSchema = z.object({
  time_format: timeFormatSchema.optional().default('standard'),
});

export interface DetailedTime {
  year: number;
  month: number;
  day: number;
  hour: number;
  minute: number;
  second: number;
  /** 0 = Monday … 6 = Sunday */
  weekday: number;
  isoFormat: string;
  timestamp: number;
}

export function formatTime(now: Date, format: TimeFormat): string | DetailedTime {
  const year = now.getFullYear();
  const month = pad(now.getMonth() + 1);
  const day = pad(now.getDate());
  const hour = pad(now.getHours());
  const minute = pad(now.getMinutes());
  const second = pad(now.getSeconds());
  const timestamp = Math.floor(now.getTime() / 1000);

  switch (format) {
    case 'standard':
      return `${String(year)}-${month}-${day} ${hour}:${minute}:${second}`;
    case 'timestamp':
      return String(timestamp);
    case 'chinese':
      return `${String(year)}年${month}月${day}日 ${hour}时${minute}分${second}秒`;
    case 'detailed':
      return {
        year,
        month: now.getMonth() + 1,
        day: now.getDate(),
        hour: now.getHours(),
        minute: now.getMinutes(),
        second: now.getSeconds(),
        weekday: (now.getDay() + 6) % 7,
        isoFormat: now.toISOString(),
        timestamp,
      };
  }
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

// ── Tool ─────────────────────────────────────────────────────

export function createCurrentTimeTool(
  now: () => Date = () => new Date(),
): ToolDefinition {
  return {
    schema: TOOL_CATALOG.get_current_time,
    handler(args) {
      const { time_format } = currentTimeArgsSchema.parse(args);
      return formatTime(now(), time_format);
    },
  };
}
