import { z } from 'zod';

// ── Built-in tool identifiers ────────────────────────────────

export const toolNameSchema = z.enum([
  'add',
  'stock_search',
  'get_current_time',
  'generate_markdown_report',
  'retrieve_reports',
]);

export type ToolName = z.infer<typeof toolNameSchema>;

// ── Argument schema ──────────────────────────────────────────

export type ToolParameterType = 'int' | 'str' | 'bool' | 'dict';

export interface ToolParameterChoice {
  value: string;
  description: string;
}

export interface ToolParameter {
  type: ToolParameterType;
  description: string;
  required?: boolean;
  enum?: readonly ToolParameterChoice[];
}

export interface ToolSchema<TName extends string = string> {
  name: TName;
  description: string;
  parameters: Readonly<Record<string, ToolParameter>>;
}

// ── Catalog ──────────────────────────────────────────────────

export const TOOL_CATALOG: { readonly [K in ToolName]: ToolSchema<K> } = {
  add: {
    name: 'add',
    description: 'Adds two integers.',
    parameters: {
      add1: { type: 'int', description: 'First addend', required: true },
      add2: { type: 'int', description: 'Second addend', required: true },
    },
  },
  stock_search: {
    name: 'stock_search',
    description:
      'Market data lookup. Accepts company names, A-share codes and US/HK tickers; several codes may be given comma-separated.',
    parameters: {
      stock_code: {
        type: 'str',
        description: 'One or more stock codes, comma-separated',
        required: true,
      },
      data_type: {
        type: 'str',
        description: 'Kind of data to fetch',
        required: true,
        enum: [
          { value: 'realtime', description: 'Current or latest quote' },
          { value: 'history', description: 'Historical prices for a date range' },
          { value: 'info', description: 'Basic company information' },
        ],
      },
      start_date: { type: 'str', description: 'Start date, YYYYMMDD (history only)' },
      end_date: { type: 'str', description: 'End date, YYYYMMDD (history only)' },
    },
  },
  get_current_time: {
    name: 'get_current_time',
    description: 'Returns the current local time.',
    parameters: {
      time_format: {
        type: 'str',
        description: 'Output format, defaults to standard',
        enum: [
          { value: 'standard', description: 'YYYY-MM-DD HH:MM:SS' },
          { value: 'timestamp', description: 'Unix timestamp in seconds' },
          { value: 'detailed', description: 'Broken-down date fields' },
          { value: 'chinese', description: 'YYYY年MM月DD日 HH时MM分SS秒' },
        ],
      },
    },
  },
  generate_markdown_report: {
    name: 'generate_markdown_report',
    description: 'Renders a markdown report from gathered material.',
    parameters: {
      user_requirement: {
        type: 'str',
        description: 'What the user asked the report to cover',
        required: true,
      },
      report_content: {
        type: 'str',
        description:
          'Full report material, written out from the results of earlier steps',
        required: true,
      },
      save_to_file: {
        type: 'bool',
        description: 'Also save the report under the reports directory',
      },
    },
  },
  retrieve_reports: {
    name: 'retrieve_reports',
    description: 'Searches the research report library.',
    parameters: {
      query: { type: 'str', description: 'Search text', required: true },
      n_results: { type: 'int', description: 'Number of reports to return, default 5' },
      filters: {
        type: 'dict',
        description: "Metadata filter, e.g. {'ticker': 'NVDA'}",
      },
    },
  },
};

// ── Contract rendering ───────────────────────────────────────

/**
 * Render schemas as the argument contract embedded in resolution prompts.
 * Every tool is described the same way: description, then each argument
 * with its type, whether it is required, and its allowed values.
 */
export function renderArgumentContract(schemas: readonly ToolSchema[]): string {
  const contract: Record<string, unknown> = {};

  for (const schema of schemas) {
    const parameters: Record<string, unknown> = {};
    for (const [name, param] of Object.entries(schema.parameters)) {
      parameters[name] = {
        type: param.type,
        description: param.description,
        required: param.required ?? false,
        ...(param.enum ? { enum: param.enum } : {}),
      };
    }
    contract[schema.name] = { description: schema.description, parameters };
  }

  return JSON.stringify(contract, null, 2);
}
