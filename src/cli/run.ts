import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { createInterface } from 'node:readline';

import { InvalidArgumentError } from 'commander';
import type { Command } from 'commander';

import type { FileConfig } from '../schema/index.js';
import { createLLMClient, loadLLMConfig } from '../llm/index.js';
import type { LLMClient } from '../llm/index.js';
import { runAgent } from '../core/orchestrator.js';
import type { RunResult } from '../core/orchestrator.js';
import { ConversationMemory } from '../memory/index.js';
import {
  createDefaultRegistry,
  renderArgumentContract,
  TOOL_CATALOG,
  toolNameSchema,
} from '../tools/index.js';
import type { ToolRegistry, ToolSchema } from '../tools/index.js';
import { generateMarkdown, generateJSON, serializeJSON } from '../report/reporter.js';
import { PATHS } from '../config/defaults.js';
import { loadConfigFile } from '../config/loader.js';

// ── Exit codes ───────────────────────────────────────────────

export const EXIT_CODES = {
  COMPLETED: 0,
  DEGRADED: 1,
  ERROR: 4,
} as const;

export function exitCodeFor(result: RunResult): number {
  return result.completed && result.degraded === null
    ? EXIT_CODES.COMPLETED
    : EXIT_CODES.DEGRADED;
}

// ── Option parsing ───────────────────────────────────────────

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

interface SharedOptions {
  config: string;
  maxSteps?: number;
  maxRegenerations?: number;
  memoryFile?: string;
}

// ── Session setup ────────────────────────────────────────────

interface Session {
  client: LLMClient;
  tools: ToolRegistry;
  memory: ConversationMemory;
  memoryFile: string | undefined;
  maxTotalSteps: number;
  maxConsecutiveRegenerations: number;
}

/**
 * Merge settings: CLI flags override the config file, the config file
 * overrides environment variables.
 */
export function resolveLLMEnv(
  fileConfig: FileConfig,
  env: NodeJS.ProcessEnv = process.env,
): NodeJS.ProcessEnv {
  return {
    ...env,
    ...(fileConfig.provider !== undefined ? { LLM_PROVIDER: fileConfig.provider } : {}),
    ...(fileConfig.model !== undefined ? { PLANLOOP_MODEL: fileConfig.model } : {}),
    ...(fileConfig.ollamaBaseUrl !== undefined
      ? { OLLAMA_BASE_URL: fileConfig.ollamaBaseUrl }
      : {}),
  };
}

async function openSession(opts: SharedOptions): Promise<Session> {
  const fileConfig = await loadConfigFile(opts.config);
  const client = createLLMClient(loadLLMConfig(resolveLLMEnv(fileConfig)));
  const tools = createDefaultRegistry({ reportsDir: path.resolve(fileConfig.reportsDir) });

  const memory = new ConversationMemory();
  const memoryFile = opts.memoryFile ?? fileConfig.memoryFile;
  if (memoryFile !== undefined) await memory.load(memoryFile);

  return {
    client,
    tools,
    memory,
    memoryFile,
    maxTotalSteps: opts.maxSteps ?? fileConfig.maxTotalSteps,
    maxConsecutiveRegenerations: opts.maxRegenerations ?? fileConfig.maxConsecutiveRegenerations,
  };
}

async function runTurn(session: Session, request: string): Promise<RunResult> {
  const result = await runAgent(
    { client: session.client, tools: session.tools, context: session.memory.snapshot() },
    request,
    {
      maxTotalSteps: session.maxTotalSteps,
      maxConsecutiveRegenerations: session.maxConsecutiveRegenerations,
    },
  );

  if (result.completed) {
    session.memory.commit(request, result.finalAnswer);
    if (session.memoryFile !== undefined) await session.memory.save(session.memoryFile);
  }
  return result;
}

/** Empty the memory, and the memory file when one is in use. */
export async function clearMemory(
  memory: ConversationMemory,
  memoryFile: string | undefined,
): Promise<void> {
  memory.clear();
  if (memoryFile !== undefined) await memory.save(memoryFile);
}

// ── Stderr summary ───────────────────────────────────────────

function printSummary(result: RunResult): void {
  const status = result.degraded === null ? 'completed' : `degraded (${result.degraded})`;

  process.stderr.write(`\n--- planloop Result ---\n`);
  process.stderr.write(`Request: ${result.userInput}\n`);
  process.stderr.write(`Result:  ${status}\n`);
  process.stderr.write(
    `Steps:   ${String(result.steps)} executed, ${String(result.regenerations)} regenerations\n`,
  );
  process.stderr.write(`Time:    ${(result.durationMs / 1000).toFixed(1)}s\n`);
  process.stderr.write(`Run ID:  ${result.runId}\n\n`);
}

async function writeReport(reportPath: string, result: RunResult): Promise<void> {
  const target = path.resolve(reportPath);
  await mkdir(path.dirname(target), { recursive: true });
  await writeFile(target, generateMarkdown(result), 'utf-8');
  process.stderr.write(`Report written to ${target}\n`);
}

function addSharedOptions(command: Command): Command {
  return command
    .option('--config <path>', 'Path to config file', PATHS.CONFIG_FILE)
    .option('--max-steps <n>', 'Maximum executed steps per run', parsePositiveInt)
    .option(
      '--max-regenerations <n>',
      'Maximum consecutive plan regenerations',
      parsePositiveInt,
    )
    .option('--memory-file <path>', 'Load and save conversation memory as JSON');
}

// ── Command registration ─────────────────────────────────────

export function registerAskCommand(program: Command): void {
  addSharedOptions(
    program
      .command('ask')
      .description('Plan, execute and answer a single request')
      .argument('<request>', 'Natural language request'),
  )
    .option('--json', 'Output the JSON run record to stdout')
    .option('--report-path <file>', 'Write a markdown transcript of the run')
    .action(
      async (
        request: string,
        opts: SharedOptions & { json?: true; reportPath?: string },
      ) => {
        try {
          const session = await openSession(opts);
          const result = await runTurn(session, request);
          const exitCode = exitCodeFor(result);

          if (opts.reportPath !== undefined) {
            await writeReport(opts.reportPath, result);
          }

          if (opts.json) {
            process.stdout.write(serializeJSON(generateJSON(result, exitCode)) + '\n');
          } else {
            process.stdout.write(result.finalAnswer + '\n');
          }

          printSummary(result);
          process.exitCode = exitCode;
        } catch (err) {
          const message = err instanceof Error ? err.message : String(err);
          process.stderr.write(`Error: ${message}\n`);
          process.exitCode = EXIT_CODES.ERROR;
        }
      },
    );
}

export function registerChatCommand(program: Command): void {
  addSharedOptions(
    program
      .command('chat')
      .description('Interactive session; turns share one conversation memory'),
  ).action(async (opts: SharedOptions) => {
    let session: Session;
    try {
      session = await openSession(opts);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      process.stderr.write(`Error: ${message}\n`);
      process.exitCode = EXIT_CODES.ERROR;
      return;
    }

    const rl = createInterface({ input: process.stdin, output: process.stdout });
    process.stderr.write('Type a request, /clear to reset memory, or exit to quit.\n');
    rl.setPrompt('> ');
    rl.prompt();

    let worstExitCode: number = EXIT_CODES.COMPLETED;
    for await (const line of rl) {
      const request = line.trim();
      if (request === 'exit' || request === 'quit') break;

      if (request === '/clear') {
        try {
          await clearMemory(session.memory, session.memoryFile);
          process.stderr.write('Conversation memory cleared.\n');
        } catch (err) {
          const message = err instanceof Error ? err.message : String(err);
          process.stderr.write(`Error: ${message}\n`);
          worstExitCode = EXIT_CODES.ERROR;
        }
      } else if (request.length > 0) {
        try {
          const result = await runTurn(session, request);
          process.stdout.write(`\n${result.finalAnswer}\n\n`);
          printSummary(result);
          worstExitCode = Math.max(worstExitCode, exitCodeFor(result));
        } catch (err) {
          const message = err instanceof Error ? err.message : String(err);
          process.stderr.write(`Error: ${message}\n`);
          worstExitCode = EXIT_CODES.ERROR;
        }
      }
      rl.prompt();
    }

    rl.close();
    process.exitCode = worstExitCode;
  });
}

/**
 * Pick the schemas the tools command prints. A name must be one of the
 * catalogued tools; without one, `all` widens the list from the registered
 * tools to the whole catalog.
 */
export function selectToolSchemas(
  registered: readonly ToolSchema[],
  options: { name?: string | undefined; all?: boolean | undefined },
): readonly ToolSchema[] {
  if (options.name !== undefined) {
    const parsed = toolNameSchema.safeParse(options.name);
    if (!parsed.success) {
      throw new Error(
        `Unknown tool "${options.name}". Catalogued tools: ${toolNameSchema.options.join(', ')}`,
      );
    }
    return [TOOL_CATALOG[parsed.data]];
  }
  return options.all === true ? Object.values(TOOL_CATALOG) : registered;
}

export function registerToolsCommand(program: Command): void {
  program
    .command('tools')
    .description('List the registered tools and their argument contract')
    .argument('[name]', 'Show a single catalogued tool')
    .option('--all', 'Include catalogued tools the host has to provide')
    .option('--config <path>', 'Path to config file', PATHS.CONFIG_FILE)
    .action(async (name: string | undefined, opts: { all?: true; config: string }) => {
      try {
        const fileConfig = await loadConfigFile(opts.config);
        const registered = createDefaultRegistry({
          reportsDir: path.resolve(fileConfig.reportsDir),
        }).schemas();
        const schemas = selectToolSchemas(registered, { name, all: opts.all });
        process.stdout.write(renderArgumentContract(schemas) + '\n');
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        process.stderr.write(`Error: ${message}\n`);
        process.exitCode = EXIT_CODES.ERROR;
      }
    });
}
