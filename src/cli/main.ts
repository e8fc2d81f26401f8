#!/usr/bin/env node

import 'dotenv/config';
import { Command } from 'commander';

import { setQuiet } from '../utils/logger.js';
import { registerAskCommand, registerChatCommand, registerToolsCommand } from './run.js';

const program = new Command('planloop')
  .description('Break a request into steps, run them with tools, replan on failure and answer.')
  .version('0.1.0')
  .option('-q, --quiet', 'Only print warnings to stderr')
  .hook('preAction', (command) => {
    setQuiet(command.opts<{ quiet?: true }>().quiet === true);
  });

for (const register of [registerAskCommand, registerChatCommand, registerToolsCommand]) {
  register(program);
}

await program.parseAsync();
