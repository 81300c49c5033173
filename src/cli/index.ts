#!/usr/bin/env node

import { Command } from 'commander';
import { registerFetchDatasetCommand } from './commands/fetch-dataset.js';
import { registerRunCommand } from './commands/run.js';
import { reportError } from './commands/shared.js';
import { registerValidateCommand } from './commands/validate.js';

const COMMANDS = [registerRunCommand, registerValidateCommand, registerFetchDatasetCommand];

export function buildProgram(): Command {
  const program = new Command('reel-etl')
    .description('Short-video ETL: scrape, label viral posts, fetch and analyze videos, write tabular outputs')
    .version('0.1.0')
    .showHelpAfterError();

  COMMANDS.forEach(register => register(program));
  return program;
}

export async function runCli(argv: string[] = process.argv): Promise<void> {
  await buildProgram().parseAsync(argv);
}

if (process.env.NODE_ENV !== 'test') {
  runCli().catch(error => {
    reportError(error);
    process.exit(1);
  });
}
