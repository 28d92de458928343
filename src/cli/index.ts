#!/usr/bin/env node

import { Command } from 'commander';
import { registerArchiveCommand } from './commands/archive.js';
import { APP_NAME, APP_VERSION } from '../core/config/constants.js';

export function buildProgram(): Command {
  const program = new Command();

  program
    .name(APP_NAME)
    .description('Extract the links of a PDF and archive them in the Wayback Machine')
    .version(APP_VERSION);

  registerArchiveCommand(program);

  return program;
}

export async function runCli(argv: string[] = process.argv): Promise<void> {
  const program = buildProgram();
  await program.parseAsync(argv);
}

if (process.env.NODE_ENV !== 'test') {
  runCli().catch((error: unknown) => {
    console.error('Error:', error instanceof Error ? error.message : error);
    process.exit(1);
  });
}
