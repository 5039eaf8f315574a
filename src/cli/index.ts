/**
 * CLI Main Program
 *
 * Commander.js program setup for the md-digest CLI.
 */

import { Command, Option } from 'commander';
import { VERSION } from '../version.js';
import { addTranslateCommand } from './commands/translate.js';
import { addSegmentCommand } from './commands/segment.js';
import { addConfigCommand } from './commands/config.js';

/**
 * Create the Commander.js program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('md-digest')
    .description('Translate, summarize and tag Markdown documents with a chat-completions model')
    .version(VERSION)
    .addOption(
      new Option('--format <format>', 'Output format').choices(['json', 'table']).default('json')
    );

  addTranslateCommand(program);
  addSegmentCommand(program);
  addConfigCommand(program);

  return program;
}

/**
 * Run the CLI program
 */
export async function runCli(argv: string[]): Promise<void> {
  const program = createProgram();
  await program.parseAsync(argv, { from: 'user' });
}
