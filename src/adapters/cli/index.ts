import { Command } from 'commander';
import { createSummarizeCommand } from './commands/summarize.js';
import { createCacheCommand } from './commands/cache.js';

export function createCLI(): Command {
  const program = new Command()
    .name('tube-digest')
    .description('Summarize YouTube videos with Gemini, caching transcripts and summaries')
    .version('0.1.0');

  program.addCommand(createSummarizeCommand(), { isDefault: true });
  program.addCommand(createCacheCommand());

  return program;
}
