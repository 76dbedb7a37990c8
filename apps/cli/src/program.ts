import { Command } from 'commander';
import { registerDownloadCommand } from './commands/download';
import { registerSlidesCommand } from './commands/slides';
import { registerSummarizeCommand } from './commands/summarize';

export function createProgram(): Command {
  const program = new Command();
  program
    .name('openreview-papers')
    .description('Download OpenReview papers, summarize them and build slide decks')
    .version('0.4.0');

  registerDownloadCommand(program);
  registerSummarizeCommand(program);
  registerSlidesCommand(program);
  return program;
}
