import path from 'path';
import { Command, Option } from 'commander';
import { format } from 'date-fns';
import { z } from 'zod';
import { getConfig, requireOpenReviewCredentials, type AppConfig } from '../services/config';
import { OpenReviewClient } from '../services/openreview/client';
import { compileQuery } from '../services/papers/filter';
import { runDownload, type DownloadRunResult, type RunContext } from '../services/papers/pipeline';
import { CITATION_STYLES } from '../services/references/formatter';
import { parseInteger, parseOptions } from './options';

const downloadOptionsSchema = z.object({
  query: z.string().trim().min(1, 'must not be empty'),
  venues: z.array(z.string().trim().min(1)).min(1, 'at least one venue id is required'),
  out: z.string().trim().min(1).default('papers'),
  runName: z.string().trim().min(1).optional(),
  style: z.enum(CITATION_STYLES).default('gb7714'),
  max: z.number().int().nonnegative().optional(),
  includeSubmitted: z.boolean().default(false),
});

export function defaultRunName(now: Date): string {
  return `run-${format(now, 'yyyyMMdd-HHmmss')}`;
}

function safeDirectoryName(name: string): string {
  return name.replace(/[\\/:*?"<>|]+/g, '_');
}

export function buildRunContext(raw: unknown, now: Date = new Date()): RunContext {
  const options = parseOptions(downloadOptionsSchema, raw, 'download');
  const outDir = path.resolve(options.out);
  const runName = safeDirectoryName(options.runName ?? defaultRunName(now));
  return {
    query: compileQuery(options.query),
    venues: options.venues,
    outDir,
    runDir: path.join(outDir, runName),
    style: options.style,
    max: options.max ?? null,
    includeSubmitted: options.includeSubmitted,
  };
}

export async function downloadCommand(raw: unknown, config: AppConfig): Promise<DownloadRunResult> {
  const context = buildRunContext(raw);
  const credentials = requireOpenReviewCredentials(config);

  const client = new OpenReviewClient({ baseUrl: config.openreview.baseUrl, credentials });
  await client.login();

  const result = await runDownload(context, client);
  console.log(`[download] Finished! ${result.downloaded.length} PDF(s) in ${context.runDir}`);
  return result;
}

export function registerDownloadCommand(program: Command): void {
  program
    .command('download')
    .description('Download OpenReview PDFs matching a keyword and write a reference list')
    .requiredOption('--query <pattern>', 'keyword or regular expression (case-insensitive)')
    .requiredOption('--venues <ids...>', 'OpenReview venue ids, e.g. ICLR.cc/2025/Conference')
    .option('--out <dir>', 'output directory', 'papers')
    .option('--run-name <name>', 'run subdirectory (default: run-<timestamp>)')
    .addOption(new Option('--style <style>', 'reference style').choices(CITATION_STYLES).default('gb7714'))
    .option('--max <n>', 'download at most n papers', parseInteger)
    .option('--include-submitted', 'keep submissions that are under review, withdrawn or rejected', false)
    .action(async (options: unknown) => {
      await downloadCommand(options, getConfig());
    });
}
