import path from 'path';
import { Command } from 'commander';
import { z } from 'zod';
import { getConfig, requireDeepSeekKey, type AppConfig } from '../services/config';
import { DeepSeekClient, OpenAIChatClient } from '../services/summaries/deepseek';
import { PdfTextExtractor } from '../services/summaries/pdf-text';
import { defaultSummaryDir, summarizeDirectory, type SummarizeReport } from '../services/summaries/runner';
import { parseInteger, parseOptions } from './options';

const summarizeOptionsSchema = z.object({
  path: z.string().trim().min(1),
  out: z.string().trim().min(1).optional(),
  apiKey: z.string().trim().min(1).optional(),
  budget: z.number().int().min(1_000).optional(),
});

export async function summarizeCommand(raw: unknown, config: AppConfig): Promise<SummarizeReport> {
  const options = parseOptions(summarizeOptionsSchema, raw, 'summarize');
  const apiKey = requireDeepSeekKey(config, options.apiKey);
  const inputDir = path.resolve(options.path);
  const outDir = options.out ? path.resolve(options.out) : defaultSummaryDir(inputDir);

  const client = new DeepSeekClient({
    chat: new OpenAIChatClient({ apiKey, baseURL: config.deepseek.baseUrl }, config.deepseek.model),
    tokenBudget: options.budget,
  });
  try {
    return await summarizeDirectory(inputDir, outDir, {
      extractor: new PdfTextExtractor(),
      summarizer: client,
    });
  } finally {
    client.close();
  }
}

export function registerSummarizeCommand(program: Command): void {
  program
    .command('summarize')
    .description('Summarize every PDF in a directory into JSON files with DeepSeek')
    .argument('<path>', 'directory containing PDFs')
    .option('--out <dir>', 'JSON output directory (default: <path>/../summaries)')
    .option('--api-key <key>', 'DeepSeek API key (default: DEEPSEEK_API_KEY)')
    .option('--budget <tokens>', 'token budget for paper text', parseInteger)
    .action(async (inputPath: string, options: Record<string, unknown>) => {
      await summarizeCommand({ ...options, path: inputPath }, getConfig());
    });
}
