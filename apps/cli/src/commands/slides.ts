import path from 'path';
import { Command, Option } from 'commander';
import { z } from 'zod';
import { getConfig, type AppConfig } from '../services/config';
import { readReferenceLines } from '../services/references/writer';
import {
  findReference,
  generateSlides,
  loadSummaries,
  type GenerateSlidesResult,
} from '../services/slides/generator';
import { DEFAULT_TEMPLATE_PATH, loadSlideTemplate } from '../services/slides/template';
import { DeepSeekClient, OpenAIChatClient } from '../services/summaries/deepseek';
import { TARGET_LANGUAGES } from '../services/summaries/types';
import { parseOptions } from './options';

const slidesOptionsSchema = z.object({
  summaries: z.string().trim().min(1),
  out: z.string().trim().min(1).default('slides.pptx'),
  template: z.string().trim().min(1).optional(),
  refs: z.string().trim().min(1).optional(),
  lang: z.enum(TARGET_LANGUAGES).default('zh'),
  translate: z.boolean().default(true),
  printInfo: z.boolean().default(false),
});

export function defaultReferencesPath(summariesDir: string): string {
  return path.join(path.dirname(path.resolve(summariesDir)), 'references_ieee.txt');
}

function createTranslator(config: AppConfig): DeepSeekClient | undefined {
  const apiKey = config.deepseek.apiKey;
  if (!apiKey) {
    console.warn('[slides] DEEPSEEK_API_KEY is not set; summaries are used without translation');
    return undefined;
  }
  return new DeepSeekClient({
    chat: new OpenAIChatClient({ apiKey, baseURL: config.deepseek.baseUrl }, config.deepseek.model),
  });
}

async function printInfo(summariesDir: string, references: readonly string[]): Promise<void> {
  const loaded = await loadSummaries(summariesDir);
  loaded.forEach(({ summary }, i) => {
    console.log(`${i + 1}. ${summary.title}`);
    console.log(findReference(summary.title, references));
    console.log(`${JSON.stringify(summary, null, 2)}\n`);
  });
}

export async function slidesCommand(raw: unknown, config: AppConfig): Promise<GenerateSlidesResult | null> {
  const options = parseOptions(slidesOptionsSchema, raw, 'slides');
  const summariesDir = path.resolve(options.summaries);
  const references = await readReferenceLines(options.refs ?? defaultReferencesPath(summariesDir));

  if (options.printInfo) {
    await printInfo(summariesDir, references);
    return null;
  }

  const template = await loadSlideTemplate(options.template ?? DEFAULT_TEMPLATE_PATH);
  const translator = options.translate ? createTranslator(config) : undefined;
  try {
    return await generateSlides({
      summariesDir,
      outPath: path.resolve(options.out),
      template,
      references,
      translator,
      targetLang: options.lang,
    });
  } finally {
    translator?.close();
  }
}

export function registerSlidesCommand(program: Command): void {
  program
    .command('slides')
    .description('Build a slide deck from JSON summaries, one slide per paper')
    .argument('<summaries>', 'directory containing JSON summaries')
    .option('--out <file>', 'output .pptx file', 'slides.pptx')
    .option('--template <file>', 'slide template JSON')
    .option('--refs <file>', 'reference list, one per line (default: <summaries>/../references_ieee.txt)')
    .addOption(new Option('--lang <lang>', 'slide language').choices(TARGET_LANGUAGES).default('zh'))
    .option('--no-translate', 'keep summary text as written')
    .option('--print-info', 'print summaries and references instead of generating slides', false)
    .action(async (summaries: string, options: Record<string, unknown>) => {
      await slidesCommand({ ...options, summaries }, getConfig());
    });
}
