/**
 * Slide deck generator
 * One slide per paper summary, filled from a JSON slide template and
 * written with pptxgenjs.
 */

import PptxGenJS from 'pptxgenjs';
import path from 'path';
import { promises as fs } from 'fs';
import { ConfigurationError, errorMessage } from '../errors';
import { isInLanguage } from '../summaries/language';
import { titleFromStem } from '../summaries/runner';
import {
  paperSummarySchema,
  type PaperSummary,
  type TargetLanguage,
  type Translator,
} from '../summaries/types';
import type { ShapeElement, SlideTemplate, TextElement } from './template';

export interface LoadedSummary {
  file: string;
  summary: PaperSummary;
}

export interface SlideContent {
  index: number;
  page: number;
  totalPages: number;
  title: string;
  reference: string;
  summary: string;
  phenomenon: string[];
  problem: string[];
  mechanism: string[];
  result: string[];
}

const CIRCLED_NUMBERS = [
  '①', '②', '③', '④', '⑤', '⑥', '⑦', '⑧', '⑨', '⑩',
  '⑪', '⑫', '⑬', '⑭', '⑮', '⑯', '⑰', '⑱', '⑲', '⑳',
];

/**
 * Summary JSON files of dir in file name order. Files that are not valid
 * summaries are reported and left out.
 */
export async function loadSummaries(dir: string): Promise<LoadedSummary[]> {
  const names = (await fs.readdir(dir))
    .filter((name) => name.toLowerCase().endsWith('.json'))
    .sort((a, b) => a.localeCompare(b));

  const loaded: LoadedSummary[] = [];
  for (const name of names) {
    const file = path.join(dir, name);
    try {
      const data: unknown = JSON.parse(await fs.readFile(file, 'utf-8'));
      const parsed = paperSummarySchema.parse(data);
      const stem = path.basename(name, path.extname(name));
      loaded.push({
        file,
        summary: {
          id: parsed.id || stem,
          title: parsed.title.trim() || titleFromStem(stem),
          summary: parsed.summary.trim(),
          phenomenon: parsed.phenomenon,
          problem: parsed.problem,
          mechanism: parsed.mechanism,
          result: parsed.result,
        },
      });
    } catch (error) {
      console.warn(`[slides] Skipping ${name}: ${errorMessage(error)}`);
    }
  }
  return loaded;
}

function normalizeForLookup(text: string): string {
  return text
    .replace(/[^\p{L}\p{N}\s]/gu, '')
    .replace(/\s+/g, ' ')
    .trim()
    .toLowerCase();
}

/**
 * First reference line that contains the paper title (punctuation and case ignored)
 */
export function findReference(title: string, references: readonly string[]): string {
  const needle = normalizeForLookup(title);
  if (!needle) return '';
  return references.find((line) => normalizeForLookup(line).includes(needle)) ?? '';
}

export function indexedText(items: readonly string[]): string {
  return items
    .map((item, i) => `${CIRCLED_NUMBERS[i] ?? `(${i + 1})`} ${item}`)
    .join('\n');
}

export function plainText(items: readonly string[]): string {
  return items.join('\n');
}

export function buildSlidePlan(
  summaries: readonly PaperSummary[],
  references: readonly string[]
): SlideContent[] {
  return summaries.map((summary, i) => ({
    index: i + 1,
    page: i + 1,
    totalPages: summaries.length,
    title: summary.title,
    reference: findReference(summary.title, references),
    summary: summary.summary,
    phenomenon: summary.phenomenon,
    problem: summary.problem,
    mechanism: summary.mechanism,
    result: summary.result,
  }));
}

export function placeholderValues(slide: SlideContent): Record<string, string> {
  return {
    'No.': String(slide.index),
    title: slide.title,
    reference: slide.reference,
    summary: slide.summary,
    phenomenon: plainText(slide.phenomenon),
    problems: indexedText(slide.problem),
    methods: indexedText(slide.mechanism),
    results: indexedText(slide.result),
    Pages: `${slide.page} / ${slide.totalPages}`,
    totalpages: String(slide.totalPages),
  };
}

/**
 * Replace {{key}} markers; unknown markers are left untouched
 */
export function fillPlaceholders(text: string, values: Record<string, string>): string {
  return text.replace(/\{\{\s*([^{}]+?)\s*\}\}/g, (marker, key: string) =>
    Object.prototype.hasOwnProperty.call(values, key) ? values[key] : marker
  );
}

async function translateText(
  text: string,
  translator: Translator,
  lang: TargetLanguage
): Promise<string> {
  if (!text.trim() || isInLanguage(text, lang)) return text;
  try {
    return await translator.translate(text, lang);
  } catch (error) {
    console.warn(`[slides] Translation failed, keeping original text: ${errorMessage(error)}`);
    return text;
  }
}

/**
 * Translate summary text that is not in the target language.
 * The paper title is left as is.
 */
export async function localizeSummary(
  summary: PaperSummary,
  translator: Translator,
  lang: TargetLanguage
): Promise<PaperSummary> {
  const translateAll = async (items: readonly string[]): Promise<string[]> => {
    const out: string[] = [];
    for (const item of items) {
      out.push(await translateText(item, translator, lang));
    }
    return out;
  };

  return {
    ...summary,
    summary: await translateText(summary.summary, translator, lang),
    phenomenon: await translateAll(summary.phenomenon),
    problem: await translateAll(summary.problem),
    mechanism: await translateAll(summary.mechanism),
    result: await translateAll(summary.result),
  };
}

export class SlideDeckGenerator {
  constructor(private readonly template: SlideTemplate) {}

  render(slides: readonly SlideContent[]): PptxGenJS {
    const pptx = new PptxGenJS();
    pptx.layout = this.template.layout;
    pptx.title = 'Paper summaries';

    for (const content of slides) {
      const slide = pptx.addSlide();
      slide.background = { color: this.template.background };
      const values = placeholderValues(content);

      for (const shape of this.template.shapes) {
        this.addShape(pptx, slide, shape);
      }
      for (const element of this.template.elements) {
        this.addText(slide, element, fillPlaceholders(element.text, values));
      }
      this.addText(slide, this.template.pageNumber, fillPlaceholders(this.template.pageNumber.text, values));
    }

    return pptx;
  }

  async save(slides: readonly SlideContent[], outPath: string): Promise<string> {
    const pptx = this.render(slides);
    await fs.mkdir(path.dirname(path.resolve(outPath)), { recursive: true });
    const fileName = outPath.toLowerCase().endsWith('.pptx') ? outPath : `${outPath}.pptx`;
    await pptx.writeFile({ fileName });
    return fileName;
  }

  private addShape(pptx: PptxGenJS, slide: PptxGenJS.Slide, shape: ShapeElement): void {
    slide.addShape(pptx.ShapeType.rect, {
      x: shape.x,
      y: shape.y,
      w: shape.w,
      h: shape.h,
      line: { color: shape.fill, transparency: 100 },
      fill: { color: shape.fill },
    });
  }

  private addText(slide: PptxGenJS.Slide, element: TextElement, text: string): void {
    slide.addText(text, {
      x: element.x,
      y: element.y,
      w: element.w,
      h: element.h,
      fontFace: element.fontFace ?? this.template.fontFace,
      fontSize: element.fontSize,
      bold: element.bold,
      italic: element.italic,
      color: element.color ?? this.template.textColor,
      align: element.align,
      valign: element.valign,
      fit: 'shrink',
      margin: 0,
      ...(element.fill ? { fill: { color: element.fill } } : {}),
    });
  }
}

export interface GenerateSlidesOptions {
  summariesDir: string;
  outPath: string;
  template: SlideTemplate;
  references: readonly string[];
  translator?: Translator;
  targetLang: TargetLanguage;
}

export interface GenerateSlidesResult {
  outPath: string;
  slideCount: number;
}

export async function generateSlides(options: GenerateSlidesOptions): Promise<GenerateSlidesResult> {
  const loaded = await loadSummaries(options.summariesDir);
  if (loaded.length === 0) {
    throw new ConfigurationError(`No summary JSON files found in ${options.summariesDir}`);
  }

  const summaries: PaperSummary[] = [];
  for (const { summary } of loaded) {
    summaries.push(
      options.translator
        ? await localizeSummary(summary, options.translator, options.targetLang)
        : summary
    );
  }

  const plan = buildSlidePlan(summaries, options.references);
  const outPath = await new SlideDeckGenerator(options.template).save(plan, options.outPath);
  console.log(`[slides] Generated ${plan.length} slides: ${outPath}`);
  return { outPath, slideCount: plan.length };
}
