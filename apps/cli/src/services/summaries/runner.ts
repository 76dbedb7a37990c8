import path from 'path';
import { promises as fs } from 'fs';
import { errorMessage } from '../errors';
import type { PaperSummary, Summarizer, TextExtractor } from './types';

export interface SummarizeDeps {
  extractor: TextExtractor;
  summarizer: Summarizer;
}

export interface SummarizeReport {
  written: string[];
  skipped: Array<{ file: string; reason: string }>;
}

/**
 * PDFs under dir (recursive), sorted by relative path
 */
export async function listPdfFiles(dir: string): Promise<string[]> {
  const entries = await fs.readdir(dir, { recursive: true });
  return entries
    .filter((entry) => entry.toLowerCase().endsWith('.pdf'))
    .map((entry) => path.join(dir, entry))
    .sort((a, b) => a.localeCompare(b));
}

/**
 * "12_Deep RL" -> "Deep RL"
 */
export function titleFromStem(stem: string): string {
  const match = stem.match(/^\d+_(.+)$/);
  return (match?.[1] ?? stem).trim();
}

export function defaultSummaryDir(inputDir: string): string {
  return path.join(path.dirname(path.resolve(inputDir)), 'summaries');
}

export async function summarizeDirectory(
  inputDir: string,
  outDir: string,
  deps: SummarizeDeps
): Promise<SummarizeReport> {
  const report: SummarizeReport = { written: [], skipped: [] };
  const pdfs = await listPdfFiles(inputDir);
  if (pdfs.length === 0) {
    console.warn(`[summarize] No PDF found in ${inputDir}`);
    return report;
  }

  await fs.mkdir(outDir, { recursive: true });

  for (const [index, pdfPath] of pdfs.entries()) {
    const name = path.basename(pdfPath);
    const stem = path.basename(pdfPath, path.extname(pdfPath));
    console.log(`[summarize] (${index + 1}/${pdfs.length}) ${name}`);

    let text: string;
    try {
      text = await deps.extractor.extract(pdfPath);
    } catch (error) {
      const reason = `Cannot read PDF: ${errorMessage(error)}`;
      console.warn(`[summarize] Skipping ${name}: ${reason}`);
      report.skipped.push({ file: pdfPath, reason });
      continue;
    }

    if (!text.trim()) {
      console.warn(`[summarize] Skipping ${name}: extracted text is empty`);
      report.skipped.push({ file: pdfPath, reason: 'Extracted text is empty' });
      continue;
    }

    try {
      const content = await deps.summarizer.summarize(text);
      const summary: PaperSummary = {
        id: stem,
        title: content.title || titleFromStem(stem),
        summary: content.summary,
        phenomenon: content.phenomenon,
        problem: content.problem,
        mechanism: content.mechanism,
        result: content.result,
      };
      const outPath = path.join(outDir, `${stem}.json`);
      await fs.writeFile(outPath, `${JSON.stringify(summary, null, 2)}\n`, 'utf-8');
      report.written.push(outPath);
    } catch (error) {
      const reason = errorMessage(error);
      console.error(`[summarize] ${name}: ${reason}`);
      report.skipped.push({ file: pdfPath, reason });
    }
  }

  console.log(`[summarize] Saved ${report.written.length} summaries to ${outDir}`);
  return report;
}
