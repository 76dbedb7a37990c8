import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import os from 'os';
import path from 'path';
import { promises as fs } from 'fs';
import { summarizeDirectory, titleFromStem } from '../../apps/cli/src/services/summaries/runner';
import { PdfTextExtractor } from '../../apps/cli/src/services/summaries/pdf-text';
import type { Summarizer, SummaryContent, TextExtractor } from '../../apps/cli/src/services/summaries/types';

// Test PDFs are plain text files; the stub extractor reads them as is
const extractor: TextExtractor = {
  async extract(pdfPath) {
    const text = await fs.readFile(pdfPath, 'utf-8');
    if (text === 'corrupt') throw new Error('Invalid PDF structure');
    return text;
  },
};

function contentFor(text: string): SummaryContent {
  return {
    summary: `summary of ${text}`,
    phenomenon: ['现象'],
    problem: ['问题'],
    mechanism: ['机制'],
    result: ['结果'],
  };
}

describe('summarizeDirectory', () => {
  let root: string;
  let inputDir: string;
  let outDir: string;

  beforeEach(async () => {
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'summaries-'));
    inputDir = path.join(root, 'papers');
    outDir = path.join(root, 'summaries');
    await fs.mkdir(path.join(inputDir, 'ICLR.cc_2025_Conference'), { recursive: true });
    await fs.writeFile(path.join(inputDir, '1_Alpha.pdf'), 'Alpha text');
    await fs.writeFile(path.join(inputDir, '2_Beta.pdf'), 'Beta text');
    await fs.writeFile(path.join(inputDir, 'ICLR.cc_2025_Conference', '3_Gamma.pdf'), 'Gamma text');
    await fs.writeFile(path.join(inputDir, 'broken.pdf'), 'corrupt');
    await fs.writeFile(path.join(inputDir, 'empty.pdf'), '   ');
    await fs.writeFile(path.join(inputDir, 'notes.txt'), 'not a pdf');
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fs.rm(root, { recursive: true, force: true });
  });

  it('writes one JSON file per readable PDF and skips the rest', async () => {
    const summarizer: Summarizer = { summarize: vi.fn(async (text: string) => contentFor(text)) };

    const report = await summarizeDirectory(inputDir, outDir, { extractor, summarizer });

    expect(report.written).toHaveLength(3);
    expect(report.skipped.map((item) => [path.basename(item.file), item.reason]).sort()).toEqual([
      ['broken.pdf', 'Cannot read PDF: Invalid PDF structure'],
      ['empty.pdf', 'Extracted text is empty'],
    ]);
    expect((await fs.readdir(outDir)).sort()).toEqual(['1_Alpha.json', '2_Beta.json', '3_Gamma.json']);

    const saved: unknown = JSON.parse(await fs.readFile(path.join(outDir, '1_Alpha.json'), 'utf-8'));
    expect(saved).toEqual({
      id: '1_Alpha',
      title: 'Alpha',
      summary: 'summary of Alpha text',
      phenomenon: ['现象'],
      problem: ['问题'],
      mechanism: ['机制'],
      result: ['结果'],
    });
  });

  it('keeps going when the API fails for one paper', async () => {
    const summarizer: Summarizer = {
      summarize: vi.fn(async (text: string) => {
        if (text === 'Beta text') throw new Error('503 Service Unavailable');
        return { ...contentFor(text), title: 'Title From Model' };
      }),
    };

    const report = await summarizeDirectory(inputDir, outDir, { extractor, summarizer });

    expect(report.written.map((file) => path.basename(file)).sort()).toEqual(['1_Alpha.json', '3_Gamma.json']);
    expect(report.skipped.find((item) => item.file.endsWith('2_Beta.pdf'))?.reason).toBe('503 Service Unavailable');
    const saved: unknown = JSON.parse(await fs.readFile(path.join(outDir, '3_Gamma.json'), 'utf-8'));
    expect(saved).toMatchObject({ id: '3_Gamma', title: 'Title From Model' });
  });

  it('does nothing for a directory without PDFs', async () => {
    const emptyDir = path.join(root, 'nothing');
    await fs.mkdir(emptyDir);
    const summarizer: Summarizer = { summarize: vi.fn(async (text: string) => contentFor(text)) };

    const report = await summarizeDirectory(emptyDir, outDir, { extractor, summarizer });

    expect(report).toEqual({ written: [], skipped: [] });
    expect(summarizer.summarize).not.toHaveBeenCalled();
  });

  it('rejects files that are not PDFs', async () => {
    await expect(new PdfTextExtractor().extract(path.join(inputDir, 'notes.txt'))).rejects.toThrow();
  });
});

describe('titleFromStem', () => {
  it('drops the submission number prefix', () => {
    expect(titleFromStem('12_Deep RL')).toBe('Deep RL');
    expect(titleFromStem('Deep RL')).toBe('Deep RL');
  });
});
