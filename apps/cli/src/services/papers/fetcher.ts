import path from 'path';
import { promises as fs } from 'fs';
import { errorMessage } from '../errors';
import type { PaperRecord, PdfSource } from '../openreview/types';

export interface DownloadedPaper {
  record: PaperRecord;
  path: string;
  /** cached: the file already existed and was reused */
  status: 'downloaded' | 'cached';
}

export interface SkippedPaper {
  record: PaperRecord;
  reason: string;
}

export interface FetchReport {
  downloaded: DownloadedPaper[];
  skipped: SkippedPaper[];
}

export interface FetchOptions {
  max: number | null;
}

/**
 * `<number>_<title>.pdf` with characters that are illegal in file names removed
 */
export function pdfFilename(record: PaperRecord): string {
  const title = record.title
    .replace(/[\\/*?:"<>|]/g, '')
    .replace(/\s+/g, ' ')
    .trim()
    .slice(0, 100)
    .trim();
  const prefix = record.number ?? record.id;
  return title ? `${prefix}_${title}.pdf` : `${prefix}.pdf`;
}

export function venueDirectoryName(venueId: string): string {
  return venueId.replace(/[\\/]+/g, '_');
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stats = await fs.stat(filePath);
    return stats.isFile() && stats.size > 0;
  } catch {
    return false;
  }
}

export async function fetchPdfs(
  records: readonly PaperRecord[],
  source: PdfSource,
  runDir: string,
  options: FetchOptions = { max: null }
): Promise<FetchReport> {
  const report: FetchReport = { downloaded: [], skipped: [] };

  for (const record of records) {
    if (options.max !== null && report.downloaded.length >= options.max) break;

    if (!record.pdf) {
      console.warn(`[fetcher] No PDF for ${record.id} (${record.title})`);
      report.skipped.push({ record, reason: 'No PDF attachment' });
      continue;
    }

    const dir = path.join(runDir, venueDirectoryName(record.venueId));
    const target = path.join(dir, pdfFilename(record));

    if (await fileExists(target)) {
      report.downloaded.push({ record, path: target, status: 'cached' });
      continue;
    }

    try {
      const data = await source.fetchPdf(record);
      await fs.mkdir(dir, { recursive: true });
      await fs.writeFile(target, data);
      report.downloaded.push({ record, path: target, status: 'downloaded' });
      console.log(`[fetcher] Saved ${path.basename(target)}`);
    } catch (error) {
      const reason = errorMessage(error);
      console.warn(`[fetcher] PDF missing for ${record.id}: ${reason}`);
      report.skipped.push({ record, reason });
    }
  }

  return report;
}
