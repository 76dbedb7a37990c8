/**
 * Download pipeline
 * Queries every venue, keeps the submissions matching the query, downloads
 * their PDFs into the run directory and writes the reference list for the
 * papers that actually landed on disk.
 */

import { queryVenues } from '../openreview/client';
import type { PaperRecord, PdfSource, VenueSource } from '../openreview/types';
import { formatReferences, type CitationStyle } from '../references/formatter';
import { writeReferenceFile } from '../references/writer';
import { fetchPdfs, type DownloadedPaper, type SkippedPaper } from './fetcher';
import { filterPapers } from './filter';

export interface RunContext {
  readonly query: RegExp;
  readonly venues: readonly string[];
  readonly outDir: string;
  readonly runDir: string;
  readonly style: CitationStyle;
  readonly max: number | null;
  readonly includeSubmitted: boolean;
}

export interface DownloadRunResult {
  venuesQueried: string[];
  venuesSkipped: string[];
  failures: string[];
  scanned: number;
  matched: PaperRecord[];
  downloaded: DownloadedPaper[];
  skipped: SkippedPaper[];
  citations: string[];
  referencesPath: string;
}

export async function runDownload(
  context: RunContext,
  source: VenueSource & PdfSource
): Promise<DownloadRunResult> {
  const { records, venuesQueried, venuesSkipped, failures } = await queryVenues(source, context.venues);

  const matched = filterPapers(records, {
    pattern: context.query,
    includeSubmitted: context.includeSubmitted,
    max: context.max,
  });
  console.log(`[download] ${matched.length} of ${records.length} submissions match ${context.query}`);

  const { downloaded, skipped } = await fetchPdfs(matched, source, context.runDir, { max: context.max });

  const citations = formatReferences(
    downloaded.map((paper) => paper.record),
    context.style
  );
  const referencesPath = await writeReferenceFile(context.runDir, context.style, citations);

  if (citations.length > 0) {
    console.log(`[download] Saved ${citations.length} references to ${referencesPath}`);
  } else {
    console.log('[download] No matching papers; reference list is empty.');
  }

  return {
    venuesQueried,
    venuesSkipped,
    failures,
    scanned: records.length,
    matched,
    downloaded,
    skipped,
    citations,
    referencesPath,
  };
}
