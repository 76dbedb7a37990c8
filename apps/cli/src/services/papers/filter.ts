import type { PaperRecord, SubmissionStatus } from '../openreview/types';

export interface KeywordFilterOptions {
  pattern: RegExp;
  /** Keep submissions that are under review, withdrawn or rejected */
  includeSubmitted: boolean;
  /** Maximum number of records to keep; null means no cap */
  max: number | null;
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Compile a user query into a case-insensitive pattern.
 * Input that is not a valid regular expression is matched literally.
 */
export function compileQuery(query: string): RegExp {
  const trimmed = query.trim();
  try {
    return new RegExp(trimmed, 'i');
  } catch {
    return new RegExp(escapeRegExp(trimmed), 'i');
  }
}

export function matchesQuery(record: PaperRecord, pattern: RegExp): boolean {
  // lastIndex would leak between calls for global/sticky patterns
  const matcher = pattern.global || pattern.sticky
    ? new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ''))
    : pattern;
  return matcher.test(record.title) || matcher.test(record.abstract);
}

export function isFinalSubmission(status: SubmissionStatus): boolean {
  return status === 'active';
}

export function filterPapers(
  records: readonly PaperRecord[],
  options: KeywordFilterOptions
): PaperRecord[] {
  const kept: PaperRecord[] = [];
  for (const record of records) {
    if (options.max !== null && kept.length >= options.max) break;
    if (!options.includeSubmitted && !isFinalSubmission(record.status)) continue;
    if (!matchesQuery(record, options.pattern)) continue;
    kept.push(record);
  }
  return kept;
}
