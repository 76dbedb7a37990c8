import type { PaperRecord } from '../openreview/types';
import { gbAuthor, ieeeAuthor } from './authors';

export const CITATION_STYLES = ['gb7714', 'ieee'] as const;
export type CitationStyle = (typeof CITATION_STYLES)[number];

export const ANONYMOUS_AUTHOR = 'Anonymous';
export const MISSING_YEAR = 'n.d.';

// GB/T 7714-2015 lists the first three authors
const GB_AUTHOR_LIMIT = 3;
// IEEE lists up to six authors, otherwise the first one and "et al."
const IEEE_AUTHOR_LIMIT = 6;

const JOURNAL_PATTERN = /\b(journal|transactions|letters|TMLR)\b/i;

export function venueLabel(venue: string): string {
  return venue.replace(/\s+(poster|oral|spotlight)$/i, '').trim();
}

export function isJournalVenue(venue: string): boolean {
  return JOURNAL_PATTERN.test(venue);
}

function formattedAuthors(record: PaperRecord, format: (raw: string) => string): string[] {
  return record.authors.map(format).filter(Boolean);
}

export function joinGbAuthors(authors: readonly string[]): string {
  if (authors.length === 0) return ANONYMOUS_AUTHOR;
  if (authors.length <= GB_AUTHOR_LIMIT) return authors.join(', ');
  return `${authors.slice(0, GB_AUTHOR_LIMIT).join(', ')}, et al`;
}

export function joinIeeeAuthors(authors: readonly string[]): string {
  if (authors.length === 0) return ANONYMOUS_AUTHOR;
  if (authors.length > IEEE_AUTHOR_LIMIT) return `${authors[0]} et al.`;
  if (authors.length === 1) return authors[0];
  if (authors.length === 2) return `${authors[0]} and ${authors[1]}`;
  return `${authors.slice(0, -1).join(', ')}, and ${authors[authors.length - 1]}`;
}

/**
 * [n] Zhang W, Li M. Deep RL[C]. ICLR, 2025.
 */
export function gb7714Citation(record: PaperRecord, ordinal: number): string {
  const authors = joinGbAuthors(formattedAuthors(record, gbAuthor));
  const venue = venueLabel(record.venue);
  const typeMark = isJournalVenue(venue) ? '[J]' : '[C]';
  const year = record.year ?? MISSING_YEAR;
  return `[${ordinal}] ${authors}. ${record.title}${typeMark}. ${venue}, ${year}.`;
}

/**
 * [n] W. Zhang and M. Li, "Deep RL," in Proc. ICLR, 2025.
 */
export function ieeeCitation(record: PaperRecord, ordinal: number): string {
  const authors = joinIeeeAuthors(formattedAuthors(record, ieeeAuthor));
  const venue = venueLabel(record.venue);
  const title = /[?!]$/.test(record.title) ? record.title : `${record.title},`;
  let venuePart = venue;
  if (venue && !/^in\s/i.test(venue) && !isJournalVenue(venue)) {
    venuePart = `in Proc. ${venue}`;
  }
  const year = record.year ?? MISSING_YEAR;
  return `[${ordinal}] ${authors}, "${title}" ${venuePart}, ${year}.`;
}

export function formatCitation(record: PaperRecord, style: CitationStyle, ordinal: number): string {
  return style === 'ieee' ? ieeeCitation(record, ordinal) : gb7714Citation(record, ordinal);
}

export function formatReferences(records: readonly PaperRecord[], style: CitationStyle): string[] {
  return records.map((record, index) => formatCitation(record, style, index + 1));
}
