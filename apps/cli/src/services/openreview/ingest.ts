import type { OpenReviewNote, PaperRecord, SubmissionStatus } from './types';

const YEAR_PATTERN = /\b(19|20)\d{2}\b/;

function readValue(note: OpenReviewNote, key: string): unknown {
  return note.content[key]?.value;
}

function readString(note: OpenReviewNote, key: string): string {
  const value = readValue(note, key);
  if (typeof value === 'string') return value.replace(/\s+/g, ' ').trim();
  if (typeof value === 'number') return String(value);
  return '';
}

function readStringList(note: OpenReviewNote, key: string): string[] {
  const value = readValue(note, key);
  if (!Array.isArray(value)) return [];
  return value
    .filter((item): item is string => typeof item === 'string')
    .map((item) => item.trim())
    .filter(Boolean);
}

function yearFromText(text: string): number | null {
  const match = text.match(YEAR_PATTERN);
  return match ? Number(match[0]) : null;
}

function resolveYear(note: OpenReviewNote, venue: string, venueId: string): number | null {
  const explicit = readValue(note, 'year');
  if (typeof explicit === 'number' && Number.isInteger(explicit)) return explicit;
  if (typeof explicit === 'string' && /^\d{4}$/.test(explicit.trim())) return Number(explicit);

  const fromLabels = yearFromText(venue) ?? yearFromText(venueId);
  if (fromLabels !== null) return fromLabels;

  const timestamp = note.pdate ?? note.cdate;
  if (typeof timestamp === 'number' && Number.isFinite(timestamp)) {
    return new Date(timestamp).getUTCFullYear();
  }
  return null;
}

/**
 * Derive the decision state of a submission from its venue labels.
 * OpenReview moves decided papers to `<venue>/Withdrawn_Submission`,
 * `<venue>/Rejected_Submission`, etc.; undecided ones keep
 * `<venue>/Submission` and a "Submitted to ..." label.
 */
export function resolveStatus(venueIdLabel: string, venueLabel: string): SubmissionStatus {
  if (/(Withdrawn|Desk_Rejected)_Submission$/i.test(venueIdLabel)) return 'withdrawn';
  if (/Rejected_Submission$/i.test(venueIdLabel)) return 'rejected';
  if (/\/Submission$/i.test(venueIdLabel) || /^submitted to\b/i.test(venueLabel)) {
    return 'under-review';
  }
  return 'active';
}

export function toPaperRecord(note: OpenReviewNote, queriedVenueId: string): PaperRecord {
  const venueIdLabel = readString(note, 'venueid');
  const venue = readString(note, 'venue') || venueIdLabel || queriedVenueId;
  const pdf = readString(note, 'pdf');

  return {
    id: note.id,
    number: typeof note.number === 'number' ? note.number : null,
    title: readString(note, 'title') || 'Untitled',
    abstract: readString(note, 'abstract'),
    authors: readStringList(note, 'authors'),
    venueId: queriedVenueId,
    venue,
    year: resolveYear(note, venue, venueIdLabel || queriedVenueId),
    status: resolveStatus(venueIdLabel, readString(note, 'venue')),
    pdf: pdf || null,
  };
}
