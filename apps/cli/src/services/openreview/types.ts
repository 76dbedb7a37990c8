import { z } from 'zod';

export type SubmissionStatus = 'active' | 'under-review' | 'withdrawn' | 'rejected';

/**
 * Paper metadata with every optional OpenReview field already resolved.
 */
export interface PaperRecord {
  readonly id: string;
  readonly number: number | null;
  readonly title: string;
  readonly abstract: string;
  readonly authors: readonly string[];
  /** Venue id the record was queried from */
  readonly venueId: string;
  /** Human readable venue, e.g. "ICLR 2025 Poster" */
  readonly venue: string;
  readonly year: number | null;
  readonly status: SubmissionStatus;
  /** Attachment path ("/pdf/...") or absolute URL */
  readonly pdf: string | null;
}

/**
 * Where venue submissions come from
 */
export interface VenueSource {
  listSubmissions(venueId: string): Promise<PaperRecord[]>;
}

/**
 * Where PDF bytes come from
 */
export interface PdfSource {
  fetchPdf(record: PaperRecord): Promise<Uint8Array>;
}

// API v2 wraps every content field as { value: ... }
const contentField = z.object({ value: z.unknown() }).passthrough();

export const noteSchema = z
  .object({
    id: z.string().min(1),
    number: z.number().int().nullish(),
    cdate: z.number().nullish(),
    pdate: z.number().nullish(),
    content: z.record(contentField).default({}),
  })
  .passthrough();

export type OpenReviewNote = z.infer<typeof noteSchema>;

export const notesPageSchema = z.object({
  notes: z.array(z.unknown()).default([]),
  count: z.number().optional(),
});

export const groupsSchema = z.object({
  groups: z
    .array(
      z
        .object({
          id: z.string(),
          content: z.record(contentField).optional(),
        })
        .passthrough()
    )
    .default([]),
});

export const loginSchema = z.object({
  token: z.string().min(1),
});
