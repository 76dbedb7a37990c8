/**
 * OpenReview API v2 client
 * Authenticates once, lists venue submissions page by page and
 * downloads PDF attachments. No retries: callers decide what a failure means.
 */

import { errorMessage, OpenReviewAuthError, OpenReviewRequestError } from '../errors';
import type { OpenReviewCredentials } from '../config';
import { toPaperRecord } from './ingest';
import {
  groupsSchema,
  loginSchema,
  noteSchema,
  notesPageSchema,
  type PaperRecord,
  type PdfSource,
  type VenueSource,
} from './types';

export interface OpenReviewClientOptions {
  baseUrl: string;
  credentials: OpenReviewCredentials;
  /** Notes per request (API maximum is 1000) */
  pageSize?: number;
}

const DEFAULT_SUBMISSION_NAME = 'Submission';

export class OpenReviewClient implements VenueSource, PdfSource {
  private token: string | null = null;
  private readonly baseUrl: string;
  private readonly pageSize: number;

  constructor(private readonly options: OpenReviewClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.pageSize = Math.min(Math.max(options.pageSize ?? 1000, 1), 1000);
  }

  async login(): Promise<void> {
    const response = await fetch(`${this.baseUrl}/login`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        id: this.options.credentials.username,
        password: this.options.credentials.password,
      }),
    });

    if (!response.ok) {
      const detail = await this.readErrorDetail(response);
      throw new OpenReviewAuthError(
        `OpenReview login failed (${response.status})${detail ? `: ${detail}` : ''}`,
        response.status
      );
    }

    const parsed = loginSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new OpenReviewAuthError('OpenReview login response did not include a token', response.status);
    }
    this.token = parsed.data.token;
  }

  /**
   * Resolve `<venue>/-/<submission_name>` from the venue group
   */
  async getSubmissionInvitation(venueId: string): Promise<string> {
    const body = groupsSchema.parse(
      await this.getJson('/groups', new URLSearchParams({ id: venueId }))
    );
    const group = body.groups[0];
    if (!group) {
      throw new OpenReviewRequestError(`Venue group not found: ${venueId}`, 404, '/groups');
    }
    const submissionName = group.content?.submission_name?.value;
    const name =
      typeof submissionName === 'string' && submissionName.trim()
        ? submissionName.trim()
        : DEFAULT_SUBMISSION_NAME;
    return `${venueId}/-/${name}`;
  }

  async listSubmissions(venueId: string): Promise<PaperRecord[]> {
    const invitation = await this.getSubmissionInvitation(venueId);
    const records: PaperRecord[] = [];

    for (let offset = 0; ; offset += this.pageSize) {
      const page = notesPageSchema.parse(
        await this.getJson(
          '/notes',
          new URLSearchParams({
            invitation,
            offset: String(offset),
            limit: String(this.pageSize),
          })
        )
      );

      for (const raw of page.notes) {
        const note = noteSchema.safeParse(raw);
        if (!note.success) {
          console.warn(`[openreview] Skipping malformed note in ${venueId}: ${note.error.issues[0]?.message ?? 'invalid'}`);
          continue;
        }
        records.push(toPaperRecord(note.data, venueId));
      }

      const reachedCount = typeof page.count === 'number' && offset + page.notes.length >= page.count;
      if (page.notes.length < this.pageSize || reachedCount) break;
    }

    return records;
  }

  async fetchPdf(record: PaperRecord): Promise<Uint8Array> {
    if (!record.pdf) {
      throw new OpenReviewRequestError(`No PDF attached to ${record.id}`, 404, '/attachment');
    }

    const isAbsolute = /^https?:\/\//i.test(record.pdf);
    const url = isAbsolute
      ? record.pdf
      : `${this.baseUrl}/attachment?${new URLSearchParams({ id: record.id, name: 'pdf' }).toString()}`;
    const endpoint = isAbsolute ? record.pdf : '/attachment';

    const response = await fetch(url, { headers: isAbsolute ? {} : this.authHeaders() });
    if (!response.ok) {
      throw new OpenReviewRequestError(
        `PDF download failed for ${record.id} (${response.status})`,
        response.status,
        endpoint
      );
    }
    return new Uint8Array(await response.arrayBuffer());
  }

  private authHeaders(): Record<string, string> {
    return this.token ? { Authorization: `Bearer ${this.token}` } : {};
  }

  private async getJson(endpoint: string, params: URLSearchParams): Promise<unknown> {
    const response = await fetch(`${this.baseUrl}${endpoint}?${params.toString()}`, {
      headers: { Accept: 'application/json', ...this.authHeaders() },
    });
    if (!response.ok) {
      const detail = await this.readErrorDetail(response);
      throw new OpenReviewRequestError(
        `OpenReview ${endpoint} request failed (${response.status})${detail ? `: ${detail}` : ''}`,
        response.status,
        endpoint
      );
    }
    return response.json();
  }

  private async readErrorDetail(response: Response): Promise<string> {
    try {
      const text = await response.text();
      const parsed: unknown = JSON.parse(text);
      if (parsed && typeof parsed === 'object' && 'message' in parsed && typeof parsed.message === 'string') {
        return parsed.message;
      }
      return text.slice(0, 200);
    } catch (error) {
      return errorMessage(error);
    }
  }
}

export interface VenueQueryResult {
  records: PaperRecord[];
  venuesQueried: string[];
  venuesSkipped: string[];
  failures: string[];
}

/**
 * Query venues one after another. A failing venue contributes nothing and
 * the remaining venues are still queried.
 */
export async function queryVenues(source: VenueSource, venueIds: readonly string[]): Promise<VenueQueryResult> {
  const records: PaperRecord[] = [];
  const venuesQueried: string[] = [];
  const venuesSkipped: string[] = [];
  const failures: string[] = [];

  for (const venueId of venueIds) {
    console.log(`[openreview] Scanning ${venueId}...`);
    try {
      const submissions = await source.listSubmissions(venueId);
      venuesQueried.push(venueId);
      if (submissions.length === 0) {
        console.warn(`[openreview] ${venueId} returned no submissions`);
      }
      records.push(...submissions);
    } catch (error) {
      const message = `${venueId}: ${errorMessage(error)}`;
      console.error(`[openreview] Cannot fetch ${message}`);
      venuesSkipped.push(venueId);
      failures.push(message);
    }
  }

  return { records, venuesQueried, venuesSkipped, failures };
}
