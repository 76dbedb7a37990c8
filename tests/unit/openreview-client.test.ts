import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { OpenReviewAuthError } from '../../apps/cli/src/services/errors';
import { OpenReviewClient, queryVenues } from '../../apps/cli/src/services/openreview/client';
import { resolveStatus } from '../../apps/cli/src/services/openreview/ingest';
import type { PaperRecord, VenueSource } from '../../apps/cli/src/services/openreview/types';

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

const VENUE = 'ICLR.cc/2025/Conference';

const acceptedNote = {
  id: 'n1',
  number: 7,
  cdate: Date.UTC(2024, 8, 20),
  content: {
    title: { value: 'Deep  RL' },
    abstract: { value: 'About RL' },
    authors: { value: ['Wei Zhang', 'Ming Li'] },
    venue: { value: 'ICLR 2025 Poster' },
    venueid: { value: VENUE },
    pdf: { value: '/pdf/n1.pdf' },
  },
};

const withdrawnNote = {
  id: 'n2',
  number: 8,
  content: {
    title: { value: 'Gone' },
    venue: { value: 'ICLR 2025 Conference Withdrawn Submission' },
    venueid: { value: `${VENUE}/Withdrawn_Submission` },
  },
};

const pendingNote = {
  id: 'n3',
  content: {
    venue: { value: 'Submitted to ICLR 2025' },
    venueid: { value: `${VENUE}/Submission` },
  },
};

describe('resolveStatus', () => {
  it('derives the decision state from venue labels', () => {
    expect(resolveStatus(VENUE, 'ICLR 2025 Oral')).toBe('active');
    expect(resolveStatus(`${VENUE}/Withdrawn_Submission`, '')).toBe('withdrawn');
    expect(resolveStatus(`${VENUE}/Desk_Rejected_Submission`, '')).toBe('withdrawn');
    expect(resolveStatus(`${VENUE}/Rejected_Submission`, '')).toBe('rejected');
    expect(resolveStatus(`${VENUE}/Submission`, '')).toBe('under-review');
    expect(resolveStatus('', 'Submitted to ICLR 2025')).toBe('under-review');
  });
});

describe('OpenReviewClient', () => {
  const fetchMock = vi.fn<typeof fetch>();

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  function createClient(pageSize?: number) {
    return new OpenReviewClient({
      baseUrl: 'https://api.test/',
      credentials: { username: 'user@example.com', password: 'test-secret' },
      pageSize,
    });
  }

  it('logs in and pages through venue submissions', async () => {
    fetchMock
      .mockResolvedValueOnce(jsonResponse({ token: 'test-token' }))
      .mockResolvedValueOnce(
        jsonResponse({ groups: [{ id: VENUE, content: { submission_name: { value: 'Submission' } } }] })
      )
      .mockResolvedValueOnce(jsonResponse({ notes: [acceptedNote, withdrawnNote], count: 3 }))
      .mockResolvedValueOnce(jsonResponse({ notes: [pendingNote], count: 3 }));

    const client = createClient(2);
    await client.login();
    const records = await client.listSubmissions(VENUE);

    expect(fetchMock).toHaveBeenCalledTimes(4);
    const [loginUrl, loginInit] = fetchMock.mock.calls[0];
    expect(loginUrl).toBe('https://api.test/login');
    expect(loginInit?.method).toBe('POST');
    expect(loginInit?.body).toBe(JSON.stringify({ id: 'user@example.com', password: 'test-secret' }));

    expect(fetchMock.mock.calls[1][0]).toBe('https://api.test/groups?id=ICLR.cc%2F2025%2FConference');
    expect(fetchMock.mock.calls[1][1]?.headers).toEqual({
      Accept: 'application/json',
      Authorization: 'Bearer test-token',
    });
    expect(fetchMock.mock.calls[2][0]).toBe(
      'https://api.test/notes?invitation=ICLR.cc%2F2025%2FConference%2F-%2FSubmission&offset=0&limit=2'
    );
    expect(String(fetchMock.mock.calls[3][0])).toContain('offset=2&limit=2');

    expect(records).toEqual<PaperRecord[]>([
      {
        id: 'n1',
        number: 7,
        title: 'Deep RL',
        abstract: 'About RL',
        authors: ['Wei Zhang', 'Ming Li'],
        venueId: VENUE,
        venue: 'ICLR 2025 Poster',
        year: 2025,
        status: 'active',
        pdf: '/pdf/n1.pdf',
      },
      {
        id: 'n2',
        number: 8,
        title: 'Gone',
        abstract: '',
        authors: [],
        venueId: VENUE,
        venue: 'ICLR 2025 Conference Withdrawn Submission',
        year: 2025,
        status: 'withdrawn',
        pdf: null,
      },
      {
        id: 'n3',
        number: null,
        title: 'Untitled',
        abstract: '',
        authors: [],
        venueId: VENUE,
        venue: 'Submitted to ICLR 2025',
        year: 2025,
        status: 'under-review',
        pdf: null,
      },
    ]);
  });

  it('stops after a short page when the API sends no count', async () => {
    fetchMock
      .mockResolvedValueOnce(jsonResponse({ groups: [{ id: VENUE }] }))
      .mockResolvedValueOnce(jsonResponse({ notes: [acceptedNote] }));

    const records = await createClient(2).listSubmissions(VENUE);

    expect(records).toHaveLength(1);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('rejects bad credentials with an auth error', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ message: 'Invalid username or password' }, 403));

    const attempt = createClient().login();

    await expect(attempt).rejects.toBeInstanceOf(OpenReviewAuthError);
    await expect(attempt).rejects.toThrow('OpenReview login failed (403): Invalid username or password');
  });

  it('fails for an unknown venue', async () => {
    fetchMock.mockResolvedValueOnce(jsonResponse({ groups: [] }));

    await expect(createClient().listSubmissions('Nope.cc/2025')).rejects.toThrow(
      'Venue group not found: Nope.cc/2025'
    );
  });

  it('downloads attachments with the session token', async () => {
    fetchMock
      .mockResolvedValueOnce(jsonResponse({ token: 'test-token' }))
      .mockResolvedValueOnce(new Response(new Uint8Array([37, 80, 68, 70])));

    const client = createClient();
    await client.login();
    const bytes = await client.fetchPdf({
      id: 'n1',
      number: 7,
      title: 'Deep RL',
      abstract: '',
      authors: [],
      venueId: VENUE,
      venue: 'ICLR 2025',
      year: 2025,
      status: 'active',
      pdf: '/pdf/n1.pdf',
    });

    expect(Array.from(bytes)).toEqual([37, 80, 68, 70]);
    expect(fetchMock.mock.calls[1][0]).toBe('https://api.test/attachment?id=n1&name=pdf');
    expect(fetchMock.mock.calls[1][1]?.headers).toEqual({ Authorization: 'Bearer test-token' });
  });
});

describe('queryVenues', () => {
  it('skips a failing venue and keeps querying the rest', async () => {
    const record: PaperRecord = {
      id: 'p1',
      number: 1,
      title: 'Deep RL',
      abstract: '',
      authors: [],
      venueId: VENUE,
      venue: 'ICLR 2025',
      year: 2025,
      status: 'active',
      pdf: null,
    };
    const source: VenueSource = {
      listSubmissions: vi.fn(async (venueId: string) => {
        if (venueId === 'Broken.cc/2025') throw new Error('OpenReview /groups request failed (500)');
        return venueId === 'Empty.cc/2025' ? [] : [record];
      }),
    };
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});

    const result = await queryVenues(source, ['Broken.cc/2025', 'Empty.cc/2025', VENUE]);

    expect(result.records).toEqual([record]);
    expect(result.venuesQueried).toEqual(['Empty.cc/2025', VENUE]);
    expect(result.venuesSkipped).toEqual(['Broken.cc/2025']);
    expect(result.failures).toEqual(['Broken.cc/2025: OpenReview /groups request failed (500)']);
    expect(warn).toHaveBeenCalledWith('[openreview] Empty.cc/2025 returned no submissions');
    vi.restoreAllMocks();
  });
});
