/**
 * Tests for ArxivWatcher
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ArxivWatcher, buildArxivQueryUrl, parseArxivId } from '../../src/watchers/arxiv';
import { makeTarget, textResponse } from '../helpers';

const mockFetch = vi.fn();
global.fetch = mockFetch;

const TARGET = makeTarget({ entityKey: 'arxiv:Alpha', source: 'arxiv', identifier: 'example diffusion' });
const OPTIONS = { timeoutMs: 1000, maxItems: 10 };

const ATOM_FEED = `<?xml version="1.0" encoding="UTF-8"?>
<feed xmlns="http://www.w3.org/2005/Atom">
  <title>arXiv Query</title>
  <id>http://arxiv.org/api/query</id>
  <updated>2026-03-01T00:00:00-05:00</updated>
  <entry>
    <id>http://arxiv.org/abs/2601.00001v2</id>
    <updated>2026-01-06T18:00:00Z</updated>
    <published>2026-01-05T18:00:00Z</published>
    <title>Scaling  Example
      Diffusion</title>
    <summary>  We scale
  example diffusion models.  </summary>
    <author><name>Ada Example</name></author>
    <author><name>Bo Sample</name></author>
    <link href="http://arxiv.org/abs/2601.00001v2" rel="alternate" type="text/html"/>
    <link title="pdf" href="http://arxiv.org/pdf/2601.00001v2" rel="related" type="application/pdf"/>
  </entry>
</feed>`;

describe('parseArxivId', () => {
  it('should split the version suffix off an abs URL', () => {
    expect(parseArxivId('http://arxiv.org/abs/2601.00001v2')).toEqual({
      base: '2601.00001',
      versioned: '2601.00001v2',
    });
  });

  it('should accept a bare id', () => {
    expect(parseArxivId('2601.00001')).toEqual({ base: '2601.00001', versioned: '2601.00001' });
  });
});

describe('buildArxivQueryUrl', () => {
  it('should search the phrase, newest first', () => {
    expect(buildArxivQueryUrl('example diffusion', 10)).toBe(
      'https://export.arxiv.org/api/query?search_query=all%3A%22example+diffusion%22&start=0&max_results=10&sortBy=submittedDate&sortOrder=descending'
    );
  });
});

describe('ArxivWatcher', () => {
  beforeEach(() => {
    mockFetch.mockReset();
  });

  it('should map Atom entries onto paper items', async () => {
    mockFetch.mockResolvedValueOnce(textResponse(ATOM_FEED, 'application/atom+xml'));

    const result = await new ArxivWatcher(OPTIONS).safeFetch(TARGET);

    expect(result.ok).toBe(true);
    if (result.ok && result.snapshot.kind === 'items') {
      expect(result.snapshot.items).toEqual([
        {
          id: 'arxiv:2601.00001',
          category: 'paper',
          fingerprint: '2601.00001v2',
          title: 'Scaling Example Diffusion',
          description: 'We scale example diffusion models.',
          url: 'http://arxiv.org/abs/2601.00001v2',
          timestamp: '2026-01-05T18:00:00.000Z',
          metadata: { arxivId: '2601.00001v2', authors: ['Ada Example'] },
        },
      ]);
    }
  });

  it('should fail on a server error', async () => {
    mockFetch.mockResolvedValueOnce(new Response('busy', { status: 503, statusText: 'Service Unavailable' }));

    const result = await new ArxivWatcher(OPTIONS).safeFetch(TARGET);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('arxiv responded 503 Service Unavailable');
    }
  });
});
