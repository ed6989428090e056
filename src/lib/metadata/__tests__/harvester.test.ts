import { describe, it, expect } from 'vitest';
import { SourceUnavailableError } from '@/lib/errors';
import type { MetadataCandidate, MetadataHints, SourceId } from '@/types/metadata';
import { MetadataHarvester } from '../harvester';
import { MetadataSource, type LookupContext } from '../sources';

class StubSource extends MetadataSource {
  calls = 0;

  constructor(
    readonly id: SourceId,
    private readonly behaviour: (context: LookupContext) => Promise<MetadataCandidate[]>
  ) {
    super();
  }

  async lookup(_hints: MetadataHints, context: LookupContext): Promise<MetadataCandidate[]> {
    this.calls++;
    return this.behaviour(context);
  }
}

function candidate(source: SourceId, title: string): MetadataCandidate {
  return { source, confidence: 1, matchKey: 'doi', rank: 0, fields: { title }, extra: {} };
}

const hints: MetadataHints = {
  doi: '10.1234/dla.2020.7',
  isbn: null,
  title: 'Deep Learning for Document Analysis',
  authors: [],
  year: null,
};

function hanging(context: LookupContext): Promise<MetadataCandidate[]> {
  return new Promise((_, reject) => {
    context.signal.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
  });
}

describe('MetadataHarvester', () => {
  it('records failures and timeouts without raising', async () => {
    const harvester = new MetadataHarvester(
      [
        new StubSource('crossref', async () => [candidate('crossref', 'Deep Learning for Document Analysis')]),
        new StubSource('openalex', async () => {
          throw new SourceUnavailableError('openalex', 'HTTP 503');
        }),
        new StubSource('k10plus', hanging),
      ],
      { timeoutMs: 50, similarityFloor: 0.6 }
    );

    const result = await harvester.harvest(hints);

    expect(result.candidates).toEqual([candidate('crossref', 'Deep Learning for Document Analysis')]);
    expect(result.reports.map((r) => [r.source, r.status, r.candidates])).toEqual([
      ['crossref', 'ok', 1],
      ['openalex', 'unavailable', 0],
      ['k10plus', 'timeout', 0],
    ]);
    expect(result.reports[1]?.error).toBe('openalex unavailable: HTTP 503');
    expect(result.reports[2]?.error).toBe('k10plus did not answer within 50ms');
  });

  it('returns no candidates when every source is down', async () => {
    const harvester = new MetadataHarvester(
      [
        new StubSource('crossref', async () => {
          throw new Error('ECONNREFUSED');
        }),
        new StubSource('openlibrary', hanging),
      ],
      { timeoutMs: 30, similarityFloor: 0.6 }
    );

    const result = await harvester.harvest(hints);

    expect(result.candidates).toEqual([]);
    expect(result.reports.map((r) => r.status)).toEqual(['unavailable', 'timeout']);
    expect(result.reports[0]?.error).toBe('crossref unavailable: ECONNREFUSED');
  });

  it('only queries the requested sources', async () => {
    const crossref = new StubSource('crossref', async () => []);
    const openalex = new StubSource('openalex', async () => []);
    const harvester = new MetadataHarvester([crossref, openalex], { timeoutMs: 1000, similarityFloor: 0.6 });

    const result = await harvester.harvest(hints, { sources: ['openalex'] });

    expect(crossref.calls).toBe(0);
    expect(openalex.calls).toBe(1);
    expect(result.reports.map((r) => r.source)).toEqual(['openalex']);
  });

  it('skips sources that have nothing to search by', async () => {
    const crossref = new StubSource('crossref', async () => []);
    const harvester = new MetadataHarvester([crossref], { timeoutMs: 1000, similarityFloor: 0.6 });

    const result = await harvester.harvest({ doi: null, isbn: null, title: null, authors: ['Jane Smith'], year: null });

    expect(crossref.calls).toBe(0);
    expect(result.reports[0]?.status).toBe('skipped');
  });
});
