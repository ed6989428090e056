import { describe, it, expect } from 'vitest';
import { fakeFetch } from '@/__tests__/fixtures';
import { SourceUnavailableError } from '@/lib/errors';
import type { MetadataHints } from '@/types/metadata';
import { CrossrefSource } from '../sources/crossref';
import { GoogleBooksSource } from '../sources/googlebooks';
import { K10plusSource } from '../sources/k10plus';
import { OpenAlexSource, reconstructAbstract } from '../sources/openalex';
import { OpenLibrarySource } from '../sources/openlibrary';
import { MemoryResponseCache } from '../response-cache';

const context = { signal: new AbortController().signal, similarityFloor: 0.6 };

function hints(partial: Partial<MetadataHints>): MetadataHints {
  return { doi: null, isbn: null, title: null, authors: [], year: null, ...partial };
}

describe('CrossrefSource', () => {
  const work = {
    DOI: '10.1234/DLA.2020.7',
    title: ['Deep Learning for Document Analysis'],
    author: [
      { given: 'Jane', family: 'Smith' },
      { given: 'Omar', family: 'Khan' },
    ],
    'container-title': ['Journal of Document Engineering'],
    published: { 'date-parts': [[2020, 3]] },
    publisher: 'Example Press',
    ISSN: ['1234-5678'],
    type: 'journal-article',
    abstract: '<jats:p>Neural networks.</jats:p>',
    'is-referenced-by-count': 12,
  };

  it('returns a full-confidence candidate for a matching DOI', async () => {
    const { fetch, calls } = fakeFetch([{ match: 'works/10.1234%2Fdla.2020.7', body: { message: work } }]);
    const source = new CrossrefSource({ fetch });

    const candidates = await source.lookup(hints({ doi: '10.1234/dla.2020.7' }), context);

    expect(calls).toEqual(['https://api.crossref.org/works/10.1234%2Fdla.2020.7']);
    expect(candidates).toEqual([
      {
        source: 'crossref',
        confidence: 1,
        matchKey: 'doi',
        rank: 0,
        fields: {
          title: 'Deep Learning for Document Analysis',
          authors: ['Jane Smith', 'Omar Khan'],
          year: 2020,
          journal: 'Journal of Document Engineering',
          publisher: 'Example Press',
          doi: '10.1234/dla.2020.7',
          isbn: null,
          language: null,
        },
        extra: {
          abstract: 'Neural networks.',
          issn: '1234-5678',
          type: 'journal-article',
          citationCount: 12,
        },
      },
    ]);
  });

  it('answers a repeated lookup from the response cache', async () => {
    const { fetch, calls } = fakeFetch([{ match: 'works/10.1234%2Fdla.2020.7', body: { message: work } }]);
    const cache = new MemoryResponseCache();
    const source = new CrossrefSource({ fetch, cache, cacheTtlMs: 60_000 });
    const doiHints = hints({ doi: '10.1234/dla.2020.7' });

    const first = await source.lookup(doiHints, context);
    const second = await source.lookup(doiHints, context);

    expect(calls).toHaveLength(1);
    expect(cache.size).toBe(1);
    expect(second).toEqual(first);
  });

  it('does not cache misses or use the cache without a TTL', async () => {
    const { fetch, calls } = fakeFetch([{ match: 'works/10.1234%2Fdla.2020.7', body: { message: work } }]);
    const cache = new MemoryResponseCache();

    const uncached = new CrossrefSource({ fetch, cache, cacheTtlMs: 0 });
    await uncached.lookup(hints({ doi: '10.1234/dla.2020.7' }), context);
    await uncached.lookup(hints({ doi: '10.1234/dla.2020.7' }), context);
    expect(calls).toHaveLength(2);

    const cached = new CrossrefSource({ fetch, cache, cacheTtlMs: 60_000 });
    expect(await cached.lookup(hints({ doi: '10.9999/missing' }), context)).toEqual([]);
    expect(cache.size).toBe(0);
  });

  it('falls back to a bibliographic search when the DOI is unknown', async () => {
    const { fetch, calls } = fakeFetch([{ match: 'query.bibliographic', body: { message: { items: [work] } } }]);
    const source = new CrossrefSource({ fetch });

    const candidates = await source.lookup(
      hints({ doi: '10.9999/missing', title: 'Deep Learning for Document Analysis', authors: ['Jane Smith'] }),
      context
    );

    expect(calls).toHaveLength(2);
    expect(calls[1]).toContain('query.author=smith');
    expect(candidates).toHaveLength(1);
    expect(candidates[0]?.matchKey).toBe('fuzzy');
    expect(candidates[0]?.confidence).toBe(1);
  });

  it('reports server errors as unavailable', async () => {
    const { fetch } = fakeFetch([{ match: 'crossref', status: 503, body: 'busy' }]);
    const source = new CrossrefSource({ fetch });

    await expect(source.lookup(hints({ doi: '10.1234/dla.2020.7' }), context)).rejects.toBeInstanceOf(
      SourceUnavailableError
    );
  });
});

describe('OpenAlexSource', () => {
  it('rebuilds abstracts from the inverted index', () => {
    expect(reconstructAbstract({ networks: [1], Neural: [0], learn: [2] })).toBe('Neural networks learn');
  });

  it('maps a DOI filter result', async () => {
    const { fetch, calls } = fakeFetch([
      {
        match: 'filter=doi',
        body: {
          results: [
            {
              doi: 'https://doi.org/10.1234/dla.2020.7',
              title: 'Deep Learning for Document Analysis',
              publication_year: 2020,
              authorships: [{ author: { display_name: 'Jane Smith' } }],
              primary_location: { source: { display_name: 'Journal of Document Engineering', issn_l: '1234-5678' } },
              cited_by_count: 4,
              concepts: [{ display_name: 'Computer science' }, { display_name: 'OCR' }],
              abstract_inverted_index: { Scanned: [0], pages: [1] },
            },
          ],
        },
      },
    ]);
    const source = new OpenAlexSource({ fetch, mailto: 'test@example.org' });

    const [candidate] = await source.lookup(hints({ doi: '10.1234/dla.2020.7' }), context);

    expect(calls[0]).toContain('mailto=test%40example.org');
    expect(candidate?.confidence).toBe(1);
    expect(candidate?.fields.doi).toBe('10.1234/dla.2020.7');
    expect(candidate?.fields.journal).toBe('Journal of Document Engineering');
    expect(candidate?.extra).toEqual({
      abstract: 'Scanned pages',
      issn: '1234-5678',
      citationCount: 4,
      concepts: ['Computer science', 'OCR'],
    });
  });
});

describe('OpenLibrarySource', () => {
  it('keeps only fuzzy matches above the similarity floor', async () => {
    const { fetch, calls } = fakeFetch([
      {
        match: 'search.json',
        body: {
          docs: [
            {
              title: 'The Art of Computer Programming',
              author_name: ['Donald E. Knuth'],
              first_publish_year: 1968,
              publisher: ['Addison-Wesley'],
              isbn: ['0201896834'],
              language: ['eng'],
              number_of_pages_median: 650,
            },
            { title: 'Cooking for Beginners', author_name: ['Ann Lee'] },
          ],
        },
      },
    ]);
    const source = new OpenLibrarySource({ fetch });

    const candidates = await source.lookup(
      hints({ title: 'The Art of Computer Programming', authors: ['Donald Knuth'] }),
      context
    );

    expect(calls[0]).toContain('author=knuth');
    expect(candidates).toHaveLength(1);
    expect(candidates[0]).toMatchObject({
      source: 'openlibrary',
      matchKey: 'fuzzy',
      rank: 0,
      confidence: 1,
      fields: {
        title: 'The Art of Computer Programming',
        year: 1968,
        publisher: 'Addison-Wesley',
        isbn: '9780201896831',
        language: 'en',
        pageCount: 650,
      },
    });
  });
});

describe('GoogleBooksSource', () => {
  it('prefers ISBN-13 identifiers and passes the API key', async () => {
    const { fetch, calls } = fakeFetch([
      {
        match: 'isbn%3A9780201896831',
        body: {
          items: [
            {
              id: 'vol-1',
              volumeInfo: {
                title: 'The Art of Computer Programming',
                authors: ['Donald E. Knuth'],
                publisher: 'Addison-Wesley',
                publishedDate: '1997-07-04',
                industryIdentifiers: [
                  { type: 'ISBN_10', identifier: '0201896834' },
                  { type: 'ISBN_13', identifier: '9780201896831' },
                ],
                pageCount: 672,
                language: 'en',
              },
            },
          ],
        },
      },
    ]);
    const source = new GoogleBooksSource({ fetch, apiKey: 'test-key' });

    const [candidate] = await source.lookup(hints({ isbn: '978-0-201-89683-1' }), context);

    expect(calls[0]).toContain('key=test-key');
    expect(candidate).toMatchObject({
      matchKey: 'isbn',
      confidence: 1,
      fields: { year: 1997, isbn: '9780201896831', pageCount: 672 },
      extra: { googleBooksId: 'vol-1' },
    });
  });
});

describe('K10plusSource', () => {
  const fixed = `200101s2019${' '.repeat(24)}ger d`;
  const marcxml = `<?xml version="1.0" encoding="UTF-8"?>
<zs:searchRetrieveResponse xmlns:zs="http://www.loc.gov/zing/srw/">
  <zs:version>1.1</zs:version>
  <zs:numberOfRecords>1</zs:numberOfRecords>
  <zs:records>
    <zs:record>
      <zs:recordSchema>marcxml</zs:recordSchema>
      <zs:recordPacking>xml</zs:recordPacking>
      <zs:recordData>
        <record xmlns="http://www.loc.gov/MARC21/slim">
          <leader>00000nam a2200000 c 4500</leader>
          <controlfield tag="001">123456789</controlfield>
          <controlfield tag="008">${fixed}</controlfield>
          <datafield tag="020" ind1=" " ind2=" "><subfield code="a">978-3-16-148410-0</subfield></datafield>
          <datafield tag="100" ind1="1" ind2=" "><subfield code="a">Müller, Hans</subfield></datafield>
          <datafield tag="245" ind1="1" ind2="0">
            <subfield code="a">Grundlagen der Informatik :</subfield>
            <subfield code="b">eine Einführung /</subfield>
          </datafield>
          <datafield tag="264" ind1=" " ind2="1">
            <subfield code="b">Springer Vieweg,</subfield>
            <subfield code="c">2019</subfield>
          </datafield>
          <datafield tag="300" ind1=" " ind2=" "><subfield code="a">350 Seiten</subfield></datafield>
          <datafield tag="650" ind1=" " ind2="7"><subfield code="a">Informatik</subfield></datafield>
          <datafield tag="700" ind1="1" ind2=" "><subfield code="a">Schmidt, Eva</subfield></datafield>
        </record>
      </zs:recordData>
    </zs:record>
  </zs:records>
</zs:searchRetrieveResponse>`;

  it('queries by ISBN and maps MARC fields', async () => {
    const { fetch, calls } = fakeFetch([{ match: 'sru.k10plus.de', body: marcxml }]);
    const source = new K10plusSource({ fetch });

    const candidates = await source.lookup(hints({ isbn: '9783161484100' }), context);

    expect(calls[0]).toContain('query=NUM%3DISBN+9783161484100');
    expect(calls[0]).toContain('maximumRecords=1');
    expect(candidates).toEqual([
      {
        source: 'k10plus',
        confidence: 1,
        matchKey: 'isbn',
        rank: 0,
        fields: {
          title: 'Grundlagen der Informatik: eine Einführung',
          authors: ['Hans Müller', 'Eva Schmidt'],
          year: 2019,
          publisher: 'Springer Vieweg',
          isbn: '9783161484100',
          language: 'de',
          pageCount: 350,
        },
        extra: { subjects: ['Informatik'], ppn: '123456789' },
      },
    ]);
  });

  it('falls back to a title and person query', async () => {
    const { fetch, calls } = fakeFetch([{ match: 'pica.tit', body: marcxml }]);
    const source = new K10plusSource({ fetch });

    const candidates = await source.lookup(
      hints({ title: 'Grundlagen der Informatik', authors: ['Hans Müller'] }),
      context
    );

    expect(decodeURIComponent(calls[0] ?? '').replace(/\+/g, ' ')).toContain(
      'pica.tit="Grundlagen der Informatik" and pica.per="muller"'
    );
    expect(candidates).toHaveLength(1);
    expect(candidates[0]?.matchKey).toBe('fuzzy');
  });
});
