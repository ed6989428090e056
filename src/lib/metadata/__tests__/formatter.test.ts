import { describe, it, expect } from 'vitest';
import { formatInline, formatReference } from '../formatter';

const article = {
  title: 'Deep Learning for Document Analysis',
  authors: ['Jane Smith', 'Omar Khan'],
  year: 2020,
  journal: 'Journal of Document Engineering',
  publisher: null,
  doi: '10.1234/dla.2020.7',
};

describe('formatReference', () => {
  it('formats APA', () => {
    expect(formatReference(article, 'apa')).toBe(
      'Smith, J., & Khan, O. (2020). Deep Learning for Document Analysis. Journal of Document Engineering. https://doi.org/10.1234/dla.2020.7'
    );
  });

  it('formats MLA', () => {
    expect(formatReference(article, 'mla')).toBe(
      'Smith, Jane, and Omar Khan. "Deep Learning for Document Analysis." Journal of Document Engineering, 2020. https://doi.org/10.1234/dla.2020.7.'
    );
  });

  it('formats Chicago author-date', () => {
    expect(formatReference(article, 'chicago')).toBe(
      'Smith, Jane and Omar Khan. 2020. "Deep Learning for Document Analysis." Journal of Document Engineering. https://doi.org/10.1234/dla.2020.7.'
    );
  });

  it('formats Harvard', () => {
    expect(formatReference(article, 'harvard')).toBe(
      'Smith, J. and Khan, O. (2020) Deep Learning for Document Analysis. Journal of Document Engineering. doi:10.1234/dla.2020.7.'
    );
  });

  it('formats numbered IEEE entries', () => {
    expect(formatReference(article, 'ieee', 1)).toBe(
      '[1] J. Smith and O. Khan, "Deep Learning for Document Analysis," Journal of Document Engineering, 2020, doi: 10.1234/dla.2020.7.'
    );
  });

  it('writes n.d. for a missing year and uses the publisher for books', () => {
    const book = { title: 'Field Notes', authors: ['Lee, Ann'], year: null, journal: null, publisher: 'Example Press', doi: null };
    expect(formatReference(book, 'apa')).toBe('Lee, A. (n.d.). Field Notes. Example Press.');
  });
});

describe('formatInline', () => {
  it('adds page locators per style', () => {
    expect(formatInline(article, 'apa', { page: 3 })).toBe('(Smith & Khan, 2020, p. 3)');
    expect(formatInline(article, 'mla', { page: 3 })).toBe('(Smith and Khan 3)');
    expect(formatInline(article, 'chicago', { page: 3 })).toBe('(Smith and Khan 2020, 3)');
    expect(formatInline(article, 'harvard')).toBe('(Smith and Khan, 2020)');
    expect(formatInline(article, 'ieee', { number: 2 })).toBe('[2]');
  });

  it('abbreviates three or more authors', () => {
    const many = { ...article, authors: ['Jane Smith', 'Omar Khan', 'Ann Lee'] };
    expect(formatInline(many, 'apa')).toBe('(Smith et al., 2020)');
  });

  it('falls back to a shortened title without authors', () => {
    expect(formatInline({ ...article, authors: null }, 'apa')).toBe('("Deep Learning for Document...", 2020)');
  });
});
