import { FormatError } from '../../common/errors';
import { makeDocument } from '../../testing/fixtures';
import {
  CitationFormatterService,
  formatReference,
} from './citation-formatter.service';

describe('CitationFormatterService', () => {
  const formatter = new CitationFormatterService();

  const sources = [
    makeDocument('fbi-1', 1, {
      source: 'Crime Classification Manual',
      documentAuthority: 'FBI',
      sourceReliability: 'high',
      publicationYear: 2013,
      crimeType: 'homicide',
    }),
    makeDocument('paper-1', 2, { source: 'Routine Activity Theory' }),
    makeDocument('fbi-2', 3, {
      source: 'Crime Classification Manual',
      documentAuthority: 'FBI',
    }),
  ];

  it('numbers unique sources by first appearance and appends the list', () => {
    const result = formatter.format(
      'Staging is common [Document 3]. Opportunity matters [Document 2].',
      sources,
    );

    expect(result.text).toBe(
      'Staging is common [1]. Opportunity matters [2].' +
        '\n\n---\n\n**Sources:**\n\n' +
        '1. Crime Classification Manual (FBI, reliability: high, 2013, crime type: homicide)\n' +
        '2. Routine Activity Theory',
    );
    expect(result.citations.map((c) => [c.referenceNumber, c.chunkIds])).toEqual([
      [1, ['fbi-1', 'fbi-2']],
      [2, ['paper-1']],
    ]);
  });

  it('rewrites markers that carry the source name', () => {
    const result = formatter.format(
      'See [Document 2 - Source: Routine Activity Theory].',
      sources,
    );

    expect(result.text.startsWith('See [2].')).toBe(true);
  });

  it('is idempotent for the same input', () => {
    const body = 'Answer [Document 1].';

    expect(formatter.format(body, sources)).toEqual(formatter.format(body, sources));
  });

  it('omits absent metadata instead of printing placeholders', () => {
    const [citation] = formatter.format('x', [makeDocument('d', 1, { source: 'Bare' })])
      .citations;

    expect(citation).toEqual({
      referenceNumber: 1,
      documentName: 'Bare',
      sourceDocumentId: 'Bare',
      chunkIds: ['d'],
      preview: 'Passage d about crime scene analysis.',
    });
    expect(formatReference(citation)).toBe('1. Bare');
  });

  it('truncates long previews', () => {
    const long = 'w'.repeat(250);
    const [citation] = formatter.format('x', [makeDocument('d', 1, {}, long)]).citations;

    expect(citation.preview).toBe(`${'w'.repeat(200)}...`);
  });

  it('leaves the body alone when no sources were used', () => {
    expect(formatter.format('  Nothing to cite.  ', [])).toEqual({
      text: 'Nothing to cite.',
      citations: [],
    });
  });

  it('rejects an empty body', () => {
    expect(() => formatter.format(' \n ', sources)).toThrow(FormatError);
  });

  it('rejects a marker outside the documents used', () => {
    expect(() => formatter.format('Claim [Document 4].', sources)).toThrow(
      'Citation marker [Document 4] does not match any of the 3 documents used',
    );
  });
});
