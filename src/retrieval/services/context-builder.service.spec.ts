import { InputError } from '../../common/errors';
import { makeDocument } from '../../testing/fixtures';
import { WordTokenCounter } from '../../testing/word-token-counter';
import { ContextBuilderService } from './context-builder.service';

describe('ContextBuilderService', () => {
  const builder = new ContextBuilderService(new WordTokenCounter());
  const documents = [
    makeDocument('a', 1, { source: 'A' }, 'one two three'),
    makeDocument('b', 2, { source: 'B' }, 'four five'),
    makeDocument('c', 3, { source: 'C' }, 'six'),
  ];

  it('formats numbered source blocks separated by rules', () => {
    const built = builder.build(documents, 100);

    expect(built.context).toBe(
      '[Document 1 - Source: A]\none two three\n' +
        '\n---\n\n' +
        '[Document 2 - Source: B]\nfour five\n' +
        '\n---\n\n' +
        '[Document 3 - Source: C]\nsix\n',
    );
    expect(built.tokens).toBe(23);
    expect(built.truncated).toBe(false);
    expect(built.documents).toEqual(documents);
  });

  it('drops the lowest-ranked documents first', () => {
    const built = builder.build(documents, 16);

    expect(built.documents.map((d) => d.chunk.chunkId)).toEqual(['a', 'b']);
    expect(built.tokens).toBe(16);
    expect(built.truncated).toBe(true);
  });

  it('truncates the first document when it alone exceeds the budget', () => {
    const built = builder.build(documents, 7);

    expect(built.context).toBe('[Document 1 - Source: A]\none two\n');
    expect(built.documents.map((d) => d.chunk.chunkId)).toEqual(['a']);
    expect(built.tokens).toBe(7);
    expect(built.truncated).toBe(true);
  });

  it('keeps one word of text when the budget leaves room for it', () => {
    const built = builder.build(documents, 6);

    expect(built.context).toBe('[Document 1 - Source: A]\none\n');
    expect(built.tokens).toBe(6);
  });

  it.each([5, 3])('rejects a budget of %p that cannot hold the header and any text', (budget) => {
    expect(() => builder.build(documents, budget)).toThrow(InputError);
    expect(() => builder.build(documents, budget)).toThrow(
      `Context budget of ${budget} tokens cannot fit a document header (5 tokens)`,
    );
  });

  it('falls back to the document id when there is no source name', () => {
    const built = builder.build([makeDocument('x', 1, {}, 'text')], 100);

    expect(built.context).toBe('[Document 1 - Source: doc-x]\ntext\n');
  });

  it('returns an empty context for no documents', () => {
    expect(builder.build([], 100)).toEqual({
      context: '',
      documents: [],
      tokens: 0,
      truncated: false,
    });
  });
});
