import { IndexUnavailableError, InputError } from '../../common/errors';
import { FakeIndexAdapter } from '../../testing/fake-index.adapter';
import { makeCandidate, testPipelineConfig } from '../../testing/fixtures';
import { RetrieverService } from './retriever.service';

describe('RetrieverService', () => {
  const config = testPipelineConfig();

  function retrieverOver(adapter: FakeIndexAdapter): RetrieverService {
    return new RetrieverService(adapter, config);
  }

  it('returns the top k by similarity when diversity is disabled', async () => {
    const adapter = new FakeIndexAdapter(
      [0.9, 0.85, 0.8, 0.7, 0.6].map((score, i) =>
        makeCandidate(`c${i}`, score, [1, i]),
      ),
    );

    const documents = await retrieverOver(adapter).retrieve(
      'ballistics analysis techniques',
      { k: 3, diversityLambda: 1 },
    );

    expect(documents.map((d) => [d.chunk.chunkId, d.rank, d.similarityScore])).toEqual([
      ['c0', 1, 0.9],
      ['c1', 2, 0.85],
      ['c2', 3, 0.8],
    ]);
  });

  it('trades a near-duplicate for a diverse candidate', async () => {
    const adapter = new FakeIndexAdapter([
      makeCandidate('c0', 0.9, [1, 0]),
      makeCandidate('c1', 0.88, [1, 0]),
      makeCandidate('c2', 0.8, [0, 1]),
      makeCandidate('c3', 0.7, [0.6, 0.8]),
    ]);

    const documents = await retrieverOver(adapter).retrieve('modus operandi', {
      k: 3,
      diversityLambda: 0.5,
    });

    expect(documents.map((d) => d.chunk.chunkId)).toEqual(['c0', 'c2', 'c3']);
    expect(documents.map((d) => d.rank)).toEqual([1, 2, 3]);
  });

  it('is deterministic for a fixed index', async () => {
    const adapter = new FakeIndexAdapter(
      Array.from({ length: 8 }, (_, i) =>
        makeCandidate(`c${i}`, 0.9 - i * 0.05, [Math.cos(i), Math.sin(i)]),
      ),
    );
    const retriever = retrieverOver(adapter);

    const first = await retriever.retrieve('signature behavior', { k: 4 });
    const second = await retriever.retrieve('signature behavior', { k: 4 });

    expect(second).toEqual(first);
  });

  it('breaks similarity ties by pool position', async () => {
    const adapter = new FakeIndexAdapter([
      makeCandidate('first', 0.8, [1, 0]),
      makeCandidate('second', 0.8, [0, 1]),
      makeCandidate('third', 0.8, [1, 1]),
    ]);

    const documents = await retrieverOver(adapter).retrieve('victimology', {
      k: 3,
      diversityLambda: 1,
    });

    expect(documents.map((d) => d.chunk.chunkId)).toEqual([
      'first',
      'second',
      'third',
    ]);
  });

  it('oversamples the candidate pool and clamps k to the configured range', async () => {
    const adapter = new FakeIndexAdapter(
      Array.from({ length: 40 }, (_, i) => makeCandidate(`c${i}`, 1 - i / 100)),
    );
    const retriever = retrieverOver(adapter);

    const few = await retriever.retrieve('profiling', { k: 1 });
    const many = await retriever.retrieve('profiling', { k: 50 });

    expect(few).toHaveLength(3);
    expect(many).toHaveLength(10);
    expect(adapter.searches.map((s) => s.k)).toEqual([9, 30]);
  });

  it('enforces every filter predicate even if the index ignores them', async () => {
    const adapter = new FakeIndexAdapter([
      makeCandidate('c0', 0.9, [1, 0], { crimeType: 'arson' }),
      makeCandidate('c1', 0.8, [0, 1], { crimeType: 'homicide', geography: 'US' }),
      makeCandidate('c2', 0.7, [1, 1], { crimeType: 'homicide', geography: 'UK' }),
      makeCandidate('c3', 0.6, [1, 2], { geography: 'US' }),
    ]);
    adapter.applyFilters = false;

    const documents = await retrieverOver(adapter).retrieve('serial homicide', {
      filters: { crimeType: 'homicide', geography: ['US', 'CA'] },
    });

    expect(documents.map((d) => d.chunk.chunkId)).toEqual(['c1']);
  });

  it('drops duplicate chunk ids, keeping the first occurrence', async () => {
    const adapter = new FakeIndexAdapter([
      makeCandidate('dup', 0.9, [1, 0], {}, 'forensic_cases'),
      makeCandidate('dup', 0.85, [1, 0], {}, 'criminology_theory'),
      makeCandidate('other', 0.5, [0, 1]),
    ]);

    const documents = await retrieverOver(adapter).retrieve('autopsy', {
      diversityLambda: 1,
    });

    expect(
      documents.map((d) => [d.chunk.chunkId, d.collectionName]),
    ).toEqual([
      ['dup', 'forensic_cases'],
      ['other', 'forensic_cases'],
    ]);
  });

  it('returns an empty sequence when nothing satisfies the filters', async () => {
    const adapter = new FakeIndexAdapter([
      makeCandidate('c0', 0.9, [1, 0], { crimeType: 'arson' }),
    ]);

    await expect(
      retrieverOver(adapter).retrieve('fraud schemes', {
        filters: { crimeType: 'fraud' },
      }),
    ).resolves.toEqual([]);
  });

  it('restricts the search to one collection', async () => {
    const adapter = new FakeIndexAdapter([
      makeCandidate('case', 0.9, [1, 0], {}, 'forensic_cases'),
      makeCandidate('theory', 0.95, [0, 1], {}, 'criminology_theory'),
    ]);

    const documents = await retrieverOver(adapter).retrieveFromCollection(
      'routine activity theory',
      'criminology_theory',
    );

    expect(documents.map((d) => d.chunk.chunkId)).toEqual(['theory']);
    expect(adapter.searches[0].options.collections).toEqual([
      'criminology_theory',
    ]);
  });

  it('rejects a blank query', async () => {
    await expect(
      retrieverOver(new FakeIndexAdapter()).retrieve('   '),
    ).rejects.toBeInstanceOf(InputError);
  });

  it('reports backend errors as IndexUnavailable', async () => {
    const adapter = new FakeIndexAdapter();
    adapter.failWith = new Error('connect ECONNREFUSED 127.0.0.1:6333');

    await expect(retrieverOver(adapter).retrieve('crime scene')).rejects.toThrow(
      new IndexUnavailableError(
        'Index query failed: connect ECONNREFUSED 127.0.0.1:6333',
      ),
    );
  });

  it('reports a timeout as IndexUnavailable', async () => {
    const adapter = new FakeIndexAdapter();
    adapter.hang = true;

    const attempt = retrieverOver(adapter).retrieve('crime scene', {
      timeoutMs: 20,
    });

    await expect(attempt).rejects.toBeInstanceOf(IndexUnavailableError);
    await expect(attempt).rejects.toThrow('Index query timed out after 20ms');
  });

  it('aborts the in-flight index query when the timeout fires', async () => {
    const adapter = new FakeIndexAdapter();
    adapter.hang = true;

    await expect(
      retrieverOver(adapter).retrieve('crime scene', { timeoutMs: 20 }),
    ).rejects.toThrow('Index query timed out after 20ms');

    expect(adapter.searches).toHaveLength(1);
    expect(adapter.searches[0].options.signal?.aborted).toBe(true);
  });
});
