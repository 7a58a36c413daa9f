import { KeywordContentClassifier } from './content-classifier';

describe('KeywordContentClassifier', () => {
  const classifier = new KeywordContentClassifier();

  it('picks the type with the most keyword hits', () => {
    const result = classifier.classify(
      'The evidence shows the facts as reported, and the analysis follows.',
    );

    expect(result).toEqual({ contentType: 'Facts', confidence: 0.75 });
  });

  it('matches Spanish keywords and breaks ties by priority', () => {
    const result = classifier.classify('El análisis de la evidencia disponible.');

    expect(result).toEqual({ contentType: 'Facts', confidence: 0.5 });
  });

  it('matches whole words only', () => {
    expect(classifier.classify('Remodeling the factory floor.')).toEqual({
      contentType: 'Unclassified',
      confidence: 0,
    });
  });

  it('accepts a custom keyword table', () => {
    const custom = new KeywordContentClassifier({
      Theory: [],
      Facts: [],
      Analysis: [],
      Conclusion: ['verdict'],
    });

    expect(custom.classify('The verdict was unanimous.')).toEqual({
      contentType: 'Conclusion',
      confidence: 1,
    });
  });
});
