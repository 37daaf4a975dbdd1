/**
 * TfIdfIndex - Sparse TF-IDF vectors with cosine scoring
 *
 * Terms are runs of two or more word characters, lowercased, minus stop
 * words. IDF is smoothed: ln((1 + n) / (1 + df)) + 1. Every vector is
 * L2-normalized, so the dot product of two vectors is their cosine
 * similarity and scores fall in [0, 1].
 */

/** Sparse vector: [termIndex, weight] pairs sorted by term index */
export type SparseVector = Array<[number, number]>;

export interface TfIdfSnapshot {
  vocabulary: string[];
  idf: number[];
  vectors: SparseVector[];
}

const TOKEN_PATTERN = /\b\w\w+\b/g;

export function tokenize(text: string, stopWords: ReadonlySet<string>): string[] {
  const tokens = text.toLowerCase().match(TOKEN_PATTERN) ?? [];
  return tokens.filter(token => !stopWords.has(token));
}

function normalize(weights: Map<number, number>): SparseVector {
  let norm = 0;
  for (const weight of weights.values()) {
    norm += weight * weight;
  }
  norm = Math.sqrt(norm);
  if (norm === 0) {
    return [];
  }
  return [...weights.entries()]
    .sort((a, b) => a[0] - b[0])
    .map(([index, weight]): [number, number] => [index, weight / norm]);
}

export class TfIdfIndex {
  private readonly vocabulary: string[];
  private readonly termIndex: Map<string, number>;
  private readonly idf: number[];
  private readonly vectors: SparseVector[];
  private readonly stopWords: ReadonlySet<string>;

  private constructor(snapshot: TfIdfSnapshot, stopWords: ReadonlySet<string>) {
    this.vocabulary = snapshot.vocabulary;
    this.idf = snapshot.idf;
    this.vectors = snapshot.vectors;
    this.stopWords = stopWords;
    this.termIndex = new Map(snapshot.vocabulary.map((term, index) => [term, index]));
  }

  /**
   * Fit the index over a corpus
   */
  static fit(documents: readonly string[], stopWords: ReadonlySet<string>): TfIdfIndex {
    const tokenized = documents.map(doc => tokenize(doc, stopWords));

    const documentFrequency = new Map<string, number>();
    for (const tokens of tokenized) {
      for (const term of new Set(tokens)) {
        documentFrequency.set(term, (documentFrequency.get(term) ?? 0) + 1);
      }
    }

    const vocabulary = [...documentFrequency.keys()].sort();
    const termIndex = new Map(vocabulary.map((term, index) => [term, index]));
    const n = documents.length;
    const idf = vocabulary.map(term => Math.log((1 + n) / (1 + (documentFrequency.get(term) ?? 0))) + 1);

    const vectors = tokenized.map(tokens => {
      const weights = new Map<number, number>();
      for (const token of tokens) {
        const index = termIndex.get(token);
        if (index !== undefined) {
          weights.set(index, (weights.get(index) ?? 0) + idf[index]);
        }
      }
      return normalize(weights);
    });

    return new TfIdfIndex({ vocabulary, idf, vectors }, stopWords);
  }

  static fromSnapshot(snapshot: TfIdfSnapshot, stopWords: ReadonlySet<string>): TfIdfIndex {
    return new TfIdfIndex(snapshot, stopWords);
  }

  snapshot(): TfIdfSnapshot {
    return { vocabulary: this.vocabulary, idf: this.idf, vectors: this.vectors };
  }

  get size(): number {
    return this.vectors.length;
  }

  /**
   * Project free text into the index's term space
   */
  transform(text: string): SparseVector {
    const weights = new Map<number, number>();
    for (const token of tokenize(text, this.stopWords)) {
      const index = this.termIndex.get(token);
      if (index !== undefined) {
        weights.set(index, (weights.get(index) ?? 0) + this.idf[index]);
      }
    }
    return normalize(weights);
  }

  /**
   * Cosine similarity of the query against every document, in corpus order
   */
  scores(query: string): number[] {
    const queryWeights = new Map(this.transform(query));
    return this.vectors.map(vector => {
      let score = 0;
      for (const [index, weight] of vector) {
        const queryWeight = queryWeights.get(index);
        if (queryWeight !== undefined) {
          score += weight * queryWeight;
        }
      }
      return score;
    });
  }
}
