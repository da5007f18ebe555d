/**
 * BM25 relevance scoring
 *
 *   score(Q, D) = Σ IDF(t) · f(t,D)·(k1+1) / (f(t,D) + k1·(1 − b + b·|D|/avgdl))
 *   IDF(t)      = ln(1 + (N − n(t) + 0.5) / (n(t) + 0.5))
 *
 * The corpus is whatever set of documents one search call buffered.
 */

export const BM25_K1 = 1.5;
export const BM25_B = 0.75;

/**
 * A document reduced to what BM25 needs
 */
export interface ScoredDocument {
  /** Term frequencies */
  terms: ReadonlyMap<string, number>;
  /** Token count */
  length: number;
}

export interface BM25Params {
  k1: number;
  b: number;
}

export class BM25Scorer {
  readonly documentCount: number;
  readonly averageLength: number;
  private readonly documentFrequency = new Map<string, number>();

  constructor(
    documents: readonly ScoredDocument[],
    private readonly params: BM25Params = { k1: BM25_K1, b: BM25_B }
  ) {
    this.documentCount = documents.length;

    let totalLength = 0;
    for (const doc of documents) {
      totalLength += doc.length;
      for (const term of doc.terms.keys()) {
        this.documentFrequency.set(term, (this.documentFrequency.get(term) ?? 0) + 1);
      }
    }
    this.averageLength = documents.length > 0 ? totalLength / documents.length : 0;
  }

  /**
   * Number of corpus documents containing the term
   */
  frequencyOf(term: string): number {
    return this.documentFrequency.get(term) ?? 0;
  }

  /**
   * Inverse document frequency. Never negative, even for terms in every document.
   */
  idf(term: string): number {
    const n = this.frequencyOf(term);
    const N = this.documentCount;
    return Math.log(1 + (N - n + 0.5) / (n + 0.5));
  }

  /**
   * Raw (unbounded) score of one document for the given query terms
   */
  score(doc: ScoredDocument, queryTerms: readonly string[]): number {
    const { k1, b } = this.params;
    // An all-empty corpus has no length to normalize against
    const lengthRatio = this.averageLength > 0 ? doc.length / this.averageLength : 1;
    const norm = k1 * (1 - b + b * lengthRatio);

    let total = 0;
    for (const term of queryTerms) {
      const tf = doc.terms.get(term) ?? 0;
      if (tf === 0) continue;
      total += this.idf(term) * ((tf * (k1 + 1)) / (tf + norm));
    }
    return total;
  }
}

/**
 * Map a raw score onto [0, 1)
 */
export function normalizeScore(raw: number): number {
  return raw > 0 ? raw / (raw + 1) : 0;
}
