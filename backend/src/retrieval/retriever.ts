import type { RetrievalResult } from '../../../shared/types.js';
import { traced } from '../orchestrator/telemetry.js';
import { IndexNotReadyError, InvalidArgumentError } from '../utils/errors.js';
import { mergeHits, rankHits } from './merge.js';
import { expandWithFallback } from './queryExpansion.js';
import type {
  EmbeddingService,
  QueryExpander,
  RetrievalOutcome,
  RetrieverOptions,
  VectorHit,
  VectorIndex
} from './types.js';

export interface RetrieverDependencies {
  expander: QueryExpander;
  embedder: EmbeddingService;
  index: VectorIndex;
}

const DEFAULT_OPTIONS: RetrieverOptions = { candidatesPerQuery: 3 };

/**
 * Expand → embed and search each subquery → merge by document id → rank.
 * Only expansion failures are absorbed; embedding and index errors propagate.
 */
export class SchemeRetriever {
  private readonly options: RetrieverOptions;

  constructor(
    private readonly deps: RetrieverDependencies,
    options: Partial<RetrieverOptions> = {}
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  async search(query: string, topK: number): Promise<RetrievalResult[]> {
    const { results } = await this.retrieve(query, topK);
    return results;
  }

  async retrieve(query: string, topK: number): Promise<RetrievalOutcome> {
    if (!Number.isInteger(topK) || topK <= 0) {
      throw new InvalidArgumentError(`top_k must be a positive integer, received ${topK}`);
    }
    if (!query.trim()) {
      throw new InvalidArgumentError('query must not be empty');
    }

    return traced(
      'retrieval.search',
      async () => {
        if (!(await this.deps.index.isReady())) {
          throw new IndexNotReadyError();
        }

        const queries = await expandWithFallback(this.deps.expander, query);
        const perQuery = Math.max(this.options.candidatesPerQuery, topK);

        const hitLists: VectorHit[][] = [];
        for (const subquery of queries) {
          const vector = await this.deps.embedder.embed(subquery);
          hitLists.push(await this.deps.index.search(vector, perQuery));
        }

        return { queries, results: rankHits(mergeHits(hitLists), topK) };
      },
      { 'retrieval.top_k': topK }
    );
  }
}
