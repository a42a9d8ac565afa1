import type { RetrievalResult, SchemeDocument } from '../../../shared/types.js';

export interface EmbeddingService {
  embed(text: string): Promise<number[]>;
}

export interface VectorHit {
  documentId: string;
  distance: number;
}

export interface VectorIndex {
  /** Nearest neighbours of `vector`, closest first. */
  search(vector: number[], k: number): Promise<VectorHit[]>;
  isReady(): Promise<boolean>;
}

export interface DocumentStore {
  getDocument(id: string): Promise<SchemeDocument | null>;
}

export interface QueryExpander {
  expand(query: string): Promise<string[]>;
}

export interface RetrieverOptions {
  /** Neighbours requested per expanded query; raised to top_k when smaller. */
  candidatesPerQuery: number;
}

export interface RetrievalOutcome {
  queries: string[];
  results: RetrievalResult[];
}
