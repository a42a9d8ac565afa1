import type { SchemeDocument } from '../../../shared/types.js';
import { schemeSearchText } from './schemes.js';

export interface BatchEmbedder {
  embedMany(texts: readonly string[]): Promise<number[][]>;
}

export interface SchemeSink {
  upsert(scheme: SchemeDocument, embedding: readonly number[]): void;
  count(): number;
}

export interface IndexBuildSummary {
  indexed: number;
  total: number;
}

/**
 * Embeds every scheme's search text and writes it to the index. Rows are
 * replaced by id, so rebuilding with the same data leaves the count unchanged.
 */
export async function buildSchemeIndex(
  schemes: readonly SchemeDocument[],
  embedder: BatchEmbedder,
  sink: SchemeSink
): Promise<IndexBuildSummary> {
  const vectors = await embedder.embedMany(schemes.map(schemeSearchText));
  schemes.forEach((scheme, index) => sink.upsert(scheme, vectors[index]));
  return { indexed: schemes.length, total: sink.count() };
}
