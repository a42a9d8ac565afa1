import type { EmbeddingClient } from '../openai/openaiClient.js';
import type { EmbeddingService } from '../retrieval/types.js';
import { EmbeddingServiceError, describeError } from './errors.js';

const DEFAULT_BATCH_SIZE = 16;
const MAX_CACHE_ENTRIES = 2000;

export interface EmbeddingServiceOptions {
  model: string;
  batchSize?: number;
}

function cacheKey(text: string): string {
  return text.slice(0, 2048);
}

/**
 * Embeds text through the OpenAI embeddings endpoint. Vectors are cached per
 * text so repeated subqueries and index rebuilds skip the network.
 */
export class OpenAIEmbeddingService implements EmbeddingService {
  private readonly cache = new Map<string, number[]>();
  private readonly batchSize: number;

  constructor(
    private readonly client: EmbeddingClient,
    private readonly options: EmbeddingServiceOptions
  ) {
    this.batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
  }

  async embed(text: string): Promise<number[]> {
    const [vector] = await this.embedMany([text]);
    return vector;
  }

  async embedMany(texts: readonly string[]): Promise<number[][]> {
    const embeddings: number[][] = new Array(texts.length);
    const pending: Array<{ index: number; text: string }> = [];

    texts.forEach((text, index) => {
      const hit = this.cache.get(cacheKey(text));
      if (hit) {
        embeddings[index] = hit;
      } else {
        pending.push({ index, text });
      }
    });

    for (let offset = 0; offset < pending.length; offset += this.batchSize) {
      const slice = pending.slice(offset, offset + this.batchSize);
      const vectors = await this.request(slice.map((item) => item.text));

      if (vectors.length !== slice.length) {
        throw new EmbeddingServiceError(
          `Embedding mismatch: expected ${slice.length} vectors, received ${vectors.length}`
        );
      }

      vectors.forEach((vector, index) => {
        const { text, index: originalIndex } = slice[index];
        embeddings[originalIndex] = vector;
        this.cache.set(cacheKey(text), vector);
      });
      this.pruneCache();
    }

    return embeddings;
  }

  private async request(input: string[]): Promise<number[][]> {
    try {
      const response = await this.client.embeddings.create({ model: this.options.model, input });
      return [...response.data].sort((a, b) => a.index - b.index).map((item) => item.embedding);
    } catch (error) {
      throw new EmbeddingServiceError(`Embedding request failed: ${describeError(error)}`, error);
    }
  }

  private pruneCache() {
    if (this.cache.size <= MAX_CACHE_ENTRIES) {
      return;
    }
    const keep = Math.floor(MAX_CACHE_ENTRIES * 0.8);
    const keys = Array.from(this.cache.keys());
    for (let index = 0; index < keys.length - keep; index += 1) {
      this.cache.delete(keys[index]);
    }
  }
}
