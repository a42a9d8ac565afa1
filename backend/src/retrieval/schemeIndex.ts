import type Database from 'better-sqlite3';
import type { SchemeDocument } from '../../../shared/types.js';
import { IndexNotReadyError } from '../utils/errors.js';
import { openSqliteDatabase } from '../utils/sqlite-utils.js';
import { cosineDistance, fromEmbeddingBlob, toEmbeddingBlob } from '../utils/vector-ops.js';
import { compareDocumentIds } from './merge.js';
import { schemeDocumentSchema } from './schemes.js';
import type { DocumentStore, VectorHit, VectorIndex } from './types.js';

interface SchemeRow {
  id: string;
  document: string;
  embedding: Buffer;
}

/**
 * Scheme documents and their embeddings in sqlite. Similarity is computed in
 * process; the catalogue is small enough for a full scan per query.
 */
export class SqliteSchemeIndex implements VectorIndex, DocumentStore {
  private readonly db: Database.Database;

  constructor(dbPath: string) {
    this.db = openSqliteDatabase(dbPath);
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS schemes (
        id TEXT PRIMARY KEY,
        document TEXT NOT NULL,
        embedding BLOB NOT NULL,
        updated_at TEXT NOT NULL
      );
    `);
  }

  upsert(scheme: SchemeDocument, embedding: readonly number[]): void {
    this.db
      .prepare<[string, string, Buffer, string]>(
        `INSERT INTO schemes (id, document, embedding, updated_at)
         VALUES (?, ?, ?, ?)
         ON CONFLICT(id) DO UPDATE SET
           document = excluded.document,
           embedding = excluded.embedding,
           updated_at = excluded.updated_at`
      )
      .run(scheme.id, JSON.stringify(scheme), toEmbeddingBlob(embedding), new Date().toISOString());
  }

  count(): number {
    const row = this.db.prepare<[], { total: number }>('SELECT COUNT(*) AS total FROM schemes').get();
    return row?.total ?? 0;
  }

  async isReady(): Promise<boolean> {
    return this.count() > 0;
  }

  async search(vector: number[], k: number): Promise<VectorHit[]> {
    const rows = this.db.prepare<[], Pick<SchemeRow, 'id' | 'embedding'>>('SELECT id, embedding FROM schemes').all();

    return rows
      .map((row) => {
        const embedding = fromEmbeddingBlob(row.embedding);
        if (embedding.length !== vector.length) {
          throw new IndexNotReadyError(
            `Scheme index was built with ${embedding.length}-dimensional embeddings but the query has ${vector.length}; rebuild the index`
          );
        }
        return { documentId: row.id, distance: cosineDistance(vector, embedding) };
      })
      .sort((a, b) => a.distance - b.distance || compareDocumentIds(a.documentId, b.documentId))
      .slice(0, k);
  }

  async getDocument(id: string): Promise<SchemeDocument | null> {
    const row = this.db.prepare<[string], Pick<SchemeRow, 'document'>>('SELECT document FROM schemes WHERE id = ?').get(id);
    if (!row) {
      return null;
    }
    return schemeDocumentSchema.parse(JSON.parse(row.document));
  }

  close(): void {
    this.db.close();
  }
}

