import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { fileURLToPath } from 'node:url';
import { buildSchemeIndex } from '../retrieval/indexBuilder.js';
import { SqliteSchemeIndex } from '../retrieval/schemeIndex.js';
import { loadSchemes, parseSchemes, schemeSearchText } from '../retrieval/schemes.js';
import { IndexNotReadyError } from '../utils/errors.js';
import { scheme } from './fakes.js';

const SCHEMES_PATH = fileURLToPath(new URL('../../data/schemes.json', import.meta.url));

describe('SqliteSchemeIndex', () => {
  let index: SqliteSchemeIndex;

  beforeEach(() => {
    index = new SqliteSchemeIndex(':memory:');
  });

  afterEach(() => {
    index.close();
  });

  it('is not ready until a scheme is stored', async () => {
    await expect(index.isReady()).resolves.toBe(false);
    index.upsert(scheme({ id: 'A' }), [1, 0]);
    await expect(index.isReady()).resolves.toBe(true);
  });

  it('replaces rows by id', async () => {
    index.upsert(scheme({ id: 'A', title: 'Old title' }), [1, 0]);
    index.upsert(scheme({ id: 'A', title: 'New title' }), [0, 1]);

    expect(index.count()).toBe(1);
    await expect(index.getDocument('A')).resolves.toMatchObject({ title: 'New title' });
    await expect(index.search([0, 1], 1)).resolves.toEqual([{ documentId: 'A', distance: 0 }]);
  });

  it('returns the nearest neighbours closest first, ties by id', async () => {
    index.upsert(scheme({ id: 'far' }), [0, 1]);
    index.upsert(scheme({ id: 'near-b' }), [1, 0]);
    index.upsert(scheme({ id: 'near-a' }), [2, 0]);

    const hits = await index.search([1, 0], 2);

    expect(hits).toEqual([
      { documentId: 'near-a', distance: 0 },
      { documentId: 'near-b', distance: 0 }
    ]);
    await expect(index.search([1, 0], 10)).resolves.toHaveLength(3);
  });

  it('rejects a query whose embedding dimension differs from the stored vectors', async () => {
    index.upsert(scheme({ id: 'A' }), [1, 0]);
    index.upsert(scheme({ id: 'B' }), [0, 1]);

    await expect(index.search([1, 0, 0], 2)).rejects.toThrow(
      new IndexNotReadyError(
        'Scheme index was built with 2-dimensional embeddings but the query has 3; rebuild the index'
      )
    );
    await expect(index.search([1, 0, 0], 2)).rejects.toBeInstanceOf(IndexNotReadyError);
  });

  it('returns null for unknown documents', async () => {
    await expect(index.getDocument('missing')).resolves.toBeNull();
  });
});

describe('scheme catalogue', () => {
  it('loads the bundled schemes with unique ids', async () => {
    const schemes = await loadSchemes(SCHEMES_PATH);

    expect(schemes).toHaveLength(10);
    expect(new Set(schemes.map((entry) => entry.id)).size).toBe(10);
    expect(schemes.find((entry) => entry.id === 'KAR-RAITHA-001')?.state).toBe('Karnataka');
  });

  it('rejects duplicate ids', () => {
    expect(() => parseSchemes([scheme({ id: 'A' }), scheme({ id: 'A' })])).toThrow(/duplicate scheme id A/);
  });

  it('builds the search text from the scheme fields', () => {
    const text = schemeSearchText(
      scheme({ id: 'A', title: 'Drip subsidy', eligibility: ['Small farmers', 'Marginal farmers'], benefits: ['55% subsidy'] })
    );

    expect(text).toBe(
      [
        'Title: Drip subsidy',
        'Description: A test scheme',
        'Category: Test',
        'Eligibility: Small farmers, Marginal farmers',
        'Benefits: 55% subsidy',
        'Application Process: Apply online',
        'State: All India'
      ].join('\n')
    );
  });
});

describe('buildSchemeIndex', () => {
  it('embeds every scheme and is idempotent on rebuild', async () => {
    const index = new SqliteSchemeIndex(':memory:');
    const schemes = [scheme({ id: 'A' }), scheme({ id: 'B' })];
    const embedder = { embedMany: async (texts: readonly string[]) => texts.map((_text, position) => [position + 1, 1]) };

    await expect(buildSchemeIndex(schemes, embedder, index)).resolves.toEqual({ indexed: 2, total: 2 });
    await expect(buildSchemeIndex(schemes, embedder, index)).resolves.toEqual({ indexed: 2, total: 2 });
    await expect(index.getDocument('B')).resolves.toEqual(schemes[1]);
    index.close();
  });
});
