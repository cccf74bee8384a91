import { SqliteVectorStore, cosineSimilarity, decodeVector, encodeVector, schemaDimensions } from '../vector-store.js';
import { buildIndexSchema } from '../index-lifecycle.js';
import { IndexDocument } from '../../types/record.js';
import { DimensionMismatchError, IndexNotFoundError, StoreError, ValidationError } from '../../utils/errors.js';

function doc(id: string, embedding: number[], extra: Partial<IndexDocument> = {}): IndexDocument {
  return { id, content: `content ${id}`, source: `/data/${id}.pdf`, sourceType: 'document-file', embedding, ...extra };
}

describe('vector helpers', () => {
  it('round-trips vectors through Float32 blobs', () => {
    expect(decodeVector(encodeVector([0.5, -2, 0]))).toEqual([0.5, -2, 0]);
  });

  it('scores cosine similarity', () => {
    expect(cosineSimilarity([1, 0], [1, 0])).toBe(1);
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
    expect(cosineSimilarity([1, 0], [-1, 0])).toBe(-1);
    expect(cosineSimilarity([0, 0], [1, 0])).toBe(0);
  });

  it('reads the dimension from the single vector field', () => {
    expect(schemaDimensions(buildIndexSchema('x', 7))).toBe(7);
  });
});

describe('SqliteVectorStore', () => {
  let store: SqliteVectorStore;

  beforeEach(async () => {
    store = new SqliteVectorStore(':memory:').initialize();
    await store.createOrUpdateIndex(buildIndexSchema('test-index', 3));
  });

  afterEach(() => {
    store.close();
  });

  it('stores and returns the index schema', async () => {
    await expect(store.getIndex('test-index')).resolves.toEqual(buildIndexSchema('test-index', 3));
    await expect(store.getIndex('other')).resolves.toBeNull();
  });

  it('refuses to change the vector dimension of an existing index', async () => {
    await expect(store.createOrUpdateIndex(buildIndexSchema('test-index', 4))).rejects.toBeInstanceOf(StoreError);
  });

  it('rejects a schema without a vector field', async () => {
    const schema = buildIndexSchema('broken', 3);
    schema.fields = schema.fields.filter(field => field.type !== 'vector');

    await expect(store.createOrUpdateIndex(schema)).rejects.toBeInstanceOf(ValidationError);
  });

  it('reports a result per uploaded document', async () => {
    const results = await store.uploadDocuments('test-index', [
      doc('a', [1, 0, 0]),
      doc('b', [0, 1, 0]),
      doc('c', [1, 1]),
      doc('', [1, 0, 0]),
    ]);

    expect(results).toEqual([
      { key: 'a', succeeded: true },
      { key: 'b', succeeded: true },
      { key: 'c', succeeded: false, error: 'Expected 3 dimensions, got 2' },
      { key: '', succeeded: false, error: 'Document key is empty' },
    ]);
    await expect(store.getDocumentCount('test-index')).resolves.toBe(2);
  });

  it('returns the nearest documents first with the selected fields', async () => {
    await store.uploadDocuments('test-index', [
      doc('far', [0, 0, 1]),
      doc('near', [1, 0, 0], { title: 'Guide', page: 4 }),
      doc('mid', [1, 1, 0]),
    ]);

    const hits = await store.vectorSearch('test-index', [1, 0, 0], 2, ['content', 'title', 'page']);

    expect(hits.map(hit => hit.id)).toEqual(['near', 'mid']);
    expect(hits[0]).toEqual({ id: 'near', score: 1, content: 'content near', title: 'Guide', page: 4 });
    expect(hits[1]?.score).toBeCloseTo(Math.SQRT1_2, 6);
    expect(hits[1]).not.toHaveProperty('title');
  });

  it('keeps insertion order for equal scores, also after an upsert', async () => {
    await store.uploadDocuments('test-index', [doc('first', [1, 0, 0]), doc('second', [1, 0, 0])]);
    await store.uploadDocuments('test-index', [doc('first', [2, 0, 0], { content: 'updated' })]);

    const hits = await store.vectorSearch('test-index', [1, 0, 0], 5, ['content']);

    expect(hits.map(hit => [hit.id, hit.content])).toEqual([['first', 'updated'], ['second', 'content second']]);
    await expect(store.getDocumentCount('test-index')).resolves.toBe(2);
  });

  it('returns nothing for k below one', async () => {
    await store.uploadDocuments('test-index', [doc('a', [1, 0, 0])]);
    await expect(store.vectorSearch('test-index', [1, 0, 0], 0, [])).resolves.toEqual([]);
  });

  it('rejects a query of the wrong dimension', async () => {
    await expect(store.vectorSearch('test-index', [1, 0], 1, [])).rejects.toBeInstanceOf(DimensionMismatchError);
  });

  it('deletes an index with its documents', async () => {
    await store.uploadDocuments('test-index', [doc('a', [1, 0, 0])]);
    await store.deleteIndex('test-index');

    await expect(store.getIndex('test-index')).resolves.toBeNull();
    await expect(store.getDocumentCount('test-index')).rejects.toBeInstanceOf(IndexNotFoundError);
    await expect(store.deleteIndex('test-index')).rejects.toBeInstanceOf(IndexNotFoundError);
  });
});
