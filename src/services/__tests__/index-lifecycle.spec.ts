import { IndexLifecycle, VECTOR_ALGORITHM, VECTOR_PROFILE, buildIndexSchema } from '../index-lifecycle.js';
import { SqliteVectorStore } from '../vector-store.js';
import { StoreError } from '../../utils/errors.js';

describe('buildIndexSchema', () => {
  it('declares the key, content, source and vector fields', () => {
    const schema = buildIndexSchema('at2-index', 1536);

    expect(schema.fields.find(f => f.key)).toEqual({ name: 'id', type: 'string', key: true, filterable: true });
    expect(schema.fields.find(f => f.name === 'content')).toMatchObject({ searchable: true });
    expect(schema.fields.find(f => f.name === 'source')).toMatchObject({ filterable: true, facetable: true });
    expect(schema.fields.find(f => f.type === 'vector')).toEqual({
      name: 'embedding',
      type: 'vector',
      dimensions: 1536,
      profile: VECTOR_PROFILE,
    });
    expect(schema.vectorSearch.profiles).toEqual([{ name: VECTOR_PROFILE, algorithm: VECTOR_ALGORITHM }]);
  });
});

describe('IndexLifecycle', () => {
  let store: SqliteVectorStore;

  beforeEach(() => {
    store = new SqliteVectorStore(':memory:').initialize();
  });

  afterEach(() => {
    store.close();
  });

  it('treats resetting a missing index as success', async () => {
    const lifecycle = new IndexLifecycle(store, { indexName: 'missing', dimensions: 3 });
    await expect(lifecycle.reset()).resolves.toBeUndefined();
  });

  it('propagates other delete failures', async () => {
    const lifecycle = new IndexLifecycle(store, { indexName: 'x', dimensions: 3 });
    jest.spyOn(store, 'deleteIndex').mockRejectedValue(new StoreError('disk full'));

    await expect(lifecycle.reset()).rejects.toThrow('disk full');
  });

  it('creates the schema and is idempotent', async () => {
    const lifecycle = new IndexLifecycle(store, { indexName: 'docs', dimensions: 3 });

    await lifecycle.ensureSchema();
    await lifecycle.ensureSchema();

    await expect(store.getIndex('docs')).resolves.toEqual(lifecycle.schema);
  });

  it('recreate empties the index and allows a new dimension', async () => {
    await new IndexLifecycle(store, { indexName: 'docs', dimensions: 3 }).ensureSchema();
    await store.uploadDocuments('docs', [
      { id: 'a', content: 'c', source: 's', sourceType: 'document-file', embedding: [1, 0, 0] },
    ]);

    const lifecycle = new IndexLifecycle(store, { indexName: 'docs', dimensions: 2 });
    await lifecycle.recreate();

    await expect(store.getDocumentCount('docs')).resolves.toBe(0);
    await expect(store.getIndex('docs')).resolves.toEqual(buildIndexSchema('docs', 2));
  });
});
