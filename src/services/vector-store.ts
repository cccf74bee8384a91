import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import path from 'path';
import { IndexDocument, SourceType } from '../types/record.js';
import { SearchHit, SelectableField } from '../types/search.js';
import { IndexSchema, IndexSchemaSchema, UploadResult, VectorStore } from '../types/vector-store.js';
import { DimensionMismatchError, IndexNotFoundError, StoreError, ValidationError, errorMessage } from '../utils/errors.js';

interface IndexRow {
  name: string;
  dimensions: number;
  schema: string;
}

interface DocumentRow {
  id: string;
  content: string;
  source: string;
  source_type: SourceType;
  title: string | null;
  page: number | null;
  embedding: Buffer;
}

export function encodeVector(vector: number[]): Buffer {
  return Buffer.from(new Float32Array(vector).buffer);
}

export function decodeVector(blob: Buffer): number[] {
  // Copy first: a Float32Array view needs a 4-byte aligned offset
  const bytes = new Uint8Array(blob);
  return Array.from(new Float32Array(bytes.buffer, 0, Math.floor(bytes.byteLength / 4)));
}

export function cosineSimilarity(a: ArrayLike<number>, b: ArrayLike<number>): number {
  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  if (normA === 0 || normB === 0) {
    return 0;
  }
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * Vector dimension declared by a schema's single vector field.
 */
export function schemaDimensions(schema: IndexSchema): number {
  const vectorFields = schema.fields.filter(field => field.type === 'vector');
  const [vectorField] = vectorFields;
  if (!vectorField || vectorFields.length !== 1 || !vectorField.dimensions || vectorField.dimensions < 1) {
    throw new ValidationError(`Index ${schema.name} must declare exactly one vector field with positive dimensions`);
  }
  return vectorField.dimensions;
}

function validateSchema(schema: IndexSchema): number {
  const parsed = IndexSchemaSchema.safeParse(schema);
  if (!parsed.success) {
    throw new ValidationError(`Invalid index schema: ${parsed.error.issues.map(issue => issue.message).join('; ')}`);
  }

  const keys = schema.fields.filter(field => field.key);
  if (keys.length !== 1 || keys[0]?.type !== 'string') {
    throw new ValidationError(`Index ${schema.name} must declare exactly one string key field`);
  }

  const dimensions = schemaDimensions(schema);
  const vectorField = schema.fields.find(field => field.type === 'vector');
  const profile = schema.vectorSearch.profiles.find(p => p.name === vectorField?.profile);
  if (!profile) {
    throw new ValidationError(`Vector field references unknown profile ${vectorField?.profile ?? '(none)'}`);
  }
  if (!schema.vectorSearch.algorithms.some(algorithm => algorithm.name === profile.algorithm)) {
    throw new ValidationError(`Profile ${profile.name} references unknown algorithm ${profile.algorithm}`);
  }

  return dimensions;
}

/**
 * Local vector index on SQLite. Index definitions and documents live in two
 * tables; embeddings are stored as Float32 blobs and scored by cosine
 * similarity in process. Equal scores keep insertion order.
 */
export class SqliteVectorStore implements VectorStore {
  private db: Database.Database | null = null;
  private dbPath: string;

  constructor(dbPath: string) {
    this.dbPath = dbPath;
  }

  /**
   * Open the database and create tables. Use ':memory:' for a throwaway store.
   */
  initialize(): this {
    try {
      if (this.dbPath !== ':memory:') {
        mkdirSync(path.dirname(path.resolve(this.dbPath)), { recursive: true });
      }
      this.db = new Database(this.dbPath);
      this.db.pragma('journal_mode = WAL');
      this.db.pragma('foreign_keys = ON');
      this.createTables();
      return this;
    } catch (error) {
      throw new StoreError(`Failed to initialize vector store: ${errorMessage(error)}`);
    }
  }

  private createTables(): void {
    const db = this.getDb();

    db.exec(`
      CREATE TABLE IF NOT EXISTS vector_indexes (
        name TEXT PRIMARY KEY,
        dimensions INTEGER NOT NULL,
        schema TEXT NOT NULL,
        created_at DATETIME DEFAULT CURRENT_TIMESTAMP,
        updated_at DATETIME DEFAULT CURRENT_TIMESTAMP
      )
    `);

    db.exec(`
      CREATE TABLE IF NOT EXISTS index_documents (
        index_name TEXT NOT NULL,
        id TEXT NOT NULL,
        content TEXT NOT NULL,
        source TEXT NOT NULL,
        source_type TEXT NOT NULL,
        title TEXT,
        page INTEGER,
        embedding BLOB NOT NULL,
        PRIMARY KEY (index_name, id),
        FOREIGN KEY (index_name) REFERENCES vector_indexes(name) ON DELETE CASCADE
      )
    `);

    db.exec('CREATE INDEX IF NOT EXISTS idx_index_documents_source ON index_documents(index_name, source)');
  }

  private getDb(): Database.Database {
    if (!this.db) {
      throw new StoreError('Vector store not initialized. Call initialize() first.');
    }
    return this.db;
  }

  private getIndexRow(name: string): IndexRow | undefined {
    return this.getDb()
      .prepare<[string], IndexRow>('SELECT name, dimensions, schema FROM vector_indexes WHERE name = ?')
      .get(name);
  }

  private requireIndex(name: string): IndexRow {
    const row = this.getIndexRow(name);
    if (!row) {
      throw new IndexNotFoundError(name);
    }
    return row;
  }

  async createOrUpdateIndex(schema: IndexSchema): Promise<void> {
    const dimensions = validateSchema(schema);
    const existing = this.getIndexRow(schema.name);

    if (existing && existing.dimensions !== dimensions) {
      throw new StoreError(
        `Index ${schema.name} has ${existing.dimensions}-dimension vectors; delete it before changing to ${dimensions}`
      );
    }

    try {
      this.getDb().prepare(`
        INSERT INTO vector_indexes (name, dimensions, schema) VALUES (?, ?, ?)
        ON CONFLICT(name) DO UPDATE SET schema = excluded.schema, updated_at = CURRENT_TIMESTAMP
      `).run(schema.name, dimensions, JSON.stringify(schema));
    } catch (error) {
      throw new StoreError(`Failed to create index ${schema.name}: ${errorMessage(error)}`);
    }
  }

  async deleteIndex(name: string): Promise<void> {
    this.requireIndex(name);

    try {
      const db = this.getDb();
      db.transaction(() => {
        db.prepare('DELETE FROM index_documents WHERE index_name = ?').run(name);
        db.prepare('DELETE FROM vector_indexes WHERE name = ?').run(name);
      })();
    } catch (error) {
      throw new StoreError(`Failed to delete index ${name}: ${errorMessage(error)}`);
    }
  }

  async getIndex(name: string): Promise<IndexSchema | null> {
    const row = this.getIndexRow(name);
    if (!row) {
      return null;
    }
    const parsed = IndexSchemaSchema.safeParse(JSON.parse(row.schema));
    if (!parsed.success) {
      throw new StoreError(`Stored schema for index ${name} is corrupt`);
    }
    return parsed.data;
  }

  /**
   * Upsert documents. Each document gets its own result; a document with the
   * wrong vector length or an empty key fails without affecting the rest.
   */
  async uploadDocuments(name: string, documents: IndexDocument[]): Promise<UploadResult[]> {
    const { dimensions } = this.requireIndex(name);
    const db = this.getDb();
    const upsert = db.prepare(`
      INSERT INTO index_documents (index_name, id, content, source, source_type, title, page, embedding)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?)
      ON CONFLICT(index_name, id) DO UPDATE SET
        content = excluded.content,
        source = excluded.source,
        source_type = excluded.source_type,
        title = excluded.title,
        page = excluded.page,
        embedding = excluded.embedding
    `);

    const results: UploadResult[] = [];
    db.transaction(() => {
      for (const document of documents) {
        if (!document.id) {
          results.push({ key: document.id, succeeded: false, error: 'Document key is empty' });
          continue;
        }
        if (document.embedding.length !== dimensions) {
          results.push({
            key: document.id,
            succeeded: false,
            error: `Expected ${dimensions} dimensions, got ${document.embedding.length}`,
          });
          continue;
        }

        try {
          upsert.run(
            name,
            document.id,
            document.content,
            document.source,
            document.sourceType,
            document.title ?? null,
            document.page ?? null,
            encodeVector(document.embedding)
          );
          results.push({ key: document.id, succeeded: true });
        } catch (error) {
          results.push({ key: document.id, succeeded: false, error: errorMessage(error) });
        }
      }
    })();

    return results;
  }

  /**
   * Exhaustive nearest-neighbour search. Returns at most `k` hits, best
   * first, carrying the selected fields.
   */
  async vectorSearch(
    name: string,
    vector: number[],
    k: number,
    select: readonly SelectableField[]
  ): Promise<SearchHit[]> {
    const { dimensions } = this.requireIndex(name);
    if (vector.length !== dimensions) {
      throw new DimensionMismatchError(dimensions, vector.length, `search in ${name}`);
    }
    if (k < 1) {
      return [];
    }

    const rows = this.getDb()
      .prepare<[string], DocumentRow>(`
        SELECT id, content, source, source_type, title, page, embedding
        FROM index_documents WHERE index_name = ? ORDER BY rowid
      `)
      .all(name);

    const query = Float32Array.from(vector);
    const ranked = rows
      .map(row => ({ row, score: cosineSimilarity(query, decodeVector(row.embedding)) }))
      .sort((a, b) => b.score - a.score)
      .slice(0, k);

    return ranked.map(({ row, score }) => project(row, score, select));
  }

  async getDocumentCount(name: string): Promise<number> {
    this.requireIndex(name);
    const row = this.getDb()
      .prepare<[string], { count: number }>('SELECT COUNT(*) AS count FROM index_documents WHERE index_name = ?')
      .get(name);
    return row?.count ?? 0;
  }

  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }
}

function project(row: DocumentRow, score: number, select: readonly SelectableField[]): SearchHit {
  const hit: SearchHit = { id: row.id, score };
  for (const field of select) {
    switch (field) {
      case 'content':
        hit.content = row.content;
        break;
      case 'source':
        hit.source = row.source;
        break;
      case 'sourceType':
        hit.sourceType = row.source_type;
        break;
      case 'title':
        if (row.title !== null) hit.title = row.title;
        break;
      case 'page':
        if (row.page !== null) hit.page = row.page;
        break;
      case 'id':
        break;
    }
  }
  return hit;
}
