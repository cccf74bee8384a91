import { z } from 'zod';
import { IndexDocument } from './record.js';
import { SearchHit, SelectableField } from './search.js';

export const IndexFieldSchema = z.object({
  name: z.string().min(1),
  type: z.enum(['string', 'int', 'vector']),
  key: z.boolean().optional(),
  searchable: z.boolean().optional(),
  filterable: z.boolean().optional(),
  facetable: z.boolean().optional(),
  /** Vector fields only */
  dimensions: z.number().int().positive().optional(),
  /** Vector fields only; must name a profile in `vectorSearch.profiles` */
  profile: z.string().optional(),
});

export const IndexSchemaSchema = z.object({
  name: z.string().min(1),
  fields: z.array(IndexFieldSchema),
  vectorSearch: z.object({
    algorithms: z.array(z.object({ name: z.string(), kind: z.literal('hnsw') })),
    profiles: z.array(z.object({ name: z.string(), algorithm: z.string() })),
  }),
});

export type IndexField = z.infer<typeof IndexFieldSchema>;
export type IndexSchema = z.infer<typeof IndexSchemaSchema>;

export interface UploadResult {
  key: string;
  succeeded: boolean;
  error?: string;
}

/**
 * Store contract the lifecycle, builder and ranker are written against.
 */
export interface VectorStore {
  createOrUpdateIndex(schema: IndexSchema): Promise<void>;
  /** Throws `IndexNotFoundError` when the index does not exist */
  deleteIndex(name: string): Promise<void>;
  getIndex(name: string): Promise<IndexSchema | null>;
  uploadDocuments(name: string, documents: IndexDocument[]): Promise<UploadResult[]>;
  vectorSearch(name: string, vector: number[], k: number, select: readonly SelectableField[]): Promise<SearchHit[]>;
  getDocumentCount(name: string): Promise<number>;
  close(): void;
}
