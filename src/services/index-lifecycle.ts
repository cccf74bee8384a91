import { IndexSchema, VectorStore } from '../types/vector-store.js';
import { IndexNotFoundError } from '../utils/errors.js';
import { Logger, silentLogger } from '../utils/logger.js';

export const VECTOR_PROFILE = 'hnsw-profile';
export const VECTOR_ALGORITHM = 'hnsw-config';

/**
 * The fixed index layout: `id` key, searchable `content`, filterable and
 * facetable `source`, and one vector field searched through an HNSW profile.
 */
export function buildIndexSchema(name: string, dimensions: number): IndexSchema {
  return {
    name,
    fields: [
      { name: 'id', type: 'string', key: true, filterable: true },
      { name: 'content', type: 'string', searchable: true },
      { name: 'source', type: 'string', filterable: true, facetable: true },
      { name: 'sourceType', type: 'string', filterable: true },
      { name: 'title', type: 'string' },
      { name: 'page', type: 'int' },
      { name: 'embedding', type: 'vector', dimensions, profile: VECTOR_PROFILE },
    ],
    vectorSearch: {
      algorithms: [{ name: VECTOR_ALGORITHM, kind: 'hnsw' }],
      profiles: [{ name: VECTOR_PROFILE, algorithm: VECTOR_ALGORITHM }],
    },
  };
}

/**
 * Reset-then-create is the only way an index changes; there are no
 * migrations.
 */
export class IndexLifecycle {
  private store: VectorStore;
  private indexName: string;
  readonly dimensions: number;
  private logger: Logger;

  constructor(store: VectorStore, options: { indexName: string; dimensions: number; logger?: Logger }) {
    this.store = store;
    this.indexName = options.indexName;
    this.dimensions = options.dimensions;
    this.logger = options.logger ?? silentLogger;
  }

  get schema(): IndexSchema {
    return buildIndexSchema(this.indexName, this.dimensions);
  }

  /**
   * Delete the index. A missing index is fine; any other failure propagates.
   */
  async reset(): Promise<void> {
    try {
      await this.store.deleteIndex(this.indexName);
      this.logger.info(`deleted index ${this.indexName}`);
    } catch (error) {
      if (error instanceof IndexNotFoundError) {
        this.logger.debug(`index ${this.indexName} did not exist`);
        return;
      }
      throw error;
    }
  }

  async ensureSchema(): Promise<void> {
    await this.store.createOrUpdateIndex(this.schema);
    this.logger.info(`index ${this.indexName} ready (${this.dimensions} dims)`);
  }

  async recreate(): Promise<void> {
    await this.reset();
    await this.ensureSchema();
  }
}
