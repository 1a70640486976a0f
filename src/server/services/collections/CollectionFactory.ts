/**
 * CollectionFactory
 *
 * One collection per country, all created with the same hybrid schema:
 * dense vectors sized to the encoder with cosine distance, and sparse term
 * vectors weighted by IDF at query time.
 */

import type {
  CollectionStats,
  DenseSchema,
  SparseSchema,
  VectorStore,
} from '../../contracts/capabilities.js';
import { SUPPORTED_COUNTRIES, type SupportedCountry } from '../../config/jurisdictions.js';
import { createChildLogger } from '../../utils/logger.js';

export type CollectionStatus = 'active' | 'empty' | 'not_initialized';

export interface CountryCollectionInfo {
  collection: string;
  pointsCount: number;
  status: CollectionStatus;
}

export function collectionNameFor(country: string): string {
  return `laws_${country}`;
}

export class CollectionFactory {
  private readonly logger = createChildLogger({ service: 'CollectionFactory' });

  constructor(
    private readonly store: VectorStore,
    private readonly denseDims: number
  ) {}

  get denseSchema(): DenseSchema {
    return { dims: this.denseDims, distance: 'cosine' };
  }

  get sparseSchema(): SparseSchema {
    return { idf: true };
  }

  getCollectionName(country: SupportedCountry): string {
    return collectionNameFor(country);
  }

  /**
   * Create the country collection if it does not exist yet. Returns its name.
   */
  async ensureCountryCollection(country: SupportedCountry): Promise<string> {
    const name = this.getCollectionName(country);
    if (await this.store.collectionExists(name)) {
      this.logger.debug({ collection: name }, 'Collection exists');
      return name;
    }

    await this.store.createCollection(name, this.denseSchema, this.sparseSchema);
    this.logger.info({ collection: name, dims: this.denseDims }, 'Created country collection');
    return name;
  }

  async getCollectionStats(country: SupportedCountry): Promise<CollectionStats | null> {
    return this.store.collectionStats(this.getCollectionName(country));
  }

  /**
   * Status of every supported country's collection, keyed by country
   */
  async listCollections(): Promise<Record<string, CountryCollectionInfo>> {
    const entries = await Promise.all(
      SUPPORTED_COUNTRIES.map(async (country): Promise<[string, CountryCollectionInfo]> => {
        const collection = this.getCollectionName(country);
        const stats = await this.store.collectionStats(collection);
        if (!stats) {
          return [country, { collection, pointsCount: 0, status: 'not_initialized' }];
        }
        return [
          country,
          { collection, pointsCount: stats.pointsCount, status: stats.pointsCount > 0 ? 'active' : 'empty' },
        ];
      })
    );
    return Object.fromEntries(entries);
  }

  /**
   * Delete a country's collection. Returns false when there was nothing to delete.
   */
  async deleteCountryCollection(country: SupportedCountry): Promise<boolean> {
    const name = this.getCollectionName(country);
    if (!(await this.store.collectionExists(name))) {
      return false;
    }
    await this.store.deleteCollection(name);
    this.logger.warn({ collection: name }, 'Deleted country collection');
    return true;
  }

  /**
   * Drop and recreate a country collection with the standard schema
   */
  async resetCountryCollection(country: SupportedCountry): Promise<string> {
    await this.deleteCountryCollection(country);
    return this.ensureCountryCollection(country);
  }
}
