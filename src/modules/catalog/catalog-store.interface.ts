import { CatalogData } from './catalog.types';

export const CATALOG_STORE = Symbol('CATALOG_STORE');

/**
 * Read side of the catalog/pricing store. Administrative writes happen
 * elsewhere; the engine only ever loads full snapshots.
 */
export interface CatalogStore {
  load(): Promise<CatalogData>;
}
