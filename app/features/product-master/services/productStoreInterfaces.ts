import type { ProductCollection } from "./productCollection";

/**
 * Outcome of reading the product list from storage
 */
export type ProductLoadResult =
  | { status: "loaded"; count: number }
  | { status: "missing" }
  | { status: "failed"; error: string };

/**
 * Outcome of writing the product list to storage
 */
export interface ProductSaveResult {
  success: boolean;
  count: number;
  error?: string;
}

/**
 * Base interface for persistence backends holding the product list.
 * A failed load or save leaves the collection as it was.
 */
export interface ProductStore {
  readonly location: string;
  load(collection: ProductCollection): Promise<ProductLoadResult>;
  save(collection: ProductCollection): Promise<ProductSaveResult>;
}

/**
 * Configuration for store operations
 */
export interface ProductStoreConfig {
  filePath: string;
  enableDetailedLogging?: boolean;
}
