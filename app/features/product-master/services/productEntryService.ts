import type { ProductRecord, RawProductFields } from "../types/productRecord";
import type { ProductCollection } from "./productCollection";
import { createProductRecord } from "./productRecordModel";

export type ProductEntryResult =
  | { success: true; product: ProductRecord; warnings: string[] }
  | { success: false; errors: string[] };

export const REQUIRED_FIELDS_ERROR =
  "SKU Code and SKU Name are required fields.";

/**
 * Validates operator input and adds new products to the session collection
 */
export class ProductEntryService {
  constructor(
    private readonly collection: ProductCollection,
    private readonly createRecord: (
      raw: RawProductFields
    ) => ProductRecord = createProductRecord
  ) {}

  addProduct(raw: RawProductFields): ProductEntryResult {
    if (!raw["SKU Code"] || !raw["SKU Name"]) {
      return { success: false, errors: [REQUIRED_FIELDS_ERROR] };
    }

    let product: ProductRecord;
    try {
      product = this.createRecord(raw);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error("Product creation failed:", error);
      return {
        success: false,
        errors: [`An unexpected error occurred during creation: ${message}`],
      };
    }

    // SKU codes are unique by convention only
    const warnings: string[] = [];
    if (this.collection.hasSkuCode(product.skuCode)) {
      const warning = `Duplicate SKU Code found: ${product.skuCode}.`;
      console.warn(warning);
      warnings.push(warning);
    }

    this.collection.add(product);
    return { success: true, product, warnings };
  }
}
