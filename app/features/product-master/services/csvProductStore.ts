import { readFile, writeFile } from "fs/promises";
import Papa from "papaparse";
import type { ProductEntry, RawProductFields } from "../types/productRecord";
import { PRODUCT_FIELDS } from "../types/productRecord";
import type { ProductCollection } from "./productCollection";
import type {
  ProductLoadResult,
  ProductSaveResult,
  ProductStore,
  ProductStoreConfig,
} from "./productStoreInterfaces";
import {
  createProductRecord,
  toProductStorageMap,
} from "./productRecordModel";
import { FILE_CONFIG } from "~/constants/productMaster";

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

const isMissingFileError = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

/**
 * Parses product master CSV text into raw rows keyed by header
 */
export function parseProductCsv(csvText: string): RawProductFields[] {
  const results = Papa.parse<Record<string, string>>(
    csvText.replace(/^\uFEFF/, ""),
    {
      header: true,
      skipEmptyLines: true,
      delimiter: FILE_CONFIG.DELIMITER,
    }
  );

  results.errors.forEach((error) => {
    console.warn(
      `CSV row ${error.row ?? "?"}: ${error.message}. Missing columns are left blank.`
    );
  });

  return results.data;
}

/**
 * Serializes rows to CSV with the full header, even when there are no rows
 */
export function serializeProductCsv(rows: ProductEntry[]): string {
  const csvOutput = Papa.unparse(
    { fields: [...PRODUCT_FIELDS], data: rows },
    { delimiter: FILE_CONFIG.DELIMITER, newline: FILE_CONFIG.NEWLINE }
  );
  return `${csvOutput}${FILE_CONFIG.NEWLINE}`;
}

/**
 * Product store backed by a single CSV file
 */
export class CsvProductStore implements ProductStore {
  constructor(private readonly config: ProductStoreConfig) {}

  get location(): string {
    return this.config.filePath;
  }

  async load(collection: ProductCollection): Promise<ProductLoadResult> {
    let csvText: string;
    try {
      csvText = await readFile(this.config.filePath, FILE_CONFIG.ENCODING);
    } catch (error) {
      if (isMissingFileError(error)) {
        this.logDetail(`No product file at ${this.location}; starting empty`);
        return { status: "missing" };
      }
      console.error("Failed to read product file:", error);
      return { status: "failed", error: errorMessage(error) };
    }

    try {
      const products = parseProductCsv(csvText).map(createProductRecord);
      collection.replaceAll(products);
      this.logDetail(`Loaded ${products.length} products from ${this.location}`);
      return { status: "loaded", count: products.length };
    } catch (error) {
      console.error("Failed to load product data:", error);
      return { status: "failed", error: errorMessage(error) };
    }
  }

  async save(collection: ProductCollection): Promise<ProductSaveResult> {
    const products = collection.list();

    try {
      const csvOutput = serializeProductCsv(products.map(toProductStorageMap));
      await writeFile(this.config.filePath, csvOutput, FILE_CONFIG.ENCODING);
      this.logDetail(`Saved ${products.length} products to ${this.location}`);
      return { success: true, count: products.length };
    } catch (error) {
      console.error("Failed to save product data:", error);
      return { success: false, count: 0, error: errorMessage(error) };
    }
  }

  private logDetail(message: string): void {
    if (this.config.enableDetailedLogging) {
      console.log(`💾 ${message}`);
    }
  }
}
