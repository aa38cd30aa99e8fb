import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { ProductCollection } from "../features/product-master/services/productCollection";
import {
  ProductEntryService,
  REQUIRED_FIELDS_ERROR,
} from "../features/product-master/services/productEntryService";
import { createBlankEntry } from "../features/product-master/services/productRecordModel";

describe("ProductEntryService", () => {
  let collection: ProductCollection;
  let service: ProductEntryService;

  beforeEach(() => {
    collection = new ProductCollection();
    service = new ProductEntryService(collection);
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should add a product built from the entry", () => {
    const result = service.addProduct({
      ...createBlankEntry(),
      "SKU Code": "SKU-1",
      "SKU Name": "Shampoo",
      SRP: "199",
    });

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.product.skuName).toBe("Shampoo");
    expect(result.product.srp).toBe(199);
    expect(result.product.status).toBe("Active");
    expect(result.warnings).toEqual([]);
    expect(collection.list()).toEqual([result.product]);
  });

  it("should reject an entry without SKU Code", () => {
    const result = service.addProduct({ "SKU Name": "Shampoo" });

    expect(result).toEqual({ success: false, errors: [REQUIRED_FIELDS_ERROR] });
    expect(collection.size).toBe(0);
  });

  it("should reject an entry with an empty SKU Name", () => {
    const result = service.addProduct({ "SKU Code": "SKU-1", "SKU Name": "" });

    expect(result.success).toBe(false);
    expect(collection.size).toBe(0);
  });

  it("should accept malformed numbers as zero", () => {
    const result = service.addProduct({
      "SKU Code": "SKU-1",
      "SKU Name": "Shampoo",
      SRP: "free",
    });

    expect(result.success).toBe(true);
    expect(collection.list()[0].srp).toBe(0);
  });

  it("should report unexpected construction failures without adding", () => {
    const failing = new ProductEntryService(collection, () => {
      throw new Error("boom");
    });

    const result = failing.addProduct({ "SKU Code": "SKU-1", "SKU Name": "X" });

    expect(result).toEqual({
      success: false,
      errors: ["An unexpected error occurred during creation: boom"],
    });
    expect(collection.size).toBe(0);
  });

  it("should warn on a duplicate SKU Code but still add it", () => {
    service.addProduct({ "SKU Code": "SKU-1", "SKU Name": "First" });
    const result = service.addProduct({ "SKU Code": "SKU-1", "SKU Name": "Second" });

    expect(result.success).toBe(true);
    if (!result.success) return;
    expect(result.warnings).toEqual(["Duplicate SKU Code found: SKU-1."]);
    expect(collection.list().map((p) => p.skuName)).toEqual(["First", "Second"]);
  });
});

describe("ProductCollection", () => {
  it("should keep insertion order and return copies", () => {
    const collection = new ProductCollection();
    const service = new ProductEntryService(collection);
    service.addProduct({ "SKU Code": "B", "SKU Name": "b" });
    service.addProduct({ "SKU Code": "A", "SKU Name": "a" });

    const listed = collection.list();
    collection.replaceAll([]);

    expect(listed.map((p) => p.skuCode)).toEqual(["B", "A"]);
    expect(collection.size).toBe(0);
  });
});
