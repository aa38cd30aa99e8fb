import { describe, it, expect } from "vitest";
import {
  createBlankEntry,
  createProductRecord,
  toProductDisplayRow,
  toProductStorageMap,
} from "../features/product-master/services/productRecordModel";
import { PRODUCT_FIELDS } from "../features/product-master/types/productRecord";

const sampleFields = {
  Status: "Active",
  "SKU Code": "SKU-1001",
  "SKU Name": "Aloe Face Mist 100ml",
  "Product Line": "Skincare",
  Category: "Face",
  "Sub-Category": "Mist",
  MFUPC: "4800000000017",
  SRP: "1234.5",
  "PCS per Inner Box": "12",
  "PCS per Master Box": "144",
  "Shelflife (Months)": "36",
  "Period After Opening (Months)": "12",
  CBM: "0.025",
  "Height(cm)": "15.5",
  "Width(cm)": "5",
  "Length(cm)": "5",
  "Weight(g)": "120.75",
  "Expiry Item": "Yes",
  "Selling Ban": "No",
  "Storage Type": "Room Temperature",
  "Tester product": "No",
  "Image URL": "https://example.com/images/sku-1001.png",
};

describe("createProductRecord", () => {
  it("should map every header to its typed field", () => {
    const product = createProductRecord(sampleFields);

    expect(product).toEqual({
      status: "Active",
      skuCode: "SKU-1001",
      skuName: "Aloe Face Mist 100ml",
      productLine: "Skincare",
      category: "Face",
      subCategory: "Mist",
      mfupc: "4800000000017",
      srp: 1234.5,
      pcsPerInnerBox: 12,
      pcsPerMasterBox: 144,
      shelflifeMonths: 36,
      periodAfterOpeningMonths: 12,
      cbm: 0.025,
      heightCm: 15.5,
      widthCm: 5,
      lengthCm: 5,
      weightG: 120.75,
      expiryItem: "Yes",
      sellingBan: "No",
      storageType: "Room Temperature",
      testerProduct: "No",
      imageUrl: "https://example.com/images/sku-1001.png",
    });
  });

  it("should default every field when the mapping is empty", () => {
    const product = createProductRecord({});

    expect(product.status).toBe("");
    expect(product.skuCode).toBe("");
    expect(product.skuName).toBe("");
    expect(product.productLine).toBe("");
    expect(product.mfupc).toBe("");
    expect(product.storageType).toBe("");
    expect(product.imageUrl).toBe("");
    expect(product.srp).toBe(0);
    expect(product.cbm).toBe(0);
    expect(product.heightCm).toBe(0);
    expect(product.weightG).toBe(0);
    expect(product.pcsPerInnerBox).toBe(0);
    expect(product.pcsPerMasterBox).toBe(0);
    expect(product.shelflifeMonths).toBe(0);
    expect(product.periodAfterOpeningMonths).toBe(0);
  });

  it("should coerce malformed numbers to zero instead of rejecting the record", () => {
    const product = createProductRecord({
      "SKU Code": "SKU-2",
      SRP: "₱99",
      CBM: "n/a",
      "Weight(g)": "heavy",
      "PCS per Inner Box": "6.5",
      "Shelflife (Months)": "two years",
    });

    expect(product.skuCode).toBe("SKU-2");
    expect(product.srp).toBe(0);
    expect(product.cbm).toBe(0);
    expect(product.weightG).toBe(0);
    expect(product.pcsPerInnerBox).toBe(0);
    expect(product.shelflifeMonths).toBe(0);
  });

  it("should keep text fields verbatim", () => {
    const product = createProductRecord({
      Status: "  active ",
      "SKU Name": "Mixed CASE name ",
    });

    expect(product.status).toBe("  active ");
    expect(product.skuName).toBe("Mixed CASE name ");
  });

  it("should ignore headers it does not know", () => {
    const product = createProductRecord({ "SKU Code": "SKU-3", Color: "Red" });

    expect(product.skuCode).toBe("SKU-3");
    expect(Object.keys(product)).toHaveLength(22);
  });

  it("should produce a frozen record", () => {
    expect(Object.isFrozen(createProductRecord(sampleFields))).toBe(true);
  });
});

describe("toProductDisplayRow", () => {
  it("should return the eight list columns in order", () => {
    const row = toProductDisplayRow(createProductRecord(sampleFields), "₱");

    expect(row).toEqual([
      "SKU-1001",
      "Aloe Face Mist 100ml",
      "Active",
      "Skincare",
      "Face",
      "₱1,234.50",
      "36 months",
      "Room Temperature",
    ]);
  });

  it("should still return eight columns for an empty record", () => {
    const row = toProductDisplayRow(createProductRecord({}), "₱");

    expect(row).toEqual(["", "", "", "", "", "₱0.00", "0 months", ""]);
  });

  it("should group thousands and round to two decimals", () => {
    const row = toProductDisplayRow(
      createProductRecord({ SRP: "1234567.891" }),
      "$"
    );

    expect(row[5]).toBe("$1,234,567.89");
  });
});

describe("toProductStorageMap", () => {
  it("should emit one value per header with plain numbers", () => {
    const storage = toProductStorageMap(createProductRecord(sampleFields));

    expect(Object.keys(storage)).toEqual([...PRODUCT_FIELDS]);
    expect(storage.SRP).toBe("1234.5");
    expect(storage["Width(cm)"]).toBe("5");
    expect(storage["Shelflife (Months)"]).toBe("36");
  });

  it("should render coerced zeros as 0", () => {
    const storage = toProductStorageMap(createProductRecord({ SRP: "oops" }));

    expect(storage.SRP).toBe("0");
    expect(storage["PCS per Master Box"]).toBe("0");
    expect(storage.Status).toBe("");
  });

  it("should round-trip through createProductRecord", () => {
    const products = [
      createProductRecord(sampleFields),
      createProductRecord({}),
      createProductRecord({ SRP: "0.1", CBM: "1e-7", "Height(cm)": "-2.5" }),
      createProductRecord({ "SKU Name": 'Quote "and", comma', SRP: "19.99" }),
    ];

    products.forEach((product) => {
      expect(createProductRecord(toProductStorageMap(product))).toEqual(product);
    });
  });
});

describe("entry form helpers", () => {
  it("should preselect the choice fields on a blank entry", () => {
    const entry = createBlankEntry();

    expect(Object.keys(entry)).toHaveLength(22);
    expect(entry.Status).toBe("Active");
    expect(entry["Expiry Item"]).toBe("No");
    expect(entry["Selling Ban"]).toBe("No");
    expect(entry["Tester product"]).toBe("No");
    expect(entry["SKU Code"]).toBe("");
    expect(entry.SRP).toBe("");
    expect(entry["Shelflife (Months)"]).toBe("");
  });
});
