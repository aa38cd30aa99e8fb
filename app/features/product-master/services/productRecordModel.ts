import type {
  ProductDisplayRow,
  ProductEntry,
  ProductFieldName,
  ProductRecord,
  RawProductFields,
} from "../types/productRecord";
import { CHOICE_FIELD_DEFAULTS } from "~/constants/productMaster";
import { coerceDecimal, coerceInteger } from "~/core/utils/numberCoercion";
import { formatCurrency, formatMonths } from "~/utils/currencyFormatting";

const text = (raw: RawProductFields, field: ProductFieldName): string =>
  raw[field] ?? "";

const decimal = (raw: RawProductFields, field: ProductFieldName): number =>
  coerceDecimal(raw[field]);

const integer = (raw: RawProductFields, field: ProductFieldName): number =>
  coerceInteger(raw[field]);

/**
 * Builds a product record from raw field values.
 *
 * Numeric fields that are empty or do not parse become zero instead of
 * failing the record; text fields are kept exactly as given.
 */
export function createProductRecord(raw: RawProductFields): ProductRecord {
  return Object.freeze({
    status: text(raw, "Status"),
    skuCode: text(raw, "SKU Code"),
    skuName: text(raw, "SKU Name"),
    productLine: text(raw, "Product Line"),
    category: text(raw, "Category"),
    subCategory: text(raw, "Sub-Category"),
    mfupc: text(raw, "MFUPC"),
    srp: decimal(raw, "SRP"),
    pcsPerInnerBox: integer(raw, "PCS per Inner Box"),
    pcsPerMasterBox: integer(raw, "PCS per Master Box"),
    shelflifeMonths: integer(raw, "Shelflife (Months)"),
    periodAfterOpeningMonths: integer(raw, "Period After Opening (Months)"),
    cbm: decimal(raw, "CBM"),
    heightCm: decimal(raw, "Height(cm)"),
    widthCm: decimal(raw, "Width(cm)"),
    lengthCm: decimal(raw, "Length(cm)"),
    weightG: decimal(raw, "Weight(g)"),
    expiryItem: text(raw, "Expiry Item"),
    sellingBan: text(raw, "Selling Ban"),
    storageType: text(raw, "Storage Type"),
    testerProduct: text(raw, "Tester product"),
    imageUrl: text(raw, "Image URL"),
  });
}

/**
 * Key fields for the list view, with SRP and shelf-life formatted for reading
 */
export function toProductDisplayRow(
  product: ProductRecord,
  currencySymbol: string
): ProductDisplayRow {
  return [
    product.skuCode,
    product.skuName,
    product.status,
    product.productLine,
    product.category,
    formatCurrency(product.srp, currencySymbol),
    formatMonths(product.shelflifeMonths),
    product.storageType,
  ];
}

/**
 * All fields keyed by column header, numbers in their plain string form.
 * `createProductRecord(toProductStorageMap(p))` reproduces `p`.
 */
export function toProductStorageMap(product: ProductRecord): ProductEntry {
  return {
    Status: product.status,
    "SKU Code": product.skuCode,
    "SKU Name": product.skuName,
    "Product Line": product.productLine,
    Category: product.category,
    "Sub-Category": product.subCategory,
    MFUPC: product.mfupc,
    SRP: product.srp.toString(),
    "PCS per Inner Box": product.pcsPerInnerBox.toString(),
    "PCS per Master Box": product.pcsPerMasterBox.toString(),
    "Shelflife (Months)": product.shelflifeMonths.toString(),
    "Period After Opening (Months)":
      product.periodAfterOpeningMonths.toString(),
    CBM: product.cbm.toString(),
    "Height(cm)": product.heightCm.toString(),
    "Width(cm)": product.widthCm.toString(),
    "Length(cm)": product.lengthCm.toString(),
    "Weight(g)": product.weightG.toString(),
    "Expiry Item": product.expiryItem,
    "Selling Ban": product.sellingBan,
    "Storage Type": product.storageType,
    "Tester product": product.testerProduct,
    "Image URL": product.imageUrl,
  };
}

/**
 * A fresh entry form: choice fields preselected, everything else blank
 */
export function createBlankEntry(): ProductEntry {
  return {
    ...toProductStorageMap(createProductRecord({})),
    SRP: "",
    "PCS per Inner Box": "",
    "PCS per Master Box": "",
    "Shelflife (Months)": "",
    "Period After Opening (Months)": "",
    CBM: "",
    "Height(cm)": "",
    "Width(cm)": "",
    "Length(cm)": "",
    "Weight(g)": "",
    ...CHOICE_FIELD_DEFAULTS,
  };
}
