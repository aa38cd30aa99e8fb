/**
 * Column headers of the product master file, in storage order.
 */
export const PRODUCT_FIELDS = [
  "Status",
  "SKU Code",
  "SKU Name",
  "Product Line",
  "Category",
  "Sub-Category",
  "MFUPC",
  "SRP",
  "PCS per Inner Box",
  "PCS per Master Box",
  "Shelflife (Months)",
  "Period After Opening (Months)",
  "CBM",
  "Height(cm)",
  "Width(cm)",
  "Length(cm)",
  "Weight(g)",
  "Expiry Item",
  "Selling Ban",
  "Storage Type",
  "Tester product",
  "Image URL",
] as const;

export type ProductFieldName = (typeof PRODUCT_FIELDS)[number];

export type ProductFieldKind = "text" | "decimal" | "integer";

export const DECIMAL_FIELDS = [
  "SRP",
  "CBM",
  "Height(cm)",
  "Width(cm)",
  "Length(cm)",
  "Weight(g)",
] as const satisfies readonly ProductFieldName[];

export const INTEGER_FIELDS = [
  "PCS per Inner Box",
  "PCS per Master Box",
  "Shelflife (Months)",
  "Period After Opening (Months)",
] as const satisfies readonly ProductFieldName[];

/**
 * Raw field values as typed by an operator or read from a CSV row.
 * Any header may be missing; unknown headers are ignored.
 */
export type RawProductFields = Partial<Record<string, string | undefined>>;

/**
 * A complete entry with one value per header.
 */
export type ProductEntry = Record<ProductFieldName, string>;

export type ProductRecord = {
  readonly status: string;
  readonly skuCode: string;
  readonly skuName: string;
  readonly productLine: string;
  readonly category: string;
  readonly subCategory: string;
  readonly mfupc: string;
  readonly srp: number;
  readonly pcsPerInnerBox: number;
  readonly pcsPerMasterBox: number;
  readonly shelflifeMonths: number;
  readonly periodAfterOpeningMonths: number;
  readonly cbm: number;
  readonly heightCm: number;
  readonly widthCm: number;
  readonly lengthCm: number;
  readonly weightG: number;
  readonly expiryItem: string;
  readonly sellingBan: string;
  readonly storageType: string;
  readonly testerProduct: string;
  readonly imageUrl: string;
};

/**
 * List view row: SKU Code, SKU Name, Status, Product Line, Category,
 * SRP, Shelf-life, Storage Type.
 */
export type ProductDisplayRow = readonly [
  skuCode: string,
  skuName: string,
  status: string,
  productLine: string,
  category: string,
  srp: string,
  shelflife: string,
  storageType: string,
];

export function isProductFieldName(name: string): name is ProductFieldName {
  return (PRODUCT_FIELDS as readonly string[]).includes(name);
}

export function getProductFieldKind(field: ProductFieldName): ProductFieldKind {
  if ((DECIMAL_FIELDS as readonly string[]).includes(field)) return "decimal";
  if ((INTEGER_FIELDS as readonly string[]).includes(field)) return "integer";
  return "text";
}
