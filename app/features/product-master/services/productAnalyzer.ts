import type { ProductRecord } from "../types/productRecord";
import { PRODUCT_MASTER_CONSTANTS } from "~/constants/productMaster";
import { formatCurrency } from "~/utils/currencyFormatting";

export interface ProductLineCount {
  productLine: string;
  count: number;
}

export interface ProductMetrics {
  totalProducts: number;
  activeProducts: number;
  discontinuedProducts: number;
  averageSrp: number | null;
  topProductLine: ProductLineCount | null;
  productLineCounts: Map<string, number>;
}

export interface ProductDashboardMetrics {
  "Total Products": string;
  "Active Products": string;
  Discontinued: string;
  "Avg SRP": string;
  "Top Product Line": string;
}

export type ProductMetricName = keyof ProductDashboardMetrics;

/**
 * Computes dashboard figures over a product list in a single pass.
 *
 * Status matching is case-insensitive. Products without a product line are
 * counted under "Unassigned". When two lines share the highest count, the
 * one that appeared first in the list wins.
 */
export function computeProductMetrics(
  products: readonly ProductRecord[]
): ProductMetrics {
  let activeProducts = 0;
  let discontinuedProducts = 0;
  let totalSrp = 0;
  const productLineCounts = new Map<string, number>();

  for (const product of products) {
    const status = product.status.toLowerCase();
    if (status === PRODUCT_MASTER_CONSTANTS.ACTIVE_STATUS) {
      activeProducts++;
    } else if (status === PRODUCT_MASTER_CONSTANTS.DISCONTINUED_STATUS) {
      discontinuedProducts++;
    }

    totalSrp += product.srp;

    const line =
      product.productLine || PRODUCT_MASTER_CONSTANTS.UNASSIGNED_PRODUCT_LINE;
    productLineCounts.set(line, (productLineCounts.get(line) ?? 0) + 1);
  }

  let topProductLine: ProductLineCount | null = null;
  for (const [productLine, count] of productLineCounts) {
    if (!topProductLine || count > topProductLine.count) {
      topProductLine = { productLine, count };
    }
  }

  return {
    totalProducts: products.length,
    activeProducts,
    discontinuedProducts,
    averageSrp: products.length > 0 ? totalSrp / products.length : null,
    topProductLine,
    productLineCounts,
  };
}

/**
 * Renders metrics the way the dashboard shows them
 */
export function formatProductMetrics(
  metrics: ProductMetrics,
  currencySymbol: string
): ProductDashboardMetrics {
  const { NOT_AVAILABLE } = PRODUCT_MASTER_CONSTANTS;

  return {
    "Total Products": metrics.totalProducts.toString(),
    "Active Products": metrics.activeProducts.toString(),
    Discontinued: metrics.discontinuedProducts.toString(),
    "Avg SRP":
      metrics.averageSrp === null
        ? NOT_AVAILABLE
        : formatCurrency(metrics.averageSrp, currencySymbol),
    "Top Product Line": metrics.topProductLine
      ? `${metrics.topProductLine.productLine} (${metrics.topProductLine.count})`
      : NOT_AVAILABLE,
  };
}

export function analyzeProducts(
  products: readonly ProductRecord[],
  currencySymbol: string = PRODUCT_MASTER_CONSTANTS.DEFAULT_CURRENCY_SYMBOL
): ProductDashboardMetrics {
  return formatProductMetrics(computeProductMetrics(products), currencySymbol);
}
