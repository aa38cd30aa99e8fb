/**
 * Runtime configuration for the product master data manager
 */

import path from "path";
import {
  FILE_CONFIG,
  PRODUCT_MASTER_CONSTANTS,
} from "../constants/productMaster";

export interface ProductMasterConfig {
  // Storage
  csvFilePath: string;

  // Display
  currencySymbol: string;

  // Debugging
  enableDetailedLogging: boolean;
}

export const DEFAULT_PRODUCT_MASTER_CONFIG: ProductMasterConfig = {
  csvFilePath: FILE_CONFIG.DEFAULT_FILENAME,
  currencySymbol: PRODUCT_MASTER_CONSTANTS.DEFAULT_CURRENCY_SYMBOL,
  enableDetailedLogging: false,
};

function isEnabled(value: string | undefined): boolean {
  if (!value) return false;
  const normalized = value.trim().toLowerCase();
  return normalized === "true" || normalized === "1";
}

/**
 * Environment-based configuration
 */
export function getProductMasterConfig(
  env: Record<string, string | undefined> = process.env,
  cwd: string = process.cwd()
): ProductMasterConfig {
  const isDevelopment = env.NODE_ENV === "development";
  const csvFile = env.PRODUCT_MASTER_CSV?.trim();
  const currencySymbol = env.PRODUCT_MASTER_CURRENCY;

  return {
    ...DEFAULT_PRODUCT_MASTER_CONFIG,
    csvFilePath: path.resolve(
      cwd,
      csvFile || DEFAULT_PRODUCT_MASTER_CONFIG.csvFilePath
    ),
    currencySymbol:
      currencySymbol !== undefined && currencySymbol !== ""
        ? currencySymbol
        : DEFAULT_PRODUCT_MASTER_CONFIG.currencySymbol,
    enableDetailedLogging:
      isDevelopment || isEnabled(env.PRODUCT_MASTER_VERBOSE),
  };
}

/**
 * Apply command-line overrides on top of a loaded configuration
 */
export function updateProductMasterConfig(
  config: ProductMasterConfig,
  updates: Partial<ProductMasterConfig>,
  cwd: string = process.cwd()
): ProductMasterConfig {
  const merged = { ...config, ...updates };
  return updates.csvFilePath
    ? { ...merged, csvFilePath: path.resolve(cwd, updates.csvFilePath) }
    : merged;
}
