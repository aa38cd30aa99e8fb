/**
 * Command Line Interface for entering, listing and summarizing product master data
 * Usage: product-master [command] [options]
 */

import {
  getProductMasterConfig,
  updateProductMasterConfig,
  type ProductMasterConfig,
} from "../config/productMasterConfig";
import { DASHBOARD_CARDS } from "../constants/productMaster";
import { analyzeProducts } from "../features/product-master/services/productAnalyzer";
import { ProductCollection } from "../features/product-master/services/productCollection";
import { ProductEntryService } from "../features/product-master/services/productEntryService";
import {
  createBlankEntry,
  toProductDisplayRow,
} from "../features/product-master/services/productRecordModel";
import { CsvProductStore } from "../features/product-master/services/csvProductStore";
import type { ProductStore } from "../features/product-master/services/productStoreInterfaces";
import {
  PRODUCT_FIELDS,
  getProductFieldKind,
  isProductFieldName,
} from "../features/product-master/types/productRecord";

type OutputFormat = "json" | "table";

interface CliOptions {
  format?: OutputFormat;
  file?: string;
  fields: string[];
  save: boolean;
}

const isOutputFormat = (value: string): value is OutputFormat =>
  value === "json" || value === "table";

/**
 * List view headings, in display row order
 */
export function getDisplayColumns(currencySymbol: string): string[] {
  return [
    "SKU Code",
    "SKU Name",
    "Status",
    "Product Line",
    "Category",
    `SRP (${currencySymbol})`,
    "Shelf-life",
    "Storage Type",
  ];
}

/**
 * Lays out rows in left-aligned columns
 */
export function formatTable(
  headings: readonly string[],
  rows: readonly (readonly string[])[]
): string[] {
  const widths = headings.map((heading, column) =>
    Math.max(heading.length, ...rows.map((row) => (row[column] ?? "").length))
  );
  const renderRow = (cells: readonly string[]) =>
    widths
      .map((width, column) => (cells[column] ?? "").padEnd(width))
      .join("  ")
      .trimEnd();

  return [
    renderRow(headings),
    widths.map((width) => "-".repeat(width)).join("  "),
    ...rows.map(renderRow),
  ];
}

/**
 * Product master CLI commands, bound to one session's collection and store
 */
export class ProductCLI {
  private readonly entryService: ProductEntryService;

  constructor(
    private readonly config: ProductMasterConfig,
    private readonly collection: ProductCollection,
    private readonly store: ProductStore
  ) {
    this.entryService = new ProductEntryService(collection);
  }

  /**
   * Load the product file into the session; a failure is reported, not fatal
   */
  async loadProducts(): Promise<boolean> {
    const result = await this.store.load(this.collection);

    if (result.status === "failed") {
      console.log(`⚠️  Load Error: An error occurred while loading data: ${result.error}`);
      return false;
    }
    return true;
  }

  /**
   * Show every column of the product file and how its value is read
   */
  showFields() {
    console.log("\n🗂️  PRODUCT MASTER FIELDS");
    console.log("========================");
    PRODUCT_FIELDS.forEach((field, index) => {
      const position = `${index + 1}`.padStart(2);
      console.log(`${position}. ${field.padEnd(30)} ${getProductFieldKind(field)}`);
    });
    console.log("");
  }

  /**
   * Add a product from "Header=value" pairs and save the file
   */
  async addProduct(options: CliOptions, loaded: boolean = true): Promise<number> {
    const entry = createBlankEntry();

    for (const assignment of options.fields) {
      const separator = assignment.indexOf("=");
      const field = separator >= 0 ? assignment.slice(0, separator) : assignment;

      if (separator < 0 || !isProductFieldName(field)) {
        console.log(`❌ Input Error: "${assignment}" is not a known Header=value pair.`);
        console.log("   Run the fields command to list the headers.");
        return 1;
      }
      entry[field] = assignment.slice(separator + 1);
    }

    const result = this.entryService.addProduct(entry);
    if (!result.success) {
      result.errors.forEach((error) => console.log(`❌ Input Error: ${error}`));
      return 1;
    }

    result.warnings.forEach((warning) => console.log(`⚠️  ${warning}`));
    console.log(`✅ Product '${result.product.skuName}' added successfully.`);

    if (!options.save) {
      return 0;
    }
    if (!loaded) {
      // Writing now would replace the unreadable file with this one product
      console.log(`❌ Save Error: ${this.store.location} could not be read, so it was not overwritten.`);
      return 1;
    }
    return this.saveProducts();
  }

  async saveProducts(): Promise<number> {
    const result = await this.store.save(this.collection);

    if (!result.success) {
      console.log(`❌ Save Error: An error occurred while saving: ${result.error}`);
      return 1;
    }

    console.log(`💾 Data saved successfully to ${this.store.location}.`);
    return 0;
  }

  /**
   * Print the key product data overview
   */
  listProducts(options: Pick<CliOptions, "format"> = {}) {
    const columns = getDisplayColumns(this.config.currencySymbol);
    const rows = this.collection
      .list()
      .map((product) => toProductDisplayRow(product, this.config.currencySymbol));

    if (options.format === "json") {
      const records = rows.map((row) =>
        Object.fromEntries(columns.map((column, index) => [column, row[index]]))
      );
      console.log(JSON.stringify(records, null, 2));
      return;
    }

    console.log("\n📋 KEY PRODUCT DATA OVERVIEW");
    console.log("============================");
    formatTable(columns, rows).forEach((line) => console.log(line));
    console.log(`\n${rows.length} product${rows.length !== 1 ? "s" : ""}`);
  }

  /**
   * Print the analytical dashboard
   */
  showDashboard(options: Pick<CliOptions, "format"> = {}) {
    const metrics = analyzeProducts(this.collection.list(), this.config.currencySymbol);

    if (options.format === "json") {
      console.log(JSON.stringify(metrics, null, 2));
      return;
    }

    console.log("\n📊 MASTER DATA ANALYSIS SUMMARY");
    console.log("===============================");
    DASHBOARD_CARDS.forEach((card) => {
      console.log(`${card.label.padEnd(20)}: ${metrics[card.metric]}`);
    });
    console.log("");
  }

  static showUsage() {
    console.log("\n🔧 PRODUCT MASTER DATA CLI");
    console.log("==========================");
    console.log("Available commands:");
    console.log("  fields                          List the product master columns");
    console.log('  add --field "Header=value" ...  Add a product and save the file');
    console.log("  list [--format json|table]      Show the key product data overview");
    console.log("  dashboard [--format json|table] Show the analytical dashboard");
    console.log("\nOptions:");
    console.log("  --file PATH                     Product CSV file to use");
    console.log("  --no-save                       Add without writing the file");
    console.log("");
  }
}

/**
 * Parse command line arguments and execute the matching command
 * @returns Process exit code
 */
export async function runProductCLI(
  args: string[],
  env: Record<string, string | undefined> = process.env
): Promise<number> {
  const command = args[0];

  // Parse options
  const options: CliOptions = { fields: [], save: true };

  for (let i = 1; i < args.length; i++) {
    const arg = args[i];
    if (arg === "--format" && i + 1 < args.length) {
      const format = args[++i];
      if (!isOutputFormat(format)) {
        console.log(`❌ Unknown format "${format}". Use json or table.`);
        return 1;
      }
      options.format = format;
    } else if (arg === "--file" && i + 1 < args.length) {
      options.file = args[++i];
    } else if (arg === "--field" && i + 1 < args.length) {
      options.fields.push(args[++i]);
    } else if (arg === "--no-save") {
      options.save = false;
    }
  }

  const config = updateProductMasterConfig(
    getProductMasterConfig(env),
    options.file ? { csvFilePath: options.file } : {}
  );
  const collection = new ProductCollection();
  const store = new CsvProductStore({
    filePath: config.csvFilePath,
    enableDetailedLogging: config.enableDetailedLogging,
  });
  const cli = new ProductCLI(config, collection, store);

  switch (command) {
    case "fields":
      cli.showFields();
      return 0;

    case "add": {
      const loaded = await cli.loadProducts();
      return cli.addProduct(options, loaded);
    }

    case "list": {
      const loaded = await cli.loadProducts();
      cli.listProducts(options);
      return loaded ? 0 : 1;
    }

    case "dashboard": {
      const loaded = await cli.loadProducts();
      cli.showDashboard(options);
      return loaded ? 0 : 1;
    }

    default:
      ProductCLI.showUsage();
      return command === undefined || command === "help" ? 0 : 1;
  }
}
