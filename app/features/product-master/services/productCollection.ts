import type { ProductRecord } from "../types/productRecord";

/**
 * In-memory product list for a session, kept in insertion order.
 * Owned by the caller and handed to the services that read or replace it.
 */
export class ProductCollection {
  private products: ProductRecord[];

  constructor(products: readonly ProductRecord[] = []) {
    this.products = [...products];
  }

  get size(): number {
    return this.products.length;
  }

  add(product: ProductRecord): void {
    this.products.push(product);
  }

  list(): readonly ProductRecord[] {
    return [...this.products];
  }

  hasSkuCode(skuCode: string): boolean {
    return this.products.some((product) => product.skuCode === skuCode);
  }

  /**
   * Swaps in a whole new product list, e.g. after loading from storage
   */
  replaceAll(products: readonly ProductRecord[]): void {
    this.products = [...products];
  }
}
