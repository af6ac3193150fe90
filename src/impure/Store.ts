/**
 * STORE - The stateful shell around the catalog
 *
 * Holds the one mutable product list of a running storefront. Every
 * operation delegates to the pure catalog functions and then stores the
 * result, so the rules themselves stay testable without an instance.
 */

import {Either, Maybe} from 'purify-ts';
import {
  DuplicateId,
  InvalidQuantity,
  MergeFailure,
  OrderLine,
  Product,
  ProductUpdateFailure,
  SettledOrder,
  UnknownProduct,
} from '../domain';
import {Logger} from '../pure/effects';
import {StorefrontCatalog} from '../pure/types';
import {
  addProduct,
  containsProduct,
  findDuplicateId,
  findProduct,
  listActive,
  mergeCatalogs,
  removeProduct,
  replaceProduct,
  settleOrder,
  totalStock,
} from '../pure/catalog';
import {describeFailure} from '../pure/businessLogic';
import {revise} from '../pure/products';

export class Store implements StorefrontCatalog {
  private products: Product[];

  /**
   * @throws Error when two of `products` share an id
   */
  constructor(products: readonly Product[], private readonly logger: Logger) {
    findDuplicateId(products).ifJust(duplicate => {
      throw new Error(describeFailure(duplicate));
    });
    this.products = [...products];
  }

  /**
   * Appends `product`, unless its id is already in the store.
   */
  addProduct(product: Product): Either<DuplicateId, Product> {
    return addProduct(this.products, product).map(products => {
      this.products = products;
      return product;
    });
  }

  /**
   * Removes every product named exactly `name`.
   * @returns how many products were removed
   */
  removeProduct(name: string): number {
    const before = this.products.length;
    this.products = removeProduct(this.products, name);
    return before - this.products.length;
  }

  contains(name: string): boolean {
    return containsProduct(this.products, name);
  }

  find(productId: string): Maybe<Product> {
    return findProduct(this.products, productId);
  }

  /**
   * Stores the stock, activation and promotion of `transform(product)`.
   * Everything else about the product is kept, and an invalid stock
   * leaves the store untouched.
   */
  update(productId: string, transform: (product: Product) => Product): Either<ProductUpdateFailure, Product> {
    const unknown: UnknownProduct = {kind: 'unknown-product', productId};
    return this.find(productId)
      .toEither<ProductUpdateFailure>(unknown)
      .chain(product => revise(product, transform(product)))
      .ifRight(next => {
        this.products = replaceProduct(this.products, next);
      });
  }

  merge(other: Store): Either<MergeFailure, Store> {
    return mergeCatalogs(this.products, other.listAll()).map(products => new Store(products, this.logger));
  }

  totalStock(): number {
    return totalStock(this.products);
  }

  listAll(): Product[] {
    return [...this.products];
  }

  listActive(): Product[] {
    return listActive(this.products);
  }

  settleOrder(lines: readonly OrderLine[]): Either<InvalidQuantity, SettledOrder> {
    return settleOrder(this.products, lines)
      .ifLeft(failure => this.logger.warn(`Order rejected: ${describeFailure(failure)}`))
      .map(({products, ...order}) => {
        this.products = products;
        order.failures.forEach(failure =>
          this.logger.info(`Order line ${failure.lineNumber} refused: ${describeFailure(failure.reason)}`)
        );
        this.logger.debug(
          `Settled ${order.receipts.length} of ${lines.length} lines, total ${order.total.toFixed(2)}`
        );
        return order;
      });
  }
}
