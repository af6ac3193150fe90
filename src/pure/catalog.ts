/**
 * CATALOG
 *
 * Functions over an ordered list of products. Nothing here mutates its
 * input: every change returns the next list, and settlement returns the
 * products as they stand after the order.
 */

import {Either, Left, Maybe, Right} from 'purify-ts';
import {
  DuplicateId,
  DuplicateProduct,
  InvalidQuantity,
  LineFailure,
  LineReceipt,
  LineRefusal,
  MergeFailure,
  OrderLine,
  Product,
} from '../domain';
import {Settlement} from './types';
import {isActive, isValidQuantity, purchase, stockOf} from './products';

// ============================================================================
// Membership
// ============================================================================

function duplicateId(product: Product): DuplicateId {
  return {kind: 'duplicate-id', productId: product.id, productName: product.name};
}

/**
 * First product whose id is already taken, by `taken` or by an earlier
 * entry of `products`.
 */
export function findDuplicateId(
  products: readonly Product[],
  taken: readonly Product[] = []
): Maybe<DuplicateId> {
  const seen = new Set(taken.map(product => product.id));
  const duplicate = products.find(product => {
    if (seen.has(product.id)) return true;
    seen.add(product.id);
    return false;
  });
  return Maybe.fromNullable(duplicate).map(duplicateId);
}

/**
 * Appends `product`. Names may repeat; ids may not, since order lines
 * point at products by id.
 */
export function addProduct(products: readonly Product[], product: Product): Either<DuplicateId, Product[]> {
  return findDuplicateId([product], products).caseOf<Either<DuplicateId, Product[]>>({
    Just: (failure) => Left(failure),
    Nothing: () => Right([...products, product]),
  });
}

export function removeProduct(products: readonly Product[], name: string): Product[] {
  return products.filter(product => product.name !== name);
}

export function containsProduct(products: readonly Product[], name: string): boolean {
  return products.some(product => product.name === name);
}

export function findProduct(products: readonly Product[], productId: string): Maybe<Product> {
  return Maybe.fromNullable(products.find(product => product.id === productId));
}

/**
 * Swaps in `next` for the product sharing its id.
 */
export function replaceProduct(products: readonly Product[], next: Product): Product[] {
  const position = products.findIndex(product => product.id === next.id);
  return products.map((product, index) => (index === position ? next : product));
}

/**
 * Appends `incoming` to `products`. The first name already present in
 * `products` fails the whole merge, and so does an id already in use.
 */
export function mergeCatalogs(
  products: readonly Product[],
  incoming: readonly Product[]
): Either<MergeFailure, Product[]> {
  const duplicate = incoming.find(product => containsProduct(products, product.name));
  if (duplicate) {
    const failure: DuplicateProduct = {kind: 'duplicate-product', productName: duplicate.name};
    return Left(failure);
  }
  return findDuplicateId(incoming, products).caseOf<Either<MergeFailure, Product[]>>({
    Just: (failure) => Left(failure),
    Nothing: () => Right([...products, ...incoming]),
  });
}

// ============================================================================
// Queries
// ============================================================================

export function totalStock(products: readonly Product[]): number {
  return products.reduce((sum, product) => {
    const stock = stockOf(product);
    return typeof stock === 'number' ? sum + stock : sum;
  }, 0);
}

export function listActive(products: readonly Product[]): Product[] {
  return products.filter(isActive);
}

// ============================================================================
// Settlement
// ============================================================================

export function orderLine(product: Product, quantity: number): OrderLine {
  return {productId: product.id, quantity};
}

function findInvalidQuantity(
  products: readonly Product[],
  lines: readonly OrderLine[]
): Maybe<InvalidQuantity> {
  return Maybe.fromNullable(lines.find(line => !isValidQuantity(line.quantity))).map(line => ({
    kind: 'invalid-quantity' as const,
    productName: findProduct(products, line.productId).map(p => p.name).orDefault(line.productId),
    quantity: line.quantity,
  }));
}

function refuse(lineNumber: number, line: OrderLine, reason: LineRefusal): LineFailure {
  return {lineNumber, productId: line.productId, quantity: line.quantity, reason};
}

function applyLine(state: Settlement, line: OrderLine, index: number): Settlement {
  const lineNumber = index + 1;
  const product = state.products.find(candidate => candidate.id === line.productId);

  if (!product) {
    const failure = refuse(lineNumber, line, {kind: 'unknown-product', productId: line.productId});
    return {...state, failures: [...state.failures, failure]};
  }

  if (!isActive(product)) {
    const failure = refuse(lineNumber, line, {kind: 'inactive-product', productName: product.name});
    return {...state, failures: [...state.failures, failure]};
  }

  return purchase(product, line.quantity).caseOf<Settlement>({
    Left: (failure) =>
      // quantities were checked for the whole order up front
      failure.kind === 'invalid-quantity'
        ? state
        : {...state, failures: [...state.failures, refuse(lineNumber, line, failure)]},
    Right: (bought) => {
      const receipt: LineReceipt = {
        lineNumber,
        productId: product.id,
        productName: product.name,
        quantity: line.quantity,
        lineTotal: bought.lineTotal,
      };
      return {
        products: replaceProduct(state.products, bought.product),
        total: state.total + bought.lineTotal,
        receipts: [...state.receipts, receipt],
        failures: state.failures,
      };
    },
  });
}

/**
 * Applies each line in order against the running product state. Refused
 * lines are collected and add nothing to the total; the rest of the order
 * still goes through. An invalid quantity on any line fails the order
 * before any stock moves.
 */
export function settleOrder(
  products: readonly Product[],
  lines: readonly OrderLine[]
): Either<InvalidQuantity, Settlement> {
  const initial: Settlement = {products: [...products], total: 0, receipts: [], failures: []};

  return findInvalidQuantity(products, lines).caseOf<Either<InvalidQuantity, Settlement>>({
    Just: (invalid) => Left(invalid),
    Nothing: () => Right(lines.reduce(applyLine, initial)),
  });
}
