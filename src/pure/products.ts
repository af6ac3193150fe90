/**
 * PRODUCTS
 *
 * One tagged type covers every variant. Each function branches on `kind`
 * where stock semantics differ and returns a new product instead of
 * changing the old one. Activation is read from stock, so the two can
 * never disagree.
 */

import {randomUUID} from 'node:crypto';
import {Either, Just, Left, Maybe, NonEmptyList, Nothing, Right} from 'purify-ts';
import {
  InsufficientStock,
  InvalidQuantity,
  LimitedProduct,
  MaximumExceeded,
  Product,
  Promotion,
  PurchaseFailure,
  StandardProduct,
  StockedProduct,
  UnlimitedProduct,
} from '../domain';
import {LimitedProductInput, Purchase, StandardProductInput, UnlimitedProductInput} from './types';
import {applyPromotion} from './promotions';
import {nameIssues, validated} from './validation';

export const UNLIMITED = 'unlimited';

export type StockLevel = number | typeof UNLIMITED;

// ============================================================================
// Construction
// ============================================================================

function priceIssues(price: number): string[] {
  return Number.isFinite(price) && price >= 0 ? [] : ["argument 'price' cannot be negative."];
}

function stockIssues(stock: number): string[] {
  return Number.isInteger(stock) && stock >= 0
    ? []
    : ["argument 'stock' must be a non-negative whole number."];
}

function maximumIssues(maximum: number): string[] {
  return Number.isInteger(maximum) && maximum >= 1
    ? []
    : ["argument 'maximum' must be a whole number of at least 1."];
}

export function createStandardProduct(
  input: StandardProductInput
): Either<NonEmptyList<string>, StandardProduct> {
  const issues = [...nameIssues(input.name), ...priceIssues(input.price), ...stockIssues(input.stock)];
  return validated<StandardProduct>(issues, () => ({
    kind: 'standard',
    id: input.id ?? randomUUID(),
    name: input.name,
    price: input.price,
    stock: input.stock,
    promotion: Maybe.fromNullable(input.promotion),
    activation: 'auto',
  }));
}

export function createUnlimitedProduct(
  input: UnlimitedProductInput
): Either<NonEmptyList<string>, UnlimitedProduct> {
  const issues = [...nameIssues(input.name), ...priceIssues(input.price)];
  return validated<UnlimitedProduct>(issues, () => ({
    kind: 'unlimited',
    id: input.id ?? randomUUID(),
    name: input.name,
    price: input.price,
    promotion: Maybe.fromNullable(input.promotion),
    activation: 'auto',
  }));
}

export function createLimitedProduct(
  input: LimitedProductInput
): Either<NonEmptyList<string>, LimitedProduct> {
  const issues = [
    ...nameIssues(input.name),
    ...priceIssues(input.price),
    ...stockIssues(input.stock),
    ...maximumIssues(input.maximum),
  ];
  return validated<LimitedProduct>(issues, () => ({
    kind: 'limited',
    id: input.id ?? randomUUID(),
    name: input.name,
    price: input.price,
    stock: input.stock,
    maximum: input.maximum,
    promotion: Maybe.fromNullable(input.promotion),
    activation: 'auto',
  }));
}

// ============================================================================
// Queries
// ============================================================================

export function isActive(product: Product): boolean {
  if (product.kind === 'unlimited') return true;
  switch (product.activation) {
    case 'forced-active':
      return true;
    case 'forced-inactive':
      return false;
    case 'auto':
      return product.stock > 0;
  }
}

export function stockOf(product: Product): StockLevel {
  return product.kind === 'unlimited' ? UNLIMITED : product.stock;
}

export function isValidQuantity(quantity: number): boolean {
  return Number.isInteger(quantity) && quantity >= 1;
}

/**
 * Orders products by unit price, cheapest first.
 */
export function compareByPrice(a: Product, b: Product): number {
  return a.price - b.price;
}

export function describe(product: Product): string {
  const quantity = product.kind === 'unlimited' ? 'Unlimited' : String(product.stock);
  const maximum = product.kind === 'limited' ? `, Maximum: ${product.maximum} per order` : '';
  const promotion = product.promotion.map(p => p.name).orDefault('None');
  return `${product.name}, Price: $${product.price}, Quantity: ${quantity}${maximum}, Promotion: ${promotion}`;
}

// ============================================================================
// Stock & Status Updates
// ============================================================================

function withStock<P extends StockedProduct>(product: P, stock: number): P {
  return {
    ...product,
    stock,
    // running out always hands activation back to stock
    activation: stock < 1 ? 'auto' : product.activation,
  };
}

function invalidQuantity(product: Product, quantity: number): InvalidQuantity {
  return {kind: 'invalid-quantity', productName: product.name, quantity};
}

export function setStock(product: Product, stock: number): Either<InvalidQuantity, Product> {
  if (!Number.isInteger(stock) || stock < 0) {
    return Left(invalidQuantity(product, stock));
  }
  return Right(product.kind === 'unlimited' ? product : withStock(product, stock));
}

export function activate(product: Product): Product {
  return product.kind === 'unlimited' ? product : {...product, activation: 'forced-active'};
}

export function deactivate(product: Product): Product {
  return product.kind === 'unlimited' ? product : {...product, activation: 'forced-inactive'};
}

export function setPromotion(product: Product, promotion: Promotion): Product {
  return {...product, promotion: Just(promotion)};
}

export function clearPromotion(product: Product): Product {
  return {...product, promotion: Nothing};
}

/**
 * Takes the stock, activation and promotion of `edited` onto `current`.
 * Kind, id, name, price and maximum stay as they are; the new stock goes
 * through `setStock`.
 */
export function revise(current: Product, edited: Product): Either<InvalidQuantity, Product> {
  if (current.kind === 'unlimited') {
    return Right({...current, promotion: edited.promotion});
  }
  const stock = edited.kind === 'unlimited' ? current.stock : edited.stock;
  return setStock({...current, promotion: edited.promotion, activation: edited.activation}, stock);
}

// ============================================================================
// Purchase
// ============================================================================

export function lineTotal(product: Product, quantity: number): number {
  return product.promotion
    .map(promotion => applyPromotion(promotion, product.price, quantity))
    .orDefault(quantity * product.price);
}

/**
 * Buys `quantity` units. Checks run in a fixed order: quantity, then the
 * per-order maximum, then stock.
 */
export function purchase(product: Product, quantity: number): Either<PurchaseFailure, Purchase> {
  if (!isValidQuantity(quantity)) {
    return Left(invalidQuantity(product, quantity));
  }

  if (product.kind === 'limited' && quantity > product.maximum) {
    const exceeded: MaximumExceeded = {
      kind: 'maximum-exceeded',
      productName: product.name,
      requested: quantity,
      maximum: product.maximum,
    };
    return Left(exceeded);
  }

  if (product.kind === 'unlimited') {
    return Right({product, lineTotal: lineTotal(product, quantity)});
  }

  if (product.stock - quantity < 0) {
    const shortage: InsufficientStock = {
      kind: 'insufficient-stock',
      productName: product.name,
      requested: quantity,
      available: product.stock,
    };
    return Left(shortage);
  }

  return Right({
    product: withStock(product, product.stock - quantity),
    lineTotal: lineTotal(product, quantity),
  });
}
