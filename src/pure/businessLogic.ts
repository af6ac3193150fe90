/**
 * PURE STOREFRONT LOGIC
 *
 * Input parsing and text rendering for the storefront. These functions take
 * values and return values, so the menu's behaviour is tested with plain
 * inputs and outputs.
 *
 * Note that prices are a single numeric unit with no currency or rounding
 * rules beyond two decimals on the order total.
 */

import {Either, Just, Maybe, Nothing} from 'purify-ts';
import {CatalogFailure, LineFailure, OrderLine, Product, SettledOrder} from '../domain';
import {MenuChoice} from '../types';
import {describe} from './products';
import {orderLine} from './catalog';

// ============================================================================
// Messages
// ============================================================================

export const MENU = `
   Store Menu
   ----------
1. List all products in store
2. Show total amount in store
3. Make an order
4. Quit`;

export const MENU_PROMPT = 'Please choose a number:';
export const INVALID_CHOICE = 'Error with your choice! Try again!';
export const ORDER_INSTRUCTIONS = 'When you want to finish order, enter empty text.';
export const PRODUCT_PROMPT = 'Which product # do you want?';
export const AMOUNT_PROMPT = 'What amount do you want?';
export const LINE_ADDED = 'Product added to list!';
export const INDEX_OUT_OF_BOUNDS = '- Product-Index # out of bounds ! -';
export const INVALID_LINE = '- Error adding product ! -';

// ============================================================================
// Input Parsing
// ============================================================================

export function parseWholeNumber(text: string): Maybe<number> {
  const trimmed = text.trim();
  return /^[+-]?\d+$/.test(trimmed) ? Just(Number(trimmed)) : Nothing;
}

const menuChoices: Record<number, MenuChoice> = {
  1: 'list',
  2: 'total',
  3: 'order',
  4: 'quit',
};

export function parseMenuChoice(answer: string): Maybe<MenuChoice> {
  return parseWholeNumber(answer).chain(choice => Maybe.fromNullable(menuChoices[choice]));
}

/**
 * Reads one order line as typed by a shopper. `productNumber` is the
 * 1-based position in `listing`; the amount must be a positive whole number.
 * Left holds the notice to show.
 */
export function parseOrderLine(
  listing: readonly Product[],
  productNumber: string,
  amount: string
): Either<string, OrderLine> {
  return parseWholeNumber(productNumber)
    .toEither(INVALID_LINE)
    .chain(number =>
      Maybe.fromNullable(number >= 1 ? listing[number - 1] : undefined).toEither(INDEX_OUT_OF_BOUNDS)
    )
    .chain(product =>
      parseWholeNumber(amount)
        .filter(quantity => quantity > 0)
        .toEither(INVALID_LINE)
        .map(quantity => orderLine(product, quantity))
    );
}

export function isEndOfOrder(productNumber: string, amount: string): boolean {
  return productNumber.trim().length === 0 || amount.trim().length === 0;
}

// ============================================================================
// Rendering
// ============================================================================

export function formatListing(products: readonly Product[]): string {
  return [
    '-----',
    ...products.map((product, index) => `${index + 1}. ${describe(product)}`),
    '-----',
  ].join('\n');
}

export function formatTotalStock(total: number): string {
  return `Total of ${total} items in store`;
}

export function formatPrice(amount: number): string {
  return `$${amount.toFixed(2)}`;
}

export function formatOrderConfirmation(order: SettledOrder): string {
  return `********\nOrder made! Total payment ${formatPrice(order.total)}`;
}

export function formatLineFailure(failure: LineFailure): string {
  return `- Line ${failure.lineNumber} not ordered: ${describeFailure(failure.reason)} -`;
}

export function formatOrderError(failure: CatalogFailure): string {
  return `Error:\n\t${describeFailure(failure)}`;
}

export function describeFailure(failure: CatalogFailure): string {
  switch (failure.kind) {
    case 'invalid-quantity':
      return `Cannot buy ${failure.quantity}x '${failure.productName}': quantity must be a positive whole number.`;
    case 'insufficient-stock':
      return `Store cannot provide ${failure.requested}x '${failure.productName}' (${failure.available} in stock).`;
    case 'maximum-exceeded':
      return `'${failure.productName}' is limited to ${failure.maximum} per order (requested ${failure.requested}).`;
    case 'unknown-product':
      return `No product with id '${failure.productId}' in the store.`;
    case 'inactive-product':
      return `'${failure.productName}' is not available for ordering.`;
    case 'duplicate-product':
      return `Product '${failure.productName}' already exists in the store.`;
    case 'duplicate-id':
      return `Id '${failure.productId}' of '${failure.productName}' is already used in the store.`;
  }
}
