// Domain types shared across the application

import {Maybe} from 'purify-ts';

export type PromotionKind = 'second-half-price' | 'third-one-free' | 'percent-off';

export type SecondHalfPrice = {
  readonly kind: 'second-half-price';
  readonly name: string;
};

export type ThirdOneFree = {
  readonly kind: 'third-one-free';
  readonly name: string;
};

export type PercentDiscount = {
  readonly kind: 'percent-off';
  readonly name: string;
  readonly percent: number;
};

export type Promotion = SecondHalfPrice | ThirdOneFree | PercentDiscount;

/**
 * Manual curation override. `auto` means activation follows stock.
 */
export type Activation = 'auto' | 'forced-active' | 'forced-inactive';

type ProductBase = {
  readonly id: string;
  readonly name: string;
  readonly price: number;
  readonly promotion: Maybe<Promotion>;
  readonly activation: Activation;
};

export type StandardProduct = ProductBase & {
  readonly kind: 'standard';
  readonly stock: number;
};

export type UnlimitedProduct = ProductBase & {
  readonly kind: 'unlimited';
};

export type LimitedProduct = ProductBase & {
  readonly kind: 'limited';
  readonly stock: number;
  readonly maximum: number;
};

export type Product = StandardProduct | UnlimitedProduct | LimitedProduct;

export type ProductKind = Product['kind'];

export type StockedProduct = StandardProduct | LimitedProduct;

export type OrderLine = {
  readonly productId: string;
  readonly quantity: number;
};

export type LineReceipt = {
  readonly lineNumber: number;
  readonly productId: string;
  readonly productName: string;
  readonly quantity: number;
  readonly lineTotal: number;
};

export type SettledOrder = {
  readonly total: number;
  readonly receipts: LineReceipt[];
  readonly failures: LineFailure[];
};

// ============================================================================
// Failures
// ============================================================================

export type InvalidQuantity = {
  readonly kind: 'invalid-quantity';
  readonly productName: string;
  readonly quantity: number;
};

export type InsufficientStock = {
  readonly kind: 'insufficient-stock';
  readonly productName: string;
  readonly requested: number;
  readonly available: number;
};

export type MaximumExceeded = {
  readonly kind: 'maximum-exceeded';
  readonly productName: string;
  readonly requested: number;
  readonly maximum: number;
};

export type UnknownProduct = {
  readonly kind: 'unknown-product';
  readonly productId: string;
};

export type InactiveProduct = {
  readonly kind: 'inactive-product';
  readonly productName: string;
};

export type DuplicateProduct = {
  readonly kind: 'duplicate-product';
  readonly productName: string;
};

export type DuplicateId = {
  readonly kind: 'duplicate-id';
  readonly productId: string;
  readonly productName: string;
};

export type PurchaseFailure = InvalidQuantity | InsufficientStock | MaximumExceeded;

/** Reasons a single order line is refused while the rest of the order goes on. */
export type LineRefusal = InsufficientStock | MaximumExceeded | UnknownProduct | InactiveProduct;

/** Reasons two product lists cannot be combined. */
export type MergeFailure = DuplicateProduct | DuplicateId;

/** Reasons a stored product cannot be edited. */
export type ProductUpdateFailure = UnknownProduct | InvalidQuantity;

export type CatalogFailure = PurchaseFailure | LineRefusal | MergeFailure;

export type LineFailure = {
  readonly lineNumber: number;
  readonly productId: string;
  readonly quantity: number;
  readonly reason: LineRefusal;
};
