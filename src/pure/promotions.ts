/**
 * PROMOTIONS
 *
 * Pricing strategies are plain tagged values; applying one is a pure
 * function of the tag, the unit price and the quantity.
 */

import {Either, NonEmptyList} from 'purify-ts';
import {PercentDiscount, Promotion, SecondHalfPrice, ThirdOneFree} from '../domain';
import {nameIssues, validated} from './validation';

// ============================================================================
// Construction
// ============================================================================

export function createSecondHalfPrice(name: string): Either<NonEmptyList<string>, SecondHalfPrice> {
  return validated(nameIssues(name), () => ({kind: 'second-half-price' as const, name}));
}

export function createThirdOneFree(name: string): Either<NonEmptyList<string>, ThirdOneFree> {
  return validated(nameIssues(name), () => ({kind: 'third-one-free' as const, name}));
}

export function createPercentDiscount(
  name: string,
  percent: number
): Either<NonEmptyList<string>, PercentDiscount> {
  const issues = [...nameIssues(name)];
  if (!Number.isFinite(percent) || percent <= 0) {
    issues.push("argument 'percent' is negative or zero.");
  } else if (percent > 100) {
    issues.push("argument 'percent' cannot exceed 100.");
  }
  return validated(issues, () => ({kind: 'percent-off' as const, name, percent}));
}

// ============================================================================
// Pricing
// ============================================================================

/**
 * Total price of `quantity` units at `unitPrice` under the given promotion.
 * Quantity is not validated here; products do that before pricing.
 */
export function applyPromotion(promotion: Promotion, unitPrice: number, quantity: number): number {
  switch (promotion.kind) {
    case 'second-half-price': {
      // the second unit of every pair is half price
      const halfPriceUnits = Math.floor(quantity / 2);
      return (quantity - halfPriceUnits) * unitPrice + halfPriceUnits * (unitPrice / 2);
    }
    case 'third-one-free':
      return (quantity - Math.floor(quantity / 3)) * unitPrice;
    case 'percent-off':
      return quantity * unitPrice * (1 - promotion.percent / 100);
  }
}
