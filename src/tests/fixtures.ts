/**
 * Test data builders. Factories are unwrapped eagerly: a Left here is a
 * broken fixture, not a behaviour under test.
 */

import {LimitedProduct, Promotion, StandardProduct, UnlimitedProduct} from '../domain';
import {Logger} from '../pure/effects';
import {createLimitedProduct, createStandardProduct, createUnlimitedProduct} from '../pure/products';
import {createPercentDiscount, createSecondHalfPrice, createThirdOneFree} from '../pure/promotions';

export const secondHalfPrice = createSecondHalfPrice('Second Half price!').unsafeCoerce();
export const thirdOneFree = createThirdOneFree('Third One Free!').unsafeCoerce();
export const thirtyPercentOff = createPercentDiscount('30% Off!', 30).unsafeCoerce();

export function standardProduct(
  id: string,
  name: string,
  price: number,
  stock: number,
  promotion?: Promotion
): StandardProduct {
  return createStandardProduct({id, name, price, stock, promotion}).unsafeCoerce();
}

export function unlimitedProduct(id: string, name: string, price: number, promotion?: Promotion): UnlimitedProduct {
  return createUnlimitedProduct({id, name, price, promotion}).unsafeCoerce();
}

export function limitedProduct(
  id: string,
  name: string,
  price: number,
  stock: number,
  maximum: number
): LimitedProduct {
  return createLimitedProduct({id, name, price, stock, maximum}).unsafeCoerce();
}

/** The storefront's opening catalog. */
export function openingCatalog() {
  return [
    standardProduct('macbook-air-m2', 'MacBook Air M2', 1450, 100, secondHalfPrice),
    standardProduct('bose-qc-earbuds', 'Bose QuietComfort Earbuds', 250, 500, thirdOneFree),
    standardProduct('google-pixel-7', 'Google Pixel 7', 500, 250),
    unlimitedProduct('windows-license', 'Windows License', 125, thirtyPercentOff),
    limitedProduct('shipping', 'Shipping', 10, 250, 1),
  ];
}

export function createMockLogger(): jest.Mocked<Logger> {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  };
}
