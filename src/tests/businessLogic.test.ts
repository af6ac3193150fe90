/**
 * TESTS FOR PURE STOREFRONT LOGIC
 *
 * Parsing and rendering are plain functions: call them with inputs and
 * check outputs.
 */

import {Just, Nothing} from 'purify-ts';
import {
  describeFailure,
  formatLineFailure,
  formatListing,
  formatOrderConfirmation,
  formatOrderError,
  formatPrice,
  formatTotalStock,
  INDEX_OUT_OF_BOUNDS,
  INVALID_LINE,
  isEndOfOrder,
  parseMenuChoice,
  parseOrderLine,
  parseWholeNumber,
} from '../pure/businessLogic';
import {limitedProduct, secondHalfPrice, standardProduct, unlimitedProduct} from './fixtures';

describe('parseWholeNumber', () => {
  it('reads signed whole numbers around whitespace', () => {
    expect(parseWholeNumber(' 42 ')).toEqual(Just(42));
    expect(parseWholeNumber('-3')).toEqual(Just(-3));
  });

  it('rejects anything else', () => {
    expect(parseWholeNumber('1.5')).toEqual(Nothing);
    expect(parseWholeNumber('two')).toEqual(Nothing);
    expect(parseWholeNumber('')).toEqual(Nothing);
  });
});

describe('parseMenuChoice', () => {
  it('maps the four menu numbers', () => {
    expect(parseMenuChoice('1')).toEqual(Just('list'));
    expect(parseMenuChoice('2')).toEqual(Just('total'));
    expect(parseMenuChoice('3')).toEqual(Just('order'));
    expect(parseMenuChoice(' 4 ')).toEqual(Just('quit'));
  });

  it('returns Nothing for unknown choices', () => {
    expect(parseMenuChoice('5')).toEqual(Nothing);
    expect(parseMenuChoice('0')).toEqual(Nothing);
    expect(parseMenuChoice('quit')).toEqual(Nothing);
  });
});

describe('parseOrderLine', () => {
  const listing = [
    standardProduct('widget', 'Widget', 10, 5),
    standardProduct('gadget', 'Gadget', 20, 1),
  ];

  it('translates the 1-based product number into an order line', () => {
    expect(parseOrderLine(listing, '2', '3').extract()).toEqual({productId: 'gadget', quantity: 3});
  });

  it('rejects product numbers outside the listing', () => {
    expect(parseOrderLine(listing, '3', '1').extract()).toBe(INDEX_OUT_OF_BOUNDS);
    expect(parseOrderLine(listing, '0', '1').extract()).toBe(INDEX_OUT_OF_BOUNDS);
    expect(parseOrderLine(listing, '-1', '1').extract()).toBe(INDEX_OUT_OF_BOUNDS);
  });

  it('rejects a product number that is not a number', () => {
    expect(parseOrderLine(listing, 'first', '1').extract()).toBe(INVALID_LINE);
  });

  it('rejects zero, negative and non-numeric amounts', () => {
    expect(parseOrderLine(listing, '1', '0').extract()).toBe(INVALID_LINE);
    expect(parseOrderLine(listing, '1', '-2').extract()).toBe(INVALID_LINE);
    expect(parseOrderLine(listing, '1', '1.5').extract()).toBe(INVALID_LINE);
  });

  it('checks the product number before the amount', () => {
    expect(parseOrderLine(listing, '9', '0').extract()).toBe(INDEX_OUT_OF_BOUNDS);
  });
});

describe('isEndOfOrder', () => {
  it('ends on an empty product number or amount', () => {
    expect(isEndOfOrder('', '2')).toBe(true);
    expect(isEndOfOrder('1', '')).toBe(true);
    expect(isEndOfOrder('  ', '2')).toBe(true);
    expect(isEndOfOrder('1', '2')).toBe(false);
  });
});

describe('formatListing', () => {
  it('numbers products from 1 between rulers', () => {
    const products = [
      standardProduct('macbook', 'MacBook Air M2', 1450, 100, secondHalfPrice),
      unlimitedProduct('windows', 'Windows License', 125),
      limitedProduct('shipping', 'Shipping', 10, 250, 1),
    ];

    expect(formatListing(products)).toBe(
      [
        '-----',
        '1. MacBook Air M2, Price: $1450, Quantity: 100, Promotion: Second Half price!',
        '2. Windows License, Price: $125, Quantity: Unlimited, Promotion: None',
        '3. Shipping, Price: $10, Quantity: 250, Maximum: 1 per order, Promotion: None',
        '-----',
      ].join('\n')
    );
  });

  it('renders an empty listing', () => {
    expect(formatListing([])).toBe('-----\n-----');
  });
});

describe('summaries', () => {
  it('formats the total stock', () => {
    expect(formatTotalStock(1100)).toBe('Total of 1100 items in store');
  });

  it('formats prices with two decimals', () => {
    expect(formatPrice(2185)).toBe('$2185.00');
    expect(formatPrice(87.5)).toBe('$87.50');
  });

  it('formats the order confirmation', () => {
    expect(formatOrderConfirmation({total: 25, receipts: [], failures: []})).toBe(
      '********\nOrder made! Total payment $25.00'
    );
  });

  it('formats a refused line', () => {
    expect(
      formatLineFailure({
        lineNumber: 2,
        productId: 'shipping',
        quantity: 2,
        reason: {kind: 'maximum-exceeded', productName: 'Shipping', requested: 2, maximum: 1},
      })
    ).toBe("- Line 2 not ordered: 'Shipping' is limited to 1 per order (requested 2). -");
  });

  it('formats an order error', () => {
    expect(formatOrderError({kind: 'invalid-quantity', productName: 'Widget', quantity: 0})).toBe(
      "Error:\n\tCannot buy 0x 'Widget': quantity must be a positive whole number."
    );
  });
});

describe('describeFailure', () => {
  it('explains a stock shortage with the available amount', () => {
    expect(
      describeFailure({kind: 'insufficient-stock', productName: 'AMD Ryzen 5700X', requested: 7, available: 5})
    ).toBe("Store cannot provide 7x 'AMD Ryzen 5700X' (5 in stock).");
  });

  it('explains an unknown product', () => {
    expect(describeFailure({kind: 'unknown-product', productId: 'p-404'})).toBe(
      "No product with id 'p-404' in the store."
    );
  });

  it('explains an inactive product', () => {
    expect(describeFailure({kind: 'inactive-product', productName: 'Widget'})).toBe(
      "'Widget' is not available for ordering."
    );
  });

  it('explains a duplicate product', () => {
    expect(describeFailure({kind: 'duplicate-product', productName: 'Widget'})).toBe(
      "Product 'Widget' already exists in the store."
    );
    expect(describeFailure({kind: 'duplicate-id', productId: 'w1', productName: 'Widget'})).toBe(
      "Id 'w1' of 'Widget' is already used in the store."
    );
  });
});
