/**
 * SEED CATALOG
 *
 * Decodes the startup catalog description into products. Shape errors come
 * from the codec; rule errors come from the same factories the rest of the
 * application uses, so a seed file can never build a product the code
 * itself would refuse.
 */

import {array, Codec, Either, exactly, GetType, Left, Maybe, NonEmptyList, number, optional, Right, string} from 'purify-ts';
import {Product, Promotion} from '../domain';
import {createPercentDiscount, createSecondHalfPrice, createThirdOneFree} from './promotions';
import {createLimitedProduct, createStandardProduct, createUnlimitedProduct} from './products';

const PromotionSeed = Codec.interface({
  id: string,
  kind: exactly('second-half-price', 'third-one-free', 'percent-off'),
  name: string,
  percent: optional(number),
});

const ProductSeed = Codec.interface({
  id: optional(string),
  kind: exactly('standard', 'unlimited', 'limited'),
  name: string,
  price: number,
  stock: optional(number),
  maximum: optional(number),
  promotion: optional(string),
});

export const SeedCatalog = Codec.interface({
  promotions: optional(array(PromotionSeed)),
  products: array(ProductSeed),
});

type PromotionSeed = GetType<typeof PromotionSeed>;
type ProductSeed = GetType<typeof ProductSeed>;
export type SeedCatalog = GetType<typeof SeedCatalog>;

type Issues = string[];

function withContext<T>(context: string, result: Either<NonEmptyList<string>, T>): Either<Issues, T> {
  return result.mapLeft(issues => issues.map(issue => `${context}: ${issue}`));
}

function required(context: string, field: string, value: number | undefined): Either<Issues, number> {
  return Maybe.fromNullable(value).toEither([`${context}: '${field}' is required.`]);
}

function buildPromotion(seed: PromotionSeed): Either<Issues, Promotion> {
  const context = `promotion '${seed.id}'`;
  switch (seed.kind) {
    case 'second-half-price':
      return withContext<Promotion>(context, createSecondHalfPrice(seed.name));
    case 'third-one-free':
      return withContext<Promotion>(context, createThirdOneFree(seed.name));
    case 'percent-off':
      return required(context, 'percent', seed.percent).chain(percent =>
        withContext<Promotion>(context, createPercentDiscount(seed.name, percent))
      );
  }
}

function buildProduct(seed: ProductSeed, promotions: ReadonlyMap<string, Promotion>): Either<Issues, Product> {
  const context = `product '${seed.id ?? seed.name}'`;
  const promotion: Either<Issues, Promotion | undefined> =
    seed.promotion === undefined
      ? Right(undefined)
      : Maybe.fromNullable(promotions.get(seed.promotion)).toEither([
          `${context}: unknown promotion '${seed.promotion}'.`,
        ]);

  return promotion.chain((attached): Either<Issues, Product> => {
    const base = {id: seed.id, name: seed.name, price: seed.price, promotion: attached};
    switch (seed.kind) {
      case 'standard':
        return required(context, 'stock', seed.stock).chain(stock =>
          withContext<Product>(context, createStandardProduct({...base, stock}))
        );
      case 'unlimited':
        return withContext<Product>(context, createUnlimitedProduct(base));
      case 'limited':
        return required(context, 'stock', seed.stock).chain(stock =>
          required(context, 'maximum', seed.maximum).chain(maximum =>
            withContext<Product>(context, createLimitedProduct({...base, stock, maximum}))
          )
        );
    }
  });
}

function repeatedIds(ids: readonly (string | undefined)[]): string[] {
  const declared = ids.filter((id): id is string => id !== undefined);
  return [...new Set(declared.filter((id, index) => declared.indexOf(id) !== index))];
}

/**
 * Builds the seed catalog's products in file order.
 * @return either every issue found in the file or the products
 */
export function decodeSeed(json: unknown): Either<Issues, Product[]> {
  return SeedCatalog.decode(json)
    .mapLeft((error): Issues => [error])
    .chain((seed): Either<Issues, Product[]> => {
      const promotionSeeds = seed.promotions ?? [];
      const promotionResults = promotionSeeds.map(entry =>
        buildPromotion(entry).map(built => [entry.id, built] as const)
      );
      const promotions = new Map(Either.rights(promotionResults));
      const productResults = seed.products.map(entry => buildProduct(entry, promotions));

      const issues = [
        ...repeatedIds(promotionSeeds.map(entry => entry.id)).map(
          id => `promotion '${id}': id is declared more than once.`
        ),
        ...Either.lefts(promotionResults).flat(),
        ...repeatedIds(seed.products.map(entry => entry.id)).map(
          id => `product '${id}': id is declared more than once.`
        ),
        ...Either.lefts(productResults).flat(),
      ];
      return issues.length > 0 ? Left(issues) : Right(Either.rights(productResults));
    });
}
