// Module product types

import {Either} from 'purify-ts';
import {InvalidQuantity, OrderLine, Product, Promotion, SettledOrder} from '../domain';

export type Purchase = {
    readonly product: Product;
    readonly lineTotal: number;
};

export type Settlement = SettledOrder & {
    readonly products: Product[];
};

export type StandardProductInput = {
    readonly id?: string;
    readonly name: string;
    readonly price: number;
    readonly stock: number;
    readonly promotion?: Promotion;
};

export type UnlimitedProductInput = Omit<StandardProductInput, 'stock'>;

export type LimitedProductInput = StandardProductInput & {
    readonly maximum: number;
};


/** What the storefront needs from a catalog. */
export interface StorefrontCatalog {
    listActive(): Product[];
    totalStock(): number;
    settleOrder(lines: readonly OrderLine[]): Either<InvalidQuantity, SettledOrder>;
}
