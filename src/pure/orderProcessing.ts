/**
 * STOREFRONT - The Coordinator
 *
 * The thin effectful shell around the store:
 * 1. Asks the terminal for input (effects)
 * 2. Parses and renders with pure functions
 * 3. Applies orders to the store and prints the outcome (effects)
 *
 * All terminal I/O goes through the effects object, so the whole menu runs
 * in tests against a scripted terminal.
 */

import {Maybe} from 'purify-ts';
import {OrderLine} from '../domain';
import {MenuChoice} from '../types';
import {StorefrontEffects} from './effects';
import {StorefrontCatalog} from './types';
import {
  AMOUNT_PROMPT,
  formatLineFailure,
  formatListing,
  formatOrderConfirmation,
  formatOrderError,
  formatTotalStock,
  INVALID_CHOICE,
  isEndOfOrder,
  LINE_ADDED,
  MENU,
  MENU_PROMPT,
  ORDER_INSTRUCTIONS,
  parseMenuChoice,
  parseOrderLine,
  PRODUCT_PROMPT,
} from './businessLogic';

/**
 * Run the storefront menu until the shopper quits.
 * @return a function running the menu against the given effects
 */
export function runStorefront(store: StorefrontCatalog): (effects: StorefrontEffects) => Promise<void> {
  return async (effects: StorefrontEffects) => {
    let done = false;
    while (!done) {
      effects.terminal.print(MENU);
      const choice = parseMenuChoice(await effects.terminal.ask(MENU_PROMPT));
      done = await handleChoice(store, choice)(effects);
    }
    effects.logger.debug('Storefront closed');
  };
}

/**
 * @return whether the shopper asked to quit
 */
function handleChoice(
  store: StorefrontCatalog,
  choice: Maybe<MenuChoice>
): (effects: StorefrontEffects) => Promise<boolean> {
  return async (effects: StorefrontEffects) => {
    const {terminal} = effects;
    return choice.caseOf<Promise<boolean>>({
      Nothing: async () => {
        terminal.print(INVALID_CHOICE);
        return false;
      },
      Just: async (selected): Promise<boolean> => {
        effects.logger.debug(`Menu choice: ${selected}`);
        switch (selected) {
          case 'list':
            terminal.print(formatListing(store.listActive()));
            return false;
          case 'total':
            terminal.print(formatTotalStock(store.totalStock()));
            return false;
          case 'order':
            await placeOrder(store)(effects);
            return false;
          case 'quit':
            return true;
        }
      },
    });
  };
}

/**
 * Collect order lines from the shopper and settle them against the store.
 */
export function placeOrder(store: StorefrontCatalog): (effects: StorefrontEffects) => Promise<void> {
  return async (effects: StorefrontEffects) => {
    const lines = await collectOrderLines(store)(effects);
    if (lines.length === 0) {
      return;
    }

    store.settleOrder(lines).caseOf({
      Left: (failure) => effects.terminal.print(formatOrderError(failure)),
      Right: (order) => {
        order.failures.forEach(failure => effects.terminal.print(formatLineFailure(failure)));
        effects.terminal.print(formatOrderConfirmation(order));
      },
    });
  };
}

function collectOrderLines(store: StorefrontCatalog): (effects: StorefrontEffects) => Promise<OrderLine[]> {
  return async ({terminal}: StorefrontEffects) => {
    const listing = store.listActive();
    terminal.print(formatListing(listing));
    terminal.print(ORDER_INSTRUCTIONS);

    const lines: OrderLine[] = [];
    for (;;) {
      const productNumber = await terminal.ask(PRODUCT_PROMPT);
      const amount = await terminal.ask(AMOUNT_PROMPT);
      if (isEndOfOrder(productNumber, amount)) {
        return lines;
      }
      parseOrderLine(listing, productNumber, amount).caseOf({
        Left: (notice) => terminal.print(notice),
        Right: (line) => {
          lines.push(line);
          terminal.print(LINE_ADDED);
        },
      });
    }
  };
}
