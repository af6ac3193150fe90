#!/usr/bin/env node
/**
 * STOREFRONT STARTUP SCRIPT
 *
 * Loads the seed catalog and runs the interactive storefront on the
 * terminal until the shopper quits.
 *
 * Run this with: npm start
 */
import {loadConfigFromEnv} from './effects/config';
import {makeStorefrontEffects} from './effects/EffectsFactory';
import {isPromptExit} from './effects/errors';
import {loadSeedCatalog} from './effects/seedFile';
import {Store} from './impure/Store';
import {runStorefront} from './pure/orderProcessing';

async function main() {
  const config = loadConfigFromEnv();
  const effects = makeStorefrontEffects(config);

  const products = await loadSeedCatalog(config.seedPath);
  effects.logger.info(`Loaded ${products.length} products from ${config.seedPath}`);

  const store = new Store(products, effects.logger);
  try {
    await runStorefront(store)(effects);
  } catch (error) {
    if (!isPromptExit(error)) throw error;
    effects.terminal.print('\nCTRL-C catched -> Exiting...');
  }
}

main().catch((error) => {
  console.error('💥 Unhandled error:', error);
  process.exit(1);
});
