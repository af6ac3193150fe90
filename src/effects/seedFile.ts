import {readFile} from 'node:fs/promises';
import {Product} from '../domain';
import {decodeSeed} from '../pure/seed';
import {SeedError} from './errors';

/**
 * Reads and decodes the seed catalog at `seedPath`.
 * @throws SeedError when the file is unreadable, not JSON, or describes
 * invalid products
 */
export async function loadSeedCatalog(seedPath: string): Promise<Product[]> {
  let json: unknown;
  try {
    json = JSON.parse(await readFile(seedPath, 'utf8'));
  } catch (error) {
    throw new SeedError(seedPath, [error instanceof Error ? error.message : String(error)]);
  }

  return decodeSeed(json).caseOf<Product[]>({
    Left: (issues) => {
      throw new SeedError(seedPath, issues);
    },
    Right: (products) => products,
  });
}
