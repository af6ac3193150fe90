import {DEFAULT_SEED_PATH, loadConfigFromEnv} from '../effects/config';
import {createLogger} from '../effects/logger';
import {LogLevel} from '../types';
import {isPromptExit, SeedError} from '../effects/errors';

describe('loadConfigFromEnv', () => {
  it('falls back to defaults', () => {
    expect(loadConfigFromEnv({})).toEqual({seedPath: DEFAULT_SEED_PATH, logLevel: 'warn'});
  });

  it('reads the seed path and log level', () => {
    expect(loadConfigFromEnv({CATALOG_SEED_PATH: '/tmp/catalog.json', LOG_LEVEL: 'DEBUG'})).toEqual({
      seedPath: '/tmp/catalog.json',
      logLevel: 'debug',
    });
  });

  it('ignores an unknown log level', () => {
    expect(loadConfigFromEnv({LOG_LEVEL: 'verbose'}).logLevel).toBe('warn');
  });
});

describe('createLogger', () => {
  function capture(level: LogLevel) {
    const write = jest.fn<void, [string]>();
    const logger = createLogger(level, {write});
    const entries = () => write.mock.calls.map(([line]) => JSON.parse(line));
    return {logger, entries};
  }

  it('drops messages below the configured level', () => {
    const {logger, entries} = capture('info');

    logger.debug('hidden');
    logger.info('Loaded 5 products');
    logger.warn('Order rejected');

    expect(entries()).toHaveLength(2);
    expect(entries()[0]).toMatchObject({level: 'info', msg: 'Loaded 5 products', service: 'retail-catalog'});
    expect(entries()[1]).toMatchObject({level: 'warn', msg: 'Order rejected'});
  });

  it('always writes errors', () => {
    const {logger, entries} = capture('error');

    logger.warn('quiet');
    logger.error('boom');

    expect(entries()).toEqual([expect.objectContaining({level: 'error', msg: 'boom'})]);
  });
});

describe('errors', () => {
  it('joins every seed issue into the message', () => {
    const error = new SeedError('catalog.json', ['first', 'second']);

    expect(error.name).toBe('SeedError');
    expect(error.message).toBe('Cannot load seed catalog from catalog.json: first; second');
  });

  it('recognises an interrupted prompt', () => {
    const interrupted = new Error('User force closed the prompt');
    interrupted.name = 'ExitPromptError';

    expect(isPromptExit(interrupted)).toBe(true);
    expect(isPromptExit(new Error('other'))).toBe(false);
    expect(isPromptExit('ExitPromptError')).toBe(false);
  });
});
