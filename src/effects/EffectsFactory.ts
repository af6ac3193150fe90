/**
 * PRODUCTION EFFECTS IMPLEMENTATION
 *
 * Connects the storefront to a real terminal:
 * - @inquirer/prompts for questions
 * - the console for output
 * - pino for logs
 */
import {input} from '@inquirer/prompts';
import {Logger, StorefrontEffects, Terminal} from '../pure/effects';
import {createLogger} from './logger';
import {loadConfigFromEnv} from './config';
import {StorefrontConfig} from './types';

// ============================================================================
// Inquirer Terminal
// ============================================================================

class InquirerTerminal implements Terminal {
  async ask(message: string): Promise<string> {
    return input({message});
  }

  print(text: string): void {
    console.log(text);
  }
}

// ============================================================================
// Production EffectsFactory
// ============================================================================

class EffectsFactory implements StorefrontEffects {
  private _terminal?: Terminal;
  private _logger?: Logger;

  constructor(private config: StorefrontConfig) {}

  get terminal(): Terminal {
    if (!this._terminal) {
      this._terminal = new InquirerTerminal();
    }
    return this._terminal;
  }

  get logger(): Logger {
    if (!this._logger) {
      this._logger = createLogger(this.config.logLevel);
    }
    return this._logger;
  }
}

export function makeStorefrontEffects(config: StorefrontConfig = loadConfigFromEnv()): StorefrontEffects {
  return new EffectsFactory(config);
}
