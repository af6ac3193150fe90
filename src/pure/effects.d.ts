/**
 * EFFECTS LAYER
 *
 * Everything the storefront needs from the outside world, expressed as
 * small interfaces. Production wires them to the terminal and console;
 * tests hand in plain objects.
 */

export interface Terminal {
  /** Asks one question and resolves with the raw answer. */
  ask(message: string): Promise<string>;
  print(text: string): void;
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export type StorefrontEffects = {
  readonly terminal: Terminal;
  readonly logger: Logger;
}
