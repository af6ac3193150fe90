export class SeedError extends Error {
    constructor(source: string, issues: readonly string[]) {
        super(`Cannot load seed catalog from ${source}: ${issues.join('; ')}`);
        this.name = 'SeedError';
    }
}

/**
 * A prompt interrupted with Ctrl-C rejects with an error of this name.
 */
export function isPromptExit(error: unknown): boolean {
    return error instanceof Error && error.name === 'ExitPromptError';
}
