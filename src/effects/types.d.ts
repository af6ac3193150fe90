// ============================================================================
// Configuration
// ============================================================================

import {LogLevel} from '../types';

export type StorefrontConfig = {
    readonly seedPath: string;
    readonly logLevel: LogLevel;
}
