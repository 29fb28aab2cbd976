import type { Verbosity } from '../types/index.js';

/**
 * Log sink. Messages go to stderr so stdout stays free for results.
 */
export interface Logger {
    debug(message: string): void;
}

/**
 * Console logger; only `detailed` verbosity prints anything.
 */
export function createLogger(verbosity: Verbosity = 'standard'): Logger {
    return {
        debug(message) {
            if (verbosity === 'detailed') console.error(`[hpl] ${message}`);
        },
    };
}
