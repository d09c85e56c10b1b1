/**
 * Logger utility for has-lib-target
 *
 * Diagnostics go to stderr and can be silenced with --quiet. The answer line
 * is the only thing written to stdout, so CI scripts can read it without
 * filtering.
 */

let silentMode = false;

/**
 * Enable or disable silent mode.
 * When enabled, warn() outputs nothing.
 * error() and result() always output.
 */
export function setSilentMode(silent: boolean): void {
    silentMode = silent;
}

/**
 * Write the answer line to stdout. Never silenced.
 */
export function result(value: string): void {
    console.log(value);
}

/**
 * Log warning to stderr. Silenced in silent mode.
 */
export function warn(...args: unknown[]): void {
    if (!silentMode) {
        console.warn(...args);
    }
}

/**
 * Log error to stderr. ALWAYS outputs (never silenced).
 */
export function error(...args: unknown[]): void {
    console.error(...args);
}
