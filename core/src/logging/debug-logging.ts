/**
 * Debug Logging Module
 *
 * Controls whether view-model and view trace messages are written to the console.
 * Tests switch it off to keep the runner output clean.
 */

let debugEnabled = true;

/**
 * Enable or disable debug logging.
 */
export function setDebugLogging(enabled: boolean): void {
    debugEnabled = enabled;
}

export function isDebugLoggingEnabled(): boolean {
    return debugEnabled;
}

/**
 * Log a trace message (only if debug is enabled).
 * Use this instead of console.log for state transitions.
 */
export function debugLog(...args: unknown[]): void {
    if (debugEnabled) {
        console.log(...args);
    }
}

/**
 * Log a warning (always output, not suppressed).
 */
export function debugWarn(...args: unknown[]): void {
    console.warn(...args);
}
