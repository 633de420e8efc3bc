/**
 * Logger interface shared by the engine components.
 *
 * Structured data travels in `data`; messages stay constant so log lines
 * can be grouped.
 */
export interface EngineLogger {
    debug(message: string, data?: Record<string, unknown>): void;
    info(message: string, data?: Record<string, unknown>): void;
    warn(message: string, data?: Record<string, unknown>): void;
    error(message: string, data?: Record<string, unknown>): void;
}

/**
 * Console-backed logger with a component prefix.
 *
 * @param prefix - Tag prepended to every line, e.g. "RuleExecutor"
 */
export function createConsoleLogger(prefix?: string): EngineLogger {
    const tag = (level: string) => (prefix ? `[${level}] [${prefix}]` : `[${level}]`);

    return {
        debug: (msg, data) => console.debug(`${tag("DEBUG")} ${msg}`, data ?? ""),
        info : (msg, data) => console.info(`${tag("INFO")} ${msg}`, data ?? ""),
        warn : (msg, data) => console.warn(`${tag("WARN")} ${msg}`, data ?? ""),
        error: (msg, data) => console.error(`${tag("ERROR")} ${msg}`, data ?? ""),
    };
}

/**
 * Logger that discards everything.
 */
export const silentLogger: EngineLogger = {
    debug: () => undefined,
    info : () => undefined,
    warn : () => undefined,
    error: () => undefined,
};
