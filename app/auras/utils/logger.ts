/**
 * Log sink for lifecycle traces. Lines arrive already tagged, e.g. "[AuraEngine] ...".
 */
export interface EngineLogger {
    log(message: string): void;
    warn(message: string): void;
}

export function isEngineLogger(value: unknown): value is EngineLogger {
    return (
        typeof value === 'object' &&
        value !== null &&
        'log' in value &&
        typeof value.log === 'function' &&
        'warn' in value &&
        typeof value.warn === 'function'
    );
}

export const consoleLogger: EngineLogger = {
    log: message => console.log(message),
    warn: message => console.warn(message),
};

export const silentLogger: EngineLogger = {
    log: () => { },
    warn: () => { },
};

/**
 * Short form of an aura instance id for log lines.
 */
export function shortId(id: string): string {
    return id.slice(0, 8);
}
