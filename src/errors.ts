export class ConfigError extends Error {
    constructor(
        message: string,
        public readonly field?: string,
    ) {
        super(message);
        this.name = 'ConfigError';
    }
}

/**
 * A catalog backend failed to answer a query.  Asking about a name that simply
 * is not a type is never an error; this is for transport, parse and I/O failures.
 */
export class CatalogError extends Error {
    constructor(
        message: string,
        public readonly query?: string,
        options?: { cause?: unknown },
    ) {
        super(message, options);
        this.name = 'CatalogError';
    }
}

/** A single code unit could not be read or parsed.  The harvester skips it. */
export class HarvestError extends Error {
    constructor(
        message: string,
        public readonly unit: string,
        options?: { cause?: unknown },
    ) {
        super(message, options);
        this.name = 'HarvestError';
    }
}

export function describeError(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
