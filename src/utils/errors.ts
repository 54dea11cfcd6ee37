/**
 * Error taxonomy shared by the mapping engine and the cache substrate.
 *
 * Mapping errors are only raised in strict mode; download-side errors
 * always propagate to the caller.
 */
export class BiostrataError extends Error {
    public readonly code: string;
    public readonly details?: Record<string, unknown>;
    public readonly timestamp: number;

    constructor(code: string, message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'BiostrataError';
        this.code = code;
        this.details = details;
        this.timestamp = Date.now();

        Object.setPrototypeOf(this, new.target.prototype);
    }

    toJSON(): Record<string, unknown> {
        return {
            name: this.name,
            code: this.code,
            message: this.message,
            details: this.details,
            timestamp: this.timestamp,
        };
    }
}

/**
 * Network or HTTP failure after retries were exhausted.
 */
export class DownloadError extends BiostrataError {
    public readonly url: string;
    public readonly status?: number;

    constructor(message: string, url: string, status?: number, options?: { cause?: unknown }) {
        super('DOWNLOAD_ERROR', message, { url, status }, options);
        this.name = 'DownloadError';
        this.url = url;
        this.status = status;
    }
}

/**
 * Downloaded content does not match its declared checksum. The
 * partial artifact has already been discarded when this is thrown.
 */
export class ChecksumMismatchError extends BiostrataError {
    constructor(
        public readonly url: string,
        public readonly expected: string,
        public readonly actual: string,
        public readonly algorithm: string
    ) {
        super('CHECKSUM_MISMATCH', `${algorithm} checksum mismatch for ${url}: expected ${expected}, got ${actual}`, {
            url,
            expected,
            actual,
            algorithm,
        });
        this.name = 'ChecksumMismatchError';
    }
}

/**
 * The raw data no longer has the columns or structure a declaration expects.
 */
export class FormatDriftError extends BiostrataError {
    constructor(message: string, details?: Record<string, unknown>) {
        super('FORMAT_DRIFT', message, details);
        this.name = 'FormatDriftError';
    }
}

export class CVResolutionError extends BiostrataError {
    constructor(
        public readonly value: string,
        public readonly field?: string
    ) {
        super('CV_RESOLUTION_ERROR', `No controlled vocabulary term for '${value}'${field ? ` in field '${field}'` : ''}`, {
            value,
            field,
        });
        this.name = 'CVResolutionError';
    }
}

export class MappingError extends BiostrataError {
    constructor(message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
        super('MAPPING_ERROR', message, details, options);
        this.name = 'MappingError';
    }
}

/**
 * Invalid declaration, unknown registry name or unsupported format.
 */
export class ConfigError extends BiostrataError {
    constructor(message: string, details?: Record<string, unknown>) {
        super('CONFIG_ERROR', message, details);
        this.name = 'ConfigError';
    }
}

/**
 * Render any thrown value as a message string.
 */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
