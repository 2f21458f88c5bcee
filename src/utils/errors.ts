/**
 * Error categories for classification
 */
export enum ErrorCategory {
    RECOVERABLE = "RECOVERABLE", // Caller can retry with different input
    TRANSIENT = "TRANSIENT", // Retrying later may succeed
    FATAL = "FATAL", // Cannot continue
}

/**
 * Error codes for specific error types
 */
export enum ErrorCode {
    // HTTP
    OBJECT_NOT_FOUND = "OBJECT_NOT_FOUND",
    TOO_MANY_REQUESTS = "TOO_MANY_REQUESTS",
    AUTHENTICATION_FAILED = "AUTHENTICATION_FAILED",
    HTTP_ERROR = "HTTP_ERROR",

    // Login flows
    LOGIN_TIMEOUT = "LOGIN_TIMEOUT",

    // Catalog
    METADATA_NOT_AVAILABLE = "METADATA_NOT_AVAILABLE",
    INVALID_ISRC = "INVALID_ISRC",
    INVALID_UPC = "INVALID_UPC",

    // Streaming
    URL_NOT_AVAILABLE = "URL_NOT_AVAILABLE",
    STREAM_NOT_AVAILABLE = "STREAM_NOT_AVAILABLE",
    UNKNOWN_MANIFEST_FORMAT = "UNKNOWN_MANIFEST_FORMAT",
    MANIFEST_DECODE_ERROR = "MANIFEST_DECODE_ERROR",
    MPD_NOT_AVAILABLE = "MPD_NOT_AVAILABLE",

    // Configuration
    INVALID_CONFIG = "INVALID_CONFIG",
}

/**
 * Raw HTTP response kept on errors for diagnostics.
 */
export interface TidalResponse {
    status: number;
    url: string;
    headers: Record<string, string>;
    data: unknown;
}

/**
 * Base class for everything this library throws on purpose.
 */
export class TidalError extends Error {
    constructor(
        public code: ErrorCode,
        public category: ErrorCategory,
        message: string,
        public details?: Record<string, unknown>,
        public response?: TidalResponse,
    ) {
        super(message);
        this.name = "TidalError";
        Object.setPrototypeOf(this, new.target.prototype);
    }

    toJSON() {
        return {
            name: this.name,
            code: this.code,
            category: this.category,
            message: this.message,
            details: this.details,
            status: this.response?.status,
        };
    }
}

export class ObjectNotFound extends TidalError {
    constructor(message = "Object not found", response?: TidalResponse) {
        super(ErrorCode.OBJECT_NOT_FOUND, ErrorCategory.RECOVERABLE, message, undefined, response);
        this.name = "ObjectNotFound";
    }
}

export class TooManyRequests extends TidalError {
    /** Seconds from the `Retry-After` header, when the server sent one. */
    public readonly retryAfter: number | null;

    constructor(message = "Too many requests", response?: TidalResponse) {
        super(ErrorCode.TOO_MANY_REQUESTS, ErrorCategory.TRANSIENT, message, undefined, response);
        this.name = "TooManyRequests";
        this.retryAfter = parseRetryAfter(response?.headers["retry-after"]);
    }
}

export class AuthenticationError extends TidalError {
    constructor(message = "Authentication failed", response?: TidalResponse) {
        super(ErrorCode.AUTHENTICATION_FAILED, ErrorCategory.FATAL, message, undefined, response);
        this.name = "AuthenticationError";
    }
}

export class HttpError extends TidalError {
    constructor(message: string, response?: TidalResponse) {
        const category =
            response && response.status >= 500
                ? ErrorCategory.TRANSIENT
                : ErrorCategory.RECOVERABLE;
        super(ErrorCode.HTTP_ERROR, category, message, undefined, response);
        this.name = "HttpError";
    }
}

export class LoginTimeoutError extends TidalError {
    constructor(message = "You took too long to log in") {
        super(ErrorCode.LOGIN_TIMEOUT, ErrorCategory.RECOVERABLE, message);
        this.name = "LoginTimeoutError";
    }
}

export class MetadataNotAvailable extends TidalError {
    constructor(message: string) {
        super(ErrorCode.METADATA_NOT_AVAILABLE, ErrorCategory.RECOVERABLE, message);
        this.name = "MetadataNotAvailable";
    }
}

export class InvalidISRC extends TidalError {
    constructor(isrc: string) {
        super(ErrorCode.INVALID_ISRC, ErrorCategory.RECOVERABLE, `Invalid ISRC: ${isrc}`, { isrc });
        this.name = "InvalidISRC";
    }
}

export class InvalidUPC extends TidalError {
    constructor(upc: string) {
        super(ErrorCode.INVALID_UPC, ErrorCategory.RECOVERABLE, `Invalid UPC: ${upc}`, { upc });
        this.name = "InvalidUPC";
    }
}

export class URLNotAvailable extends TidalError {
    constructor(message = "URL not available for this media") {
        super(ErrorCode.URL_NOT_AVAILABLE, ErrorCategory.RECOVERABLE, message);
        this.name = "URLNotAvailable";
    }
}

export class StreamNotAvailable extends TidalError {
    constructor(message = "Stream not available for this media") {
        super(ErrorCode.STREAM_NOT_AVAILABLE, ErrorCategory.RECOVERABLE, message);
        this.name = "StreamNotAvailable";
    }
}

export class UnknownManifestFormat extends TidalError {
    constructor(mimeType: string | null) {
        super(
            ErrorCode.UNKNOWN_MANIFEST_FORMAT,
            ErrorCategory.FATAL,
            `Unknown manifest format: ${mimeType ?? "none"}`,
            { mimeType },
        );
        this.name = "UnknownManifestFormat";
    }
}

export class ManifestDecodeError extends TidalError {
    constructor(message = "Stream manifest could not be decoded") {
        super(ErrorCode.MANIFEST_DECODE_ERROR, ErrorCategory.FATAL, message);
        this.name = "ManifestDecodeError";
    }
}

export class MPDNotAvailableError extends TidalError {
    constructor(message = "HLS stream requires MPD metadata") {
        super(ErrorCode.MPD_NOT_AVAILABLE, ErrorCategory.RECOVERABLE, message);
        this.name = "MPDNotAvailableError";
    }
}

export class ConfigError extends TidalError {
    constructor(message: string, issues: string[] = []) {
        super(ErrorCode.INVALID_CONFIG, ErrorCategory.FATAL, message, { issues });
        this.name = "ConfigError";
    }
}

function parseRetryAfter(value: string | undefined): number | null {
    if (!value) return null;
    const seconds = Number.parseInt(value, 10);
    return Number.isFinite(seconds) && seconds >= 0 ? seconds : null;
}

/**
 * Check if an error is recoverable
 */
export function isRecoverable(error: unknown): boolean {
    if (error instanceof TidalError) {
        return error.category === ErrorCategory.RECOVERABLE;
    }
    return false;
}

/**
 * Check if an error is transient
 */
export function isTransient(error: unknown): boolean {
    if (error instanceof TidalError) {
        return error.category === ErrorCategory.TRANSIENT;
    }
    return false;
}

function userMessageOf(response: TidalResponse): string | null {
    const data = response.data;
    if (typeof data === "object" && data !== null && "userMessage" in data) {
        const message = data.userMessage;
        return typeof message === "string" && message.length > 0 ? message : null;
    }
    return null;
}

/**
 * Map a failed HTTP response onto the matching error type.
 */
export function errorFromResponse(response: TidalResponse): TidalError {
    const serverMessage = userMessageOf(response);

    if (response.status === 404) {
        return new ObjectNotFound(serverMessage ?? "Object not found", response);
    }

    if (response.status === 429) {
        return new TooManyRequests("Too many requests", response);
    }

    if (response.status === 401 || response.status === 403) {
        return new AuthenticationError(serverMessage ?? "Authentication failed", response);
    }

    return new HttpError(
        `Request to ${response.url} failed with status ${response.status}` +
            (serverMessage ? `: ${serverMessage}` : ""),
        response,
    );
}
