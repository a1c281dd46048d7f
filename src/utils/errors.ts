/**
 * Error categories for classification
 */
export enum ErrorCategory {
    RECOVERABLE = "RECOVERABLE", // Retry might succeed
    TRANSIENT = "TRANSIENT", // Temporary issue, will resolve
    FATAL = "FATAL", // Cannot continue
}

/**
 * Error codes for specific error types
 */
export enum ErrorCode {
    // Configuration errors
    INVALID_CONFIG = "INVALID_CONFIG",

    // Catalog search errors
    SEARCH_PROVIDER_ERROR = "SEARCH_PROVIDER_ERROR",

    // Embedding model errors
    MODEL_LOAD_FAILED = "MODEL_LOAD_FAILED",
    MODEL_CACHE_ERROR = "MODEL_CACHE_ERROR",

    // File system errors
    FILE_NOT_FOUND = "FILE_NOT_FOUND",
    FILE_READ_ERROR = "FILE_READ_ERROR",
    DISK_FULL = "DISK_FULL",
    PERMISSION_DENIED = "PERMISSION_DENIED",
}

/**
 * Custom application error class
 */
export class AppError extends Error {
    constructor(
        public code: ErrorCode,
        public category: ErrorCategory,
        message: string,
        public details?: Record<string, unknown>
    ) {
        super(message);
        this.name = "AppError";
        Object.setPrototypeOf(this, AppError.prototype);
    }

    toJSON() {
        return {
            name: this.name,
            code: this.code,
            category: this.category,
            message: this.message,
            details: this.details,
        };
    }
}

export function isRecoverable(error: unknown): boolean {
    if (error instanceof AppError) {
        return error.category === ErrorCategory.RECOVERABLE;
    }
    return false;
}

export function isTransient(error: unknown): boolean {
    if (error instanceof AppError) {
        return error.category === ErrorCategory.TRANSIENT;
    }
    return false;
}

/**
 * Best-effort message extraction for values thrown by collaborators.
 */
export function describeError(error: unknown): string {
    if (error instanceof Error) return error.message;
    if (typeof error === "string") return error;
    if (typeof error === "object" && error !== null && "message" in error) {
        const { message } = error;
        if (typeof message === "string") return message;
    }
    return String(error);
}

function nodeErrorCode(err: unknown): string | undefined {
    if (typeof err === "object" && err !== null && "code" in err) {
        const { code } = err;
        return typeof code === "string" ? code : undefined;
    }
    return undefined;
}

/**
 * Wrap a Node.js filesystem error in an AppError
 */
export function wrapNodeError(err: unknown, context: string): AppError {
    const code = nodeErrorCode(err);
    const details = { originalError: describeError(err) };

    if (code === "ENOENT") {
        return new AppError(
            ErrorCode.FILE_NOT_FOUND,
            ErrorCategory.RECOVERABLE,
            `File not found: ${context}`,
            details
        );
    }

    if (code === "EACCES" || code === "EPERM") {
        return new AppError(
            ErrorCode.PERMISSION_DENIED,
            ErrorCategory.FATAL,
            `Permission denied: ${context}`,
            details
        );
    }

    if (code === "ENOSPC") {
        return new AppError(
            ErrorCode.DISK_FULL,
            ErrorCategory.TRANSIENT,
            `Disk full: ${context}`,
            details
        );
    }

    return new AppError(
        ErrorCode.FILE_READ_ERROR,
        ErrorCategory.RECOVERABLE,
        `Failed to access file: ${context}`,
        details
    );
}
