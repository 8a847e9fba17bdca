export enum ErrorCode {
    NOT_FOUND = 'NOT_FOUND',
    READ_FAILED = 'READ_FAILED',
    INSERT_FAILED = 'INSERT_FAILED',
    INVALID_EMBEDDING = 'INVALID_EMBEDDING',
    GENERATION_FAILED = 'GENERATION_FAILED',
    STORAGE_FAILED = 'STORAGE_FAILED',
    CONNECTIVITY_FAILED = 'CONNECTIVITY_FAILED',
    CONFIGURATION_INVALID = 'CONFIGURATION_INVALID',
}

/**
 * Base class for every error raised by the ingestion and storage layers.
 */
export class KnowledgeError extends Error {
    constructor(
        public readonly code: ErrorCode,
        message: string,
        cause?: unknown,
    ) {
        super(message, cause === undefined ? undefined : { cause });
        this.name = new.target.name;
    }
}

export class NotFoundError extends KnowledgeError {
    constructor(message: string, cause?: unknown) {
        super(ErrorCode.NOT_FOUND, message, cause);
    }
}

export class ReadError extends KnowledgeError {
    constructor(message: string, cause?: unknown) {
        super(ErrorCode.READ_FAILED, message, cause);
    }
}

export class InsertError extends KnowledgeError {
    constructor(message: string, cause?: unknown) {
        super(ErrorCode.INSERT_FAILED, message, cause);
    }
}

export class ValidationError extends KnowledgeError {
    constructor(message: string, cause?: unknown) {
        super(ErrorCode.INVALID_EMBEDDING, message, cause);
    }
}

export class GenerationError extends KnowledgeError {
    constructor(message: string, cause?: unknown) {
        super(ErrorCode.GENERATION_FAILED, message, cause);
    }
}

export class StorageError extends KnowledgeError {
    constructor(message: string, cause?: unknown) {
        super(ErrorCode.STORAGE_FAILED, message, cause);
    }
}

export class ConnectivityError extends KnowledgeError {
    constructor(message: string, cause?: unknown) {
        super(ErrorCode.CONNECTIVITY_FAILED, message, cause);
    }
}

export class ConfigurationError extends KnowledgeError {
    constructor(message: string, cause?: unknown) {
        super(ErrorCode.CONFIGURATION_INVALID, message, cause);
    }
}

export function getErrorMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}
