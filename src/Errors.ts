/**
 * Record Error Taxonomy
 * Centralized error codes for construction, access and lock failures.
 */

export enum ErrorCode {
    // I. Construction
    TYPE_MISMATCH = 'TYPE_MISMATCH',
    UNEXPECTED_FIELD = 'UNEXPECTED_FIELD',
    INVALID_SCHEMA = 'INVALID_SCHEMA',

    // II. Access
    NOT_FOUND = 'NOT_FOUND',

    // III. Mutability
    IMMUTABLE = 'IMMUTABLE',
    NOT_REGISTERED = 'NOT_REGISTERED',
    PRIVATE_FIELD = 'PRIVATE_FIELD',
    MISSING_VALUE = 'MISSING_VALUE',

    // IV. Structural
    NOT_APPLICABLE = 'NOT_APPLICABLE',
    NOT_COMPARABLE = 'NOT_COMPARABLE',
    NOT_CLONEABLE = 'NOT_CLONEABLE',

    // V. Projection
    INVALID_TEXT = 'INVALID_TEXT',
    NOT_SERIALIZABLE = 'NOT_SERIALIZABLE',

    // VI. Builder
    NOT_IMPLEMENTED = 'NOT_IMPLEMENTED',
}

export class RecordError extends Error {
    constructor(
        public readonly code: ErrorCode,
        public readonly reason: string,
        public readonly metadata: Record<string, unknown> = {}
    ) {
        super(`[Record:${code}] ${reason}`);
        this.name = 'RecordError';
    }
}

export function isRecordError(error: unknown, code?: ErrorCode): error is RecordError {
    return error instanceof RecordError && (code === undefined || error.code === code);
}
