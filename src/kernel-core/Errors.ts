/**
 * Office Ledger Error Taxonomy
 * Every code is fatal to the operation that raised it.
 */

export enum ErrorCode {
    // I. Initialization
    ALREADY_INITIALIZED = 'ALREADY_INITIALIZED',
    NOT_INITIALIZED = 'NOT_INITIALIZED',

    // II. Authority & Replay
    UNAUTHORIZED = 'UNAUTHORIZED',
    INCORRECT_NONCE = 'INCORRECT_NONCE',
    INVOKER_NONCE_MISMATCH = 'INVOKER_NONCE_MISMATCH',

    // III. Office Lifecycle
    DUPLICATE_ID = 'DUPLICATE_ID',
    NOT_FOR_SALE = 'NOT_FOR_SALE',
    NOT_FOUND = 'NOT_FOUND',
    BID_REJECTED = 'BID_REJECTED',
    NOT_EXPIRED = 'NOT_EXPIRED',

    // IV. Value Transfer
    TRANSFER_FAILED = 'TRANSFER_FAILED',

    // V. Host & Input
    INVALID_ARGUMENT = 'INVALID_ARGUMENT',
    UNKNOWN_CONTRACT = 'UNKNOWN_CONTRACT',
    CORRUPT_STATE = 'CORRUPT_STATE',
}

export class KernelError extends Error {
    constructor(
        public readonly code: ErrorCode,
        message: string,
        public readonly metadata?: Record<string, unknown>,
        options?: { cause?: unknown }
    ) {
        super(`[Ledger:${code}] ${message}`, options);
        this.name = 'KernelError';
    }
}

export function isKernelError(e: unknown, code?: ErrorCode): e is KernelError {
    return e instanceof KernelError && (code === undefined || e.code === code);
}
