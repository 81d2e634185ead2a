/**
 * Ledger Platform: Domain Error Taxonomy
 * Translates kernel rejections into the exceptions callers handle.
 */
import { ErrorCode, isKernelError } from '../kernel-core/Errors.js';

export abstract class PlatformError extends Error {
    constructor(message: string, public readonly code: string, public readonly metadata?: Record<string, unknown>) {
        super(message);
        this.name = this.constructor.name;
    }
}

/**
 * Thrown when the ledger's rules refuse the operation (e.g. office not expired).
 */
export class PolicyViolationError extends PlatformError {
    constructor(message: string, code: ErrorCode, details?: Record<string, unknown>) {
        super(message, code, details);
    }
}

/**
 * Thrown when authentication or replay protection fails.
 */
export class SecurityViolationError extends PlatformError {
    constructor(message: string, code: ErrorCode, details?: Record<string, unknown>) {
        super(message, code, details);
    }
}

/**
 * Thrown when the office (or its listing) does not exist.
 */
export class NotFoundError extends PlatformError {
    constructor(message: string, code: ErrorCode, details?: Record<string, unknown>) {
        super(message, code, details);
    }
}

/**
 * Thrown when the request itself is malformed.
 */
export class InvalidRequestError extends PlatformError {
    constructor(message: string, details?: Record<string, unknown>) {
        super(message, ErrorCode.INVALID_ARGUMENT, details);
    }
}

/**
 * Thrown when stored data no longer matches its schema.
 */
export class DataIntegrityError extends PlatformError {
    constructor(message: string, details?: Record<string, unknown>) {
        super(message, ErrorCode.CORRUPT_STATE, details);
    }
}

/**
 * Thrown when the environment fails (storage, host wiring).
 */
export class InfrastructureError extends PlatformError {
    constructor(message: string, code: string = 'INFRASTRUCTURE_FAILURE', details?: Record<string, unknown>) {
        super(message, code, details);
    }
}

const SECURITY: ReadonlySet<ErrorCode> = new Set([
    ErrorCode.UNAUTHORIZED,
    ErrorCode.INCORRECT_NONCE,
    ErrorCode.INVOKER_NONCE_MISMATCH
]);

const NOT_FOUND: ReadonlySet<ErrorCode> = new Set([
    ErrorCode.NOT_FOUND,
    ErrorCode.NOT_FOR_SALE
]);

const POLICY: ReadonlySet<ErrorCode> = new Set([
    ErrorCode.ALREADY_INITIALIZED,
    ErrorCode.NOT_INITIALIZED,
    ErrorCode.DUPLICATE_ID,
    ErrorCode.BID_REJECTED,
    ErrorCode.NOT_EXPIRED,
    ErrorCode.TRANSFER_FAILED
]);

/**
 * Translates low-level kernel rejections into platform errors.
 */
export function translateError(e: unknown): PlatformError {
    if (e instanceof PlatformError) return e;
    if (!isKernelError(e)) {
        const message = e instanceof Error ? e.message : String(e);
        return new InfrastructureError(message);
    }

    const details = e.metadata;
    if (SECURITY.has(e.code)) return new SecurityViolationError(e.message, e.code, details);
    if (NOT_FOUND.has(e.code)) return new NotFoundError(e.message, e.code, details);
    if (POLICY.has(e.code)) return new PolicyViolationError(e.message, e.code, details);
    if (e.code === ErrorCode.INVALID_ARGUMENT) return new InvalidRequestError(e.message, details);
    if (e.code === ErrorCode.CORRUPT_STATE) return new DataIntegrityError(e.message, details);
    return new InfrastructureError(e.message, e.code, details);
}
