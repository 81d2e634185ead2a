import type { TimeStamp, Amount, Identity, Hex } from './Ontology.js';
import { ErrorCode, KernelError } from '../Errors.js';

/** One week, added to expiry on purchase and on each tax payment. */
export const RENEWAL_PERIOD: TimeStamp = 604800n;

export const U64_MAX = (1n << 64n) - 1n;

export const OFFICE_ID_BYTES = 16;
export const CONTRACT_ID_BYTES = 32;
export const PUBLIC_KEY_BYTES = 32;

// --- Time ---
export function addTime(ts: TimeStamp, delta: TimeStamp): TimeStamp {
    const sum = ts + delta;
    if (sum > U64_MAX) {
        throw new KernelError(ErrorCode.INVALID_ARGUMENT, `Timestamp overflow: ${ts} + ${delta}`);
    }
    return sum;
}

// --- Identifiers ---
export function isHexOfLength(value: unknown, bytes: number): value is Hex {
    return typeof value === 'string' && value.length === bytes * 2 && /^[0-9a-f]+$/.test(value);
}

export function requireHex(value: string, bytes: number, label: string): Hex {
    const normalized = value.toLowerCase();
    if (!isHexOfLength(normalized, bytes)) {
        throw new KernelError(ErrorCode.INVALID_ARGUMENT, `${label} must be ${bytes} bytes of hex`, { value });
    }
    return normalized;
}

export function requireAmount(value: Amount, label: string): Amount {
    if (value < 0n) {
        throw new KernelError(ErrorCode.INVALID_ARGUMENT, `${label} must be non-negative`, { value: value.toString() });
    }
    return value;
}

export function requireIdentity(id: Identity): Identity {
    if (id.type === 'ACCOUNT') {
        return { type: 'ACCOUNT', publicKey: requireHex(id.publicKey, PUBLIC_KEY_BYTES, 'Account key') };
    }
    return { type: 'CONTRACT', contractId: requireHex(id.contractId, CONTRACT_ID_BYTES, 'Contract id') };
}
