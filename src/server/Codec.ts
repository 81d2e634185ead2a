import type { AdminAuth, AuctionTerms, Identity, SignatureProof } from '../kernel-core/L0/Ontology.js';
import { InvalidRequestError, SecurityViolationError } from '../Platform/Errors.js';
import { ErrorCode } from '../kernel-core/Errors.js';

// --- Wire format ---
// Amounts, nonces and timestamps travel as decimal strings; identities
// and proofs as tagged objects.

type Fields = { [key: string]: unknown };

export function asFields(value: unknown, label: string = 'body'): Fields {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
        throw new InvalidRequestError(`Expected ${label} to be an object`);
    }
    const out: Fields = {};
    for (const key of Object.keys(value)) out[key] = Reflect.get(value, key);
    return out;
}

export function readString(fields: Fields, key: string): string {
    const value = fields[key];
    if (typeof value !== 'string' || value.length === 0) {
        throw new InvalidRequestError(`Field '${key}' must be a non-empty string`);
    }
    return value;
}

export function readBigInt(fields: Fields, key: string): bigint {
    const value = fields[key];
    if (typeof value === 'number' && Number.isSafeInteger(value)) return BigInt(value);
    if (typeof value === 'string' && /^-?\d+$/.test(value)) return BigInt(value);
    throw new InvalidRequestError(`Field '${key}' must be an integer or a decimal string`);
}

export function readIdentity(fields: Fields, key: string): Identity {
    const id = asFields(fields[key], key);
    if (id.type === 'ACCOUNT') return { type: 'ACCOUNT', publicKey: readString(id, 'publicKey') };
    if (id.type === 'CONTRACT') return { type: 'CONTRACT', contractId: readString(id, 'contractId') };
    throw new InvalidRequestError(`Field '${key}.type' must be ACCOUNT or CONTRACT`);
}

/**
 * HTTP callers have no host-authenticated identity, so only signed
 * proofs are accepted; an INVOKER proof would speak for ANONYMOUS.
 */
export function readProof(fields: Fields, key: string): SignatureProof {
    const proof = asFields(fields[key], key);
    if (proof.type === 'ED25519') {
        return { type: 'ED25519', publicKey: readString(proof, 'publicKey'), signature: readString(proof, 'signature') };
    }
    if (proof.type === 'INVOKER') {
        throw new SecurityViolationError(`Field '${key}' must be an ED25519 signature over HTTP`, ErrorCode.UNAUTHORIZED);
    }
    throw new InvalidRequestError(`Field '${key}.type' must be ED25519`);
}

export function readAuth(fields: Fields, key: string = 'auth'): AdminAuth {
    const auth = asFields(fields[key], key);
    return { sig: readProof(auth, 'sig'), nonce: readBigInt(auth, 'nonce') };
}

export function readTerms(fields: Fields): AuctionTerms {
    return {
        startPrice: readBigInt(fields, 'startPrice'),
        minPrice: readBigInt(fields, 'minPrice'),
        slope: readBigInt(fields, 'slope')
    };
}

/** `?account=<hex>` or `?contract=<hex>`. */
export function identityFromQuery(query: Fields): Identity {
    const { account, contract } = query;
    if (typeof account === 'string') return { type: 'ACCOUNT', publicKey: account };
    if (typeof contract === 'string') return { type: 'CONTRACT', contractId: contract };
    throw new InvalidRequestError(`Query must name an 'account' or a 'contract'`);
}

/** JSON.stringify replacer: bigints as decimal strings. */
export function bigintReplacer(_key: string, value: unknown): unknown {
    return typeof value === 'bigint' ? value.toString() : value;
}
