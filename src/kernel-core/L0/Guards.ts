// src/kernel-core/L0/Guards.ts
import type { SignatureProof, TimeStamp, OfficeID } from './Ontology.js';
import { verifySignature } from './Crypto.js';
import { ErrorCode, KernelError } from '../Errors.js';

// --- Guard Pattern ---
export type GuardResult =
    | { ok: true }
    | { ok: false; code: ErrorCode; violation: string; details?: Record<string, unknown> };

export type Guard<T> = (input: T) => GuardResult;

const OK: GuardResult = { ok: true };
const FAIL = (code: ErrorCode, violation: string, details?: Record<string, unknown>): GuardResult =>
    details ? { ok: false, code, violation, details } : { ok: false, code, violation };

/** Turns a failed guard into the operation's abort. */
export function enforce(result: GuardResult): void {
    if (!result.ok) throw new KernelError(result.code, result.violation, result.details);
}

// --- Concrete Guards ---

// 0. Initialization (write-once configuration)
export const UninitializedGuard: Guard<{ initialized: boolean }> = ({ initialized }) =>
    initialized ? FAIL(ErrorCode.ALREADY_INITIALIZED, 'Administrator is already set') : OK;

// 1. Administrator Identity
export const AdminGuard: Guard<{ signer: string; admin: string }> = ({ signer, admin }) =>
    signer === admin ? OK : FAIL(ErrorCode.UNAUTHORIZED, 'Caller is not the administrator', { signer });

// 2. Invoker Mode (no replay surface, nonce pinned to zero)
export const InvokerNonceGuard: Guard<{ nonce: bigint }> = ({ nonce }) =>
    nonce === 0n ? OK : FAIL(ErrorCode.INVOKER_NONCE_MISMATCH, `Invoker calls must use nonce 0, got ${nonce}`);

// 3. Signature over the authorization payload
export const SignatureGuard: Guard<{ data: string; proof: Extract<SignatureProof, { type: 'ED25519' }> }> = ({ data, proof }) =>
    verifySignature(data, proof.signature, proof.publicKey) ? OK : FAIL(ErrorCode.UNAUTHORIZED, 'Invalid signature');

// 4. Replay (strictly increasing per-identity counter)
export const NonceGuard: Guard<{ supplied: bigint; expected: bigint }> = ({ supplied, expected }) =>
    supplied === expected
        ? OK
        : FAIL(ErrorCode.INCORRECT_NONCE, `Expected nonce ${expected}, got ${supplied}`, {
            expected: expected.toString(),
            supplied: supplied.toString()
        });

// 5. Vacancy: an id may hold at most one record
export const VacancyGuard: Guard<{ officeId: OfficeID; forSale: boolean; bought: boolean }> = ({ officeId, forSale, bought }) =>
    forSale || bought ? FAIL(ErrorCode.DUPLICATE_ID, `Office ${officeId} already exists`, { officeId }) : OK;

// 6. Expiry: revocation only strictly after expiry
export const ExpiryGuard: Guard<{ now: TimeStamp; expiresAt: TimeStamp }> = ({ now, expiresAt }) =>
    now > expiresAt
        ? OK
        : FAIL(ErrorCode.NOT_EXPIRED, `Office expires at ${expiresAt}, now is ${now}`, {
            expiresAt: expiresAt.toString(),
            now: now.toString()
        });

// 7. Bid acceptance
export const BidGuard: Guard<{ accepted: boolean; officeId: OfficeID }> = ({ accepted, officeId }) =>
    accepted ? OK : FAIL(ErrorCode.BID_REJECTED, `Bid on office ${officeId} was rejected by the auction`, { officeId });
