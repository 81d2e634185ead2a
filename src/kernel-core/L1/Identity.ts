import type { Identity, SignatureProof, ContractID, Hex } from '../L0/Ontology.js';
import type { StoredValue } from '../L2/State.js';
import type { Env } from '../Env.js';
import { canonicalize, signData } from '../L0/Crypto.js';
import type { Ed25519PrivateKey } from '../L0/Crypto.js';
import { AdminGuard, InvokerNonceGuard, SignatureGuard, NonceGuard, enforce } from '../L0/Guards.js';

// --- Identity Algebra ---

export function account(publicKey: Hex): Identity {
    return { type: 'ACCOUNT', publicKey: publicKey.toLowerCase() };
}

export function contract(contractId: ContractID): Identity {
    return { type: 'CONTRACT', contractId: contractId.toLowerCase() };
}

/** Canonical string form; used as a map and storage key. */
export function identityKey(id: Identity): string {
    return id.type === 'ACCOUNT' ? `account:${id.publicKey}` : `contract:${id.contractId}`;
}

export function sameIdentity(a: Identity, b: Identity): boolean {
    return identityKey(a) === identityKey(b);
}

export function toStoredIdentity(id: Identity): StoredValue {
    return id.type === 'ACCOUNT'
        ? { type: 'ACCOUNT', publicKey: id.publicKey }
        : { type: 'CONTRACT', contractId: id.contractId };
}

export function fromStoredIdentity(value: StoredValue | undefined): Identity | undefined {
    if (value === undefined || value === null || typeof value !== 'object' || Array.isArray(value)) return undefined;
    const { type } = value;
    if (type === 'ACCOUNT' && typeof value.publicKey === 'string') return account(value.publicKey);
    if (type === 'CONTRACT' && typeof value.contractId === 'string') return contract(value.contractId);
    return undefined;
}

/**
 * Resolves who a proof speaks for. An INVOKER proof speaks for whoever
 * is invoking the current call; a signature speaks for its key.
 */
export function resolveSigner(env: Pick<Env, 'invoker'>, proof: SignatureProof): Identity {
    return proof.type === 'INVOKER' ? env.invoker : account(proof.publicKey);
}

// --- Authorization Payload ---

export function authorizationPayload(
    contractId: ContractID,
    fn: string,
    nonce: bigint,
    args: readonly unknown[]
): string {
    return canonicalize([contractId, fn, nonce, ...args]);
}

/** Client-side helper: produces the ED25519 proof an authenticated call expects. */
export function signAuthorization(
    privateKey: Ed25519PrivateKey,
    publicKey: Hex,
    contractId: ContractID,
    fn: string,
    nonce: bigint,
    args: readonly unknown[]
): SignatureProof {
    return {
        type: 'ED25519',
        publicKey: publicKey.toLowerCase(),
        signature: signData(authorizationPayload(contractId, fn, nonce, args), privateKey)
    };
}

// --- Replay Protection ---

const nonceKey = (id: Identity) => `Nonce:${identityKey(id)}`;

/**
 * Authentication and replay protection for one module's namespace.
 * Admin-gated calls run `checkAdmin` then `verifyAndConsumeNonce`.
 */
export class AuthEngine {
    /** Next expected nonce; 0 when never consumed. */
    public static readNonce(env: Pick<Env, 'storage'>, id: Identity): bigint {
        const stored = env.storage.get(nonceKey(id));
        return typeof stored === 'bigint' ? stored : 0n;
    }

    /** Read-only: must short-circuit before any nonce is consumed. */
    public static checkAdmin(env: Pick<Env, 'invoker'>, proof: SignatureProof, admin: Identity): void {
        enforce(AdminGuard({
            signer: identityKey(resolveSigner(env, proof)),
            admin: identityKey(admin)
        }));
    }

    public static verifyAndConsumeNonce(
        env: Pick<Env, 'invoker' | 'storage' | 'contractId'>,
        proof: SignatureProof,
        nonce: bigint,
        fn: string,
        args: readonly unknown[]
    ): void {
        if (proof.type === 'INVOKER') {
            enforce(InvokerNonceGuard({ nonce }));
            return;
        }

        enforce(SignatureGuard({ data: authorizationPayload(env.contractId, fn, nonce, args), proof }));

        const signer = resolveSigner(env, proof);
        const expected = AuthEngine.readNonce(env, signer);
        enforce(NonceGuard({ supplied: nonce, expected }));
        env.storage.set(nonceKey(signer), expected + 1n);
    }
}
