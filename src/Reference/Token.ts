import type { Amount, Identity, SignatureProof } from '../kernel-core/L0/Ontology.js';
import type { Env } from '../kernel-core/Env.js';
import type { ITokenContract } from '../Platform/LedgerHost.js';
import { AuthEngine, identityKey, fromStoredIdentity, toStoredIdentity, resolveSigner } from '../kernel-core/L1/Identity.js';
import { UninitializedGuard, enforce } from '../kernel-core/L0/Guards.js';
import { requireAmount, requireIdentity } from '../kernel-core/L0/Primitives.js';
import { ErrorCode, KernelError } from '../kernel-core/Errors.js';

/** Names signed into token authorization payloads. */
export const TokenFunction = {
    MINT: 'mint',
    APPROVE: 'approve',
    TRANSFER: 'transfer',
    TRANSFER_FROM: 'transferFrom'
} as const;

const ADMIN_KEY = 'Admin';
const balanceKey = (id: Identity) => `Balance:${identityKey(id)}`;
const allowanceKey = (from: Identity, spender: Identity) => `Allowance:${identityKey(from)}:${identityKey(spender)}`;

/**
 * Reference Fungible Token
 * Balances and allowances keyed by identity. Every authenticated call
 * goes through the same replay protection as the ledger, in the token's
 * own namespace.
 */
export class Token implements ITokenContract {
    public initialize(env: Env, admin: Identity): void {
        enforce(UninitializedGuard({ initialized: env.storage.has(ADMIN_KEY) }));
        env.storage.set(ADMIN_KEY, toStoredIdentity(requireIdentity(admin)));
    }

    public mint(env: Env, proof: SignatureProof, nonce: bigint, to: Identity, amount: Amount): void {
        const recipient = requireIdentity(to);
        requireAmount(amount, 'Amount');

        AuthEngine.checkAdmin(env, proof, this.admin(env));
        AuthEngine.verifyAndConsumeNonce(env, proof, nonce, TokenFunction.MINT, [recipient, amount]);

        this.credit(env, recipient, amount);
    }

    public approve(env: Env, proof: SignatureProof, nonce: bigint, spender: Identity, amount: Amount): void {
        const spenderId = requireIdentity(spender);
        requireAmount(amount, 'Amount');

        AuthEngine.verifyAndConsumeNonce(env, proof, nonce, TokenFunction.APPROVE, [spenderId, amount]);
        env.storage.set(allowanceKey(resolveSigner(env, proof), spenderId), amount);
    }

    public allowance(env: Env, from: Identity, spender: Identity): Amount {
        return this.readAmount(env, allowanceKey(requireIdentity(from), requireIdentity(spender)));
    }

    public balanceOf(env: Env, id: Identity): Amount {
        return this.readAmount(env, balanceKey(requireIdentity(id)));
    }

    public transfer(env: Env, proof: SignatureProof, nonce: bigint, to: Identity, amount: Amount): void {
        const recipient = requireIdentity(to);
        requireAmount(amount, 'Amount');

        AuthEngine.verifyAndConsumeNonce(env, proof, nonce, TokenFunction.TRANSFER, [recipient, amount]);

        const sender = resolveSigner(env, proof);
        this.debit(env, sender, amount);
        this.credit(env, recipient, amount);
    }

    /** The signer of `proof` is the spender; it must hold an allowance from `from`. */
    public transferFrom(env: Env, proof: SignatureProof, nonce: bigint, from: Identity, to: Identity, amount: Amount): void {
        const owner = requireIdentity(from);
        const recipient = requireIdentity(to);
        requireAmount(amount, 'Amount');

        AuthEngine.verifyAndConsumeNonce(env, proof, nonce, TokenFunction.TRANSFER_FROM, [owner, recipient, amount]);

        const spender = resolveSigner(env, proof);
        const key = allowanceKey(owner, spender);
        const allowed = this.readAmount(env, key);
        if (allowed < amount) {
            throw new KernelError(ErrorCode.TRANSFER_FAILED, `Allowance ${allowed} is below ${amount}`, {
                owner: identityKey(owner),
                spender: identityKey(spender)
            });
        }

        env.storage.set(key, allowed - amount);
        this.debit(env, owner, amount);
        this.credit(env, recipient, amount);
    }

    private admin(env: Env): Identity {
        const admin = fromStoredIdentity(env.storage.get(ADMIN_KEY));
        if (!admin) throw new KernelError(ErrorCode.NOT_INITIALIZED, `Token ${env.contractId} is not initialized`);
        return admin;
    }

    private debit(env: Env, id: Identity, amount: Amount) {
        const balance = this.readAmount(env, balanceKey(id));
        if (balance < amount) {
            throw new KernelError(ErrorCode.TRANSFER_FAILED, `Balance ${balance} is below ${amount}`, {
                owner: identityKey(id)
            });
        }
        env.storage.set(balanceKey(id), balance - amount);
    }

    private credit(env: Env, id: Identity, amount: Amount) {
        env.storage.set(balanceKey(id), this.readAmount(env, balanceKey(id)) + amount);
    }

    private readAmount(env: Env, key: string): Amount {
        const raw = env.storage.get(key);
        if (raw === undefined) return 0n;
        if (typeof raw !== 'bigint') throw new KernelError(ErrorCode.CORRUPT_STATE, `Stored value under ${key} is malformed`);
        return raw;
    }
}
