import type { Amount, Identity, SignatureProof } from '../L0/Ontology.js';
import type { Env } from '../Env.js';
import { OfficeStorage } from '../L2/OfficeStorage.js';
import { ErrorCode, KernelError, isKernelError } from '../Errors.js';

/**
 * External Token Port
 * One fungible-token instance, bound to its reference by the host.
 */
export interface ITokenModule {
    /** Moves `amount` from `from` to `to` against an allowance granted to the signer of `proof`. */
    transferFrom(proof: SignatureProof, nonce: bigint, from: Identity, to: Identity, amount: Amount): void;
    balanceOf(id: Identity): Amount;
}

export class TokenAdapter {
    /**
     * Pulls the tax from `payer` into the administrator's vault. The ledger
     * itself is the spender, so the payer must have approved it beforehand.
     */
    public static collectTax(env: Env, payer: Identity, amount: Amount): void {
        const storage = new OfficeStorage(env);
        const token = env.token(storage.readTokenId());
        const vault = storage.readAdministrator();

        try {
            token.transferFrom({ type: 'INVOKER' }, 0n, payer, vault, amount);
        } catch (e) {
            if (isKernelError(e)) throw e;
            throw new KernelError(ErrorCode.TRANSFER_FAILED, 'Token module rejected the tax transfer', {
                amount: amount.toString()
            }, { cause: e });
        }
    }

    public static vaultBalance(env: Env): Amount {
        const storage = new OfficeStorage(env);
        return env.token(storage.readTokenId()).balanceOf(storage.readAdministrator());
    }
}
