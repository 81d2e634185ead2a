import type { Amount, Identity, TimeStamp, TokenRef } from '../kernel-core/L0/Ontology.js';
import type { Env } from '../kernel-core/Env.js';
import type { IAuctionContract } from '../Platform/LedgerHost.js';
import { fromStoredIdentity, toStoredIdentity } from '../kernel-core/L1/Identity.js';
import { UninitializedGuard, enforce } from '../kernel-core/L0/Guards.js';
import { ErrorCode, KernelError, isKernelError } from '../kernel-core/Errors.js';

interface AuctionState {
    seller: Identity;
    token: TokenRef;
    startPrice: Amount;
    minPrice: Amount;
    slope: bigint;
    startedAt: TimeStamp;
}

const Key = {
    STATE: 'Auction',
    CLOSED: 'Closed'
} as const;

/**
 * Reference Dutch Auction
 *
 *   price(t) = max(minPrice, startPrice - (t - startedAt) / slope)
 *
 * One instance per reference. The first accepted bid pays the seller
 * and closes the auction.
 */
export class DutchAuction implements IAuctionContract {
    public initialize(env: Env, seller: Identity, token: TokenRef, startPrice: Amount, minPrice: Amount, slope: bigint): void {
        enforce(UninitializedGuard({ initialized: env.storage.has(Key.STATE) }));
        if (slope <= 0n) throw new KernelError(ErrorCode.INVALID_ARGUMENT, 'Slope must be positive');

        env.storage.set(Key.STATE, {
            seller: toStoredIdentity(seller),
            token,
            startPrice,
            minPrice,
            slope,
            startedAt: env.now
        });
    }

    public getPrice(env: Env): Amount {
        return priceAt(this.read(env), env.now);
    }

    /** false when closed or when the buyer cannot pay; never throws for a rejected payment. */
    public buy(env: Env, buyer: Identity): boolean {
        const state = this.read(env);
        if (env.storage.get(Key.CLOSED) === true) return false;

        const price = priceAt(state, env.now);
        try {
            env.token(state.token).transferFrom({ type: 'INVOKER' }, 0n, buyer, state.seller, price);
        } catch (e) {
            if (isKernelError(e, ErrorCode.TRANSFER_FAILED)) return false;
            throw e;
        }

        env.storage.set(Key.CLOSED, true);
        return true;
    }

    private read(env: Env): AuctionState {
        const raw = env.storage.get(Key.STATE);
        if (raw === undefined) {
            throw new KernelError(ErrorCode.NOT_INITIALIZED, `Auction ${env.contractId} is not initialized`);
        }
        if (raw === null || typeof raw !== 'object' || Array.isArray(raw)) {
            throw new KernelError(ErrorCode.CORRUPT_STATE, `Malformed auction state at ${env.contractId}`);
        }

        const { seller, token, startPrice, minPrice, slope, startedAt } = raw;
        const sellerId = fromStoredIdentity(seller);
        if (
            !sellerId || typeof token !== 'string' ||
            typeof startPrice !== 'bigint' || typeof minPrice !== 'bigint' ||
            typeof slope !== 'bigint' || typeof startedAt !== 'bigint'
        ) {
            throw new KernelError(ErrorCode.CORRUPT_STATE, `Malformed auction state at ${env.contractId}`);
        }
        return { seller: sellerId, token, startPrice, minPrice, slope, startedAt };
    }
}

export function priceAt(state: Pick<AuctionState, 'startPrice' | 'minPrice' | 'slope' | 'startedAt'>, now: TimeStamp): Amount {
    const elapsed = now > state.startedAt ? now - state.startedAt : 0n;
    const decayed = state.startPrice - elapsed / state.slope;
    return decayed > state.minPrice ? decayed : state.minPrice;
}
