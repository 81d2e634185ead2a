import type { Amount, AuctionRef, AuctionTerms, Identity, TokenRef } from '../L0/Ontology.js';
import type { Env } from '../Env.js';
import { OfficeStorage } from '../L2/OfficeStorage.js';

/**
 * External Auction Port
 * One Dutch auction instance, bound to its reference by the host.
 */
export interface IAuctionModule {
    initialize(seller: Identity, token: TokenRef, startPrice: Amount, minPrice: Amount, slope: bigint): void;
    /** true when the bid was accepted and paid. */
    buy(buyer: Identity): boolean;
    /** Live, time-decayed price. */
    getPrice(): Amount;
}

/**
 * Auction Adapter: pure delegation. Owns no state, never retries,
 * never catches: failures abort the calling operation as they are.
 */
export class AuctionAdapter {
    public static createAuction(env: Env, ref: AuctionRef, terms: AuctionTerms): void {
        const storage = new OfficeStorage(env);
        env.auction(ref).initialize(
            storage.readAdministrator(),
            storage.readTokenId(),
            terms.startPrice,
            terms.minPrice,
            terms.slope
        );
    }

    public static bid(env: Env, ref: AuctionRef, buyer: Identity): boolean {
        return env.auction(ref).buy(buyer);
    }

    public static currentPrice(env: Env, ref: AuctionRef): Amount {
        return env.auction(ref).getPrice();
    }
}
