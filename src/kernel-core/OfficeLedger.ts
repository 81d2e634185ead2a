import type {
    AdminAuth, Amount, AuctionRef, AuctionTerms, Identity, OfficeID, OfficeView, TokenRef
} from './L0/Ontology.js';
import type { Env } from './Env.js';
import { OfficeStorage } from './L2/OfficeStorage.js';
import { AuthEngine } from './L1/Identity.js';
import { AuctionAdapter } from './L4/Auction.js';
import { TokenAdapter } from './L4/Token.js';
import { UninitializedGuard, VacancyGuard, BidGuard, ExpiryGuard, enforce } from './L0/Guards.js';
import {
    RENEWAL_PERIOD, OFFICE_ID_BYTES, CONTRACT_ID_BYTES,
    addTime, requireHex, requireAmount, requireIdentity
} from './L0/Primitives.js';
import { ErrorCode, KernelError } from './Errors.js';

/** Names signed into admin authorization payloads. */
export const LedgerFunction = {
    NEW_OFFICE: 'newOffice',
    REVOKE: 'revoke'
} as const;

/**
 * Office Lifecycle State Machine
 *
 *             newOffice            buy (bid accepted)
 *   (vacant) ───────────► FOR_SALE ──────────────────► BOUGHT ◄─┐
 *                            ▲                           │  │   │ payTax
 *                            │      revoke (expired)     │  └───┘ (+1 week)
 *                            └───────────────────────────┘
 *
 * Stateless: every fact lives in `env.storage`. Each method is one atomic
 * operation; the host discards all of its writes if it throws.
 */
export class OfficeLedger {
    // --- Configuration ---

    public initialize(env: Env, admin: Identity, token: TokenRef, taxRate: Amount): void {
        const storage = new OfficeStorage(env);
        const adminId = requireIdentity(admin);
        const tokenRef = requireHex(token, CONTRACT_ID_BYTES, 'Token reference');
        requireAmount(taxRate, 'Tax rate');

        enforce(UninitializedGuard({ initialized: storage.hasAdministrator() }));

        storage.writeAdministrator(adminId);
        storage.writeTokenId(tokenRef);
        storage.writeTax(taxRate);
    }

    /** The administrator's next expected nonce. */
    public nonce(env: Env): bigint {
        const storage = new OfficeStorage(env);
        return AuthEngine.readNonce(env, storage.readAdministrator());
    }

    public administrator(env: Env): Identity {
        return new OfficeStorage(env).readAdministrator();
    }

    public taxRate(env: Env): Amount {
        const storage = new OfficeStorage(env);
        storage.readAdministrator();
        return storage.readTax();
    }

    public vaultBalance(env: Env): Amount {
        return TokenAdapter.vaultBalance(env);
    }

    // --- Lifecycle ---

    /** (vacant) → FOR_SALE */
    public newOffice(env: Env, auth: AdminAuth, officeId: OfficeID, auction: AuctionRef, terms: AuctionTerms): void {
        const id = requireHex(officeId, OFFICE_ID_BYTES, 'Office id');
        const ref = requireHex(auction, CONTRACT_ID_BYTES, 'Auction reference');
        requireTerms(terms);

        const storage = new OfficeStorage(env);
        AuthEngine.checkAdmin(env, auth.sig, storage.readAdministrator());
        AuthEngine.verifyAndConsumeNonce(env, auth.sig, auth.nonce, LedgerFunction.NEW_OFFICE, [
            id, ref, terms.startPrice, terms.minPrice, terms.slope
        ]);

        enforce(VacancyGuard({ officeId: id, forSale: storage.hasForSale(id), bought: storage.hasBought(id) }));

        this.openAuction(env, storage, id, ref, terms);
    }

    /** FOR_SALE → BOUGHT, when the auction accepts the bid. */
    public buy(env: Env, officeId: OfficeID, buyer: Identity): void {
        const id = requireHex(officeId, OFFICE_ID_BYTES, 'Office id');
        const holder = requireIdentity(buyer);

        const storage = new OfficeStorage(env);
        storage.readAdministrator();
        const listing = storage.readForSale(id);
        if (!listing) throw new KernelError(ErrorCode.NOT_FOR_SALE, `Office ${id} is not for sale`, { officeId: id });

        const accepted = AuctionAdapter.bid(env, listing.auction, holder);
        enforce(BidGuard({ accepted, officeId: id }));

        storage.removeForSale(id);
        storage.putBought(id, {
            holder,
            expiresAt: addTime(env.now, RENEWAL_PERIOD),
            lastRenewedAt: env.now
        });
    }

    /**
     * BOUGHT → BOUGHT, one more renewal period. Anyone may pay for any
     * office. Expiry is extended even when it already lies in the past.
     */
    public payTax(env: Env, officeId: OfficeID, payer: Identity): void {
        const id = requireHex(officeId, OFFICE_ID_BYTES, 'Office id');
        const from = requireIdentity(payer);

        const storage = new OfficeStorage(env);
        TokenAdapter.collectTax(env, from, storage.readTax());

        const office = storage.readBought(id);
        if (!office) throw new KernelError(ErrorCode.NOT_FOUND, `Office ${id} has no holder`, { officeId: id });

        storage.putBought(id, {
            holder: office.holder,
            expiresAt: addTime(office.expiresAt, RENEWAL_PERIOD),
            lastRenewedAt: env.now
        });
    }

    public getPrice(env: Env, officeId: OfficeID): Amount {
        const id = requireHex(officeId, OFFICE_ID_BYTES, 'Office id');

        const storage = new OfficeStorage(env);
        storage.readAdministrator();
        const listing = storage.readForSale(id);
        if (!listing) throw new KernelError(ErrorCode.NOT_FOR_SALE, `Office ${id} is not for sale`, { officeId: id });

        return AuctionAdapter.currentPrice(env, listing.auction);
    }

    /** BOUGHT → FOR_SALE under a fresh auction, strictly after expiry. */
    public revoke(env: Env, auth: AdminAuth, officeId: OfficeID, auction: AuctionRef, terms: AuctionTerms): void {
        const id = requireHex(officeId, OFFICE_ID_BYTES, 'Office id');
        const ref = requireHex(auction, CONTRACT_ID_BYTES, 'Auction reference');
        requireTerms(terms);

        const storage = new OfficeStorage(env);
        AuthEngine.checkAdmin(env, auth.sig, storage.readAdministrator());
        AuthEngine.verifyAndConsumeNonce(env, auth.sig, auth.nonce, LedgerFunction.REVOKE, [
            id, ref, terms.startPrice, terms.minPrice, terms.slope
        ]);

        const office = storage.readBought(id);
        if (!office) throw new KernelError(ErrorCode.NOT_FOUND, `Office ${id} has no holder`, { officeId: id });
        enforce(ExpiryGuard({ now: env.now, expiresAt: office.expiresAt }));

        storage.removeBought(id);
        this.openAuction(env, storage, id, ref, terms);
    }

    // --- Queries ---

    public getOffice(env: Env, officeId: OfficeID): OfficeView {
        const id = requireHex(officeId, OFFICE_ID_BYTES, 'Office id');
        const storage = new OfficeStorage(env);
        storage.readAdministrator();

        const listing = storage.readForSale(id);
        if (listing) return { state: 'FOR_SALE', auction: listing.auction };

        const office = storage.readBought(id);
        if (office) return { state: 'BOUGHT', ...office };

        return { state: 'VACANT' };
    }

    private openAuction(env: Env, storage: OfficeStorage, id: OfficeID, ref: AuctionRef, terms: AuctionTerms) {
        AuctionAdapter.createAuction(env, ref, terms);
        storage.putForSale(id, { auction: ref });
    }
}

function requireTerms(terms: AuctionTerms): void {
    requireAmount(terms.startPrice, 'Start price');
    requireAmount(terms.minPrice, 'Minimum price');
    if (terms.slope <= 0n) {
        throw new KernelError(ErrorCode.INVALID_ARGUMENT, 'Slope must be positive', { slope: terms.slope.toString() });
    }
}
