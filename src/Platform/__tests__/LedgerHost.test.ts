import { describe, test, expect, beforeEach } from '@jest/globals';
import type { AdminAuth, Identity } from '../../kernel-core/L0/Ontology.js';
import { account, contract, signAuthorization } from '../../kernel-core/L1/Identity.js';
import { generateKeyPair } from '../../kernel-core/L0/Crypto.js';
import { LedgerFunction } from '../../kernel-core/OfficeLedger.js';
import { ErrorCode } from '../../kernel-core/Errors.js';
import { RENEWAL_PERIOD } from '../../kernel-core/L0/Primitives.js';
import { LedgerHost } from '../LedgerHost.js';
import { DutchAuction } from '../../Reference/DutchAuction.js';
import {
    createFixture, seedLedger, approve, auctionRef,
    OFFICE_CONTRACT, TOKEN_CONTRACT, OFFICE_ID, INVOKER_AUTH,
    user1, user2, officeIdentity
} from './LedgerFixture.js';
import type { LedgerFixture } from './LedgerFixture.js';

describe('Ledger Host: full office lifecycle', () => {
    test('sell, renew and re-auction one office', () => {
        const fx = createFixture();
        seedLedger(fx);

        fx.clock.set(1666359075n);
        fx.asOffice(user1, env => fx.office.newOffice(env, INVOKER_AUTH, OFFICE_ID, auctionRef(1), {
            startPrice: 5n, minPrice: 1n, slope: 900n
        }));

        // 1800s later: 5 - 1800 / 900
        fx.clock.set(1666360875n);
        const price = fx.asOffice(user2, env => fx.office.getPrice(env, OFFICE_ID));
        expect(price).toBe(3n);

        approve(fx, user2, contract(auctionRef(1)), price);
        fx.asOffice(user2, env => fx.office.buy(env, OFFICE_ID, user2));
        expect(fx.balance(user1)).toBe(1003n);
        expect(fx.balance(user2)).toBe(997n);
        expect(fx.asOffice(user2, env => fx.office.getOffice(env, OFFICE_ID))).toEqual({
            state: 'BOUGHT',
            holder: user2,
            expiresAt: 1666360875n + RENEWAL_PERIOD,
            lastRenewedAt: 1666360875n
        });

        // One second before expiry
        fx.clock.set(1666965674n);
        approve(fx, user2, officeIdentity, 20n);
        fx.asOffice(user2, env => fx.office.payTax(env, OFFICE_ID, user2));
        expect(fx.balance(user1)).toBe(1023n);
        expect(fx.asOffice(user2, env => fx.office.vaultBalance(env))).toBe(1023n);

        fx.clock.set(1667570476n);
        fx.asOffice(user1, env => fx.office.revoke(env, INVOKER_AUTH, OFFICE_ID, auctionRef(2), {
            startPrice: 50n, minPrice: 5n, slope: 1800n
        }));
        expect(fx.asOffice(user1, env => fx.office.getPrice(env, OFFICE_ID))).toBe(50n);
        expect(fx.asOffice(user1, env => fx.office.getOffice(env, OFFICE_ID))).toEqual({
            state: 'FOR_SALE',
            auction: auctionRef(2)
        });
    });

    test('revoke before expiry is rejected', () => {
        const fx = createFixture(1666359075n);
        seedLedger(fx);
        fx.asOffice(user1, env => fx.office.newOffice(env, INVOKER_AUTH, OFFICE_ID, auctionRef(1), {
            startPrice: 5n, minPrice: 1n, slope: 900n
        }));
        approve(fx, user2, contract(auctionRef(1)), 5n);
        fx.asOffice(user2, env => fx.office.buy(env, OFFICE_ID, user2));

        fx.clock.set(1666359075n + RENEWAL_PERIOD);
        expect(() => fx.asOffice(user1, env => fx.office.revoke(env, INVOKER_AUTH, OFFICE_ID, auctionRef(2), {
            startPrice: 1n, minPrice: 1n, slope: 1n
        }))).toThrow(/NOT_EXPIRED/);
    });

    test('newOffice by a non-administrator is rejected', () => {
        const fx = createFixture(1666359075n);
        seedLedger(fx);
        expect(() => fx.asOffice(user2, env => fx.office.newOffice(env, INVOKER_AUTH, OFFICE_ID, auctionRef(1), {
            startPrice: 5n, minPrice: 1n, slope: 900n
        }))).toThrow(/UNAUTHORIZED/);
    });
});

describe('Ledger Host: atomicity', () => {
    let fx: LedgerFixture;

    beforeEach(() => {
        fx = createFixture(1000n);
        seedLedger(fx);
        fx.asOffice(user1, env => fx.office.newOffice(env, INVOKER_AUTH, OFFICE_ID, auctionRef(1), {
            startPrice: 100n, minPrice: 10n, slope: 1n
        }));
    });

    test('a bid the buyer cannot pay leaves every store untouched', () => {
        const before = fx.backing.dump();
        // No allowance granted to the auction
        expect(() => fx.asOffice(user2, env => fx.office.buy(env, OFFICE_ID, user2))).toThrow(/BID_REJECTED/);
        expect(fx.backing.dump()).toBe(before);
        expect(fx.balance(user2)).toBe(1000n);
    });

    test('tax without allowance fails and keeps the record', () => {
        approve(fx, user2, contract(auctionRef(1)), 100n);
        fx.asOffice(user2, env => fx.office.buy(env, OFFICE_ID, user2));

        const before = fx.backing.dump();
        expect(() => fx.asOffice(user2, env => fx.office.payTax(env, OFFICE_ID, user2))).toThrow(/TRANSFER_FAILED/);
        expect(fx.backing.dump()).toBe(before);
    });

    test('tax on an office nobody holds is refunded by the rollback', () => {
        approve(fx, user2, officeIdentity, 20n);
        const before = fx.backing.dump();
        expect(() => fx.asOffice(user2, env => fx.office.payTax(env, '0e'.repeat(16), user2))).toThrow(/NOT_FOUND/);
        expect(fx.backing.dump()).toBe(before);
        expect(fx.balance(user1)).toBe(1000n);
    });

    test('time is read once per invocation', () => {
        const seen: bigint[] = [];
        fx.asOffice(user1, env => {
            seen.push(env.now);
            fx.clock.advance(50n);
            seen.push(env.now);
        });
        expect(seen).toEqual([1000n, 1000n]);
    });
});

describe('Ledger Host: signed administration', () => {
    const keys = generateKeyPair();
    const admin = account(keys.publicKey);
    const terms = { startPrice: 5n, minPrice: 1n, slope: 900n };
    const signed = (fn: string, nonce: bigint, officeId: string, auction: string): AdminAuth => ({
        sig: signAuthorization(keys.privateKey, keys.publicKey, OFFICE_CONTRACT, fn, nonce,
            [officeId, auction, terms.startPrice, terms.minPrice, terms.slope]),
        nonce
    });

    let fx: LedgerFixture;
    const nonce = () => fx.asOffice(user2, env => fx.office.nonce(env));

    beforeEach(() => {
        fx = createFixture(1000n);
        seedLedger(fx, admin);
        fx.asOffice(user2, env => fx.office.newOffice(env, signed(LedgerFunction.NEW_OFFICE, 0n, OFFICE_ID, auctionRef(1)),
            OFFICE_ID, auctionRef(1), terms));
    });

    test('a nonce consumed by a call that fails a later check is restored', () => {
        expect(nonce()).toBe(1n);

        expect(() => fx.asOffice(user2, env => fx.office.newOffice(env, signed(LedgerFunction.NEW_OFFICE, 1n, OFFICE_ID, auctionRef(2)),
            OFFICE_ID, auctionRef(2), terms))).toThrow(/DUPLICATE_ID/);
        expect(nonce()).toBe(1n);

        const unknown = '0e'.repeat(16);
        expect(() => fx.asOffice(user2, env => fx.office.revoke(env, signed(LedgerFunction.REVOKE, 1n, unknown, auctionRef(2)),
            unknown, auctionRef(2), terms))).toThrow(/NOT_FOUND/);
        expect(nonce()).toBe(1n);

        approve(fx, user2, contract(auctionRef(1)), 5n);
        fx.asOffice(user2, env => fx.office.buy(env, OFFICE_ID, user2));
        expect(() => fx.asOffice(user2, env => fx.office.revoke(env, signed(LedgerFunction.REVOKE, 1n, OFFICE_ID, auctionRef(2)),
            OFFICE_ID, auctionRef(2), terms))).toThrow(/NOT_EXPIRED/);
        expect(nonce()).toBe(1n);
    });

    test('a signed revoke cannot be replayed', () => {
        approve(fx, user2, contract(auctionRef(1)), 5n);
        fx.asOffice(user2, env => fx.office.buy(env, OFFICE_ID, user2));
        fx.clock.set(1000n + RENEWAL_PERIOD + 1n);

        const auth = signed(LedgerFunction.REVOKE, 1n, OFFICE_ID, auctionRef(2));
        fx.asOffice(user2, env => fx.office.revoke(env, auth, OFFICE_ID, auctionRef(2), terms));
        expect(nonce()).toBe(2n);

        expect(() => fx.asOffice(user2, env => fx.office.revoke(env, auth, OFFICE_ID, auctionRef(2), terms)))
            .toThrow(/INCORRECT_NONCE/);
        expect(nonce()).toBe(2n);
    });
});

describe('Ledger Host: wiring', () => {
    test('unknown contracts and references fail', () => {
        const fx = createFixture();
        seedLedger(fx);
        expect(() => fx.host.invoke('cc'.repeat(32), user1, () => 1)).toThrow(/UNKNOWN_CONTRACT/);

        const host = new LedgerHost();
        host.deploy(OFFICE_CONTRACT, { kind: 'office', code: fx.office });
        expect(() => host.invoke(OFFICE_CONTRACT, user1, env => env.auction(auctionRef(1)).getPrice()))
            .toThrow(/UNKNOWN_CONTRACT/);
        expect(() => host.invoke(OFFICE_CONTRACT, user1, env => env.token(TOKEN_CONTRACT)))
            .toThrow(/UNKNOWN_CONTRACT/);
    });

    test('deploying twice at one id is rejected', () => {
        const host = new LedgerHost();
        host.deploy(auctionRef(1), { kind: 'auction', code: new DutchAuction() });
        expect(() => host.deploy(auctionRef(1).toUpperCase(), { kind: 'auction', code: new DutchAuction() }))
            .toThrow(ErrorCode.ALREADY_INITIALIZED);
    });

    test('nested calls run as the calling module, at the same time', () => {
        const fx = createFixture(42n);
        const seen: Identity[] = [];
        fx.host.deploy(auctionRef(3), {
            kind: 'auction',
            code: {
                initialize: () => undefined,
                buy: env => { seen.push(env.invoker); return true; },
                getPrice: env => env.now
            }
        });

        const price = fx.asOffice(user1, env => {
            env.auction(auctionRef(3)).buy(user2);
            return env.auction(auctionRef(3)).getPrice();
        });
        expect(seen).toEqual([officeIdentity]);
        expect(price).toBe(42n);
    });

    test('auctions deployed on demand keep their state under their own id', () => {
        const fx = createFixture();
        seedLedger(fx);
        fx.asOffice(user1, env => env.auction(auctionRef(3)).initialize(user1, TOKEN_CONTRACT, 1n, 1n, 1n));
        expect(fx.host.isDeployed(auctionRef(3))).toBe(true);
        expect(fx.backing.read(`${auctionRef(3)}/Auction`)).toEqual({
            seller: user1,
            token: TOKEN_CONTRACT,
            startPrice: 1n,
            minPrice: 1n,
            slope: 1n,
            startedAt: 0n
        });
    });

    test('an auction deployed by a call that rolls back is not kept', () => {
        const fx = createFixture();
        seedLedger(fx);
        expect(() => fx.asOffice(user1, env => {
            env.auction(auctionRef(4)).initialize(user1, TOKEN_CONTRACT, 1n, 1n, 1n);
            throw new Error('abort');
        })).toThrow('abort');
        expect(fx.host.isDeployed(auctionRef(4))).toBe(false);
        expect(fx.backing.read(`${auctionRef(4)}/Auction`)).toBeUndefined();

        fx.asOffice(user1, env => env.auction(auctionRef(4)).initialize(user1, TOKEN_CONTRACT, 1n, 1n, 1n));
        expect(fx.host.isDeployed(auctionRef(4))).toBe(true);
    });

    test('a call may reuse the auction it deployed before committing', () => {
        const fx = createFixture(7n);
        seedLedger(fx);
        const price = fx.asOffice(user1, env => {
            env.auction(auctionRef(5)).initialize(user1, TOKEN_CONTRACT, 9n, 1n, 1n);
            expect(fx.host.isDeployed(auctionRef(5))).toBe(false);
            return env.auction(auctionRef(5)).getPrice();
        });
        expect(price).toBe(9n);
        expect(fx.host.isDeployed(auctionRef(5))).toBe(true);
    });

    test('invocations do not nest', () => {
        const fx = createFixture();
        expect(() => fx.asOffice(user1, () => fx.asToken(user1, () => 0))).toThrow(/serial/);
    });
});
