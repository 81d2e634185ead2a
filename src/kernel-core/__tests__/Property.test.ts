import { describe, test, expect } from '@jest/globals';
import fc from 'fast-check';
import type { Identity } from '../L0/Ontology.js';
import { contract } from '../L1/Identity.js';
import { isKernelError } from '../Errors.js';
import {
    createFixture, seedLedger, approve, auctionRef,
    OFFICE_CONTRACT, INVOKER_AUTH, user1, user2, officeIdentity
} from '../../Platform/__tests__/LedgerFixture.js';

// Generators
const OFFICES = ['01'.repeat(16), '02'.repeat(16)];
const AUCTIONS = 40;

const genOp = fc.oneof(
    fc.record({ kind: fc.constant('newOffice' as const), office: fc.integer({ min: 0, max: 1 }) }),
    fc.record({ kind: fc.constant('buy' as const), office: fc.integer({ min: 0, max: 1 }), buyer: fc.boolean() }),
    fc.record({ kind: fc.constant('payTax' as const), office: fc.integer({ min: 0, max: 1 }) }),
    fc.record({ kind: fc.constant('revoke' as const), office: fc.integer({ min: 0, max: 1 }) }),
    fc.record({ kind: fc.constant('wait' as const), seconds: fc.bigInt({ min: 0n, max: 800_000n }) })
);

describe('Office lifecycle properties', () => {
    test('an office is never both for sale and bought; rejected operations change nothing', () => {
        fc.assert(fc.property(fc.array(genOp, { maxLength: 30 }), ops => {
            const fx = createFixture(1_000_000n);
            seedLedger(fx);
            for (let i = 1; i <= AUCTIONS; i++) {
                for (const holder of [user1, user2]) approve(fx, holder, contract(auctionRef(i)), 1000n);
            }
            for (const holder of [user1, user2]) approve(fx, holder, officeIdentity, 1000n);

            let nextAuction = 1;
            const terms = { startPrice: 10n, minPrice: 1n, slope: 60n };

            for (const op of ops) {
                const before = fx.backing.dump();
                try {
                    switch (op.kind) {
                        case 'newOffice':
                            fx.asOffice(user1, env => fx.office.newOffice(env, INVOKER_AUTH, OFFICES[op.office], auctionRef(nextAuction++), terms));
                            break;
                        case 'buy': {
                            const buyer: Identity = op.buyer ? user1 : user2;
                            fx.asOffice(buyer, env => fx.office.buy(env, OFFICES[op.office], buyer));
                            break;
                        }
                        case 'payTax':
                            fx.asOffice(user2, env => fx.office.payTax(env, OFFICES[op.office], user2));
                            break;
                        case 'revoke':
                            fx.asOffice(user1, env => fx.office.revoke(env, INVOKER_AUTH, OFFICES[op.office], auctionRef(nextAuction++), terms));
                            break;
                        case 'wait':
                            fx.clock.advance(op.seconds);
                            break;
                    }
                } catch (e) {
                    if (!isKernelError(e)) throw e;
                    expect(fx.backing.dump()).toBe(before);
                }

                for (const id of OFFICES) {
                    const forSale = fx.backing.read(`${OFFICE_CONTRACT}/ForSale:${id}`) !== undefined;
                    const bought = fx.backing.read(`${OFFICE_CONTRACT}/Bought:${id}`) !== undefined;
                    expect(forSale && bought).toBe(false);
                }
            }

            // Funds are only moved, never created
            expect(fx.balance(user1) + fx.balance(user2)).toBe(2000n);
        }), { numRuns: 40 });
    });
});
