import type { ContractID, Identity, OfficeID, AuctionRef, TimeStamp } from '../../kernel-core/L0/Ontology.js';
import type { Env } from '../../kernel-core/Env.js';
import { OfficeLedger } from '../../kernel-core/OfficeLedger.js';
import { MemoryBackingStore } from '../../kernel-core/L2/State.js';
import { account, contract } from '../../kernel-core/L1/Identity.js';
import { DutchAuction } from '../../Reference/DutchAuction.js';
import { Token } from '../../Reference/Token.js';
import { LedgerHost } from '../LedgerHost.js';
import { ManualClock } from '../Ports.js';

export const OFFICE_CONTRACT: ContractID = 'aa'.repeat(32);
export const TOKEN_CONTRACT: ContractID = 'bb'.repeat(32);
export const OFFICE_ID: OfficeID = '0f'.repeat(16);

export const tokenAdmin: Identity = account('a0'.repeat(32));
export const user1: Identity = account('a1'.repeat(32));
export const user2: Identity = account('a2'.repeat(32));
export const officeIdentity: Identity = contract(OFFICE_CONTRACT);

/** Deterministic 32-byte auction references: auctionRef(1), auctionRef(2), ... */
export function auctionRef(n: number): AuctionRef {
    return n.toString(16).padStart(64, '0');
}

export const INVOKER_AUTH = { sig: { type: 'INVOKER' as const }, nonce: 0n };

export interface LedgerFixture {
    clock: ManualClock;
    backing: MemoryBackingStore;
    host: LedgerHost;
    office: OfficeLedger;
    token: Token;
    asOffice<R>(invoker: Identity, fn: (env: Env) => R): R;
    asToken<R>(invoker: Identity, fn: (env: Env) => R): R;
    balance(who: Identity): bigint;
}

export function createFixture(start: TimeStamp = 0n): LedgerFixture {
    const clock = new ManualClock(start);
    const backing = new MemoryBackingStore();
    const host = new LedgerHost({ clock, backing, auctionFactory: () => new DutchAuction() });
    const office = new OfficeLedger();
    const token = new Token();
    host.deploy(OFFICE_CONTRACT, { kind: 'office', code: office });
    host.deploy(TOKEN_CONTRACT, { kind: 'token', code: token });

    const asOffice = <R>(invoker: Identity, fn: (env: Env) => R): R => host.invoke(OFFICE_CONTRACT, invoker, fn);
    const asToken = <R>(invoker: Identity, fn: (env: Env) => R): R => host.invoke(TOKEN_CONTRACT, invoker, fn);

    return {
        clock, backing, host, office, token, asOffice, asToken,
        balance: who => asToken(who, env => token.balanceOf(env, who))
    };
}

/**
 * Token initialized by `tokenAdmin`, 1000 minted to user1 and user2,
 * ledger initialized with user1 as administrator and a tax of 20.
 */
export function seedLedger(fx: LedgerFixture, admin: Identity = user1): void {
    fx.asToken(tokenAdmin, env => fx.token.initialize(env, tokenAdmin));
    for (const holder of [user1, user2]) {
        fx.asToken(tokenAdmin, env => fx.token.mint(env, { type: 'INVOKER' }, 0n, holder, 1000n));
    }
    fx.asOffice(admin, env => fx.office.initialize(env, admin, TOKEN_CONTRACT, 20n));
}

export function approve(fx: LedgerFixture, owner: Identity, spender: Identity, amount: bigint): void {
    fx.asToken(owner, env => fx.token.approve(env, { type: 'INVOKER' }, 0n, spender, amount));
}
