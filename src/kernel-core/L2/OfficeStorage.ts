import type { Identity, OfficeID, ForSaleRecord, OfficeRecord, TokenRef, Amount } from '../L0/Ontology.js';
import type { IStateStore, StoredValue } from './State.js';
import type { Env } from '../Env.js';
import { toStoredIdentity, fromStoredIdentity } from '../L1/Identity.js';
import { ErrorCode, KernelError } from '../Errors.js';

/**
 * Office Ledger Storage Layout
 *
 *   Admin              → Identity          (write-once)
 *   TokenId            → TokenRef          (write-once)
 *   Tax                → Amount            (write-once)
 *   ForSale:<officeId> → ForSaleRecord
 *   Bought:<officeId>  → OfficeRecord
 *   Nonce:<identity>   → bigint            (owned by AuthEngine)
 */
export type DataKey =
    | { type: 'Admin' }
    | { type: 'TokenId' }
    | { type: 'Tax' }
    | { type: 'ForSale'; officeId: OfficeID }
    | { type: 'Bought'; officeId: OfficeID };

export function keyOf(key: DataKey): string {
    switch (key.type) {
        case 'ForSale':
        case 'Bought':
            return `${key.type}:${key.officeId}`;
        default:
            return key.type;
    }
}

function corrupt(key: DataKey): KernelError {
    return new KernelError(ErrorCode.CORRUPT_STATE, `Stored value under ${keyOf(key)} is malformed`);
}

function isRecord(value: StoredValue | undefined): value is { [key: string]: StoredValue } {
    return value !== undefined && value !== null && typeof value === 'object' && !Array.isArray(value);
}

export class OfficeStorage {
    private readonly store: IStateStore;

    constructor(env: Pick<Env, 'storage'>) {
        this.store = env.storage;
    }

    // --- Configuration (write-once) ---

    public hasAdministrator(): boolean {
        return this.store.has(keyOf({ type: 'Admin' }));
    }

    /** Fails NOT_INITIALIZED before `initialize`. */
    public readAdministrator(): Identity {
        const key: DataKey = { type: 'Admin' };
        const raw = this.store.get(keyOf(key));
        if (raw === undefined) throw new KernelError(ErrorCode.NOT_INITIALIZED, 'Ledger is not initialized');
        const id = fromStoredIdentity(raw);
        if (!id) throw corrupt(key);
        return id;
    }

    public writeAdministrator(id: Identity): void {
        this.store.set(keyOf({ type: 'Admin' }), toStoredIdentity(id));
    }

    public readTokenId(): TokenRef {
        const key: DataKey = { type: 'TokenId' };
        const raw = this.store.get(keyOf(key));
        if (raw === undefined) throw new KernelError(ErrorCode.NOT_INITIALIZED, 'Ledger is not initialized');
        if (typeof raw !== 'string') throw corrupt(key);
        return raw;
    }

    public writeTokenId(token: TokenRef): void {
        this.store.set(keyOf({ type: 'TokenId' }), token);
    }

    public readTax(): Amount {
        const key: DataKey = { type: 'Tax' };
        const raw = this.store.get(keyOf(key));
        if (raw === undefined) throw new KernelError(ErrorCode.NOT_INITIALIZED, 'Ledger is not initialized');
        if (typeof raw !== 'bigint') throw corrupt(key);
        return raw;
    }

    public writeTax(amount: Amount): void {
        this.store.set(keyOf({ type: 'Tax' }), amount);
    }

    // --- ForSale ---

    public hasForSale(officeId: OfficeID): boolean {
        return this.store.has(keyOf({ type: 'ForSale', officeId }));
    }

    public readForSale(officeId: OfficeID): ForSaleRecord | undefined {
        const key: DataKey = { type: 'ForSale', officeId };
        const raw = this.store.get(keyOf(key));
        if (raw === undefined) return undefined;
        if (!isRecord(raw)) throw corrupt(key);
        const { auction } = raw;
        if (typeof auction !== 'string') throw corrupt(key);
        return { auction };
    }

    public putForSale(officeId: OfficeID, record: ForSaleRecord): void {
        this.store.set(keyOf({ type: 'ForSale', officeId }), { auction: record.auction });
    }

    public removeForSale(officeId: OfficeID): void {
        this.store.remove(keyOf({ type: 'ForSale', officeId }));
    }

    // --- Bought ---

    public hasBought(officeId: OfficeID): boolean {
        return this.store.has(keyOf({ type: 'Bought', officeId }));
    }

    public readBought(officeId: OfficeID): OfficeRecord | undefined {
        const key: DataKey = { type: 'Bought', officeId };
        const raw = this.store.get(keyOf(key));
        if (raw === undefined) return undefined;
        if (!isRecord(raw)) throw corrupt(key);

        const holder = fromStoredIdentity(raw.holder);
        const { expiresAt, lastRenewedAt } = raw;
        if (!holder || typeof expiresAt !== 'bigint' || typeof lastRenewedAt !== 'bigint') throw corrupt(key);
        return { holder, expiresAt, lastRenewedAt };
    }

    public putBought(officeId: OfficeID, record: OfficeRecord): void {
        this.store.set(keyOf({ type: 'Bought', officeId }), {
            holder: toStoredIdentity(record.holder),
            expiresAt: record.expiresAt,
            lastRenewedAt: record.lastRenewedAt
        });
    }

    public removeBought(officeId: OfficeID): void {
        this.store.remove(keyOf({ type: 'Bought', officeId }));
    }
}
