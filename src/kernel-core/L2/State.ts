import { produce } from 'immer';

// --- Stored Values ---
// JSON-shaped data with bigint in place of number.
export type StoredValue =
    | null
    | boolean
    | string
    | bigint
    | StoredValue[]
    | { [key: string]: StoredValue };

/**
 * State Store Port
 * No transactions of its own: atomicity comes from the StagedStore
 * wrapped around it for the lifetime of one operation.
 */
export interface IStateStore {
    get(key: string): StoredValue | undefined;
    set(key: string, value: StoredValue): void;
    has(key: string): boolean;
    remove(key: string): void;
}

/** `undefined` marks a removal. */
export type WriteSet = ReadonlyMap<string, StoredValue | undefined>;

/**
 * Persistence Port: what a StagedStore commits into.
 * `apply` must take effect entirely or not at all.
 */
export interface IBackingStore {
    read(key: string): StoredValue | undefined;
    apply(writes: WriteSet): void;
}

// --- Staging (one per operation, one per nested call) ---
export class StagedStore implements IStateStore, IBackingStore {
    private writes: Map<string, StoredValue | undefined> = new Map();
    private closed = false;

    constructor(private backing: IBackingStore) { }

    public get(key: string): StoredValue | undefined {
        this.ensureOpen();
        if (this.writes.has(key)) return this.writes.get(key);
        return this.backing.read(key);
    }

    public has(key: string): boolean {
        return this.get(key) !== undefined;
    }

    public set(key: string, value: StoredValue): void {
        this.ensureOpen();
        this.writes.set(key, value);
    }

    public remove(key: string): void {
        this.ensureOpen();
        this.writes.set(key, undefined);
    }

    // IBackingStore: a nested stage reads through and merges into this one.
    public read(key: string): StoredValue | undefined {
        return this.get(key);
    }

    public apply(writes: WriteSet): void {
        this.ensureOpen();
        for (const [key, value] of writes) {
            this.writes.set(key, value);
        }
    }

    public get pending(): number { return this.writes.size; }

    public commit(): void {
        this.ensureOpen();
        this.backing.apply(this.writes);
        this.close();
    }

    public discard(): void {
        this.close();
    }

    private close() {
        this.writes = new Map();
        this.closed = true;
    }

    private ensureOpen() {
        if (this.closed) throw new Error('State Error: stage already committed or discarded');
    }
}

/** Confines a module to its own key namespace. */
export class ScopedStore implements IStateStore {
    constructor(private inner: IStateStore, private namespace: string) { }

    private scoped(key: string): string { return `${this.namespace}/${key}`; }

    public get(key: string) { return this.inner.get(this.scoped(key)); }
    public set(key: string, value: StoredValue) { this.inner.set(this.scoped(key), value); }
    public has(key: string) { return this.inner.has(this.scoped(key)); }
    public remove(key: string) { this.inner.remove(this.scoped(key)); }
}

// --- Codec ---
const BIGINT_TAG = '$bigint';

export function encodeValue(value: StoredValue): string {
    return JSON.stringify(value, (_key, v: unknown) =>
        typeof v === 'bigint' ? { [BIGINT_TAG]: v.toString() } : v
    );
}

export function decodeValue(text: string): StoredValue {
    return fromJson(JSON.parse(text));
}

function fromJson(raw: unknown): StoredValue {
    if (raw === null || typeof raw === 'boolean' || typeof raw === 'string') return raw;
    if (Array.isArray(raw)) return raw.map(fromJson);
    if (typeof raw === 'object') {
        const tag = Reflect.get(raw, BIGINT_TAG);
        if (typeof tag === 'string' && Object.keys(raw).length === 1) return BigInt(tag);

        const out: { [key: string]: StoredValue } = {};
        for (const key of Object.keys(raw)) {
            out[key] = fromJson(Reflect.get(raw, key));
        }
        return out;
    }
    throw new Error(`State Error: unsupported stored value of type ${typeof raw}`);
}

// --- In-Memory Backing ---
export class MemoryBackingStore implements IBackingStore {
    // Frozen by immer; replaced wholesale on every apply.
    private snapshot: Readonly<Record<string, string>> = {};
    private version = 0;

    public read(key: string): StoredValue | undefined {
        const encoded = this.snapshot[key];
        return encoded === undefined ? undefined : decodeValue(encoded);
    }

    public apply(writes: WriteSet): void {
        if (writes.size === 0) return;
        this.snapshot = produce(this.snapshot, draft => {
            for (const [key, value] of writes) {
                if (value === undefined) delete draft[key];
                else draft[key] = encodeValue(value);
            }
        });
        this.version++;
    }

    public get Version() { return this.version; }

    /** Encoded view, for equality checks across operations. */
    public dump(): Readonly<Record<string, string>> {
        return this.snapshot;
    }
}
