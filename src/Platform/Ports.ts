import type { TimeStamp } from '../kernel-core/L0/Ontology.js';
import type { Evidence } from '../kernel-core/L5/Audit.js';

/**
 * Persistence Port: Event Store
 * Handles the append-only journal of operation outcomes.
 */
export interface IEventStore {
    append(evidence: Evidence): Promise<void>;
    getHistory(): Promise<Evidence[]>;
    getLatest(): Promise<Evidence | null>;
}

/**
 * Environment Port: Ledger Clock
 * Monotonic seconds; read once per top-level operation.
 */
export interface ISystemClock {
    now(): TimeStamp;
}

export class SystemClock implements ISystemClock {
    public now(): TimeStamp {
        return BigInt(Math.floor(Date.now() / 1000));
    }
}

/** Settable clock for tests and simulations. Never moves backwards. */
export class ManualClock implements ISystemClock {
    constructor(private current: TimeStamp = 0n) { }

    public now(): TimeStamp { return this.current; }

    public set(ts: TimeStamp): void {
        if (ts < this.current) throw new Error(`Clock Error: cannot move from ${this.current} back to ${ts}`);
        this.current = ts;
    }

    public advance(seconds: TimeStamp): void {
        this.set(this.current + seconds);
    }
}
