// src/kernel-core/L5/Audit.ts
import { hash, canonicalize } from '../L0/Crypto.js';
import type { IEventStore } from '../../Platform/Ports.js';

export type EvidenceStatus = 'COMMITTED' | 'REJECTED';

// --- Evidence (one per platform command) ---
export interface Evidence {
    evidenceId: string; // sha256 of the canonical tuple
    previousEvidenceId: string; // Chain linkage
    operation: string;
    invoker: string; // identity key
    args: string; // canonical JSON
    status: EvidenceStatus;
    code?: string; // ErrorCode when REJECTED
    timestamp: string; // Ledger seconds, decimal
}

export interface EvidenceInput {
    operation: string;
    invoker: string;
    args: readonly unknown[];
    status: EvidenceStatus;
    code?: string;
    timestamp: bigint;
}

export const GENESIS_HASH = '0'.repeat(64);

export class AuditLog {
    private localChain: Evidence[] = [];
    private pending: Promise<void> = Promise.resolve();

    constructor(private store?: IEventStore) { }

    /** Resumes the chain persisted in `store`. */
    public static async open(store: IEventStore): Promise<AuditLog> {
        const log = new AuditLog(store);
        log.localChain = await store.getHistory();
        return log;
    }

    /**
     * Links the entry synchronously, so concurrent appends keep their call
     * order; persistence is serialized behind the previous write.
     */
    public append(input: EvidenceInput): Promise<Evidence> {
        const previousEvidenceId = this.getTip()?.evidenceId ?? GENESIS_HASH;
        const body = {
            previousEvidenceId,
            operation: input.operation,
            invoker: input.invoker,
            args: canonicalize(input.args),
            status: input.status,
            timestamp: input.timestamp.toString(),
            ...(input.code ? { code: input.code } : {})
        };

        const evidence: Evidence = Object.freeze({ evidenceId: computeHash(body), ...body });
        this.localChain.push(evidence);

        const store = this.store;
        const write = this.pending.then(() => store?.append(evidence));
        this.pending = write.catch(() => undefined);
        return write.then(() => evidence);
    }

    public getHistory(): Evidence[] {
        return [...this.localChain];
    }

    public getTip(): Evidence | undefined {
        return this.localChain[this.localChain.length - 1];
    }

    /** Recomputes every link, from the store when one is attached. */
    public async verifyChain(): Promise<boolean> {
        const history = this.store ? await this.store.getHistory() : this.localChain;
        return verifyEvidence(history);
    }
}

export function verifyEvidence(history: readonly Evidence[]): boolean {
    let prev = GENESIS_HASH;
    for (const entry of history) {
        if (entry.previousEvidenceId !== prev) return false;
        const { evidenceId, ...body } = entry;
        if (computeHash(body) !== evidenceId) return false;
        prev = evidenceId;
    }
    return true;
}

function computeHash(body: Omit<Evidence, 'evidenceId'>): string {
    // [PreviousHash, Operation, Invoker, ArgsHash, Status, Code, Timestamp]
    return hash(canonicalize([
        body.previousEvidenceId,
        body.operation,
        body.invoker,
        hash(body.args),
        body.status,
        body.code ?? '',
        body.timestamp
    ]));
}
