import { OfficeLedger } from '../kernel-core/OfficeLedger.js';
import { MemoryBackingStore } from '../kernel-core/L2/State.js';
import type { IBackingStore } from '../kernel-core/L2/State.js';
import { AuditLog } from '../kernel-core/L5/Audit.js';
import { DutchAuction } from '../Reference/DutchAuction.js';
import { Token } from '../Reference/Token.js';
import { SQLiteStateStore } from '../infrastructure/persistence/SQLiteStateStore.js';
import { SQLiteEventStore } from '../infrastructure/persistence/SQLiteEventStore.js';
import { LedgerHost } from './LedgerHost.js';
import { LedgerPlatform } from './LedgerPlatform.js';
import type { ISystemClock } from './Ports.js';
import type { LedgerConfig } from './Config.js';

export interface LedgerRuntime {
    platform: LedgerPlatform;
    host: LedgerHost;
    close(): void;
}

/**
 * Wires one ledger: office module at `contractId`, reference token at
 * `tokenId`, and reference auctions deployed on first use.
 */
export async function createLedger(
    config: Pick<LedgerConfig, 'dbPath' | 'auditDbPath' | 'contractId' | 'tokenId'>,
    clock?: ISystemClock
): Promise<LedgerRuntime> {
    const state = config.dbPath === ':memory:' ? undefined : new SQLiteStateStore(config.dbPath);
    const events = config.auditDbPath ? new SQLiteEventStore(config.auditDbPath) : undefined;
    const backing: IBackingStore = state ?? new MemoryBackingStore();

    const host = new LedgerHost({
        backing,
        auctionFactory: () => new DutchAuction(),
        ...(clock ? { clock } : {})
    });

    const office = new OfficeLedger();
    const token = new Token();
    const contractId = host.deploy(config.contractId, { kind: 'office', code: office });
    const tokenId = host.deploy(config.tokenId, { kind: 'token', code: token });

    const audit = events ? await AuditLog.open(events) : new AuditLog();
    const platform = new LedgerPlatform({ host, contractId, office, token: { id: tokenId, code: token }, audit });

    console.log(`[Ledger] Office ledger at ${contractId}, token at ${tokenId}`);
    return {
        platform,
        host,
        close: () => {
            state?.close();
            events?.close();
        }
    };
}
