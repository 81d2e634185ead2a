import Database from 'better-sqlite3';
import type { IBackingStore, StoredValue, WriteSet } from '../../kernel-core/L2/State.js';
import { encodeValue, decodeValue } from '../../kernel-core/L2/State.js';

interface StateRow {
    value: string;
}

export class SQLiteStateStore implements IBackingStore {
    private db: Database.Database;
    private readStmt: Database.Statement<[string], StateRow>;
    private upsertStmt: Database.Statement<[string, string]>;
    private deleteStmt: Database.Statement<[string]>;
    private applyAll: (writes: WriteSet) => void;

    constructor(dbPath: string = ':memory:') {
        this.db = new Database(dbPath);
        this.initialize();

        this.readStmt = this.db.prepare<[string], StateRow>('SELECT value FROM ledger_state WHERE key = ?');
        this.upsertStmt = this.db.prepare<[string, string]>(`
            INSERT INTO ledger_state (key, value) VALUES (?, ?)
            ON CONFLICT(key) DO UPDATE SET value = excluded.value
        `);
        this.deleteStmt = this.db.prepare<[string]>('DELETE FROM ledger_state WHERE key = ?');

        // All-or-nothing: better-sqlite3 rolls the transaction back on throw.
        this.applyAll = this.db.transaction((writes: WriteSet) => {
            for (const [key, value] of writes) {
                if (value === undefined) this.deleteStmt.run(key);
                else this.upsertStmt.run(key, encodeValue(value));
            }
        });
    }

    private initialize() {
        this.db.pragma('journal_mode = WAL');
        this.db.exec(`
            CREATE TABLE IF NOT EXISTS ledger_state (
                key TEXT PRIMARY KEY,
                value TEXT NOT NULL
            )
        `);
    }

    public read(key: string): StoredValue | undefined {
        const row = this.readStmt.get(key);
        return row ? decodeValue(row.value) : undefined;
    }

    public apply(writes: WriteSet): void {
        if (writes.size === 0) return;
        this.applyAll(writes);
    }

    public close() {
        this.db.close();
    }
}
