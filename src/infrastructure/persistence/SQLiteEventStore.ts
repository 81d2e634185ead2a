import Database from 'better-sqlite3';
import type { IEventStore } from '../../Platform/Ports.js';
import type { Evidence } from '../../kernel-core/L5/Audit.js';

interface EvidenceRow {
    evidenceId: string;
    previousEvidenceId: string;
    operation: string;
    invoker: string;
    args: string;
    status: string;
    code: string | null;
    timestamp: string;
}

export class SQLiteEventStore implements IEventStore {
    private db: Database.Database;

    constructor(dbPath: string = ':memory:') {
        this.db = new Database(dbPath);
        this.initialize();
    }

    private initialize() {
        this.db.pragma('journal_mode = WAL');
        this.db.exec(`
            CREATE TABLE IF NOT EXISTS audit_log (
                sequence INTEGER PRIMARY KEY AUTOINCREMENT,
                evidenceId TEXT UNIQUE NOT NULL,
                previousEvidenceId TEXT NOT NULL,
                operation TEXT NOT NULL,
                invoker TEXT NOT NULL,
                args TEXT NOT NULL,
                status TEXT NOT NULL,
                code TEXT,
                timestamp TEXT NOT NULL
            )
        `);
    }

    async append(evidence: Evidence): Promise<void> {
        const stmt = this.db.prepare(`
            INSERT INTO audit_log (
                evidenceId, previousEvidenceId, operation, invoker, args, status, code, timestamp
            ) VALUES (
                ?, ?, ?, ?, ?, ?, ?, ?
            )
        `);

        stmt.run(
            evidence.evidenceId,
            evidence.previousEvidenceId,
            evidence.operation,
            evidence.invoker,
            evidence.args,
            evidence.status,
            evidence.code ?? null,
            evidence.timestamp
        );
    }

    async getHistory(): Promise<Evidence[]> {
        const stmt = this.db.prepare<[], EvidenceRow>('SELECT * FROM audit_log ORDER BY sequence ASC');
        return stmt.all().map(row => this.mapRowToEvidence(row));
    }

    async getLatest(): Promise<Evidence | null> {
        const stmt = this.db.prepare<[], EvidenceRow>('SELECT * FROM audit_log ORDER BY sequence DESC LIMIT 1');
        const row = stmt.get();

        if (!row) return null;
        return this.mapRowToEvidence(row);
    }

    private mapRowToEvidence(row: EvidenceRow): Evidence {
        if (row.status !== 'COMMITTED' && row.status !== 'REJECTED') {
            throw new Error(`Audit Error: unknown status '${row.status}' for ${row.evidenceId}`);
        }
        return {
            evidenceId: row.evidenceId,
            previousEvidenceId: row.previousEvidenceId,
            operation: row.operation,
            invoker: row.invoker,
            args: row.args,
            status: row.status,
            timestamp: row.timestamp,
            ...(row.code !== null ? { code: row.code } : {})
        };
    }

    public close() {
        this.db.close();
    }
}
