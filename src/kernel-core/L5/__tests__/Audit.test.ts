import { describe, test, expect, beforeEach } from '@jest/globals';
import { AuditLog, GENESIS_HASH, verifyEvidence } from '../Audit.js';
import type { EvidenceInput } from '../Audit.js';

describe('Audit Log (hash-chained journal)', () => {
    let audit: AuditLog;
    const entry = (operation: string, timestamp: bigint, code?: string): EvidenceInput => ({
        operation,
        invoker: `account:${'a1'.repeat(32)}`,
        args: ['0f'.repeat(16), 5n],
        status: code ? 'REJECTED' : 'COMMITTED',
        timestamp,
        ...(code ? { code } : {})
    });

    beforeEach(() => {
        audit = new AuditLog();
    });

    test('entries link to their predecessor, starting at genesis', async () => {
        const first = await audit.append(entry('newOffice', 10n));
        const second = await audit.append(entry('buy', 20n, 'BID_REJECTED'));

        expect(first.previousEvidenceId).toBe(GENESIS_HASH);
        expect(second.previousEvidenceId).toBe(first.evidenceId);
        expect(second).toMatchObject({ status: 'REJECTED', code: 'BID_REJECTED', timestamp: '20' });
        expect(first.args).toBe(`["${'0f'.repeat(16)}","5"]`);
        expect(Object.isFrozen(first)).toBe(true);
        expect(await audit.verifyChain()).toBe(true);
    });

    test('concurrent appends keep call order', async () => {
        const [a, b, c] = await Promise.all([
            audit.append(entry('a', 1n)),
            audit.append(entry('b', 1n)),
            audit.append(entry('c', 1n))
        ]);
        expect(b.previousEvidenceId).toBe(a.evidenceId);
        expect(c.previousEvidenceId).toBe(b.evidenceId);
        expect(audit.getTip()).toBe(c);
    });

    test('tampering with a field breaks the chain', async () => {
        await audit.append(entry('newOffice', 10n));
        const second = await audit.append(entry('buy', 20n));

        const [first] = audit.getHistory();
        expect(verifyEvidence(audit.getHistory())).toBe(true);
        expect(verifyEvidence([first, { ...second, status: 'REJECTED' }])).toBe(false);
        expect(verifyEvidence([{ ...second, previousEvidenceId: GENESIS_HASH }])).toBe(false);
    });

    test('history is a copy', async () => {
        await audit.append(entry('newOffice', 10n));
        audit.getHistory().pop();
        expect(audit.getHistory()).toHaveLength(1);
    });
});
