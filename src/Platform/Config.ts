import { ZodError, z } from 'zod';
import { isHexOfLength, CONTRACT_ID_BYTES } from '../kernel-core/L0/Primitives.js';

export const DEFAULT_CONTRACT_ID = '01'.repeat(CONTRACT_ID_BYTES);
export const DEFAULT_TOKEN_ID = '02'.repeat(CONTRACT_ID_BYTES);

const contractId = z.string()
    .transform(value => value.toLowerCase())
    .refine(value => isHexOfLength(value, CONTRACT_ID_BYTES), 'must be 32 bytes of hex');

const configSchema = z.object({
    LEDGER_PORT: z.coerce.number().int().min(0).max(65535).default(3000),
    LEDGER_HOST: z.string().min(1).default('localhost'),
    LEDGER_DB_PATH: z.string().min(1).default(':memory:'),
    LEDGER_AUDIT_DB_PATH: z.string().min(1).optional(),
    LEDGER_CONTRACT_ID: contractId.default(DEFAULT_CONTRACT_ID),
    LEDGER_TOKEN_ID: contractId.default(DEFAULT_TOKEN_ID)
});

export interface LedgerConfig {
    port: number;
    host: string;
    dbPath: string;
    auditDbPath: string | undefined;
    contractId: string;
    tokenId: string;
}

export class ConfigValidationError extends Error {
    constructor(public readonly invalid: string[], options?: { cause?: unknown }) {
        super(`Invalid ledger configuration: ${invalid.join(', ')}`, options);
        this.name = 'ConfigValidationError';
    }
}

/** Reads `LEDGER_*` variables; fails fast on the first start-up. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): LedgerConfig {
    try {
        const parsed = configSchema.parse(env);
        return {
            port: parsed.LEDGER_PORT,
            host: parsed.LEDGER_HOST,
            dbPath: parsed.LEDGER_DB_PATH,
            auditDbPath: parsed.LEDGER_AUDIT_DB_PATH,
            contractId: parsed.LEDGER_CONTRACT_ID,
            tokenId: parsed.LEDGER_TOKEN_ID
        };
    } catch (e) {
        if (e instanceof ZodError) {
            throw new ConfigValidationError(e.issues.map(issue => issue.path.join('.')), { cause: e });
        }
        throw e;
    }
}
