import express from 'express';
import type { Request, Response } from 'express';
import bodyParser from 'body-parser';
import cors from 'cors';
import type { Server } from 'http';
import { ErrorCode } from '../kernel-core/Errors.js';
import { ANONYMOUS } from '../Platform/LedgerPlatform.js';
import type { LedgerPlatform } from '../Platform/LedgerPlatform.js';
import { translateError } from '../Platform/Errors.js';
import { loadConfig } from '../Platform/Config.js';
import { createLedger } from '../Platform/Bootstrap.js';
import {
    asFields, readString, readBigInt, readIdentity, readProof, readAuth, readTerms,
    identityFromQuery, bigintReplacer
} from './Codec.js';

const STATUS: Partial<Record<string, number>> = {
    [ErrorCode.UNAUTHORIZED]: 401,
    [ErrorCode.INCORRECT_NONCE]: 401,
    [ErrorCode.INVOKER_NONCE_MISMATCH]: 401,
    [ErrorCode.NOT_FOUND]: 404,
    [ErrorCode.NOT_FOR_SALE]: 404,
    [ErrorCode.DUPLICATE_ID]: 409,
    [ErrorCode.ALREADY_INITIALIZED]: 409,
    [ErrorCode.NOT_EXPIRED]: 409,
    [ErrorCode.BID_REJECTED]: 409,
    [ErrorCode.TRANSFER_FAILED]: 402,
    [ErrorCode.INVALID_ARGUMENT]: 400
};

export function statusFor(code: string): number {
    return STATUS[code] ?? 500;
}

type Handler = (req: Request, res: Response) => Promise<void>;

export class LedgerServer {
    private app: express.Express;
    private server: Server | undefined;

    constructor(private platform: LedgerPlatform, private port: number = 3000, private host: string = 'localhost') {
        this.app = express();
        this.app.set('json replacer', bigintReplacer);
        this.app.use(cors());
        this.app.use(bodyParser.json());
        this.setupRoutes();
    }

    public get App(): express.Express { return this.app; }

    /** Resolves with the bound port (useful with port 0). */
    public start(): Promise<number> {
        return new Promise((resolve, reject) => {
            const server = this.app.listen(this.port, this.host, () => {
                const address = server.address();
                const port = typeof address === 'object' && address !== null ? address.port : this.port;
                console.log(`[LedgerServer] Listening on ${this.host}:${port}`);
                resolve(port);
            });
            server.on('error', reject);
            this.server = server;
        });
    }

    public stop(): Promise<void> {
        return new Promise((resolve, reject) => {
            if (!this.server) return resolve();
            this.server.close(err => (err ? reject(err) : resolve()));
            this.server = undefined;
        });
    }

    private route(handler: Handler) {
        return (req: Request, res: Response) => {
            handler(req, res).catch(e => this.fail(res, e));
        };
    }

    private fail(res: Response, e: unknown) {
        const error = translateError(e);
        const status = statusFor(error.code);
        if (status >= 500) console.error(`[LedgerServer] ${error.code}: ${error.message}`);
        res.status(status).json({ error: error.message, code: error.code, ...(error.metadata ? { details: error.metadata } : {}) });
    }

    private setupRoutes() {
        const platform = this.platform;

        this.app.use((req, _res, next) => {
            console.log(`[LedgerServer] ${req.method} ${req.url}`);
            next();
        });

        // --- Ledger ---

        this.app.post('/initialize', this.route(async (req, res) => {
            const body = asFields(req.body);
            await platform.initialize(ANONYMOUS, readIdentity(body, 'admin'), readString(body, 'token'), readBigInt(body, 'taxRate'));
            res.status(201).json({ ok: true });
        }));

        this.app.get('/ledger', this.route(async (_req, res) => {
            res.json({
                contractId: platform.ContractId,
                administrator: await platform.administrator(),
                taxRate: await platform.taxRate(),
                vaultBalance: await platform.vaultBalance()
            });
        }));

        this.app.get('/nonce', this.route(async (_req, res) => {
            res.json({ nonce: await platform.nonce() });
        }));

        // --- Offices ---

        this.app.get('/offices/:id', this.route(async (req, res) => {
            res.json(await platform.getOffice(req.params.id));
        }));

        this.app.get('/offices/:id/price', this.route(async (req, res) => {
            res.json({ price: await platform.getPrice(req.params.id) });
        }));

        this.app.post('/offices', this.route(async (req, res) => {
            const body = asFields(req.body);
            const officeId = readString(body, 'officeId');
            await platform.newOffice(ANONYMOUS, readAuth(body), officeId, readString(body, 'auction'), readTerms(body));
            res.status(201).json(await platform.getOffice(officeId));
        }));

        this.app.post('/offices/:id/buy', this.route(async (req, res) => {
            const body = asFields(req.body);
            await platform.buy(ANONYMOUS, req.params.id, readIdentity(body, 'buyer'));
            res.json(await platform.getOffice(req.params.id));
        }));

        this.app.post('/offices/:id/tax', this.route(async (req, res) => {
            const body = asFields(req.body);
            await platform.payTax(ANONYMOUS, req.params.id, readIdentity(body, 'payer'));
            res.json(await platform.getOffice(req.params.id));
        }));

        this.app.post('/offices/:id/revoke', this.route(async (req, res) => {
            const body = asFields(req.body);
            await platform.revoke(ANONYMOUS, readAuth(body), req.params.id, readString(body, 'auction'), readTerms(body));
            res.json(await platform.getOffice(req.params.id));
        }));

        // --- Reference token ---

        this.app.post('/token/initialize', this.route(async (req, res) => {
            const body = asFields(req.body);
            await platform.initializeToken(ANONYMOUS, readIdentity(body, 'admin'));
            res.status(201).json({ ok: true });
        }));

        this.app.post('/token/mint', this.route(async (req, res) => {
            const body = asFields(req.body);
            await platform.mint(ANONYMOUS, readProof(body, 'proof'), readBigInt(body, 'nonce'), readIdentity(body, 'to'), readBigInt(body, 'amount'));
            res.json({ ok: true });
        }));

        this.app.post('/token/approve', this.route(async (req, res) => {
            const body = asFields(req.body);
            await platform.approve(ANONYMOUS, readProof(body, 'proof'), readBigInt(body, 'nonce'), readIdentity(body, 'spender'), readBigInt(body, 'amount'));
            res.json({ ok: true });
        }));

        this.app.post('/token/transfer', this.route(async (req, res) => {
            const body = asFields(req.body);
            await platform.transfer(ANONYMOUS, readProof(body, 'proof'), readBigInt(body, 'nonce'), readIdentity(body, 'to'), readBigInt(body, 'amount'));
            res.json({ ok: true });
        }));

        this.app.get('/token/balance', this.route(async (req, res) => {
            res.json({ balance: await platform.balanceOf(identityFromQuery(asFields(req.query, 'query'))) });
        }));

        this.app.get('/token/nonce', this.route(async (req, res) => {
            res.json({ nonce: await platform.tokenNonce(identityFromQuery(asFields(req.query, 'query'))) });
        }));

        // --- Audit ---

        this.app.get('/audit', this.route(async (_req, res) => {
            res.json({ entries: platform.getAuditTrail(), valid: await platform.verifyAudit() });
        }));
    }
}

async function main() {
    const config = loadConfig();
    const runtime = await createLedger(config);
    const server = new LedgerServer(runtime.platform, config.port, config.host);
    await server.start();

    process.on('SIGINT', () => {
        server.stop()
            .then(() => runtime.close())
            .catch(e => console.error('[LedgerServer] Shutdown failed:', e))
            .finally(() => process.exit(0));
    });
}

// Start if run directly
if (require.main === module) {
    main().catch(e => {
        console.error('[LedgerServer] Failed to start:', e);
        process.exit(1);
    });
}
