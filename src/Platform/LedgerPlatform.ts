import type {
    AdminAuth, Amount, AuctionRef, AuctionTerms, ContractID, Identity,
    OfficeID, OfficeView, SignatureProof, TimeStamp, TokenRef
} from '../kernel-core/L0/Ontology.js';
import type { Env } from '../kernel-core/Env.js';
import { OfficeLedger } from '../kernel-core/OfficeLedger.js';
import { AuthEngine, identityKey, sameIdentity } from '../kernel-core/L1/Identity.js';
import { requireIdentity } from '../kernel-core/L0/Primitives.js';
import { ErrorCode, KernelError } from '../kernel-core/Errors.js';
import { AuditLog } from '../kernel-core/L5/Audit.js';
import type { Evidence } from '../kernel-core/L5/Audit.js';
import { Token } from '../Reference/Token.js';
import { LedgerHost } from './LedgerHost.js';
import { translateError } from './Errors.js';

/** Identity of callers the platform cannot attribute (e.g. anonymous HTTP). */
export const ANONYMOUS: Identity = { type: 'ACCOUNT', publicKey: '00'.repeat(32) };

/** Any caller could act for ANONYMOUS, so it may never hold a role. */
function requireAccountable(id: Identity, role: string): Identity {
    const normalized = requireIdentity(id);
    if (sameIdentity(normalized, ANONYMOUS)) {
        throw new KernelError(ErrorCode.INVALID_ARGUMENT, `${role} cannot be the anonymous identity`);
    }
    return normalized;
}

export interface TokenDeployment {
    id: TokenRef;
    code: Token;
}

export interface LedgerPlatformOptions {
    host: LedgerHost;
    contractId: ContractID;
    office: OfficeLedger;
    token?: TokenDeployment;
    audit?: AuditLog;
}

/**
 * LedgerPlatform: the official interface layer.
 * Every command runs as one host invocation, is journaled, and fails
 * with a PlatformError.
 */
export class LedgerPlatform {
    private readonly host: LedgerHost;
    private readonly contractId: ContractID;
    private readonly office: OfficeLedger;
    private readonly tokenDeployment: TokenDeployment | undefined;
    private readonly audit: AuditLog;

    constructor(options: LedgerPlatformOptions) {
        this.host = options.host;
        this.contractId = options.contractId;
        this.office = options.office;
        this.tokenDeployment = options.token;
        this.audit = options.audit ?? new AuditLog();
    }

    public get ContractId(): ContractID { return this.contractId; }

    // --- Commands ---

    public initialize(invoker: Identity, admin: Identity, token: TokenRef, taxRate: Amount): Promise<void> {
        return this.command('initialize', invoker, [admin, token, taxRate],
            env => this.office.initialize(env, requireAccountable(admin, 'Administrator'), token, taxRate));
    }

    public newOffice(invoker: Identity, auth: AdminAuth, officeId: OfficeID, auction: AuctionRef, terms: AuctionTerms): Promise<void> {
        return this.command('newOffice', invoker, [officeId, auction, terms, auth.nonce],
            env => this.office.newOffice(env, auth, officeId, auction, terms));
    }

    public buy(invoker: Identity, officeId: OfficeID, buyer: Identity): Promise<void> {
        return this.command('buy', invoker, [officeId, buyer],
            env => this.office.buy(env, officeId, buyer));
    }

    public payTax(invoker: Identity, officeId: OfficeID, payer: Identity): Promise<void> {
        return this.command('payTax', invoker, [officeId, payer],
            env => this.office.payTax(env, officeId, payer));
    }

    public revoke(invoker: Identity, auth: AdminAuth, officeId: OfficeID, auction: AuctionRef, terms: AuctionTerms): Promise<void> {
        return this.command('revoke', invoker, [officeId, auction, terms, auth.nonce],
            env => this.office.revoke(env, auth, officeId, auction, terms));
    }

    // --- Queries (not journaled) ---

    public nonce(): Promise<bigint> {
        return this.query(this.contractId, env => this.office.nonce(env));
    }

    public getOffice(officeId: OfficeID): Promise<OfficeView> {
        return this.query(this.contractId, env => this.office.getOffice(env, officeId));
    }

    public getPrice(officeId: OfficeID): Promise<Amount> {
        return this.query(this.contractId, env => this.office.getPrice(env, officeId));
    }

    public administrator(): Promise<Identity> {
        return this.query(this.contractId, env => this.office.administrator(env));
    }

    public taxRate(): Promise<Amount> {
        return this.query(this.contractId, env => this.office.taxRate(env));
    }

    public vaultBalance(): Promise<Amount> {
        return this.query(this.contractId, env => this.office.vaultBalance(env));
    }

    // --- Token (reference deployment only) ---

    public initializeToken(invoker: Identity, admin: Identity): Promise<void> {
        const { id, code } = this.token();
        return this.command('token.initialize', invoker, [admin],
            env => code.initialize(env, requireAccountable(admin, 'Token administrator')), id);
    }

    public mint(invoker: Identity, proof: SignatureProof, nonce: bigint, to: Identity, amount: Amount): Promise<void> {
        const { id, code } = this.token();
        return this.command('token.mint', invoker, [to, amount, nonce],
            env => code.mint(env, proof, nonce, to, amount), id);
    }

    public approve(invoker: Identity, proof: SignatureProof, nonce: bigint, spender: Identity, amount: Amount): Promise<void> {
        const { id, code } = this.token();
        return this.command('token.approve', invoker, [spender, amount, nonce],
            env => code.approve(env, proof, nonce, spender, amount), id);
    }

    public transfer(invoker: Identity, proof: SignatureProof, nonce: bigint, to: Identity, amount: Amount): Promise<void> {
        const { id, code } = this.token();
        return this.command('token.transfer', invoker, [to, amount, nonce],
            env => code.transfer(env, proof, nonce, to, amount), id);
    }

    public balanceOf(who: Identity): Promise<Amount> {
        const { id, code } = this.token();
        return this.query(id, env => code.balanceOf(env, who));
    }

    public allowance(from: Identity, spender: Identity): Promise<Amount> {
        const { id, code } = this.token();
        return this.query(id, env => code.allowance(env, from, spender));
    }

    public tokenNonce(who: Identity): Promise<bigint> {
        const { id } = this.token();
        return this.query(id, env => AuthEngine.readNonce(env, who));
    }

    // --- Audit ---

    public getAuditTrail(): Evidence[] {
        return this.audit.getHistory();
    }

    public verifyAudit(): Promise<boolean> {
        return this.audit.verifyChain();
    }

    // --- Execution ---

    private async command(
        operation: string,
        invoker: Identity,
        args: readonly unknown[],
        fn: (env: Env) => void,
        target: ContractID = this.contractId
    ): Promise<void> {
        let timestamp: TimeStamp;
        try {
            timestamp = this.host.invoke(target, invoker, env => {
                fn(env);
                return env.now;
            });
        } catch (e) {
            const error = translateError(e);
            console.warn(`[Ledger] ${operation} rejected: ${error.message}`);
            await this.journal(operation, invoker, args, this.host.time(), error.code);
            throw error;
        }

        console.log(`[Ledger] ${operation} committed at ${timestamp}`);
        await this.journal(operation, invoker, args, timestamp);
    }

    private async query<R>(target: ContractID, fn: (env: Env) => R): Promise<R> {
        try {
            return this.host.invoke(target, ANONYMOUS, fn);
        } catch (e) {
            throw translateError(e);
        }
    }

    private async journal(operation: string, invoker: Identity, args: readonly unknown[], timestamp: TimeStamp, code?: string) {
        try {
            await this.audit.append({
                operation,
                invoker: identityKey(invoker),
                args,
                status: code ? 'REJECTED' : 'COMMITTED',
                timestamp,
                ...(code ? { code } : {})
            });
        } catch (e) {
            console.error(`[Ledger] Audit append failed for ${operation}:`, e);
            throw translateError(e);
        }
    }

    private token(): TokenDeployment {
        if (!this.tokenDeployment) throw translateError(new Error('No reference token is deployed on this platform'));
        return this.tokenDeployment;
    }
}
