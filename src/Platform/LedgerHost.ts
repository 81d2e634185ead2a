import type { Amount, AuctionRef, ContractID, Identity, SignatureProof, TimeStamp, TokenRef } from '../kernel-core/L0/Ontology.js';
import type { Env } from '../kernel-core/Env.js';
import type { IAuctionModule } from '../kernel-core/L4/Auction.js';
import type { ITokenModule } from '../kernel-core/L4/Token.js';
import type { IBackingStore } from '../kernel-core/L2/State.js';
import { StagedStore, ScopedStore, MemoryBackingStore } from '../kernel-core/L2/State.js';
import { OfficeLedger } from '../kernel-core/OfficeLedger.js';
import { contract } from '../kernel-core/L1/Identity.js';
import { requireHex, CONTRACT_ID_BYTES } from '../kernel-core/L0/Primitives.js';
import { ErrorCode, KernelError } from '../kernel-core/Errors.js';
import type { ISystemClock } from './Ports.js';
import { SystemClock } from './Ports.js';

// --- Hosted Code ---
// Module code is stateless; its state lives in the host store under its id.

export interface IAuctionContract {
    initialize(env: Env, seller: Identity, token: TokenRef, startPrice: Amount, minPrice: Amount, slope: bigint): void;
    buy(env: Env, buyer: Identity): boolean;
    getPrice(env: Env): Amount;
}

export interface ITokenContract {
    transferFrom(env: Env, proof: SignatureProof, nonce: bigint, from: Identity, to: Identity, amount: Amount): void;
    balanceOf(env: Env, id: Identity): Amount;
}

export type ContractCode =
    | { kind: 'office'; code: OfficeLedger }
    | { kind: 'auction'; code: IAuctionContract }
    | { kind: 'token'; code: ITokenContract };

export interface LedgerHostOptions {
    clock?: ISystemClock;
    backing?: IBackingStore;
    /** Deploys auction code on first call to an unknown reference. */
    auctionFactory?: () => IAuctionContract;
}

interface Frame {
    stage: StagedStore;
    now: TimeStamp;
    parent?: Frame;
    /** Auctions made by the factory in this frame; registered on commit. */
    deployments: Map<ContractID, IAuctionContract>;
}

/**
 * LedgerHost: runs modules the way a ledger would.
 *  - one top-level invocation = one transaction over the backing store
 *  - time is read once per invocation
 *  - cross-module calls run in a savepoint of the caller's transaction,
 *    with the calling module as invoker
 *  - auctions deployed on demand exist only once the invocation commits
 */
export class LedgerHost {
    private contracts: Map<ContractID, ContractCode> = new Map();
    private readonly clock: ISystemClock;
    private readonly backing: IBackingStore;
    private readonly auctionFactory: (() => IAuctionContract) | undefined;
    private active = false;

    constructor(options: LedgerHostOptions = {}) {
        this.clock = options.clock ?? new SystemClock();
        this.backing = options.backing ?? new MemoryBackingStore();
        this.auctionFactory = options.auctionFactory;
    }

    public deploy(id: ContractID, entry: ContractCode): ContractID {
        const contractId = requireHex(id, CONTRACT_ID_BYTES, 'Contract id');
        if (this.contracts.has(contractId)) {
            throw new KernelError(ErrorCode.ALREADY_INITIALIZED, `Contract ${contractId} is already deployed`);
        }
        this.contracts.set(contractId, entry);
        return contractId;
    }

    public isDeployed(id: ContractID): boolean {
        return this.contracts.has(id.toLowerCase());
    }

    /** Current ledger time, outside any invocation. */
    public time(): TimeStamp {
        return this.clock.now();
    }

    /**
     * Runs `fn` as one atomic operation of `contractId`, invoked by `invoker`.
     * Every write is discarded if it throws.
     */
    public invoke<R>(contractId: ContractID, invoker: Identity, fn: (env: Env) => R): R {
        const id = contractId.toLowerCase();
        if (!this.contracts.has(id)) {
            throw new KernelError(ErrorCode.UNKNOWN_CONTRACT, `No contract deployed at ${id}`);
        }
        if (this.active) {
            throw new Error('Host Error: invocations are serial; use the env clients for nested calls');
        }

        this.active = true;
        const frame: Frame = { stage: new StagedStore(this.backing), now: this.clock.now(), deployments: new Map() };
        try {
            const result = fn(this.envFor(id, invoker, frame));
            frame.stage.commit();
            for (const [ref, code] of frame.deployments) this.contracts.set(ref, { kind: 'auction', code });
            return result;
        } catch (e) {
            frame.stage.discard();
            throw e;
        } finally {
            this.active = false;
        }
    }

    private envFor(contractId: ContractID, invoker: Identity, frame: Frame): Env {
        return {
            contractId,
            invoker,
            now: frame.now,
            storage: new ScopedStore(frame.stage, contractId),
            auction: (ref: AuctionRef) => this.auctionClient(ref, contractId, frame),
            token: (ref: TokenRef) => this.tokenClient(ref, contractId, frame)
        };
    }

    /** Savepoint: the callee's writes merge into the caller's stage only on success. */
    private call<R>(callee: ContractID, caller: ContractID, parent: Frame, fn: (env: Env) => R): R {
        const frame: Frame = { stage: new StagedStore(parent.stage), now: parent.now, parent, deployments: new Map() };
        try {
            const result = fn(this.envFor(callee, contract(caller), frame));
            frame.stage.commit();
            for (const [ref, code] of frame.deployments) parent.deployments.set(ref, code);
            return result;
        } catch (e) {
            frame.stage.discard();
            throw e;
        }
    }

    private auctionClient(ref: AuctionRef, caller: ContractID, frame: Frame): IAuctionModule {
        const id = requireHex(ref, CONTRACT_ID_BYTES, 'Auction reference');
        const code = this.auctionCode(id, frame);
        return {
            initialize: (seller, token, startPrice, minPrice, slope) =>
                this.call(id, caller, frame, env => code.initialize(env, seller, token, startPrice, minPrice, slope)),
            buy: buyer => this.call(id, caller, frame, env => code.buy(env, buyer)),
            getPrice: () => this.call(id, caller, frame, env => code.getPrice(env))
        };
    }

    private tokenClient(ref: TokenRef, caller: ContractID, frame: Frame): ITokenModule {
        const id = requireHex(ref, CONTRACT_ID_BYTES, 'Token reference');
        const code = this.tokenCode(id);
        return {
            transferFrom: (proof, nonce, from, to, amount) =>
                this.call(id, caller, frame, env => code.transferFrom(env, proof, nonce, from, to, amount)),
            balanceOf: who => this.call(id, caller, frame, env => code.balanceOf(env, who))
        };
    }

    private auctionCode(id: ContractID, frame: Frame): IAuctionContract {
        const entry = this.contracts.get(id);
        if (entry?.kind === 'auction') return entry.code;
        if (!entry && this.auctionFactory) {
            for (let f: Frame | undefined = frame; f; f = f.parent) {
                const pending = f.deployments.get(id);
                if (pending) return pending;
            }
            const code = this.auctionFactory();
            frame.deployments.set(id, code);
            return code;
        }
        throw new KernelError(ErrorCode.UNKNOWN_CONTRACT, `No auction deployed at ${id}`);
    }

    private tokenCode(id: ContractID): ITokenContract {
        const entry = this.contracts.get(id);
        if (entry?.kind === 'token') return entry.code;
        throw new KernelError(ErrorCode.UNKNOWN_CONTRACT, `No token deployed at ${id}`);
    }
}
