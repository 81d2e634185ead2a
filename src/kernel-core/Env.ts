import type { ContractID, Identity, TimeStamp, AuctionRef, TokenRef } from './L0/Ontology.js';
import type { IStateStore } from './L2/State.js';
import type { IAuctionModule } from './L4/Auction.js';
import type { ITokenModule } from './L4/Token.js';

/**
 * Execution Environment
 * Everything a module may touch during one call. Supplied by the host;
 * `now` is read once per top-level operation and shared by nested calls.
 */
export interface Env {
    readonly contractId: ContractID;
    readonly invoker: Identity;
    readonly now: TimeStamp;
    /** Scoped to `contractId`, staged for the lifetime of the operation. */
    readonly storage: IStateStore;

    auction(ref: AuctionRef): IAuctionModule;
    token(ref: TokenRef): ITokenModule;
}
