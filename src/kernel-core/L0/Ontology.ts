/**
 * OFFICE LEDGER ONTOLOGY
 * The primitives every layer of the ledger speaks in.
 */

// --- 1. Scalars ---
export type Hex = string;
export type ContractID = Hex; // 32 bytes
export type OfficeID = Hex; // 16 bytes
export type AuctionRef = ContractID;
export type TokenRef = ContractID;

/** Arbitrary-precision, non-negative. */
export type Amount = bigint;

/** Ledger seconds since epoch (u64). Compared and added, never subtracted. */
export type TimeStamp = bigint;

// --- 2. Identity ---
export type Identity =
    | { type: 'ACCOUNT'; publicKey: Hex }
    | { type: 'CONTRACT'; contractId: ContractID };

// --- 3. Signature Proofs ---
export type SignatureProof =
    | { type: 'INVOKER' }
    | { type: 'ED25519'; publicKey: Hex; signature: Hex };

export interface AdminAuth {
    sig: SignatureProof;
    nonce: bigint;
}

// --- 4. Office Records ---
export interface ForSaleRecord {
    auction: AuctionRef;
}

export interface OfficeRecord {
    holder: Identity;
    expiresAt: TimeStamp;
    lastRenewedAt: TimeStamp;
}

export type OfficeView =
    | { state: 'VACANT' }
    | { state: 'FOR_SALE'; auction: AuctionRef }
    | { state: 'BOUGHT'; holder: Identity; expiresAt: TimeStamp; lastRenewedAt: TimeStamp };

// --- 5. Auction Parameters ---
export interface AuctionTerms {
    startPrice: Amount;
    minPrice: Amount;
    slope: bigint; // seconds per unit of price decay
}
