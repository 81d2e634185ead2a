// src/kernel-core/L0/Crypto.ts
import { createHash } from 'crypto';
import * as ed from '@noble/ed25519';

// The sync Ed25519 API needs a synchronous SHA-512.
ed.utils.sha512Sync = (...messages: Uint8Array[]) =>
    createHash('sha512').update(Buffer.concat(messages)).digest();

// 1.1 Hash Function (SHA-256)
export function hash(data: string): string {
    return createHash('sha256').update(data).digest('hex');
}

/**
 * Deterministic JSON: object keys sorted, bigints as decimal strings.
 * Used for authorization payloads and evidence hashing.
 */
export function canonicalize(value: unknown): string {
    return JSON.stringify(normalize(value));
}

function normalize(value: unknown): unknown {
    if (typeof value === 'bigint') return value.toString();
    if (Array.isArray(value)) return value.map(normalize);
    if (value !== null && typeof value === 'object') {
        const out: Record<string, unknown> = {};
        for (const key of Object.keys(value).sort()) {
            out[key] = normalize(Reflect.get(value, key));
        }
        return out;
    }
    return value;
}

// 1.2 Digital Signatures (Ed25519, hex encoded)
export type Ed25519PublicKey = string;
export type Ed25519PrivateKey = string;
export type Signature = string;

export interface KeyPair {
    publicKey: Ed25519PublicKey;
    privateKey: Ed25519PrivateKey;
}

export function generateKeyPair(): KeyPair {
    const privateKey = ed.utils.randomPrivateKey();
    return {
        publicKey: Buffer.from(ed.sync.getPublicKey(privateKey)).toString('hex'),
        privateKey: Buffer.from(privateKey).toString('hex')
    };
}

export function signData(data: string, privateKey: Ed25519PrivateKey): Signature {
    return Buffer.from(ed.sync.sign(Buffer.from(data), privateKey)).toString('hex');
}

export function verifySignature(data: string, signature: Signature, publicKey: Ed25519PublicKey): boolean {
    try {
        return ed.sync.verify(signature, Buffer.from(data), publicKey);
    } catch {
        // Malformed key or signature encoding
        return false;
    }
}
