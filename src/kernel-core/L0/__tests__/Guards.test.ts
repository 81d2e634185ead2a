import { describe, test, expect } from '@jest/globals';
import {
    UninitializedGuard, AdminGuard, InvokerNonceGuard, NonceGuard,
    VacancyGuard, ExpiryGuard, BidGuard, SignatureGuard, enforce
} from '../Guards.js';
import { addTime, requireHex, requireAmount, requireIdentity, U64_MAX, RENEWAL_PERIOD } from '../Primitives.js';
import { generateKeyPair, signData, canonicalize } from '../Crypto.js';
import { ErrorCode, KernelError, isKernelError } from '../../Errors.js';

describe('Guards', () => {
    test('pass results carry no violation', () => {
        expect(UninitializedGuard({ initialized: false })).toEqual({ ok: true });
        expect(AdminGuard({ signer: 'account:1', admin: 'account:1' })).toEqual({ ok: true });
        expect(InvokerNonceGuard({ nonce: 0n })).toEqual({ ok: true });
        expect(VacancyGuard({ officeId: 'x', forSale: false, bought: false })).toEqual({ ok: true });
        expect(BidGuard({ accepted: true, officeId: 'x' })).toEqual({ ok: true });
    });

    test('each failure maps to its error code', () => {
        expect(UninitializedGuard({ initialized: true })).toMatchObject({ ok: false, code: ErrorCode.ALREADY_INITIALIZED });
        expect(AdminGuard({ signer: 'account:2', admin: 'account:1' })).toMatchObject({ ok: false, code: ErrorCode.UNAUTHORIZED });
        expect(InvokerNonceGuard({ nonce: 1n })).toMatchObject({ ok: false, code: ErrorCode.INVOKER_NONCE_MISMATCH });
        expect(NonceGuard({ supplied: 4n, expected: 3n })).toEqual({
            ok: false,
            code: ErrorCode.INCORRECT_NONCE,
            violation: 'Expected nonce 3, got 4',
            details: { expected: '3', supplied: '4' }
        });
        expect(VacancyGuard({ officeId: 'x', forSale: false, bought: true })).toMatchObject({ code: ErrorCode.DUPLICATE_ID });
        expect(BidGuard({ accepted: false, officeId: 'x' })).toMatchObject({ code: ErrorCode.BID_REJECTED });
    });

    test('expiry is strict', () => {
        expect(ExpiryGuard({ now: 10n, expiresAt: 10n })).toMatchObject({ ok: false, code: ErrorCode.NOT_EXPIRED });
        expect(ExpiryGuard({ now: 11n, expiresAt: 10n })).toEqual({ ok: true });
    });

    test('signatures verify over the exact payload', () => {
        const keys = generateKeyPair();
        const data = canonicalize(['a', 1n]);
        const proof = { type: 'ED25519' as const, publicKey: keys.publicKey, signature: signData(data, keys.privateKey) };

        expect(SignatureGuard({ data, proof })).toEqual({ ok: true });
        expect(SignatureGuard({ data: canonicalize(['a', 2n]), proof })).toMatchObject({ ok: false, code: ErrorCode.UNAUTHORIZED });
    });

    test('enforce throws a KernelError carrying the code', () => {
        expect(() => enforce({ ok: true })).not.toThrow();
        try {
            enforce(ExpiryGuard({ now: 1n, expiresAt: 5n }));
            throw new Error('unreachable');
        } catch (e) {
            expect(isKernelError(e, ErrorCode.NOT_EXPIRED)).toBe(true);
            expect(e).toBeInstanceOf(KernelError);
            expect(e).toMatchObject({ message: '[Ledger:NOT_EXPIRED] Office expires at 5, now is 1' });
        }
    });
});

describe('Primitives', () => {
    test('time addition stays within u64', () => {
        expect(addTime(1n, RENEWAL_PERIOD)).toBe(604801n);
        expect(() => addTime(U64_MAX, 1n)).toThrow(ErrorCode.INVALID_ARGUMENT);
    });

    test('hex ids are length-checked and lowercased', () => {
        expect(requireHex('ABCD', 2, 'Id')).toBe('abcd');
        expect(() => requireHex('abc', 2, 'Id')).toThrow('Id must be 2 bytes of hex');
        expect(() => requireHex('zzzz', 2, 'Id')).toThrow(ErrorCode.INVALID_ARGUMENT);
    });

    test('amounts are non-negative', () => {
        expect(requireAmount(0n, 'Amount')).toBe(0n);
        expect(() => requireAmount(-1n, 'Amount')).toThrow('Amount must be non-negative');
    });

    test('identities are validated by kind', () => {
        expect(requireIdentity({ type: 'CONTRACT', contractId: 'AB'.repeat(32) })).toEqual({ type: 'CONTRACT', contractId: 'ab'.repeat(32) });
        expect(() => requireIdentity({ type: 'ACCOUNT', publicKey: 'ab'.repeat(16) })).toThrow('Account key must be 32 bytes of hex');
    });
});
