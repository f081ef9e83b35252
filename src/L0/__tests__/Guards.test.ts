import { describe, it, expect } from '@jest/globals';
import { ErrorCode, RecordError } from '../../Errors.js';
import { OK, RegistrationGuard, ValueGuard, WriteGuard, enforce } from '../Guards.js';

describe('WriteGuard', () => {
    const base = { kind: 'Person', lifecycle: 'LOCKED' as const, locked: true };

    it('blocks locked fields once the record is locked', () => {
        expect(WriteGuard({ ...base, name: 'age' })).toEqual({
            ok: false,
            code: ErrorCode.IMMUTABLE,
            violation: "Cannot modify immutable field 'age' of object Person"
        });
    });

    it('lets everything through while constructing', () => {
        expect(WriteGuard({ ...base, name: 'age', lifecycle: 'UNLOCKED' })).toEqual(OK);
    });

    it('never guards reserved names', () => {
        expect(WriteGuard({ ...base, name: '_cache' })).toEqual(OK);
    });

    it('passes unlocked fields', () => {
        expect(WriteGuard({ ...base, name: 'age', locked: false })).toEqual(OK);
    });

    it('treats a missing name as the whole object', () => {
        expect(WriteGuard({ ...base, locked: false })).toEqual({
            ok: false,
            code: ErrorCode.IMMUTABLE,
            violation: 'Cannot modify immutable object Person'
        });
    });
});

describe('RegistrationGuard', () => {
    it('requires registration unless new names are allowed', () => {
        const result = RegistrationGuard({ name: 'x', registered: false, allowNew: false, operation: 'lock' });
        expect(result).toEqual({ ok: false, code: ErrorCode.NOT_REGISTERED, violation: "Attribute 'x' has not been registered" });
        expect(RegistrationGuard({ name: 'x', registered: false, allowNew: true, operation: 'lock' })).toEqual(OK);
    });

    it('refuses reserved names', () => {
        const result = RegistrationGuard({ name: '_x', registered: false, allowNew: true, operation: 'unlock' });
        expect(result).toEqual({ ok: false, code: ErrorCode.PRIVATE_FIELD, violation: "Cannot unlock private attribute '_x'" });
    });
});

describe('ValueGuard', () => {
    it('requires a value for a new absent field', () => {
        expect(ValueGuard({ name: 'x', allowNew: true, exists: false })).toMatchObject({ ok: false, code: ErrorCode.MISSING_VALUE });
        expect(ValueGuard({ name: 'x', allowNew: true, exists: true })).toEqual(OK);
        expect(ValueGuard({ name: 'x', allowNew: false, exists: false })).toEqual(OK);
    });
});

describe('enforce', () => {
    it('throws the failed result as a RecordError', () => {
        const result = WriteGuard({ kind: 'A', name: 'x', lifecycle: 'LOCKED', locked: true });
        expect(() => enforce(result, { field: 'x' })).toThrow(RecordError);
        try {
            enforce(result, { field: 'x' });
        } catch (err) {
            expect(err).toBeInstanceOf(RecordError);
            if (err instanceof RecordError) {
                expect(err.code).toBe(ErrorCode.IMMUTABLE);
                expect(err.metadata).toEqual({ field: 'x' });
            }
        }
    });

    it('is silent for OK', () => {
        expect(() => enforce(OK)).not.toThrow();
    });
});
