// src/L0/Guards.ts
import { ErrorCode, RecordError } from '../Errors.js';
import { type RecordLifecycle, isReserved } from './Ontology.js';

// --- Guard Pattern ---
export type GuardResult = { ok: true } | { ok: false; code: ErrorCode; violation: string };

export type Guard<T> = (input: T) => GuardResult;

export const OK: GuardResult = { ok: true };
const FAIL = (code: ErrorCode, violation: string): GuardResult => ({ ok: false, code, violation });

/** Throws the failure carried by a guard result. */
export function enforce(result: GuardResult, metadata: Record<string, unknown> = {}): void {
    if (!result.ok) throw new RecordError(result.code, result.violation, metadata);
}

// --- Concrete Guards ---

// 1. Writes and deletions on an immutable record
export const WriteGuard: Guard<{
    kind: string,
    name?: string,
    lifecycle: RecordLifecycle,
    locked: boolean
}> = ({ kind, name, lifecycle, locked }) => {
    if (name === undefined) return FAIL(ErrorCode.IMMUTABLE, `Cannot modify immutable object ${kind}`);
    if (lifecycle === 'UNLOCKED' || isReserved(name)) return OK;
    if (locked) return FAIL(ErrorCode.IMMUTABLE, `Cannot modify immutable field '${name}' of object ${kind}`);
    return OK;
};

// 2. Lock table membership for lock/unlock
export const RegistrationGuard: Guard<{
    name: string,
    registered: boolean,
    allowNew: boolean,
    operation: 'lock' | 'unlock'
}> = ({ name, registered, allowNew, operation }) => {
    if (!registered && !allowNew) return FAIL(ErrorCode.NOT_REGISTERED, `Attribute '${name}' has not been registered`);
    if (isReserved(name)) return FAIL(ErrorCode.PRIVATE_FIELD, `Cannot ${operation} private attribute '${name}'`);
    return OK;
};

// 3. A newly locked field needs something to hold
export const ValueGuard: Guard<{ name: string, allowNew: boolean, exists: boolean }> = ({ name, allowNew, exists }) => {
    if (allowNew && !exists) return FAIL(ErrorCode.MISSING_VALUE, `New attribute '${name}' must have a value when locking`);
    return OK;
};
