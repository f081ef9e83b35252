import { ErrorCode, RecordError } from '../Errors.js';
import { type FieldEntry, type FieldValues, describeType, isPlainObject, isRecordLike } from '../L0/Ontology.js';

type Memo = Map<object, unknown>;

/** Implemented by classes whose state a property-by-property copy cannot reach, such as `#private` fields. */
export interface Cloneable {
    clone(): unknown;
}

function define(target: object, key: PropertyKey, value: unknown): void {
    Object.defineProperty(target, key, { value, writable: true, enumerable: true, configurable: true });
}

function uncloneable(value: object, path: string, cause?: unknown): never {
    throw new RecordError(ErrorCode.NOT_CLONEABLE, `Cannot copy ${describeType(value)} at ${path}`, {
        path,
        actual: describeType(value),
        cause
    });
}

function hasCloneHook(value: object): value is Cloneable {
    return 'clone' in value && typeof value.clone === 'function';
}

// Built-ins whose state lives in internal slots
function isSlotted(value: object): boolean {
    return value instanceof Date ||
        value instanceof RegExp ||
        value instanceof ArrayBuffer ||
        ArrayBuffer.isView(value);
}

// Slotted built-ins with no way to read their state back
function isOpaque(value: object): boolean {
    return value instanceof WeakMap ||
        value instanceof WeakSet ||
        value instanceof WeakRef ||
        value instanceof Promise;
}

function reproduce(value: object, path: string): unknown {
    try {
        return structuredClone(value);
    } catch (err) {
        return uncloneable(value, path, err);
    }
}

function cloneInstance(value: object, asMutable: boolean, memo: Memo, path: string): object {
    const copy: object = Object.create(Object.getPrototypeOf(value));
    memo.set(value, copy);
    for (const key of Reflect.ownKeys(value)) {
        const descriptor = Object.getOwnPropertyDescriptor(value, key);
        if (!descriptor) continue;
        if ('value' in descriptor) descriptor.value = cloneValue(descriptor.value, asMutable, memo, `${path}.${String(key)}`);
        Object.defineProperty(copy, key, descriptor);
    }
    return copy;
}

/**
 * Duplicates a value without sharing any mutable part of it.
 *
 * Nested records are copied through their own `deepCopy`, and objects with a
 * `clone()` method through that method. Other class instances are rebuilt on
 * their prototype from their own properties, which cannot reach `#private`
 * fields: such classes must implement `clone()`. Frozen arrays come back
 * frozen whatever `asMutable` says. Map keys are shared with the source; only
 * the values are copied. Weak collections, weak refs and promises raise
 * `NOT_CLONEABLE` with the path of the offending value.
 */
export function cloneValue(value: unknown, asMutable: boolean, memo: Memo = new Map(), path: string = '$'): unknown {
    if (typeof value !== 'object' || value === null) return value;
    if (isRecordLike(value)) return value.deepCopy(asMutable);

    const seen = memo.get(value);
    if (seen !== undefined) return seen;

    if (Array.isArray(value)) {
        const copy: unknown[] = [];
        memo.set(value, copy);
        value.forEach((item, i) => copy.push(cloneValue(item, asMutable, memo, `${path}[${i}]`)));
        return Object.isFrozen(value) ? Object.freeze(copy) : copy;
    }
    if (value instanceof Set) {
        const copy = new Set<unknown>();
        memo.set(value, copy);
        let i = 0;
        for (const item of value) copy.add(cloneValue(item, asMutable, memo, `${path}[${i++}]`));
        return copy;
    }
    if (value instanceof Map) {
        const copy = new Map<unknown, unknown>();
        memo.set(value, copy);
        for (const [key, item] of value) copy.set(key, cloneValue(item, asMutable, memo, `${path}.${String(key)}`));
        return copy;
    }
    if (isPlainObject(value)) {
        const copy: FieldValues = Object.getPrototypeOf(value) === null ? Object.create(null) : {};
        memo.set(value, copy);
        for (const [key, item] of Object.entries(value)) define(copy, key, cloneValue(item, asMutable, memo, `${path}.${key}`));
        return copy;
    }
    if (hasCloneHook(value)) {
        const copy = value.clone();
        memo.set(value, copy);
        return copy;
    }
    if (isSlotted(value)) {
        const copy = reproduce(value, path);
        memo.set(value, copy);
        return copy;
    }
    if (isOpaque(value)) return uncloneable(value, path);
    return cloneInstance(value, asMutable, memo, path);
}

/** Clones every entry against one memo so values shared across fields stay shared in the copy. */
export function cloneEntries(entries: readonly FieldEntry[], asMutable: boolean): FieldValues {
    const memo: Memo = new Map();
    return Object.fromEntries(entries.map(([name, value]): FieldEntry => [name, cloneValue(value, asMutable, memo, `$.${name}`)]));
}
