import { ErrorCode, RecordError } from '../Errors.js';
import {
    ABSENT,
    type FieldEntry,
    type FieldValues,
    type RecordLike,
    describeType,
    isPlainObject,
    isRecordLike
} from '../L0/Ontology.js';
import { type FieldType, type TypeConstructor, isFieldType, isInstance } from '../L0/Types.js';

export type TypeFilter = FieldType | TypeConstructor;

// --- Equality ---

function sameMembers(left: Set<unknown>, right: Set<unknown>): boolean {
    if (left.size !== right.size) return false;
    const pool = [...right];
    for (const item of left) {
        const index = right.has(item) ? pool.indexOf(item) : pool.findIndex((other) => deepEqual(item, other));
        if (index < 0) return false;
        pool.splice(index, 1);
    }
    return true;
}

export function deepEqual(a: unknown, b: unknown): boolean {
    if (a === b) return true;
    if (typeof a === 'number' && typeof b === 'number') return Number.isNaN(a) && Number.isNaN(b);
    if (typeof a !== 'object' || typeof b !== 'object' || a === null || b === null) return false;

    if (isRecordLike(a)) return a.equals(b);
    if (isRecordLike(b)) return false;
    if (a instanceof Date) return b instanceof Date && a.getTime() === b.getTime();
    if (Array.isArray(a)) {
        return Array.isArray(b) && a.length === b.length && a.every((item, i) => deepEqual(item, b[i]));
    }
    if (a instanceof Set) return b instanceof Set && sameMembers(a, b);
    if (a instanceof Map) {
        if (!(b instanceof Map) || a.size !== b.size) return false;
        for (const [key, value] of a) {
            if (!b.has(key) || !deepEqual(value, b.get(key))) return false;
        }
        return true;
    }
    if (isPlainObject(a) && isPlainObject(b)) {
        const keys = Object.keys(a);
        if (keys.length !== Object.keys(b).length) return false;
        return keys.every((key) => Object.prototype.hasOwnProperty.call(b, key) && deepEqual(a[key], b[key]));
    }
    return false;
}

/**
 * Field-wise equality of two records. With `keys`, only those names are
 * compared and a missing field on both sides counts as equal.
 */
export function recordEquals(left: RecordLike, right: unknown, keys?: readonly string[]): boolean {
    if (!isRecordLike(right)) return false;
    if (keys !== undefined) {
        return keys.every((key) => deepEqual(left.get(key, ABSENT), right.get(key, ABSENT)));
    }
    if (left.size !== right.size) return false;
    const other = new Map(right.entries());
    return left.entries().every(([name, value]) => other.has(name) && deepEqual(value, other.get(name)));
}

// --- Ordering ---

function rank(value: unknown): number {
    if (value === undefined || value === null || value === ABSENT) return 0;
    switch (typeof value) {
        case 'boolean': return 1;
        case 'number':
        case 'bigint': return 2;
        case 'string': return 3;
    }
    if (value instanceof Date) return 4;
    if (Array.isArray(value)) return 5;
    if (value instanceof Set) return 6;
    if (value instanceof Map || isPlainObject(value)) return 7;
    if (isRecordLike(value)) return 8;
    return 9;
}

function sign(n: number): number {
    return n < 0 ? -1 : n > 0 ? 1 : 0;
}

function compareSequences(a: readonly unknown[], b: readonly unknown[]): number {
    const length = Math.min(a.length, b.length);
    for (let i = 0; i < length; i++) {
        const order = compareValues(a[i], b[i]);
        if (order !== 0) return order;
    }
    return sign(a.length - b.length);
}

function mappingEntries(value: Map<unknown, unknown> | FieldValues): FieldEntry[] {
    if (value instanceof Map) return [...value.entries()].map(([key, item]): FieldEntry => [String(key), item]);
    return Object.entries(value);
}

export function compareValues(a: unknown, b: unknown): number {
    const ra = rank(a);
    const rb = rank(b);
    if (ra !== rb) return sign(ra - rb);
    if (ra === 0) return 0;

    if (typeof a === 'boolean' && typeof b === 'boolean') return Number(a) - Number(b);
    if ((typeof a === 'number' || typeof a === 'bigint') && (typeof b === 'number' || typeof b === 'bigint')) {
        return a < b ? -1 : a > b ? 1 : 0;
    }
    if (typeof a === 'string' && typeof b === 'string') return a < b ? -1 : a > b ? 1 : 0;
    if (a instanceof Date && b instanceof Date) return sign(a.getTime() - b.getTime());
    if (Array.isArray(a) && Array.isArray(b)) return compareSequences(a, b);
    if (a instanceof Set && b instanceof Set) {
        return compareSequences([...a].sort(compareValues), [...b].sort(compareValues));
    }
    if ((a instanceof Map || isPlainObject(a)) && (b instanceof Map || isPlainObject(b))) {
        return compareEntries(mappingEntries(a), mappingEntries(b));
    }
    if (isRecordLike(a) && isRecordLike(b)) return a.compareTo(b);
    if (a === b) return 0;

    throw new RecordError(ErrorCode.NOT_COMPARABLE, `Cannot order ${describeType(a)} against ${describeType(b)}`, {
        left: describeType(a),
        right: describeType(b)
    });
}

function byName(a: FieldEntry, b: FieldEntry): number {
    return a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0;
}

/** Lexicographic order over name-sorted entries: name first, then value. */
export function compareEntries(left: readonly FieldEntry[], right: readonly FieldEntry[]): number {
    const a = [...left].sort(byName);
    const b = [...right].sort(byName);
    const length = Math.min(a.length, b.length);
    for (let i = 0; i < length; i++) {
        const [nameA, valueA] = a[i] ?? ['', undefined];
        const [nameB, valueB] = b[i] ?? ['', undefined];
        if (nameA !== nameB) return nameA < nameB ? -1 : 1;
        const order = compareValues(valueA, valueB);
        if (order !== 0) return order;
    }
    return sign(a.length - b.length);
}

// --- Set Algebra ---

/** Right operand wins on collision; left order first, then new right names. */
export function unionOf(left: readonly FieldEntry[], right: readonly FieldEntry[]): FieldValues {
    const merged = new Map(left);
    for (const [name, value] of right) merged.set(name, value);
    return Object.fromEntries(merged);
}

export function differenceOf(left: readonly FieldEntry[], right: readonly FieldEntry[]): FieldValues {
    const removed = new Set(right.map(([name]) => name));
    return Object.fromEntries(left.filter(([name]) => !removed.has(name)));
}

// --- Filtering ---

export function matchesType(value: unknown, filter: TypeFilter): boolean {
    return isFieldType(filter) ? filter.is(value) : isInstance(value, filter);
}

export function filterEntries(entries: readonly FieldEntry[], options: { keys?: readonly string[], type?: TypeFilter }): FieldValues {
    const { keys, type } = options;
    const wanted = keys ? new Set(keys) : undefined;
    return Object.fromEntries(entries.filter(([name, value]) =>
        (wanted === undefined || wanted.has(name)) && (type === undefined || matchesType(value, type))
    ));
}
