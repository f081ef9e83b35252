/**
 * Record Ontology
 * Shared vocabulary of the record layers: field values, reserved names and the
 * brand every record carries so lower layers can recognise nested records
 * without importing the record classes.
 */

export type FieldValues = Record<string, unknown>;
export type FieldMapping = FieldValues | ReadonlyMap<string, unknown>;
export type FieldEntry = [string, unknown];

export type SortOrder = 'none' | 'ascending' | 'descending';
export type RecordLifecycle = 'UNLOCKED' | 'LOCKED';

/** Names starting with this prefix are bookkeeping fields. */
export const RESERVED_PREFIX = '_';

/** Keys that never become accessors or schema entries. */
export const PROTOTYPE_KEYS: ReadonlySet<string> = new Set(['__proto__', 'prototype', 'constructor']);

export const RECORD_BRAND: unique symbol = Symbol.for('attribute-record.record');

/** Stand-in for a field that is not present, shared by both sides of a comparison. */
export const ABSENT: unique symbol = Symbol.for('attribute-record.absent');

export interface RecordLike {
    readonly [RECORD_BRAND]: true;
    readonly size: number;
    get(name: string, fallback?: unknown): unknown;
    entries(): FieldEntry[];
    equals(other: unknown, keys?: readonly string[]): boolean;
    compareTo(other: unknown): number;
    deepCopy(asMutable?: boolean): RecordLike;
    toMapping(): FieldValues;
}

export function isRecordLike(value: unknown): value is RecordLike {
    return typeof value === 'object' && value !== null && RECORD_BRAND in value && value[RECORD_BRAND] === true;
}

export function isReserved(name: string): boolean {
    return name.startsWith(RESERVED_PREFIX);
}

/** True for object literals and null-prototype objects, from any realm. */
export function isPlainObject(value: unknown): value is FieldValues {
    if (typeof value !== 'object' || value === null) return false;
    if (Object.prototype.toString.call(value) !== '[object Object]') return false;
    const proto: unknown = Object.getPrototypeOf(value);
    return proto === null || (typeof proto === 'object' && Object.getPrototypeOf(proto) === null);
}

export function isIterable(value: unknown): value is Iterable<unknown> {
    if (typeof value === 'string') return true;
    return typeof value === 'object' && value !== null && Symbol.iterator in value && typeof value[Symbol.iterator] === 'function';
}

export function hasOwn(target: object, key: string): boolean {
    return Object.prototype.hasOwnProperty.call(target, key);
}

/**
 * Runtime type name used in error metadata: `null`, `number`, `Array`, `Date`,
 * the record class name, and so on.
 */
export function describeType(value: unknown): string {
    if (value === null) return 'null';
    if (typeof value !== 'object') return typeof value;
    if (Array.isArray(value)) return Object.isFrozen(value) ? 'tuple' : 'Array';
    const proto = Object.getPrototypeOf(value);
    if (proto === null) return 'Object';
    const ctor = proto.constructor;
    return typeof ctor === 'function' && ctor.name ? ctor.name : 'Object';
}

/**
 * Flattens a plain object or Map into construction values, dropping reserved
 * names.
 */
export function valuesFromMapping(mapping: FieldMapping): FieldValues {
    const entries: FieldEntry[] = mapping instanceof Map ? [...mapping.entries()] : Object.entries(mapping);
    return Object.fromEntries(entries.filter(([name]) => !isReserved(name)));
}
