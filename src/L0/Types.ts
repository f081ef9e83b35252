/**
 * Field Types
 * A field type recognises values it accepts as-is and, optionally, converts
 * others. `convert` throws when it cannot produce a value.
 */
import {
    type FieldValues,
    type RecordLike,
    isIterable,
    isPlainObject,
    isRecordLike,
    valuesFromMapping
} from './Ontology.js';

export interface FieldType<T = unknown> {
    readonly name: string;
    is(value: unknown): value is T;
    convert?(value: unknown): T;
}

export type Schema = Record<string, FieldType>;

/** Value types of a schema, e.g. `FieldsOf<typeof Person.fields>`. */
export type FieldsOf<S extends Schema> = {
    [K in keyof S]: S[K] extends FieldType<infer V> ? V | undefined : unknown;
};

export type RecordKind<R extends RecordLike> = new (values?: FieldValues) => R;

export function defineType<T>(spec: FieldType<T>): FieldType<T> {
    return Object.freeze({ ...spec });
}

/** A class, or one of the primitive wrappers `String`, `Number`, `Boolean`, `BigInt`, `Symbol`. */
export type TypeConstructor = (abstract new (...args: never[]) => unknown) | BigIntConstructor | SymbolConstructor;

const PRIMITIVE_TYPES = new Map<unknown, string>([
    [String, 'string'],
    [Number, 'number'],
    [Boolean, 'boolean'],
    [BigInt, 'bigint'],
    [Symbol, 'symbol']
]);

/** `instanceof`, except that a primitive wrapper also matches its primitive values. */
export function isInstance(value: unknown, ctor: TypeConstructor): boolean {
    const primitive = PRIMITIVE_TYPES.get(ctor);
    if (primitive !== undefined && typeof value === primitive) return true;
    return value instanceof ctor;
}

export function isFieldType(value: unknown): value is FieldType {
    return typeof value === 'object' && value !== null &&
        'name' in value && typeof value.name === 'string' &&
        'is' in value && typeof value.is === 'function';
}

function refuse(type: string, value: unknown): never {
    throw new TypeError(`cannot convert ${String(value)} to ${type}`);
}

const INTEGER_TEXT = /^[+-]?\d+$/;

function integerText(value: string): string | undefined {
    const text = value.trim();
    return INTEGER_TEXT.test(text) ? text : undefined;
}

// Beyond 2^53 a number no longer holds every integer; use Types.bigint there.
function safeInteger(candidate: number, value: unknown): number {
    return Number.isSafeInteger(candidate) ? candidate : refuse('integer', value);
}

function isPair(value: unknown): value is [unknown, unknown] {
    return Array.isArray(value) && value.length === 2;
}

const string = defineType<string>({
    name: 'string',
    is: (value): value is string => typeof value === 'string',
    convert: (value) => String(value)
});

const number = defineType<number>({
    name: 'number',
    is: (value): value is number => typeof value === 'number',
    convert: (value) => {
        if (typeof value === 'boolean') return value ? 1 : 0;
        if (typeof value === 'bigint') return Number(value);
        if (typeof value === 'string') {
            const text = value.trim();
            const parsed = Number(text);
            if (text !== '' && (!Number.isNaN(parsed) || text.toLowerCase() === 'nan')) return parsed;
        }
        return refuse('number', value);
    }
});

const integer = defineType<number>({
    name: 'integer',
    is: (value): value is number => typeof value === 'number' && Number.isInteger(value),
    convert: (value) => {
        if (typeof value === 'number' && Number.isFinite(value)) return safeInteger(Math.trunc(value), value);
        if (typeof value === 'boolean') return value ? 1 : 0;
        if (typeof value === 'bigint' && value <= BigInt(Number.MAX_SAFE_INTEGER) && value >= BigInt(Number.MIN_SAFE_INTEGER)) {
            return Number(value);
        }
        if (typeof value === 'string') {
            const text = integerText(value);
            if (text !== undefined) return safeInteger(Number(text), value);
        }
        return refuse('integer', value);
    }
});

const boolean = defineType<boolean>({
    name: 'boolean',
    is: (value): value is boolean => typeof value === 'boolean',
    convert: (value) => Boolean(value)
});

const bigint = defineType<bigint>({
    name: 'bigint',
    is: (value): value is bigint => typeof value === 'bigint',
    convert: (value) => {
        if (typeof value === 'number' && Number.isInteger(value)) return BigInt(value);
        if (typeof value === 'boolean') return BigInt(value);
        if (typeof value === 'string') {
            const text = integerText(value);
            if (text !== undefined) return BigInt(text);
        }
        return refuse('bigint', value);
    }
});

const date = defineType<Date>({
    name: 'date',
    is: (value): value is Date => value instanceof Date && !Number.isNaN(value.getTime()),
    convert: (value) => {
        if (typeof value === 'string' || typeof value === 'number') {
            const parsed = new Date(value);
            if (!Number.isNaN(parsed.getTime())) return parsed;
        }
        return refuse('date', value);
    }
});

const array = defineType<unknown[]>({
    name: 'array',
    is: (value): value is unknown[] => Array.isArray(value) && !Object.isFrozen(value),
    convert: (value) => isIterable(value) ? Array.from(value) : refuse('array', value)
});

// Frozen arrays stand in for fixed sequences.
const tuple = defineType<readonly unknown[]>({
    name: 'tuple',
    is: (value): value is readonly unknown[] => Array.isArray(value) && Object.isFrozen(value),
    convert: (value) => isIterable(value) ? Object.freeze(Array.from(value)) : refuse('tuple', value)
});

const set = defineType<Set<unknown>>({
    name: 'set',
    is: (value): value is Set<unknown> => value instanceof Set,
    convert: (value) => isIterable(value) ? new Set(value) : refuse('set', value)
});

const map = defineType<Map<unknown, unknown>>({
    name: 'map',
    is: (value): value is Map<unknown, unknown> => value instanceof Map,
    convert: (value) => {
        if (isRecordLike(value)) return new Map<unknown, unknown>(value.entries());
        if (isPlainObject(value)) return new Map<unknown, unknown>(Object.entries(value));
        if (isIterable(value) && typeof value !== 'string') {
            const pairs = Array.from(value);
            if (pairs.every(isPair)) return new Map(pairs);
        }
        return refuse('map', value);
    }
});

const object = defineType<FieldValues>({
    name: 'object',
    is: isPlainObject,
    convert: (value) => {
        if (isRecordLike(value)) return value.toMapping();
        if (value instanceof Map) {
            const entries = [...value.entries()];
            const named: Array<[string, unknown]> = [];
            for (const [key, item] of entries) {
                if (typeof key !== 'string') return refuse('object', value);
                named.push([key, item]);
            }
            return Object.fromEntries(named);
        }
        return refuse('object', value);
    }
});

const any = defineType<unknown>({
    name: 'any',
    is: (value): value is unknown => true
});

function instanceOf<T>(ctor: abstract new (...args: never[]) => T): FieldType<T> {
    return defineType<T>({
        name: ctor.name,
        is: (value): value is T => isInstance(value, ctor)
    });
}

function record<R extends RecordLike>(kind: RecordKind<R>): FieldType<R> {
    return defineType<R>({
        name: kind.name,
        is: (value): value is R => value instanceof kind,
        convert: (value) => {
            if (isRecordLike(value)) return new kind(value.toMapping());
            if (isPlainObject(value)) return new kind(valuesFromMapping(value));
            if (value instanceof Map) {
                const entries = [...value.entries()];
                const named = entries.filter((entry): entry is [string, unknown] => typeof entry[0] === 'string');
                if (named.length === entries.length) return new kind(valuesFromMapping(new Map(named)));
            }
            return refuse(kind.name, value);
        }
    });
}

function optional<T>(type: FieldType<T>): FieldType<T | undefined | null> {
    return defineType<T | undefined | null>({
        name: `${type.name}?`,
        is: (value): value is T | undefined | null => value === undefined || value === null || type.is(value),
        convert: (value) => type.convert ? type.convert(value) : refuse(type.name, value)
    });
}

function union<T extends FieldType[]>(...types: T): FieldType<T[number] extends FieldType<infer V> ? V : never> {
    type V = T[number] extends FieldType<infer U> ? U : never;
    const isMember = (value: unknown): value is V => types.some((type) => type.is(value));
    return defineType<V>({
        name: types.map((type) => type.name).join(' | '),
        is: isMember,
        convert: (value) => {
            for (const type of types) {
                if (!type.convert) continue;
                try {
                    const converted = type.convert(value);
                    if (isMember(converted)) return converted;
                } catch {
                    continue;
                }
            }
            return refuse(types.map((type) => type.name).join(' | '), value);
        }
    });
}

export const Types = Object.freeze({
    string,
    number,
    integer,
    boolean,
    bigint,
    date,
    array,
    tuple,
    set,
    map,
    object,
    any,
    instanceOf,
    record,
    optional,
    union
});
