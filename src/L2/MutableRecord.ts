import { Immer, enableMapSet } from 'immer';
import { inspect } from 'util';
import { ErrorCode, RecordError } from '../Errors.js';
import { coerce } from '../L0/Coercion.js';
import { type GuardResult, OK, enforce } from '../L0/Guards.js';
import {
    type FieldEntry,
    type FieldMapping,
    type FieldValues,
    RECORD_BRAND,
    type RecordLike,
    hasOwn,
    isRecordLike,
    isReserved,
    valuesFromMapping
} from '../L0/Ontology.js';
import type { Schema } from '../L0/Types.js';
import { SCHEMAS } from '../L1/Schema.js';
import { cloneEntries } from '../L3/DeepClone.js';
import {
    type TypeFilter,
    compareEntries,
    deepEqual,
    differenceOf,
    filterEntries,
    recordEquals,
    unionOf
} from '../L3/Structural.js';
import { type MappingOptions, type TextOptions, parseText, toMapping, toText } from '../L4/Projection.js';

enableMapSet();
const producer = new Immer({ autoFreeze: false });

/**
 * A named-field container. Subclasses may declare a static `fields` schema;
 * without one the record accepts any names verbatim.
 *
 * ```ts
 * class Person extends MutableRecord<{ name: string, age: number }> {
 *     static fields = { name: Types.string, age: Types.integer };
 *     declare name: string | undefined;
 *     declare age: number | undefined;
 * }
 * ```
 */
export class MutableRecord<T extends FieldValues = FieldValues> implements RecordLike, Iterable<FieldEntry> {
    public static fields?: Schema;

    #attributes: Map<string, unknown> = new Map();
    readonly #kind: typeof MutableRecord;

    public constructor(values: FieldValues = {}) {
        this.#kind = new.target;
        const { declared } = SCHEMAS.register(new.target);

        if (declared.size > 0) {
            for (const [name, type] of declared) {
                this.assign(name, coerce(name, hasOwn(values, name) ? values[name] : undefined, type));
            }
            for (const [name, value] of Object.entries(values)) {
                if (isReserved(name)) {
                    this.assign(name, value);
                } else if (!declared.has(name)) {
                    throw new RecordError(ErrorCode.UNEXPECTED_FIELD, `Unexpected argument '${name}' for ${new.target.name}`, {
                        kind: new.target.name,
                        field: name
                    });
                }
            }
        } else {
            for (const [name, value] of Object.entries(values)) this.assign(name, value);
        }

        this.postInit?.();
    }

    /** Runs once every field is stored, before an immutable record locks. */
    protected postInit?(): void;

    public static fromMapping<R>(this: new (values?: FieldValues) => R, mapping: FieldMapping): R {
        return new this(valuesFromMapping(mapping));
    }

    public static fromText<R>(this: new (values?: FieldValues) => R, text: string): R {
        return new this(valuesFromMapping(parseText(text, this.name)));
    }

    public get [RECORD_BRAND](): true {
        return true;
    }

    /** The concrete class this record was constructed as. */
    protected get recordKind(): typeof MutableRecord {
        return this.#kind;
    }

    // --- Guard hook ---

    /** Overridden by the immutable variant; every write passes here. */
    protected checkWrite(name?: string): GuardResult {
        return OK;
    }

    /** Stores a value without consulting the guard. */
    protected assign(name: string, value: unknown): void {
        this.#attributes.set(name, value);
        SCHEMAS.materialize(this.#kind, name);
    }

    private guard(name?: string): void {
        enforce(this.checkWrite(name), { kind: this.#kind.name, field: name });
    }

    // --- Access ---

    public get<K extends keyof T & string>(name: K): T[K] | undefined;
    public get<K extends keyof T & string>(name: K, fallback: T[K]): T[K];
    public get(name: string, fallback?: unknown): unknown;
    public get(name: string, fallback?: unknown): unknown {
        return this.#attributes.has(name) ? this.#attributes.get(name) : fallback;
    }

    public getOrDefault(name: string, fallback: unknown): unknown {
        return this.get(name, fallback);
    }

    public getItem(name: string): unknown {
        if (!this.#attributes.has(name)) {
            throw new RecordError(ErrorCode.NOT_FOUND, `'${name}' not found in ${this.#kind.name}`, { kind: this.#kind.name, field: name });
        }
        return this.#attributes.get(name);
    }

    public set<K extends string>(name: K, value: K extends keyof T ? T[K] : unknown): void {
        this.guard(name);
        this.assign(name, value);
    }

    public setItem(name: string, value: unknown): void {
        this.guard(name);
        this.assign(name, value);
    }

    public delete(name: string): void {
        if (!this.#attributes.has(name)) {
            throw new RecordError(ErrorCode.NOT_FOUND, `'${name}' not found in ${this.#kind.name}`, { kind: this.#kind.name, field: name });
        }
        this.guard(name);
        this.#attributes.delete(name);
    }

    public deleteItem(name: string): void {
        this.delete(name);
    }

    /** Writes every pair or none of them. */
    public update(values: FieldValues): void {
        const entries = Object.entries(values);
        this.#attributes = producer.produce(this.#attributes, (draft) => {
            for (const [name, value] of entries) {
                this.guard(name);
                draft.set(name, value);
            }
        });
        for (const [name] of entries) SCHEMAS.materialize(this.#kind, name);
    }

    public updateDefaults(values: FieldValues): void {
        const missing = Object.entries(values).filter(([name]) => !this.#attributes.has(name));
        if (missing.length > 0) this.update(Object.fromEntries(missing));
    }

    public has(name?: string, value?: unknown): boolean {
        const hasName = name !== undefined && this.#attributes.has(name);
        const hasValue = value !== undefined && this.values().some((item) => deepEqual(item, value));
        if (name !== undefined && value !== undefined) return hasName && hasValue;
        return hasName || hasValue;
    }

    public contains(item: unknown): boolean {
        if (typeof item === 'string' && this.#attributes.has(item)) return true;
        return this.values().some((value) => deepEqual(value, item));
    }

    // --- Enumeration (reserved fields excluded) ---

    public get size(): number {
        return this.keys().length;
    }

    public keys(): string[] {
        return [...this.#attributes.keys()].filter((name) => !isReserved(name));
    }

    public values(): unknown[] {
        return this.items().map(([, value]) => value);
    }

    public items(): FieldEntry[] {
        return [...this.#attributes.entries()].filter(([name]) => !isReserved(name));
    }

    public entries(): FieldEntry[] {
        return this.items();
    }

    public enumerate(): Array<[number, FieldEntry]> {
        return this.items().map((entry, index): [number, FieldEntry] => [index, entry]);
    }

    public [Symbol.iterator](): Iterator<FieldEntry> {
        return this.items()[Symbol.iterator]();
    }

    // --- Structure ---

    public equals(other: unknown, keys?: readonly string[]): boolean {
        return recordEquals(this, other, keys);
    }

    public compareTo(other: unknown): number {
        if (!isRecordLike(other)) {
            throw new RecordError(ErrorCode.NOT_COMPARABLE, `Cannot order ${this.#kind.name} against a non-record`, { kind: this.#kind.name });
        }
        return compareEntries(this.items(), other.entries());
    }

    public lessThan(other: unknown): boolean {
        return this.compareTo(other) < 0;
    }

    public greaterThan(other: unknown): boolean {
        return this.compareTo(other) > 0;
    }

    /** Values of the union, right operand winning; fails unless `other` is the same kind. */
    protected unionWith(other: unknown): FieldValues {
        if (!(other instanceof this.#kind)) {
            throw new RecordError(ErrorCode.NOT_APPLICABLE, `Cannot merge ${this.#kind.name} with a different kind`, { kind: this.#kind.name });
        }
        return unionOf(this.items(), other.items());
    }

    protected differenceWith(other: unknown): FieldValues {
        if (!isRecordLike(other)) {
            throw new RecordError(ErrorCode.NOT_APPLICABLE, `Cannot subtract a non-record from ${this.#kind.name}`, { kind: this.#kind.name });
        }
        return differenceOf(this.items(), other.entries());
    }

    public merge(other: unknown): MutableRecord<T> {
        return new this.#kind<T>(this.unionWith(other));
    }

    public subtract(other: unknown): MutableRecord<T> {
        return new this.#kind<T>(this.differenceWith(other));
    }

    public filterByType(type: TypeFilter): FieldValues {
        return filterEntries(this.items(), { type });
    }

    public toFilteredMapping(options: { keys?: readonly string[], type?: TypeFilter } = {}): FieldValues {
        return filterEntries(this.items(), options);
    }

    // --- Copies ---

    public copy(): MutableRecord<T> {
        return new this.#kind<T>(Object.fromEntries(this.items()));
    }

    public deepCopy(asMutable: boolean = false): MutableRecord<T> {
        return new this.#kind<T>(cloneEntries(this.items(), asMutable));
    }

    // --- Projection ---

    public toMapping(options?: MappingOptions): FieldValues {
        return toMapping(this.#attributes.entries(), options);
    }

    public toText(options?: TextOptions): string {
        return toText(this.#attributes.entries(), options);
    }

    public toString(): string {
        const fields = this.items().map(([name, value]) => `${name}=${inspect(value)}`);
        return `<${this.#kind.name} (${fields.join(', ')})>`;
    }

    public [inspect.custom](): string {
        return this.toString();
    }
}
