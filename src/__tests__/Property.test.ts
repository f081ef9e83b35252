import { describe, test, expect } from '@jest/globals';
import fc from 'fast-check';
import { ErrorCode, isRecordError } from '../Errors.js';
import { deepEqual } from '../L3/Structural.js';
import { Types } from '../L0/Types.js';
import { ImmutableRecord } from '../L2/ImmutableRecord.js';
import { MutableRecord } from '../L2/MutableRecord.js';

class Person extends MutableRecord<{ name: string, age: number }> {
    static fields = { name: Types.string, age: Types.integer };
}
class Bag extends MutableRecord { }
class Sealed extends ImmutableRecord { }

// Generators
const genName = fc.string({ minLength: 1, maxLength: 12 }).filter((name) => !name.startsWith('_'));
const genFields = fc.uniqueArray(fc.tuple(genName, fc.jsonValue({ maxDepth: 3 })), {
    minLength: 1,
    maxLength: 6,
    selector: ([name]) => name
});

/** Mutates every container reachable from `value`. */
function scramble(value: unknown): void {
    if (Array.isArray(value)) {
        for (const item of value) scramble(item);
        value.push('scrambled');
    } else if (typeof value === 'object' && value !== null) {
        for (const item of Object.values(value)) scramble(item);
        Object.defineProperty(value, 'scrambled', { value: true, enumerable: true, configurable: true, writable: true });
    }
}

function failsWith(code: ErrorCode, fn: () => unknown): boolean {
    try {
        fn();
        return false;
    } catch (err) {
        return isRecordError(err, code);
    }
}

describe('Record Property Verification', () => {
    test('every declared field is present after construction', () => {
        fc.assert(fc.property(
            fc.option(fc.string(), { nil: undefined }),
            fc.option(fc.integer(), { nil: undefined }),
            (name, age) => {
                const person = new Person({ name, age });
                expect(person.keys()).toEqual(['name', 'age']);
                expect(person.get('name')).toBe(name);
                expect(person.get('age')).toBe(age);
            }
        ));
    });

    test('undeclared names always fail with UNEXPECTED_FIELD', () => {
        fc.assert(fc.property(
            genName.filter((name) => name !== 'name' && name !== 'age'),
            (extra) => failsWith(ErrorCode.UNEXPECTED_FIELD, () => new Person(Object.fromEntries([['name', 'n'], [extra, 1]])))
        ));
    });

    test('supplied fields of an immutable record reject writes, copies included', () => {
        fc.assert(fc.property(genFields, (fields) => {
            const sealed = new Sealed(Object.fromEntries(fields));
            for (const record of [sealed, sealed.copy(), sealed.deepCopy()]) {
                for (const [name] of fields) {
                    if (!failsWith(ErrorCode.IMMUTABLE, () => record.set(name, 'changed'))) return false;
                }
            }
            return true;
        }));
    });

    test('mutating a deep copy never reaches the source', () => {
        fc.assert(fc.property(genFields, (fields) => {
            const source = new Bag(Object.fromEntries(fields));
            const snapshot = structuredClone(source.toMapping());
            const copy = source.deepCopy();
            for (const value of copy.values()) scramble(value);
            return deepEqual(source.toMapping(), snapshot);
        }));
    });

    test('toMapping then fromMapping reproduces a schema-less record', () => {
        fc.assert(fc.property(genFields, (fields) => {
            const bag = new Bag(Object.fromEntries(fields));
            return Bag.fromMapping(bag.toMapping()).equals(bag);
        }));
    });

    test('toText then fromText reproduces JSON-safe records', () => {
        fc.assert(fc.property(genFields, (fields) => {
            const bag = new Bag(Object.fromEntries(fields));
            return Bag.fromText(bag.toText()).equals(bag);
        }));
    });

    test('merge keeps every name and lets the right side win', () => {
        fc.assert(fc.property(genFields, genFields, (left, right) => {
            const merged = new Bag(Object.fromEntries(left)).merge(new Bag(Object.fromEntries(right)));
            const expected = new Map([...left, ...right]);
            return merged.size === expected.size &&
                [...expected].every(([name, value]) => deepEqual(merged.get(name), value));
        }));
    });

    test('ordering is antisymmetric', () => {
        fc.assert(fc.property(genFields, genFields, (left, right) => {
            const a = new Bag(Object.fromEntries(left));
            const b = new Bag(Object.fromEntries(right));
            return Math.sign(a.compareTo(b)) === -Math.sign(b.compareTo(a));
        }));
    });
});
