import { describe, it, expect } from '@jest/globals';
import { ErrorCode, RecordError, isRecordError } from '../../Errors.js';
import { Types } from '../../L0/Types.js';
import { MutableRecord } from '../MutableRecord.js';

class Person extends MutableRecord<{ name: string, age: number }> {
    static fields = { name: Types.string, age: Types.integer };
    declare name: string | undefined;
    declare age: number | undefined;
}

class Bag extends MutableRecord { }

class Greeting extends MutableRecord<{ who: string, text: string }> {
    protected override postInit(): void {
        this.set('text', `hello ${String(this.get('who'))}`);
    }
}

function failure(fn: () => unknown): RecordError {
    try {
        fn();
    } catch (err) {
        if (err instanceof RecordError) return err;
        throw err;
    }
    throw new Error('expected a RecordError');
}

describe('MutableRecord construction', () => {
    it('coerces declared fields and exposes accessors', () => {
        const alice = new Person({ name: 'Alice', age: '30' });
        expect(alice.get('age')).toBe(30);
        expect(alice.age).toBe(30);
        expect(alice.name).toBe('Alice');
    });

    it('stores every declared field in declaration order', () => {
        const bob = new Person({ age: 4 });
        expect(bob.keys()).toEqual(['name', 'age']);
        expect(bob.get('name')).toBeUndefined();
        expect(bob.has('name')).toBe(true);
    });

    it('rejects undeclared names', () => {
        const err = failure(() => new Person({ name: 'A', nickname: 'x' }));
        expect(err.code).toBe(ErrorCode.UNEXPECTED_FIELD);
        expect(err.metadata).toEqual({ kind: 'Person', field: 'nickname' });
    });

    it('coerces before it checks for undeclared names', () => {
        expect(failure(() => new Person({ age: 'old', nickname: 'x' })).code).toBe(ErrorCode.TYPE_MISMATCH);
    });

    it('stores reserved names verbatim outside the schema', () => {
        const carol = new Person({ name: 'Carol', _cache: [1] });
        expect(carol.get('_cache')).toEqual([1]);
        expect(carol.keys()).toEqual(['name', 'age']);
        expect(carol.size).toBe(2);
    });

    it('accepts any names without a schema, in insertion order', () => {
        const bag = new Bag({ b: 1, a: 2 });
        expect(bag.items()).toEqual([['b', 1], ['a', 2]]);
    });

    it('runs postInit after the fields are stored', () => {
        expect(new Greeting({ who: 'Ann' }).get('text')).toBe('hello Ann');
    });

    it('builds from mappings and text, dropping reserved keys', () => {
        const fromObject = Person.fromMapping({ name: 'Dee', age: 5, _tmp: true });
        expect(fromObject).toBeInstanceOf(Person);
        expect(fromObject.has('_tmp')).toBe(false);
        expect(Bag.fromMapping(new Map([['k', 'v']])).get('k')).toBe('v');
        expect(Person.fromText('{"name":"Eve","age":"7"}').age).toBe(7);
    });
});

describe('MutableRecord access', () => {
    it('falls back to the default for absent names', () => {
        const bag = new Bag({ a: 1 });
        expect(bag.get('zzz')).toBeUndefined();
        expect(bag.get('zzz', 9)).toBe(9);
        expect(bag.getOrDefault('a', 9)).toBe(1);
    });

    it('fails indexed access on absent names', () => {
        const err = failure(() => new Bag().getItem('zzz'));
        expect(err.code).toBe(ErrorCode.NOT_FOUND);
        expect(err.message).toBe("[Record:NOT_FOUND] 'zzz' not found in Bag");
    });

    it('creates and overwrites fields', () => {
        const alice = new Person({ name: 'Alice', age: 30 });
        alice.set('age', 31);
        expect(alice.get('age')).toBe(31);
        alice.age = 32;
        expect(alice.getItem('age')).toBe(32);

        const bag = new Bag();
        bag.setItem('colour', 'red');
        expect(Reflect.get(bag, 'colour')).toBe('red');
    });

    it('skips coercion on later writes', () => {
        const alice = new Person({ name: 'Alice', age: 30 });
        alice.setItem('age', 'thirty');
        expect(alice.get('age')).toBe('thirty');
    });

    it('deletes present fields only', () => {
        const bag = new Bag({ a: 1 });
        bag.deleteItem('a');
        expect(bag.has('a')).toBe(false);
        expect(failure(() => bag.delete('a')).code).toBe(ErrorCode.NOT_FOUND);
    });

    it('updates in bulk and fills only missing defaults', () => {
        const bag = new Bag({ a: 1 });
        bag.update({ a: 2, b: 3 });
        bag.updateDefaults({ b: 99, c: 4 });
        expect(bag.toMapping()).toEqual({ a: 2, b: 3, c: 4 });
        expect(Reflect.get(bag, 'c')).toBe(4);
    });
});

describe('MutableRecord membership and enumeration', () => {
    const bag = new Bag({ a: 1, b: [2], _hidden: 3 });

    it('tests names and values independently', () => {
        expect(bag.has('a')).toBe(true);
        expect(bag.has(undefined, [2])).toBe(true);
        expect(bag.has('a', [2])).toBe(true);
        expect(bag.has('a', 99)).toBe(false);
        expect(bag.has('zz', 1)).toBe(false);
        expect(bag.has()).toBe(false);
    });

    it('contains names or values', () => {
        expect(bag.contains('b')).toBe(true);
        expect(bag.contains([2])).toBe(true);
        expect(bag.contains(3)).toBe(false);
    });

    it('enumerates non-reserved fields', () => {
        expect(bag.size).toBe(2);
        expect(bag.keys()).toEqual(['a', 'b']);
        expect(bag.values()).toEqual([1, [2]]);
        expect(bag.enumerate()).toEqual([[0, ['a', 1]], [1, ['b', [2]]]]);
        expect([...bag]).toEqual([['a', 1], ['b', [2]]]);
    });

    it('renders as <Kind (name=value, ...)>', () => {
        expect(new Bag({ a: 1, b: 'x' }).toString()).toBe("<Bag (a=1, b='x')>");
        expect(new Bag({ inner: new Bag({ z: 1 }) }).toString()).toBe('<Bag (inner=<Bag (z=1)>)>');
    });
});

describe('MutableRecord copies', () => {
    it('copies shallowly into the same class', () => {
        const list = [1];
        const bag = new Bag({ list });
        const copy = bag.copy();
        expect(copy).toBeInstanceOf(Bag);
        expect(copy.get('list')).toBe(list);
    });

    it('deep copies without sharing', () => {
        const bag = new Bag({ list: [1, { x: 2 }] });
        const copy = bag.deepCopy();
        expect(copy).toBeInstanceOf(Bag);
        expect(copy.equals(bag)).toBe(true);
        expect(copy.get('list')).not.toBe(bag.get('list'));
    });

    it('fails merge with an unrelated kind', () => {
        const err = failure(() => new Bag({ a: 1 }).merge(new Person({})));
        expect(isRecordError(err, ErrorCode.NOT_APPLICABLE)).toBe(true);
    });
});
