import { type GuardResult, RegistrationGuard, ValueGuard, WriteGuard, enforce } from '../L0/Guards.js';
import { type FieldValues, type RecordLifecycle, isReserved } from '../L0/Ontology.js';
import { cloneEntries } from '../L3/DeepClone.js';
import { LockTable } from './LockTable.js';
import { MutableRecord } from './MutableRecord.js';

export interface LockOptions {
    /** Accept a name the lock table has never seen. */
    allowNew?: boolean;
    /** Written before locking, bypassing the write guard. */
    value?: unknown;
}

// Kept outside the instance: the table must exist while the base constructor runs.
const lockTables = new WeakMap<object, LockTable>();

function tableFor(record: object): LockTable {
    let table = lockTables.get(record);
    if (!table) {
        table = new LockTable();
        lockTables.set(record, table);
    }
    return table;
}

/**
 * A record whose construction-time fields are locked once construction
 * finishes. Fields added later through `update` are locked as they arrive;
 * individual fields can be unlocked and relocked.
 */
export class ImmutableRecord<T extends FieldValues = FieldValues> extends MutableRecord<T> {
    readonly #kind: typeof ImmutableRecord;

    public constructor(values: FieldValues = {}) {
        super(values);
        this.#kind = new.target;
        tableFor(this).seal(Object.keys(values));
    }

    public get lifecycle(): RecordLifecycle {
        return lockTables.get(this)?.state ?? 'UNLOCKED';
    }

    protected override checkWrite(name?: string): GuardResult {
        const table = lockTables.get(this);
        return WriteGuard({
            kind: this.recordKind.name,
            name,
            lifecycle: table?.state ?? 'UNLOCKED',
            locked: name !== undefined && (table?.isLocked(name) ?? false)
        });
    }

    public lock(name: string, options: LockOptions = {}): void {
        const { allowNew = false, value } = options;
        const table = tableFor(this);
        const metadata = { kind: this.recordKind.name, field: name };

        enforce(RegistrationGuard({ name, registered: table.isRegistered(name), allowNew, operation: 'lock' }), metadata);
        if (value !== undefined) {
            this.assign(name, value);
        } else {
            enforce(ValueGuard({ name, allowNew, exists: this.has(name) }), metadata);
        }
        table.lock(name);
    }

    public unlock(name: string): void {
        const table = tableFor(this);
        enforce(
            RegistrationGuard({ name, registered: table.isRegistered(name), allowNew: false, operation: 'unlock' }),
            { kind: this.recordKind.name, field: name }
        );
        table.unlock(name);
    }

    public isLocked(name: string): boolean {
        return lockTables.get(this)?.isLocked(name) ?? false;
    }

    /** Locks every field currently present. */
    public lockAll(): void {
        const table = tableFor(this);
        for (const name of this.keys()) table.lock(name);
    }

    public lockedNames(): string[] {
        return Object.entries(tableFor(this).snapshot()).filter(([, locked]) => locked).map(([name]) => name);
    }

    public override delete(name: string): void {
        super.delete(name);
        lockTables.get(this)?.release(name);
    }

    public override update(values: FieldValues): void {
        super.update(values);
        const table = tableFor(this);
        for (const name of Object.keys(values)) {
            if (!isReserved(name) && !table.isRegistered(name)) table.lock(name);
        }
    }

    public override merge(other: unknown): ImmutableRecord<T> {
        return new this.#kind<T>(this.unionWith(other));
    }

    public override subtract(other: unknown): ImmutableRecord<T> {
        return new this.#kind<T>(this.differenceWith(other));
    }

    public override copy(asMutable: true): MutableRecord<T>;
    public override copy(asMutable?: false): ImmutableRecord<T>;
    public override copy(asMutable: boolean): MutableRecord<T>;
    public override copy(asMutable: boolean = false): MutableRecord<T> {
        const values = Object.fromEntries(this.items());
        return asMutable ? new MutableRecord<T>(values) : new this.#kind<T>(values);
    }

    public override deepCopy(asMutable: true): MutableRecord<T>;
    public override deepCopy(asMutable?: false): ImmutableRecord<T>;
    public override deepCopy(asMutable: boolean): MutableRecord<T>;
    public override deepCopy(asMutable: boolean = false): MutableRecord<T> {
        const values = cloneEntries(this.items(), asMutable);
        return asMutable ? new MutableRecord<T>(values) : new this.#kind<T>(values);
    }
}
