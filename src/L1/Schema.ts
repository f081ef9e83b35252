import { ErrorCode, RecordError } from '../Errors.js';
import { checkInvariants } from '../L0/Invariants.js';
import { PROTOTYPE_KEYS, isReserved } from '../L0/Ontology.js';
import type { FieldType, Schema } from '../L0/Types.js';

/** What an accessor needs from the record it is installed on. */
interface AccessorHost {
    get(name: string): unknown;
    set(name: string, value: unknown): void;
}

/** A record class as seen by the registry. */
export interface SchemaSource {
    readonly name: string;
    readonly prototype: object;
    readonly fields?: Schema;
}

export interface RegisteredKind {
    readonly declared: ReadonlyMap<string, FieldType>;
    /** Field names any instance has stored so far. */
    readonly known: Set<string>;
}

function accessorFor(name: string): PropertyDescriptor {
    return {
        get(this: AccessorHost) {
            return this.get(name);
        },
        set(this: AccessorHost, value: unknown) {
            this.set(name, value);
        },
        enumerable: false,
        configurable: true
    };
}

/**
 * Per-class schema capture and accessor bookkeeping.
 * Entries are keyed by the class itself and vanish with it.
 */
export class SchemaRegistry {
    private kinds: WeakMap<SchemaSource, RegisteredKind> = new WeakMap();

    public register(kind: SchemaSource): RegisteredKind {
        const existing = this.kinds.get(kind);
        if (existing) return existing;

        const declared = new Map<string, FieldType>();
        for (const [field, type] of Object.entries(kind.fields ?? {})) {
            const result = checkInvariants({ kind: kind.name, field, type });
            if (!result.success) {
                throw new RecordError(ErrorCode.INVALID_SCHEMA, result.message ?? `Invalid schema for ${kind.name}`, {
                    kind: kind.name,
                    field,
                    invariant: result.code
                });
            }
            declared.set(field, type);
        }

        const entry: RegisteredKind = { declared, known: new Set() };
        this.kinds.set(kind, entry);
        return entry;
    }

    public isRegistered(kind: SchemaSource): boolean {
        return this.kinds.has(kind);
    }

    /**
     * Installs a get/set accessor for `name` on the class prototype the first
     * time the name is stored. Returns whether an accessor was installed.
     */
    public materialize(kind: SchemaSource, name: string): boolean {
        const entry = this.register(kind);
        if (isReserved(name) || entry.known.has(name)) return false;
        entry.known.add(name);

        if (PROTOTYPE_KEYS.has(name) || name in kind.prototype) return false;
        Object.defineProperty(kind.prototype, name, accessorFor(name));
        return true;
    }
}

export const SCHEMAS = new SchemaRegistry();
