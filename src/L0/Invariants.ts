import { PROTOTYPE_KEYS, isReserved } from './Ontology.js';
import { isFieldType } from './Types.js';

export type InvariantCode =
    | 'INV_SCH_01' | 'INV_SCH_02' | 'INV_SCH_03' | 'INV_SCH_04';

export interface InvariantResult {
    success: boolean;
    code?: InvariantCode;
    message?: string;
}

/** One declared entry of a record class's schema. */
export interface InvariantContext {
    kind: string;
    field: string;
    type: unknown;
}

export type Invariant = (context: InvariantContext) => InvariantResult;

const PASS = (): InvariantResult => ({ success: true });
const FAIL = (code: InvariantCode, message: string): InvariantResult => ({ success: false, code, message });

// --- Schema Integrity ---

export const INV_SCH_01: Invariant = ({ kind, field }) => {
    if (field.trim() === '') return FAIL('INV_SCH_01', `${kind} declares a blank field name`);
    return PASS();
};

export const INV_SCH_02: Invariant = ({ kind, field }) => {
    // Reserved names are bookkeeping and are never typed.
    if (isReserved(field)) return FAIL('INV_SCH_02', `${kind} declares reserved field '${field}'`);
    return PASS();
};

export const INV_SCH_03: Invariant = ({ kind, field }) => {
    if (PROTOTYPE_KEYS.has(field)) return FAIL('INV_SCH_03', `${kind} declares forbidden field '${field}'`);
    return PASS();
};

export const INV_SCH_04: Invariant = ({ kind, field, type }) => {
    if (!isFieldType(type)) return FAIL('INV_SCH_04', `${kind}.${field} is not a field type`);
    return PASS();
};

// --- Aggregation ---

// Prototype keys first: `__proto__` also carries the reserved prefix.
export const AllInvariants = [INV_SCH_01, INV_SCH_03, INV_SCH_02, INV_SCH_04];

export const checkInvariants = (context: InvariantContext): InvariantResult => {
    for (const inv of AllInvariants) {
        const res = inv(context);
        if (!res.success) return res;
    }
    return PASS();
};
