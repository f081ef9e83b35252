import { ErrorCode, RecordError } from '../Errors.js';
import { describeType } from './Ontology.js';
import type { FieldType } from './Types.js';

/**
 * Brings a supplied value in line with its declared type.
 * Absent values and undeclared fields pass through untouched.
 */
export function coerce(field: string, value: unknown, expected?: FieldType): unknown {
    if (value === undefined || value === null || expected === undefined) return value;
    if (expected.is(value)) return value;

    let cause: unknown;
    if (expected.convert) {
        try {
            return expected.convert(value);
        } catch (err) {
            cause = err;
        }
    }

    const actual = describeType(value);
    throw new RecordError(
        ErrorCode.TYPE_MISMATCH,
        `Field '${field}' expects ${expected.name}, got ${actual}`,
        { field, expected: expected.name, actual, cause }
    );
}
