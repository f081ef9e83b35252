export { DEFAULT_CONFIG, ENV_LOG_LEVEL, ENV_TEXT_INDENT, loadConfig, type RecordConfig } from './Config.js';
export { ErrorCode, RecordError, isRecordError } from './Errors.js';
export { Level, Logger, type LogContext } from './Logger.js';

export { coerce } from './L0/Coercion.js';
export {
    ABSENT,
    RESERVED_PREFIX,
    describeType,
    isRecordLike,
    isReserved,
    type FieldEntry,
    type FieldMapping,
    type FieldValues,
    type RecordLifecycle,
    type RecordLike,
    type SortOrder
} from './L0/Ontology.js';
export { Types, defineType, isFieldType, type FieldType, type FieldsOf, type RecordKind, type Schema } from './L0/Types.js';
export { SCHEMAS, SchemaRegistry } from './L1/Schema.js';
export { ImmutableRecord, type LockOptions } from './L2/ImmutableRecord.js';
export { LockTable } from './L2/LockTable.js';
export { MutableRecord } from './L2/MutableRecord.js';
export { cloneValue, type Cloneable } from './L3/DeepClone.js';
export { compareValues, deepEqual, type TypeFilter } from './L3/Structural.js';
export { type MappingOptions, type TextOptions } from './L4/Projection.js';
export { RecordBuilder } from './L5/RecordBuilder.js';
