/**
 * Projection
 * Turns a record's fields into a plain object or JSON text, and JSON text back
 * into construction values.
 *
 * Text is written by hand rather than through `JSON.stringify` on an object so
 * that integer-like field names keep their insertion position.
 */
import { loadConfig } from '../Config.js';
import { ErrorCode, RecordError } from '../Errors.js';
import { Logger } from '../Logger.js';
import {
    type FieldEntry,
    type FieldValues,
    type SortOrder,
    describeType,
    isPlainObject,
    isRecordLike,
    isReserved
} from '../L0/Ontology.js';

const config = loadConfig();
const logger = Logger.get('Projection', config.logLevel);

export interface MappingOptions {
    exclude?: readonly string[];
    sort?: SortOrder;
    /** Keep `_`-prefixed bookkeeping fields. */
    includeReserved?: boolean;
}

export interface TextOptions {
    exclude?: readonly string[];
    sortKeys?: boolean;
    indent?: number;
}

function byName(a: FieldEntry, b: FieldEntry): number {
    return a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0;
}

function select(entries: Iterable<FieldEntry>, exclude: readonly string[], includeReserved: boolean): FieldEntry[] {
    const excluded = new Set(exclude);
    return [...entries].filter(([name]) => (includeReserved || !isReserved(name)) && !excluded.has(name));
}

export function toMapping(entries: Iterable<FieldEntry>, options: MappingOptions = {}): FieldValues {
    const { exclude = [], sort = 'none', includeReserved = false } = options;
    const selected = select(entries, exclude, includeReserved);
    if (sort === 'ascending') selected.sort(byName);
    if (sort === 'descending') selected.sort((a, b) => byName(b, a));
    return Object.fromEntries(selected);
}

// --- JSON writer ---

class JsonObject {
    constructor(public readonly entries: Array<[string, JsonNode]>) { }
}

type JsonNode = null | boolean | number | string | JsonNode[] | JsonObject;

function unsupported(value: unknown, path: string): never {
    throw new RecordError(ErrorCode.NOT_SERIALIZABLE, `Cannot write ${describeType(value)} at ${path} as text`, {
        path,
        actual: describeType(value)
    });
}

function objectNode(entries: FieldEntry[], sortKeys: boolean, path: string, stack: Set<object>): JsonObject {
    const ordered = sortKeys ? [...entries].sort(byName) : entries;
    return new JsonObject(ordered.map(([key, item]): [string, JsonNode] => [key, toNode(item, sortKeys, `${path}.${key}`, stack)]));
}

function toNode(value: unknown, sortKeys: boolean, path: string, stack: Set<object>): JsonNode {
    if (value === undefined || value === null) return null;
    if (typeof value === 'boolean' || typeof value === 'string') return value;
    if (typeof value === 'number') return Number.isFinite(value) ? value : null;
    if (typeof value !== 'object') return unsupported(value, path);
    if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : value.toISOString();

    if (stack.has(value)) return unsupported(value, path);
    stack.add(value);
    try {
        if (isRecordLike(value)) return objectNode(value.entries(), sortKeys, path, stack);
        if (Array.isArray(value) || value instanceof Set) {
            return [...value].map((item, i) => toNode(item, sortKeys, `${path}[${i}]`, stack));
        }
        if (value instanceof Map) {
            const entries: FieldEntry[] = [];
            for (const [key, item] of value) {
                if (typeof key !== 'string' && typeof key !== 'number') return unsupported(key, path);
                entries.push([String(key), item]);
            }
            return objectNode(entries, sortKeys, path, stack);
        }
        if ('toJSON' in value && typeof value.toJSON === 'function') {
            const projected: unknown = value.toJSON();
            return toNode(projected, sortKeys, path, stack);
        }
        return objectNode(Object.entries(value), sortKeys, path, stack);
    } finally {
        stack.delete(value);
    }
}

function write(node: JsonNode, indent: number, depth: number): string {
    if (node instanceof JsonObject) {
        const parts = node.entries.map(([key, item]) => `${JSON.stringify(key)}:${indent > 0 ? ' ' : ''}${write(item, indent, depth + 1)}`);
        return wrap('{', '}', parts, indent, depth);
    }
    if (Array.isArray(node)) return wrap('[', ']', node.map((item) => write(item, indent, depth + 1)), indent, depth);
    return JSON.stringify(node);
}

function wrap(open: string, close: string, parts: string[], indent: number, depth: number): string {
    if (parts.length === 0) return `${open}${close}`;
    if (indent <= 0) return `${open}${parts.join(',')}${close}`;
    const inner = ' '.repeat(indent * (depth + 1));
    const outer = ' '.repeat(indent * depth);
    return `${open}\n${inner}${parts.join(`,\n${inner}`)}\n${outer}${close}`;
}

/** JSON text of the non-reserved fields, in insertion order unless `sortKeys`. */
export function toText(entries: Iterable<FieldEntry>, options: TextOptions = {}): string {
    const { exclude = [], sortKeys = false, indent = config.textIndent } = options;
    const root = objectNode(select(entries, exclude, false), sortKeys, '$', new Set());
    return write(root, indent, 0);
}

/** Decodes JSON text that must hold an object. */
export function parseText(text: string, kind: string): FieldValues {
    let parsed: unknown;
    try {
        parsed = JSON.parse(text);
    } catch (err) {
        const detail = err instanceof Error ? err.message : String(err);
        logger.warning(`${kind}.fromText rejected malformed text`, { length: text.length });
        throw new RecordError(ErrorCode.INVALID_TEXT, `Cannot decode text for ${kind}: ${detail}`, { kind });
    }
    if (!isPlainObject(parsed)) {
        logger.warning(`${kind}.fromText rejected non-object text`, { actual: describeType(parsed) });
        throw new RecordError(ErrorCode.INVALID_TEXT, `Text for ${kind} must decode to an object, got ${describeType(parsed)}`, { kind });
    }
    return parsed;
}
