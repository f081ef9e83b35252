import { inspect } from 'util';
import { loadConfig } from '../Config.js';
import { ErrorCode, RecordError } from '../Errors.js';
import { Logger } from '../Logger.js';
import { type FieldValues, hasOwn, isPlainObject } from '../L0/Ontology.js';
import { ImmutableRecord } from '../L2/ImmutableRecord.js';

const logger = Logger.get('RecordBuilder', loadConfig().logLevel);

/**
 * Immutable record around a single `configuration` object. The field itself
 * is locked; the options inside it stay writable through the indexed
 * operations. Subclasses supply `build()`.
 */
export class RecordBuilder<TProduct = unknown> extends ImmutableRecord<{ configuration: FieldValues }> {
    public constructor(values: FieldValues = {}) {
        const configuration = isPlainObject(values.configuration) ? { ...values.configuration } : {};
        super({ ...values, configuration });
    }

    protected get configuration(): FieldValues {
        const configuration = this.get('configuration');
        if (!isPlainObject(configuration)) {
            throw new RecordError(ErrorCode.TYPE_MISMATCH, `${this.recordKind.name}.configuration is not an object`, {
                kind: this.recordKind.name,
                field: 'configuration'
            });
        }
        return configuration;
    }

    public override contains(item: unknown): boolean {
        return typeof item === 'string' && hasOwn(this.configuration, item);
    }

    public override getItem(name: string): unknown {
        const configuration = this.configuration;
        if (!hasOwn(configuration, name)) throw this.missing(name);
        return configuration[name];
    }

    public override setItem(name: string, value: unknown): void {
        Object.defineProperty(this.configuration, name, { value, writable: true, enumerable: true, configurable: true });
    }

    public override deleteItem(name: string): void {
        const configuration = this.configuration;
        if (!hasOwn(configuration, name)) throw this.missing(name);
        delete configuration[name];
    }

    public configure(options: FieldValues): this {
        for (const [name, value] of Object.entries(options)) this.setItem(name, value);
        return this;
    }

    public override toString(): string {
        return inspect(this.configuration);
    }

    public build(): TProduct {
        throw new RecordError(ErrorCode.NOT_IMPLEMENTED, `${this.recordKind.name}.build() is not implemented`, {
            kind: this.recordKind.name
        });
    }

    /** `build()` with a debug trace of the options it ran with. */
    public create(): TProduct {
        logger.debug(`${this.recordKind.name}: building`, { options: Object.keys(this.configuration).join('|') });
        return this.build();
    }

    private missing(name: string): RecordError {
        return new RecordError(ErrorCode.NOT_FOUND, `'${name}' not found in ${this.recordKind.name} configuration`, {
            kind: this.recordKind.name,
            field: name
        });
    }
}
