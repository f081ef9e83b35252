import { type RecordLifecycle, isReserved } from '../L0/Ontology.js';

/**
 * Per-instance lock state of an immutable record.
 * Starts UNLOCKED while the record is constructed and is sealed exactly once.
 */
export class LockTable {
    private entries: Map<string, boolean> = new Map();
    private lifecycle: RecordLifecycle = 'UNLOCKED';

    public get state(): RecordLifecycle {
        return this.lifecycle;
    }

    public seal(names: Iterable<string>): void {
        if (this.lifecycle === 'LOCKED') throw new Error('LockTable: already sealed');
        for (const name of names) {
            if (!isReserved(name)) this.entries.set(name, true);
        }
        this.lifecycle = 'LOCKED';
    }

    public isRegistered(name: string): boolean {
        return this.entries.has(name);
    }

    public isLocked(name: string): boolean {
        return this.entries.get(name) ?? false;
    }

    public lock(name: string): void {
        this.entries.set(name, true);
    }

    public unlock(name: string): void {
        this.entries.set(name, false);
    }

    public release(name: string): void {
        this.entries.delete(name);
    }

    public snapshot(): Record<string, boolean> {
        return Object.fromEntries(this.entries);
    }
}
