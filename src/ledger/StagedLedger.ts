import { LedgerStore } from '../escrow/types';

/**
 * Write overlay over another ledger. Reads see staged writes first; nothing
 * reaches the base until commit(). Dropping the instance discards the writes.
 */
export class StagedLedger implements LedgerStore {
    private readonly writes = new Map<string, Uint8Array>();

    constructor(private readonly base: LedgerStore) {}

    async get(key: string): Promise<Uint8Array | undefined> {
        const staged = this.writes.get(key);
        if (staged) return staged;
        return this.base.get(key);
    }

    async put(key: string, value: Uint8Array): Promise<void> {
        this.stage(key, value);
    }

    async commit(): Promise<void> {
        for (const [key, value] of this.writes) {
            await this.base.put(key, value);
        }
        this.writes.clear();
    }

    /** Moves the staged writes onto another overlay without yielding. */
    mergeInto(target: StagedLedger): void {
        for (const [key, value] of this.writes) {
            target.stage(key, value);
        }
        this.writes.clear();
    }

    private stage(key: string, value: Uint8Array): void {
        // Re-insert so commit order follows the latest write.
        this.writes.delete(key);
        this.writes.set(key, value);
    }
}
