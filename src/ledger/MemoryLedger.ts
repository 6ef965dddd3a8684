import { LedgerStore } from '../escrow/types';

/**
 * In-memory ledger for embedding the registry in a process and for tests.
 */
export class MemoryLedger implements LedgerStore {
    private readonly state = new Map<string, Uint8Array>();

    async get(key: string): Promise<Uint8Array | undefined> {
        const value = this.state.get(key);
        return value ? Uint8Array.from(value) : undefined;
    }

    async put(key: string, value: Uint8Array): Promise<void> {
        this.state.set(key, Uint8Array.from(value));
    }

    keys(): string[] {
        return [...this.state.keys()];
    }
}
