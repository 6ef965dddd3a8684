import { LedgerStore } from '../escrow/types';

export function encode(value: unknown): Uint8Array {
    return Buffer.from(JSON.stringify(value));
}

export function decode<T>(data: Uint8Array): T {
    return JSON.parse(Buffer.from(data).toString('utf8'));
}

export async function readJson<T>(ledger: LedgerStore, key: string): Promise<T | undefined> {
    const data = await ledger.get(key);
    if (!data || data.length === 0) return undefined;
    return decode<T>(data);
}

export async function writeJson(ledger: LedgerStore, key: string, value: unknown): Promise<void> {
    await ledger.put(key, encode(value));
}
