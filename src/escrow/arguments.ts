import { ArgumentError } from './errors';

// Chaincode arguments arrive as strings.

const DIGITS = /^\d+$/;

export function parseAmount(raw: string, name: string): bigint {
    const text = raw.trim();
    if (!DIGITS.test(text)) throw new ArgumentError(`${name} must be a non-negative integer, got "${raw}"`);
    return BigInt(text);
}

export function parseInteger(raw: string, name: string): number {
    const text = raw.trim();
    const value = Number(text);
    if (!DIGITS.test(text) || !Number.isSafeInteger(value)) {
        throw new ArgumentError(`${name} must be a non-negative integer, got "${raw}"`);
    }
    return value;
}

export function parseBoolean(raw: string, name: string): boolean {
    switch (raw.trim().toLowerCase()) {
    case 'true':
        return true;
    case 'false':
        return false;
    default:
        throw new ArgumentError(`${name} must be "true" or "false", got "${raw}"`);
    }
}
