/**
 * Who is calling, with how much value attached, at what ledger time.
 * The host runtime supplies all three; nothing is read from ambient state.
 */
export interface CallContext {
    caller: string;
    /** Attached value; `0n` when the call carries none. */
    value: bigint;
    /** Unix seconds. */
    timestamp: number;
}

export interface LedgerStore {
    get(key: string): Promise<Uint8Array | undefined>;
    put(key: string, value: Uint8Array): Promise<void>;
}

export interface ValueMover {
    /** Pay `amount` out of custody. Throwing aborts the calling transition. */
    transfer(to: string, amount: bigint, escrowId: number): Promise<void>;
}

export type EscrowEvent =
    | { name: 'Created'; escrowId: number; buyer: string; seller: string; arbiter: string; amount: string; deadline: number }
    | { name: 'Funded'; escrowId: number; buyer: string; amount: string }
    | { name: 'Released'; escrowId: number; seller: string; amount: string }
    | { name: 'RefundRequested'; escrowId: number; buyer: string; amount: string }
    | { name: 'DisputeResolved'; escrowId: number; arbiter: string; recipient: string; toSeller: boolean; amount: string }
    | { name: 'Paused'; account: string }
    | { name: 'Unpaused'; account: string };

export interface EventSink {
    emit(event: EscrowEvent): void;
}

export interface EscrowLogger {
    debug(message: string, ...meta: unknown[]): void;
    info(message: string, ...meta: unknown[]): void;
    warn(message: string, ...meta: unknown[]): void;
}
