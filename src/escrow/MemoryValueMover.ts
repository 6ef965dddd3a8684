import { ValueMover } from './types';

export interface RecordedTransfer {
    to: string;
    amount: bigint;
    escrowId: number;
}

type TransferHook = (transfer: RecordedTransfer) => Promise<void>;

/**
 * Value mover that keeps payouts in memory. Recipients can be told to reject
 * incoming transfers, and a hook can run while a transfer is in flight, the
 * way a recipient would call back into the registry.
 */
export class MemoryValueMover implements ValueMover {
    readonly transfers: RecordedTransfer[] = [];
    private readonly rejecting = new Set<string>();
    private hook?: TransferHook;

    rejectFrom(recipient: string): void {
        this.rejecting.add(recipient);
    }

    acceptFrom(recipient: string): void {
        this.rejecting.delete(recipient);
    }

    onTransfer(hook: TransferHook | undefined): void {
        this.hook = hook;
    }

    balanceOf(recipient: string): bigint {
        return this.transfers
            .filter(t => t.to === recipient)
            .reduce((sum, t) => sum + t.amount, 0n);
    }

    async transfer(to: string, amount: bigint, escrowId: number): Promise<void> {
        const transfer = { to, amount, escrowId };
        if (this.hook) await this.hook(transfer);
        if (this.rejecting.has(to)) throw new Error(`Recipient ${to} rejected the transfer`);
        this.transfers.push(transfer);
    }
}
