import { ValueMover } from '../escrow/types';
import { Payout } from '../models/Payout';
import { encode } from './codec';
import { ChaincodeStub } from './StubLedger';

export function payoutKey(escrowId: number): string {
    return `PAYOUT_${escrowId}`;
}

/**
 * Fabric has no native currency: a payout is recorded in world state as an
 * instruction for the off-chain settlement layer, at most one per escrow.
 */
export class PayoutLedgerMover implements ValueMover {
    constructor(private readonly stub: Pick<ChaincodeStub, 'getState' | 'putState' | 'getTxID' | 'getDateTimestamp'>) {}

    async transfer(to: string, amount: bigint, escrowId: number): Promise<void> {
        const key = payoutKey(escrowId);
        const existing = await this.stub.getState(key);
        if (existing && existing.length > 0) throw new Error(`Payout for escrow ${escrowId} already recorded`);

        const payout: Payout = {
            id: key,
            docType: 'payout',
            escrowId,
            recipient: to,
            amount: amount.toString(),
            txId: this.stub.getTxID(),
            recordedAt: Math.floor(this.stub.getDateTimestamp().getTime() / 1000)
        };
        await this.stub.putState(key, encode(payout));
    }
}
