export interface Payout {
    id: string;             // "PAYOUT_1"
    docType: 'payout';

    escrowId: number;
    recipient: string;
    amount: string;

    txId: string;
    recordedAt: number;     // Unix seconds
}
