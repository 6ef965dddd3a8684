export enum EscrowState {
    CREATED = 'CREATED',
    FUNDED = 'FUNDED',       // Value held in custody
    RELEASED = 'RELEASED',   // Paid to seller
    REFUNDED = 'REFUNDED'    // Returned to buyer
}

export interface Escrow {
    id: number;
    docType: 'escrow';

    buyer: string;
    seller: string;
    arbiter: string;

    amount: string;         // Decimal integer, e.g. "1000"
    deadline: number;       // Unix seconds
    description: string;

    state: EscrowState;

    createdAt: number;
    fundedAt?: number;
    settledAt?: number;
}

export interface EscrowDetails {
    id: number;
    buyer: string;
    seller: string;
    arbiter: string;
    amount: string;
    deadline: number;
    description: string;
    state: EscrowState;
    funded: boolean;
    released: boolean;
    refunded: boolean;
}

export function isTerminal(state: EscrowState): boolean {
    return state === EscrowState.RELEASED || state === EscrowState.REFUNDED;
}

export function toDetails(escrow: Escrow): EscrowDetails {
    return {
        id: escrow.id,
        buyer: escrow.buyer,
        seller: escrow.seller,
        arbiter: escrow.arbiter,
        amount: escrow.amount,
        deadline: escrow.deadline,
        description: escrow.description,
        state: escrow.state,
        funded: escrow.state !== EscrowState.CREATED,
        released: escrow.state === EscrowState.RELEASED,
        refunded: escrow.state === EscrowState.REFUNDED
    };
}
