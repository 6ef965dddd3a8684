export type EscrowErrorKind =
    | 'authorization'
    | 'state'
    | 'value'
    | 'timing'
    | 'transfer'
    | 'not-found'
    | 'paused'
    | 'argument';

/**
 * Base class of every rejection raised by the registry. A rejected call has
 * no effect on the ledger.
 */
export abstract class EscrowError extends Error {
    abstract readonly kind: EscrowErrorKind;

    constructor(message: string, readonly escrowId?: number, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

export class AuthorizationError extends EscrowError {
    readonly kind = 'authorization';

    constructor(readonly caller: string, readonly requiredRole: string, escrowId?: number) {
        super(
            escrowId === undefined
                ? `Unauthorized: caller is not the ${requiredRole}`
                : `Unauthorized: caller is not the ${requiredRole} of escrow ${escrowId}`,
            escrowId
        );
    }
}

export class StateError extends EscrowError {
    readonly kind = 'state';
}

export class ValueError extends EscrowError {
    readonly kind = 'value';

    constructor(readonly expected: bigint, readonly received: bigint, escrowId: number) {
        super(`Attached value ${received} does not match escrow amount ${expected}`, escrowId);
    }
}

export class TimingError extends EscrowError {
    readonly kind = 'timing';

    constructor(readonly deadline: number, readonly now: number, escrowId: number) {
        super(`Escrow ${escrowId} deadline ${deadline} has not passed (now ${now})`, escrowId);
    }
}

export class TransferError extends EscrowError {
    readonly kind = 'transfer';

    constructor(readonly recipient: string, escrowId: number, cause: Error) {
        super(`Transfer to ${recipient} for escrow ${escrowId} failed: ${cause.message}`, escrowId, { cause });
    }
}

export class NotFoundError extends EscrowError {
    readonly kind = 'not-found';

    constructor(escrowId: number) {
        super(`Escrow ${escrowId} not found`, escrowId);
    }
}

export class PausedError extends EscrowError {
    readonly kind = 'paused';

    constructor() {
        super('Registry is paused');
    }
}

export class ArgumentError extends EscrowError {
    readonly kind = 'argument';
}

export function toError(err: unknown): Error {
    return err instanceof Error
        ? err
        : new Error('Invalid error type', { cause: err });
}
