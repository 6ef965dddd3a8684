import { Escrow, EscrowState, isTerminal } from '../models/Escrow';
import { AuthorizationError, EscrowError, StateError, TimingError, ValueError } from './errors';
import { CallContext } from './types';

/** Returns the violation, or undefined when the call may proceed. */
export type Guard = (call: CallContext, escrow: Escrow) => EscrowError | undefined;

export const onlyBuyer: Guard = (call, escrow) =>
    call.caller === escrow.buyer ? undefined : new AuthorizationError(call.caller, 'buyer', escrow.id);

export const onlySeller: Guard = (call, escrow) =>
    call.caller === escrow.seller ? undefined : new AuthorizationError(call.caller, 'seller', escrow.id);

export const onlyArbiter: Guard = (call, escrow) =>
    call.caller === escrow.arbiter ? undefined : new AuthorizationError(call.caller, 'arbiter', escrow.id);

export const notSettled: Guard = (_call, escrow) =>
    isTerminal(escrow.state) ? new StateError(`Escrow ${escrow.id} is already ${escrow.state}`, escrow.id) : undefined;

export const notFunded: Guard = (_call, escrow) =>
    escrow.state === EscrowState.CREATED ? undefined : new StateError(`Escrow ${escrow.id} is already funded`, escrow.id);

// Terminal records are reported as settled rather than unfunded.
export const funded: Guard = (call, escrow) => {
    const settled = notSettled(call, escrow);
    if (settled) return settled;
    return escrow.state === EscrowState.FUNDED ? undefined : new StateError(`Escrow ${escrow.id} is not funded`, escrow.id);
};

export const exactValue: Guard = (call, escrow) => {
    const expected = BigInt(escrow.amount);
    return call.value === expected ? undefined : new ValueError(expected, call.value, escrow.id);
};

export const deadlinePassed: Guard = (call, escrow) =>
    call.timestamp > escrow.deadline ? undefined : new TimingError(escrow.deadline, call.timestamp, escrow.id);

/** Evaluates guards in order and throws the first violation. */
export function check(call: CallContext, escrow: Escrow, ...guards: Guard[]): void {
    for (const guard of guards) {
        const violation = guard(call, escrow);
        if (violation) throw violation;
    }
}
