import { AsyncLocalStorage } from 'node:async_hooks';
import { Escrow, EscrowDetails, EscrowState, toDetails } from '../models/Escrow';
import { readJson, writeJson } from '../ledger/codec';
import { StagedLedger } from '../ledger/StagedLedger';
import { ArgumentError, AuthorizationError, EscrowError, NotFoundError, PausedError, StateError, TransferError, toError } from './errors';
import { check, deadlinePassed, exactValue, funded, notFunded, notSettled, onlyArbiter, onlyBuyer, onlySeller } from './guards';
import { CallContext, EscrowEvent, EscrowLogger, EventSink, LedgerStore, ValueMover } from './types';

export const COUNTER_KEY = 'ESCROW_COUNTER';
export const OWNER_KEY = 'REGISTRY_OWNER';
export const PAUSED_KEY = 'REGISTRY_PAUSED';

export function escrowKey(id: number): string {
    return `ESCROW_${id}`;
}

export interface EscrowRegistryOptions {
    store: LedgerStore;
    mover: ValueMover;
    events?: EventSink;
    logger?: EscrowLogger;
    /** Fixes the owner up front; `initialize` is then refused. */
    owner?: string;
}

interface CallFrame {
    ledger: StagedLedger;
    events: EscrowEvent[];
    closed: boolean;
}

const silent: EscrowLogger = {
    debug: () => undefined,
    info: () => undefined,
    warn: () => undefined
};

/**
 * Registry of independent escrow records.
 *
 * Every mutating call runs in its own frame: writes are staged and events
 * buffered until the call returns, then committed together. A call that
 * throws leaves no trace. Top-level calls run one at a time; a call issued
 * from inside a running call (e.g. by the value mover during a payout) runs
 * as a nested frame that sees the outer call's staged state.
 */
export class EscrowRegistry {
    private readonly store: LedgerStore;
    private readonly mover: ValueMover;
    private readonly sink?: EventSink;
    private readonly logger: EscrowLogger;
    private readonly owner?: string;
    private readonly frames = new AsyncLocalStorage<CallFrame>();
    private queue: Promise<void> = Promise.resolve();

    constructor(options: EscrowRegistryOptions) {
        this.store = options.store;
        this.mover = options.mover;
        this.sink = options.events;
        this.logger = options.logger ?? silent;
        this.owner = options.owner;
    }

    // --- Access control overlay ---

    async initialize(call: CallContext): Promise<void> {
        await this.run('initialize', async (frame) => {
            const owner = await this.readOwner(frame.ledger);
            if (owner !== undefined) throw new StateError('Registry is already initialized');

            await writeJson(frame.ledger, OWNER_KEY, call.caller);
            await writeJson(frame.ledger, PAUSED_KEY, false);
        });
    }

    async pause(call: CallContext): Promise<void> {
        await this.run('pause', async (frame) => {
            await this.requireOwner(frame.ledger, call);
            if (await this.readPaused(frame.ledger)) throw new StateError('Registry is already paused');

            await writeJson(frame.ledger, PAUSED_KEY, true);
            frame.events.push({ name: 'Paused', account: call.caller });
        });
    }

    async unpause(call: CallContext): Promise<void> {
        await this.run('unpause', async (frame) => {
            await this.requireOwner(frame.ledger, call);
            if (!(await this.readPaused(frame.ledger))) throw new StateError('Registry is not paused');

            await writeJson(frame.ledger, PAUSED_KEY, false);
            frame.events.push({ name: 'Unpaused', account: call.caller });
        });
    }

    // --- Escrow lifecycle ---

    async createEscrow(
        call: CallContext,
        seller: string,
        arbiter: string,
        amount: bigint,
        durationSeconds: number,
        description: string
    ): Promise<number> {
        return this.run('createEscrow', async (frame) => {
            await this.requireNotPaused(frame.ledger);
            if (amount <= 0n) throw new ArgumentError(`Amount must be positive, got ${amount}`);
            if (!Number.isSafeInteger(durationSeconds) || durationSeconds < 0) {
                throw new ArgumentError(`Duration must be a non-negative whole number of seconds, got ${durationSeconds}`);
            }
            const deadline = call.timestamp + durationSeconds;
            if (!Number.isSafeInteger(deadline)) {
                throw new ArgumentError(`Duration ${durationSeconds} puts the deadline out of range`);
            }

            const id = (await readJson<number>(frame.ledger, COUNTER_KEY)) ?? 1;
            const escrow: Escrow = {
                id,
                docType: 'escrow',
                buyer: call.caller,
                seller,
                arbiter,
                amount: amount.toString(),
                deadline,
                description,
                state: EscrowState.CREATED,
                createdAt: call.timestamp
            };

            await writeJson(frame.ledger, escrowKey(id), escrow);
            await writeJson(frame.ledger, COUNTER_KEY, id + 1);
            frame.events.push({
                name: 'Created',
                escrowId: id,
                buyer: escrow.buyer,
                seller,
                arbiter,
                amount: escrow.amount,
                deadline: escrow.deadline
            });
            return id;
        });
    }

    async fundEscrow(call: CallContext, escrowId: number): Promise<void> {
        await this.run('fundEscrow', async (frame) => {
            await this.requireNotPaused(frame.ledger);
            const escrow = await this.load(frame.ledger, escrowId);
            check(call, escrow, onlyBuyer, notSettled, notFunded, exactValue);

            escrow.state = EscrowState.FUNDED;
            escrow.fundedAt = call.timestamp;
            await writeJson(frame.ledger, escrowKey(escrowId), escrow);
            frame.events.push({ name: 'Funded', escrowId, buyer: escrow.buyer, amount: escrow.amount });
        });
    }

    async releaseFunds(call: CallContext, escrowId: number): Promise<void> {
        await this.run('releaseFunds', async (frame) => {
            await this.requireNotPaused(frame.ledger);
            const escrow = await this.load(frame.ledger, escrowId);
            check(call, escrow, onlySeller, funded);

            await this.settle(frame, call, escrow, EscrowState.RELEASED, {
                name: 'Released',
                escrowId,
                seller: escrow.seller,
                amount: escrow.amount
            });
        });
    }

    async requestRefund(call: CallContext, escrowId: number): Promise<void> {
        await this.run('requestRefund', async (frame) => {
            await this.requireNotPaused(frame.ledger);
            const escrow = await this.load(frame.ledger, escrowId);
            check(call, escrow, onlyBuyer, funded, deadlinePassed);

            await this.settle(frame, call, escrow, EscrowState.REFUNDED, {
                name: 'RefundRequested',
                escrowId,
                buyer: escrow.buyer,
                amount: escrow.amount
            });
        });
    }

    async resolveDispute(call: CallContext, escrowId: number, toSeller: boolean): Promise<void> {
        await this.run('resolveDispute', async (frame) => {
            await this.requireNotPaused(frame.ledger);
            const escrow = await this.load(frame.ledger, escrowId);
            check(call, escrow, onlyArbiter, funded);

            await this.settle(frame, call, escrow, toSeller ? EscrowState.RELEASED : EscrowState.REFUNDED, {
                name: 'DisputeResolved',
                escrowId,
                arbiter: escrow.arbiter,
                recipient: toSeller ? escrow.seller : escrow.buyer,
                toSeller,
                amount: escrow.amount
            });
        });
    }

    // --- Queries ---

    async getEscrowDetails(escrowId: number): Promise<EscrowDetails> {
        return toDetails(await this.getEscrow(escrowId));
    }

    async getEscrow(escrowId: number): Promise<Escrow> {
        return this.load(this.view(), escrowId);
    }

    async getEscrowCount(): Promise<number> {
        const next = (await readJson<number>(this.view(), COUNTER_KEY)) ?? 1;
        return next - 1;
    }

    async getOwner(): Promise<string | undefined> {
        return this.readOwner(this.view());
    }

    async isPaused(): Promise<boolean> {
        return this.readPaused(this.view());
    }

    /** Sum of the amounts held for FUNDED escrows. */
    async getCustodyBalance(): Promise<bigint> {
        const ledger = this.view();
        const next = (await readJson<number>(ledger, COUNTER_KEY)) ?? 1;
        let total = 0n;
        for (let id = 1; id < next; id++) {
            const escrow = await readJson<Escrow>(ledger, escrowKey(id));
            if (escrow?.state === EscrowState.FUNDED) total += BigInt(escrow.amount);
        }
        return total;
    }

    // --- Internals ---

    /**
     * Moves the record to its terminal state, then pays out. The state is
     * staged before the mover runs so a callback into the registry during
     * the payout is rejected by the guards.
     */
    private async settle(
        frame: CallFrame,
        call: CallContext,
        escrow: Escrow,
        state: EscrowState.RELEASED | EscrowState.REFUNDED,
        event: EscrowEvent
    ): Promise<void> {
        const amount = BigInt(escrow.amount);
        const recipient = state === EscrowState.RELEASED ? escrow.seller : escrow.buyer;

        escrow.state = state;
        escrow.settledAt = call.timestamp;
        await writeJson(frame.ledger, escrowKey(escrow.id), escrow);
        frame.events.push(event);

        try {
            await this.mover.transfer(recipient, amount, escrow.id);
        } catch (err) {
            throw new TransferError(recipient, escrow.id, toError(err));
        }
    }

    private async run<T>(operation: string, body: (frame: CallFrame) => Promise<T>): Promise<T> {
        const parent = this.frames.getStore();
        if (parent && !parent.closed) {
            return this.execute(operation, parent.ledger, parent, body);
        }

        const result = this.queue.then(() => this.execute(operation, this.store, undefined, body));
        // The queue only orders calls; each caller observes its own outcome through `result`.
        this.queue = result.then(() => undefined, () => undefined);
        return result;
    }

    private async execute<T>(
        operation: string,
        base: LedgerStore,
        parent: CallFrame | undefined,
        body: (frame: CallFrame) => Promise<T>
    ): Promise<T> {
        const frame: CallFrame = { ledger: new StagedLedger(base), events: [], closed: false };
        let result: T;
        try {
            result = await this.frames.run(frame, () => body(frame));
        } catch (err) {
            frame.closed = true;
            if (err instanceof EscrowError) {
                this.logger.debug(`${operation} rejected: ${err.message}`, { kind: err.kind, escrowId: err.escrowId });
            }
            throw err;
        }

        frame.closed = true;
        if (parent) {
            // No await between this check and the merge.
            if (parent.closed) {
                const err = new StateError(`${operation} was still running when the call that started it finished`);
                this.logger.debug(`${operation} rejected: ${err.message}`, { kind: err.kind });
                throw err;
            }
            frame.ledger.mergeInto(parent.ledger);
            parent.events.push(...frame.events);
            return result;
        }

        await frame.ledger.commit();
        this.publish(operation, frame.events);
        return result;
    }

    /** Delivers committed events; delivery failures are logged, not thrown. */
    private publish(operation: string, events: EscrowEvent[]): void {
        for (const event of events) {
            try {
                this.sink?.emit(event);
                this.logger.info(`${operation} committed: ${event.name}`, event);
            } catch (err) {
                this.logger.warn(`${operation} committed, but publishing ${event.name} failed: ${toError(err).message}`);
            }
        }
    }

    /** Current frame's staged view inside a call, the committed ledger outside one. */
    private view(): LedgerStore {
        const frame = this.frames.getStore();
        return frame && !frame.closed ? frame.ledger : this.store;
    }

    private async load(ledger: LedgerStore, escrowId: number): Promise<Escrow> {
        if (!Number.isSafeInteger(escrowId) || escrowId < 1) throw new NotFoundError(escrowId);
        const escrow = await readJson<Escrow>(ledger, escrowKey(escrowId));
        if (!escrow) throw new NotFoundError(escrowId);
        return escrow;
    }

    private async readPaused(ledger: LedgerStore): Promise<boolean> {
        return (await readJson<boolean>(ledger, PAUSED_KEY)) ?? false;
    }

    private async requireNotPaused(ledger: LedgerStore): Promise<void> {
        if (await this.readPaused(ledger)) throw new PausedError();
    }

    private async requireOwner(ledger: LedgerStore, call: CallContext): Promise<void> {
        const owner = await this.readOwner(ledger);
        if (owner === undefined || owner !== call.caller) throw new AuthorizationError(call.caller, 'owner');
    }

    private async readOwner(ledger: LedgerStore): Promise<string | undefined> {
        return this.owner ?? readJson<string>(ledger, OWNER_KEY);
    }
}
