import { Context } from 'fabric-contract-api';
import { EscrowEvent, EventSink, LedgerStore } from '../escrow/types';
import { encode } from './codec';

export type ChaincodeStub = Context['stub'];

/** World state of the current transaction as a ledger store. */
export class StubLedger implements LedgerStore {
    constructor(private readonly stub: Pick<ChaincodeStub, 'getState' | 'putState'>) {}

    async get(key: string): Promise<Uint8Array | undefined> {
        const data = await this.stub.getState(key);
        return data && data.length > 0 ? data : undefined;
    }

    async put(key: string, value: Uint8Array): Promise<void> {
        await this.stub.putState(key, value);
    }
}

/**
 * Publishes registry events as chaincode events. Fabric keeps one event per
 * transaction, and every registry call emits exactly one.
 */
export class StubEventSink implements EventSink {
    constructor(private readonly stub: Pick<ChaincodeStub, 'setEvent'>) {}

    emit(event: EscrowEvent): void {
        this.stub.setEvent(event.name, encode(event));
    }
}
