import { EscrowEvent, EventSink } from './types';

/** Append-only event list, in commit order. */
export class EventLog implements EventSink {
    readonly events: EscrowEvent[] = [];

    emit(event: EscrowEvent): void {
        this.events.push(event);
    }

    named<N extends EscrowEvent['name']>(name: N): Extract<EscrowEvent, { name: N }>[] {
        return this.events.filter((e): e is Extract<EscrowEvent, { name: N }> => e.name === name);
    }
}
