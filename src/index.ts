/*
 * SPDX-License-Identifier: Apache-2.0
 */

import {type Contract} from 'fabric-contract-api';
import { EscrowContract } from './contracts/EscrowContract';

export { EscrowContract } from './contracts/EscrowContract';
export { EscrowRegistry } from './escrow/EscrowRegistry';
export type { EscrowRegistryOptions } from './escrow/EscrowRegistry';
export { EventLog } from './escrow/EventLog';
export { MemoryValueMover } from './escrow/MemoryValueMover';
export { MemoryLedger } from './ledger/MemoryLedger';
export * from './escrow/errors';
export type { CallContext, EscrowEvent, EventSink, LedgerStore, ValueMover } from './escrow/types';
export { EscrowState } from './models/Escrow';
export type { Escrow, EscrowDetails } from './models/Escrow';

export const contracts: typeof Contract[] = [
    EscrowContract,
];
