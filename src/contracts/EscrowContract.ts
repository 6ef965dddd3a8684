import 'reflect-metadata';
import { Context, Info, Transaction } from 'fabric-contract-api';
import { ChaincodeConfig, loadConfig } from '../config';
import { parseAmount, parseBoolean, parseInteger } from '../escrow/arguments';
import { AuthorizationError, EscrowError } from '../escrow/errors';
import { EscrowRegistry } from '../escrow/EscrowRegistry';
import { PayoutLedgerMover, payoutKey } from '../ledger/PayoutLedgerMover';
import { StubEventSink, StubLedger } from '../ledger/StubLedger';
import { Escrow, toDetails } from '../models/Escrow';
import { BaseContract } from './BaseContract';

const LOGGER_NAME = 'EscrowContract';

@Info({ title: 'EscrowContract', description: 'Custodial escrow between buyer, seller and arbiter' })
export class EscrowContract extends BaseContract {
    private readonly config: ChaincodeConfig;

    constructor() {
        super('EscrowContract');
        this.config = loadConfig();
    }

    async beforeTransaction(ctx: Context): Promise<void> {
        ctx.logging.setLevel(this.config.logLevel);
    }

    // --- Access control ---

    @Transaction()
    async InitLedger(ctx: Context): Promise<void> {
        await this.invoke(ctx, 'InitLedger', registry => {
            const client = this.getClient(ctx);
            const adminMsp = this.config.adminMspId;
            if (!adminMsp) throw new AuthorizationError(client.id, 'administrator (ESCROW_ADMIN_MSP is not set)');
            if (client.mspId !== adminMsp) throw new AuthorizationError(client.id, `${adminMsp} administrator`);
            return registry.initialize(this.callContext(ctx));
        });
    }

    @Transaction()
    async Pause(ctx: Context): Promise<void> {
        await this.invoke(ctx, 'Pause', registry => registry.pause(this.callContext(ctx)));
    }

    @Transaction()
    async Unpause(ctx: Context): Promise<void> {
        await this.invoke(ctx, 'Unpause', registry => registry.unpause(this.callContext(ctx)));
    }

    // --- Escrow lifecycle ---

    @Transaction()
    async CreateEscrow(ctx: Context, seller: string, arbiter: string, amount: string, durationSeconds: string, description: string): Promise<string> {
        const id = await this.invoke(ctx, 'CreateEscrow', registry => registry.createEscrow(
            this.callContext(ctx),
            seller,
            arbiter,
            parseAmount(amount, 'amount'),
            parseInteger(durationSeconds, 'durationSeconds'),
            description
        ));
        return id.toString();
    }

    @Transaction()
    async FundEscrow(ctx: Context, escrowId: string, value: string): Promise<void> {
        await this.invoke(ctx, 'FundEscrow', registry => registry.fundEscrow(
            this.callContext(ctx, parseAmount(value, 'value')),
            parseInteger(escrowId, 'escrowId')
        ));
    }

    @Transaction()
    async ReleaseFunds(ctx: Context, escrowId: string): Promise<void> {
        await this.invoke(ctx, 'ReleaseFunds', registry => registry.releaseFunds(
            this.callContext(ctx),
            parseInteger(escrowId, 'escrowId')
        ));
    }

    @Transaction()
    async RequestRefund(ctx: Context, escrowId: string): Promise<void> {
        await this.invoke(ctx, 'RequestRefund', registry => registry.requestRefund(
            this.callContext(ctx),
            parseInteger(escrowId, 'escrowId')
        ));
    }

    @Transaction()
    async ResolveDispute(ctx: Context, escrowId: string, toSeller: string): Promise<void> {
        await this.invoke(ctx, 'ResolveDispute', registry => registry.resolveDispute(
            this.callContext(ctx),
            parseInteger(escrowId, 'escrowId'),
            parseBoolean(toSeller, 'toSeller')
        ));
    }

    // --- Queries ---

    @Transaction(false)
    async GetEscrowDetails(ctx: Context, escrowId: string): Promise<string> {
        const details = await this.invoke(ctx, 'GetEscrowDetails', registry =>
            registry.getEscrowDetails(parseInteger(escrowId, 'escrowId')));
        return JSON.stringify(details);
    }

    @Transaction(false)
    async GetEscrowCount(ctx: Context): Promise<string> {
        return (await this.registry(ctx).getEscrowCount()).toString();
    }

    @Transaction(false)
    async GetOwner(ctx: Context): Promise<string> {
        return (await this.registry(ctx).getOwner()) ?? '';
    }

    @Transaction(false)
    async IsPaused(ctx: Context): Promise<string> {
        return (await this.registry(ctx).isPaused()).toString();
    }

    @Transaction(false)
    async GetCustodyBalance(ctx: Context): Promise<string> {
        return (await this.registry(ctx).getCustodyBalance()).toString();
    }

    @Transaction(false)
    async GetPayout(ctx: Context, escrowId: string): Promise<string> {
        const id = parseInteger(escrowId, 'escrowId');
        const data = await ctx.stub.getState(payoutKey(id));
        if (!data || data.length === 0) throw new Error(`Payout for escrow ${id} not found`);
        return Buffer.from(data).toString('utf8');
    }

    // Needs CouchDB as the state database.
    @Transaction(false)
    async QueryEscrowsByParty(ctx: Context, party: string): Promise<string> {
        const selector = {
            selector: {
                docType: 'escrow',
                $or: [{ buyer: party }, { seller: party }, { arbiter: party }]
            }
        };
        const escrows = await this.queryBySelector<Escrow>(ctx, selector);
        escrows.sort((a, b) => a.id - b.id);
        return JSON.stringify(escrows.map(toDetails));
    }

    private registry(ctx: Context): EscrowRegistry {
        return new EscrowRegistry({
            store: new StubLedger(ctx.stub),
            mover: new PayoutLedgerMover(ctx.stub),
            events: new StubEventSink(ctx.stub),
            logger: ctx.logging.getLogger(LOGGER_NAME)
        });
    }

    private async invoke<T>(ctx: Context, name: string, action: (registry: EscrowRegistry) => Promise<T>): Promise<T> {
        try {
            return await action(this.registry(ctx));
        } catch (err) {
            if (err instanceof EscrowError) {
                ctx.logging.getLogger(LOGGER_NAME).warn(`${name} rejected (${err.kind}): ${err.message}`);
            }
            throw err;
        }
    }
}
