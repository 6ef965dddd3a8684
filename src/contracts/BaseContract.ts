import { Contract, Context } from 'fabric-contract-api';
import { CallContext } from '../escrow/types';

export class BaseContract extends Contract {
    constructor(name: string) {
        super(name);
    }

    // Helper: Get Client Identity & MSP
    protected getClient(ctx: Context) {
        const cid = ctx.clientIdentity;
        return {
            id: cid.getID(),
            mspId: cid.getMSPID()
        };
    }

    // Helper: Transaction timestamp in unix seconds
    protected txTime(ctx: Context): number {
        return Math.floor(ctx.stub.getDateTimestamp().getTime() / 1000);
    }

    // Helper: Caller, attached value and time of the current transaction
    protected callContext(ctx: Context, value: bigint = 0n): CallContext {
        return {
            caller: this.getClient(ctx).id,
            value,
            timestamp: this.txTime(ctx)
        };
    }

    // Helper: Standard Query (CouchDB selector)
    protected async queryBySelector<T>(ctx: Context, selector: object): Promise<T[]> {
        const iterator = await ctx.stub.getQueryResult(JSON.stringify(selector));
        const results: T[] = [];
        try {
            let result = await iterator.next();
            while (!result.done) {
                if (result.value && result.value.value) {
                    const strValue = Buffer.from(result.value.value).toString('utf8');
                    results.push(JSON.parse(strValue));
                }
                result = await iterator.next();
            }
        } finally {
            await iterator.close();
        }
        return results;
    }
}
