import { decode, encode, readJson, writeJson } from './codec';
import { MemoryLedger } from './MemoryLedger';
import { StagedLedger } from './StagedLedger';

describe('StagedLedger', () => {
    it('keeps writes away from the base until commit', async () => {
        const base = new MemoryLedger();
        await writeJson(base, 'a', 1);
        const staged = new StagedLedger(base);

        await writeJson(staged, 'a', 2);
        await writeJson(staged, 'b', 'x');

        expect(await readJson<number>(staged, 'a')).toBe(2);
        expect(await readJson<number>(base, 'a')).toBe(1);
        expect(await readJson<string>(base, 'b')).toBeUndefined();

        await staged.commit();

        expect(await readJson<number>(base, 'a')).toBe(2);
        expect(await readJson<string>(base, 'b')).toBe('x');
    });

    it('stacks over another staged ledger', async () => {
        const base = new MemoryLedger();
        const outer = new StagedLedger(base);
        const inner = new StagedLedger(outer);

        await writeJson(inner, 'k', true);
        await inner.commit();

        expect(await readJson<boolean>(outer, 'k')).toBe(true);
        expect(base.keys()).toEqual([]);
    });

    it('merges staged writes into another overlay', async () => {
        const base = new MemoryLedger();
        const outer = new StagedLedger(base);
        const inner = new StagedLedger(outer);
        await writeJson(inner, 'k', 'v');

        inner.mergeInto(outer);

        expect(await readJson<string>(outer, 'k')).toBe('v');
        expect(await readJson<string>(inner, 'k')).toBe('v');
        expect(base.keys()).toEqual([]);
    });

    it('round-trips JSON through bytes', () => {
        expect(decode<{ n: number }>(encode({ n: 5 }))).toEqual({ n: 5 });
    });
});
