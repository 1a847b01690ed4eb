import { ClauseStore } from '../src/clause-store';
import { LiteralSet } from '../src/literal-set';

describe('ClauseStore', () => {
    it('collapses clauses with equal contents', () => {
        const store = new ClauseStore();
        expect(store.add(LiteralSet.of(1, -2))).toBe(true);
        expect(store.add(LiteralSet.of(-2, 1))).toBe(false);
        expect(store.size).toBe(1);
    });

    it('keeps insertion order', () => {
        const store = new ClauseStore([LiteralSet.of(3), LiteralSet.of(1, 2), LiteralSet.of(-1)]);
        expect(store.toArray().map(c => c.toString())).toEqual(['{3}', '{1, 2}', '{-1}']);
    });

    it('answers membership by value', () => {
        const store = new ClauseStore([LiteralSet.of(1, 2)]);
        expect(store.has(LiteralSet.of(2, 1))).toBe(true);
        expect(store.has(LiteralSet.of(1))).toBe(false);
        expect(store.has(LiteralSet.EMPTY)).toBe(false);
    });

    it('stores the empty clause like any other', () => {
        const store = new ClauseStore();
        store.add(LiteralSet.EMPTY);
        expect(store.has(LiteralSet.of())).toBe(true);
    });

    it('grows past its initial table', () => {
        const store = new ClauseStore();
        for (let v = 1; v <= 200; v++) {
            store.add(LiteralSet.of(v, -(v + 1)));
        }
        expect(store.size).toBe(200);
        for (let v = 1; v <= 200; v++) {
            expect(store.has(LiteralSet.of(-(v + 1), v))).toBe(true);
        }
        expect(store.has(LiteralSet.of(201, -202))).toBe(false);
    });

    it('returns snapshots from toArray', () => {
        const store = new ClauseStore([LiteralSet.of(1)]);
        const snapshot = store.toArray();
        store.add(LiteralSet.of(2));
        expect(snapshot).toHaveLength(1);
        expect([...store]).toHaveLength(2);
    });
});
