import { LiteralSet } from '../src/literal-set';

describe('LiteralSet', () => {
    describe('construction', () => {
        it('sorts by variable, negative literal first', () => {
            expect(LiteralSet.of(3, -1, 1, -2).raw).toEqual([-1, 1, -2, 3]);
        });

        it('collapses duplicates', () => {
            const s = LiteralSet.of(2, -1, 2);
            expect(s.raw).toEqual([-1, 2]);
            expect(s.size).toBe(2);
        });

        it('shares the empty instance', () => {
            expect(LiteralSet.of()).toBe(LiteralSet.EMPTY);
            expect(LiteralSet.EMPTY.isEmpty()).toBe(true);
        });

        it('does not alias the input array', () => {
            const input = [2, 1];
            const s = LiteralSet.fromArray(input);
            input.push(5);
            expect(s.raw).toEqual([1, 2]);
        });
    });

    describe('queries', () => {
        const s = LiteralSet.of(1, -4, 7, -9, 12);

        it('finds present literals only', () => {
            expect(s.has(-4)).toBe(true);
            expect(s.has(4)).toBe(false);
            expect(s.has(12)).toBe(true);
            expect(s.has(-12)).toBe(false);
        });

        it('lists variables once each', () => {
            expect(LiteralSet.of(-2, 2, 5).variables()).toEqual([2, 5]);
        });
    });

    describe('algebra', () => {
        it('removes a literal', () => {
            expect(LiteralSet.of(1, -2, 3).without(-2).raw).toEqual([1, 3]);
        });

        it('returns itself when removing an absent literal', () => {
            const s = LiteralSet.of(1, 2);
            expect(s.without(-2)).toBe(s);
        });

        it('merges two sets', () => {
            expect(LiteralSet.of(1, 3).union(LiteralSet.of(-1, 3, 4)).raw).toEqual([-1, 1, 3, 4]);
        });

        it('union with empty is identity', () => {
            const s = LiteralSet.of(5);
            expect(s.union(LiteralSet.EMPTY)).toBe(s);
            expect(LiteralSet.EMPTY.union(s)).toBe(s);
        });
    });

    describe('value semantics', () => {
        it('treats equal contents as equal', () => {
            const a = LiteralSet.of(1, -2);
            const b = LiteralSet.of(-2, 1, 1);
            expect(a).not.toBe(b);
            expect(a.equals(b)).toBe(true);
            expect(a.hashCode).toBe(b.hashCode);
            expect(a.compare(b)).toBe(0);
        });

        it('orders shorter sets first', () => {
            expect(LiteralSet.of(9).compare(LiteralSet.of(1, 2))).toBeLessThan(0);
        });

        it('distinguishes complementary literals', () => {
            expect(LiteralSet.of(1).equals(LiteralSet.of(-1))).toBe(false);
        });
    });

    it('prints braces, or ∅ when empty', () => {
        expect(LiteralSet.of(2, -1).toString()).toBe('{-1, 2}');
        expect(LiteralSet.EMPTY.toString()).toBe('∅');
    });
});
