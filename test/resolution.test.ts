import { Clause, Formula } from '../src/cnf';
import { LiteralSet } from '../src/literal-set';
import { resolution, resolve, saturate } from '../src/solvers/resolution';
import {
    DIRECT_CONFLICT,
    EXACTLY_ONE,
    formulaOf,
    IMPLICATION_CHAIN_SAT,
    IMPLICATION_CHAIN_UNSAT,
    PIGEONHOLE_3_2,
    setsOf,
} from './fixtures';

describe('Resolution', () => {
    describe('resolve', () => {
        it('joins the remainders around a complementary pair', () => {
            expect(resolve(LiteralSet.of(1, 2), LiteralSet.of(-1, 3))?.raw).toEqual([2, 3]);
        });

        it('returns null without a complementary pair', () => {
            expect(resolve(LiteralSet.of(1), LiteralSet.of(2))).toBeNull();
            expect(resolve(LiteralSet.of(1, 2), LiteralSet.of(1, 3))).toBeNull();
        });

        it('derives the empty clause from complementary units', () => {
            expect(resolve(LiteralSet.of(1), LiteralSet.of(-1))).toBe(LiteralSet.EMPTY);
        });

        it('resolves on the first complementary literal of the first clause', () => {
            // candidates 1 and -2; 1 comes first
            expect(resolve(LiteralSet.of(1, -2), LiteralSet.of(-1, 2))?.raw).toEqual([-2, 2]);
        });
    });

    describe('saturate', () => {
        it('finds nothing to refute in an empty set', () => {
            expect(saturate([])).toBe(true);
        });

        it('refutes an input empty clause', () => {
            expect(saturate([LiteralSet.EMPTY])).toBe(false);
            expect(saturate([LiteralSet.of(4), LiteralSet.EMPTY])).toBe(false);
        });

        it('refutes repeated conflicting units on the first pair', () => {
            expect(saturate(setsOf([[1], [-1], [1], [-1], [1], [-1]]))).toBe(false);
        });

        it('saturates a satisfiable set', () => {
            expect(saturate(setsOf(EXACTLY_ONE))).toBe(true);
            expect(saturate(setsOf([[1, 2, 3]]))).toBe(true);
        });
    });

    describe('resolution', () => {
        it('decides small formulas', () => {
            expect(resolution(formulaOf(DIRECT_CONFLICT))).toBe(false);
            expect(resolution(formulaOf(IMPLICATION_CHAIN_SAT))).toBe(true);
            expect(resolution(formulaOf(IMPLICATION_CHAIN_UNSAT))).toBe(false);
        });

        it('refutes the pigeonhole formula', () => {
            expect(resolution(formulaOf(PIGEONHOLE_3_2))).toBe(false);
        });

        it('handles the trivial formulas', () => {
            expect(resolution(Formula.EMPTY)).toBe(true);
            expect(resolution(Formula.of([new Clause()]))).toBe(false);
        });
    });
});
