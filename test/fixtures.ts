/**
 * Shared formulas and generators for the test suite.
 */

import { clauseFromLiterals, Formula } from '../src/cnf';
import { LiteralSet } from '../src/literal-set';

/** Formula from DIMACS-style integer clauses (variables up to 1000 allowed). */
export function formulaOf(clauses: number[][]): Formula {
    return Formula.of(clauses.map(c => clauseFromLiterals(c, 1000)));
}

export function setsOf(clauses: number[][]): LiteralSet[] {
    return clauses.map(c => LiteralSet.fromArray(c));
}

/** (x1 ∨ x2) ∧ (¬x1 ∨ ¬x2) */
export const EXACTLY_ONE = [[1, 2], [-1, -2]];

/** x1 ∧ ¬x1 */
export const DIRECT_CONFLICT = [[1], [-1]];

/** Three pigeons, two holes. Variable 2(i-1)+j: pigeon i sits in hole j. */
export const PIGEONHOLE_3_2 = [
    [1, 2], [3, 4], [5, 6],
    [-1, -3], [-1, -5], [-3, -5],
    [-2, -4], [-2, -6], [-4, -6],
];

/** x1 → x2 → x3 → x4, x1 forced, ¬x4 forced. */
export const IMPLICATION_CHAIN_UNSAT = [[1], [-1, 2], [-2, 3], [-3, 4], [-4]];

/** Same chain without the final contradiction. */
export const IMPLICATION_CHAIN_SAT = [[1], [-1, 2], [-2, 3], [-3, 4]];

/** Deterministic PRNG (mulberry32). */
export function rng(seed: number): () => number {
    let a = seed >>> 0;
    return () => {
        a = (a + 0x6D2B79F5) >>> 0;
        let t = a;
        t = Math.imul(t ^ (t >>> 15), t | 1);
        t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
        return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    };
}

/** Random k-CNF with distinct variables per clause. */
export function randomCnf(seed: number, vars: number, clauses: number, k = 3): number[][] {
    const next = rng(seed);
    const res: number[][] = [];
    for (let i = 0; i < clauses; i++) {
        const picked: number[] = [];
        while (picked.length < k) {
            const v = 1 + Math.floor(next() * vars);
            if (picked.includes(v) || picked.includes(-v)) continue;
            picked.push(next() < 0.5 ? -v : v);
        }
        res.push(picked);
    }
    return res;
}
