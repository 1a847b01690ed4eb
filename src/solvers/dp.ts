/**
 * @module dp
 * Davis–Putnam variable elimination.
 *
 * Each step removes one variable v by replacing every clause mentioning it
 * with all resolvents on v. Clause lists are plain lists (duplicates kept)
 * and nothing is memoised, so the clause count may grow exponentially.
 */

import { Formula, toLiteralSets } from '../cnf';
import { LiteralSet } from '../literal-set';

/** Smallest variable index occurring in `clauses`, or `null` if none. */
export function selectVariable(clauses: ReadonlyArray<LiteralSet>): number | null {
    let best: number | null = null;
    for (const c of clauses) {
        const raw = c.raw;
        if (raw.length === 0) continue;
        // raw is sorted by variable index, so its first literal is the minimum
        const v = Math.abs(raw[0]);
        if (best === null || v < best) best = v;
    }
    return best;
}

/**
 * Decides satisfiability of a flat clause list.
 * @returns true for SAT, false for UNSAT.
 */
export function dp(clauses: ReadonlyArray<LiteralSet>): boolean {
    if (clauses.some(c => c.isEmpty())) return false;
    if (clauses.length === 0) return true;

    const v = selectVariable(clauses);
    if (v === null) return true;

    const pos: LiteralSet[] = [];
    const neg: LiteralSet[] = [];
    const rest: LiteralSet[] = [];
    for (const c of clauses) {
        const p = c.has(v);
        const n = c.has(-v);
        // v ∨ ¬v holds under every assignment
        if (p && n) continue;
        if (p) pos.push(c);
        else if (n) neg.push(c);
        else rest.push(c);
    }

    const resolvents: LiteralSet[] = [];
    for (const c1 of pos) {
        for (const c2 of neg) {
            const resolvent = c1.without(v).union(c2.without(-v));
            if (resolvent.isEmpty()) return false;
            resolvents.push(resolvent);
        }
    }

    return dp(rest.concat(resolvents));
}

export function davisPutnam(formula: Formula): boolean {
    return dp(toLiteralSets(formula));
}
