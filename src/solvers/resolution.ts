/**
 * @module resolution
 * Saturation of a clause set under binary resolution.
 *
 * The `known` set only grows: there is no subsumption and no eviction, so
 * memory rather than stack depth bounds what it can handle. Termination
 * follows from the finite number of clauses over a finite variable set.
 */

import { ClauseStore } from '../clause-store';
import { Formula, toLiteralSets } from '../cnf';
import { LiteralSet } from '../literal-set';

/**
 * Resolves on the first literal of `c1` (ascending order) whose complement
 * occurs in `c2`.
 * @returns the resolvent, or `null` if the clauses have no complementary pair.
 */
export function resolve(c1: LiteralSet, c2: LiteralSet): LiteralSet | null {
    for (const lit of c1) {
        if (c2.has(-lit)) return c1.without(lit).union(c2.without(-lit));
    }
    return null;
}

/**
 * Runs full passes over all unordered pairs until a pass yields nothing new.
 * @returns true for SAT (saturated without contradiction), false for UNSAT.
 */
export function saturate(clauses: Iterable<LiteralSet>): boolean {
    const known = new ClauseStore(clauses);
    // a lone empty clause has no partner to resolve with
    for (const c of known) {
        if (c.isEmpty()) return false;
    }

    while (true) {
        const derived = new ClauseStore();
        const snapshot = known.toArray();

        for (let i = 0; i < snapshot.length; i++) {
            for (let j = i + 1; j < snapshot.length; j++) {
                const resolvent = resolve(snapshot[i], snapshot[j]);
                if (resolvent === null) continue;
                if (resolvent.isEmpty()) return false;
                if (!known.has(resolvent)) derived.add(resolvent);
            }
        }

        if (derived.isEmpty()) return true;
        for (const c of derived) known.add(c);
    }
}

export function resolution(formula: Formula): boolean {
    return saturate(toLiteralSets(formula));
}
