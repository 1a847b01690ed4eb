/**
 * @module dpll
 * Davis–Putnam–Logemann–Loveland search over the clause model.
 *
 * Per call:
 * ```
 * PROPAGATE -> CONFLICT | ALL-SATISFIED | BRANCH
 * BRANCH    -> TRY-TRUE -> SUCCESS | TRY-FALSE -> SUCCESS | FAIL
 * ```
 * Conflicts are ordinary `null` results; backtracking is returning `null`.
 * Assignments are persistent, so both branches start from the same state.
 */

import { Assignment } from '../assignment';
import { findUnitClause, Formula, simplify } from '../cnf';
import { Sign, Variable } from '../variables';

/** Repeatedly assigns unit literals. `null` on conflict. */
function propagate(
    formula: Formula,
    assignment: Assignment
): { formula: Formula; assignment: Assignment } | null {
    let unit = findUnitClause(formula);
    while (unit) {
        const { variable, sign } = unit;
        const current = assignment.get(variable);
        if (current !== undefined && current !== sign) return null;

        assignment = assignment.with(variable, sign);
        const next = simplify(formula, Assignment.empty().with(variable, sign));
        if (next === null) return null;
        formula = next;
        if (formula.isEmpty()) break;

        unit = findUnitClause(formula);
    }
    return { formula, assignment };
}

function branch(formula: Formula, assignment: Assignment, v: Variable, sign: Sign): Assignment | null {
    const reduced = simplify(formula, Assignment.empty().with(v, sign));
    if (reduced === null) return null;
    return dpll(reduced, assignment.with(v, sign));
}

/**
 * Searches for a satisfying assignment.
 * @returns an assignment covering every variable the search had to fix
 * (possibly partial), or `null` when the formula is unsatisfiable.
 */
export function dpll(formula: Formula, assignment: Assignment = Assignment.empty()): Assignment | null {
    // only reachable from input: simplify reports emptied clauses as null
    if (formula.hasEmptyClause()) return null;

    const state = propagate(formula, assignment);
    if (state === null) return null;
    if (state.formula.isEmpty()) return state.assignment;

    // first unassigned symbol in canonical order
    const v = state.formula.symbols.find(s => !state.assignment.has(s));
    if (v === undefined) return state.assignment;

    return (
        branch(state.formula, state.assignment, v, 1) ??
        branch(state.formula, state.assignment, v, -1)
    );
}
