/**
 * @module cnf
 * Clause/formula model and the structural operations the solvers share.
 *
 * A `Clause` records at most one sign per variable. A `Formula` is a list of
 * clauses plus the sorted list of the variables occurring in them. Both are
 * treated as values: operations build new instances and never mutate.
 */

import { Assignment } from './assignment';
import { createParseError } from './errors';
import { LiteralSet } from './literal-set';
import { compareVariables, Sign, signOf, Variable, variableName } from './variables';

export interface SignedLiteral {
    variable: Variable;
    sign: Sign;
}

// ============================================================================
// 1. CLAUSE
// ============================================================================

export class Clause implements Iterable<[Variable, Sign]> {
    readonly #symbols: ReadonlyMap<Variable, Sign>;

    constructor(symbols: Iterable<[Variable, Sign]> = []) {
        this.#symbols = new Map(symbols);
    }

    /**
     * Later literals on the same variable overwrite earlier ones, so `x1 ∨ ¬x1`
     * ends up as `¬x1` rather than a tautology.
     */
    static of(...literals: SignedLiteral[]): Clause {
        return new Clause(literals.map((l): [Variable, Sign] => [l.variable, l.sign]));
    }

    get symbols(): ReadonlyMap<Variable, Sign> { return this.#symbols; }
    get size(): number { return this.#symbols.size; }
    isEmpty(): boolean { return this.#symbols.size === 0; }

    get(v: Variable): Sign | undefined { return this.#symbols.get(v); }
    has(v: Variable): boolean { return this.#symbols.has(v); }

    *[Symbol.iterator](): Iterator<[Variable, Sign]> { yield* this.#symbols; }

    toString(): string { return formatClause(this); }
}

/**
 * Builds a clause from DIMACS literals.
 * @param declared - number of variables declared by the preamble
 * @throws SolverException (PARSE_ERROR) for a literal outside `1..declared`
 */
export function clauseFromLiterals(literals: ReadonlyArray<number>, declared: number): Clause {
    const entries: [Variable, Sign][] = [];
    for (const literal of literals) {
        const index = Math.abs(literal);
        if (index < 1 || index > declared) {
            throw createParseError(
                `Literal ${literal} refers to an undefined variable`,
                undefined,
                undefined,
                { literal, declared }
            );
        }
        entries.push([variableName(index), signOf(literal)]);
    }
    return new Clause(entries);
}

/** `x1 -x2 x3`, in the clause's insertion order. */
export function formatClause(clause: Clause): string {
    const parts: string[] = [];
    for (const [v, sign] of clause) parts.push(sign === -1 ? `-${v}` : v);
    return parts.join(' ');
}

// ============================================================================
// 2. FORMULA
// ============================================================================

export class Formula {
    readonly clauses: ReadonlyArray<Clause>;
    readonly symbols: ReadonlyArray<Variable>;

    private constructor(clauses: ReadonlyArray<Clause>, symbols: ReadonlyArray<Variable>) {
        this.clauses = clauses;
        this.symbols = symbols;
    }

    /** Symbols are recomputed from the clauses and sorted canonically. */
    static of(clauses: ReadonlyArray<Clause>): Formula {
        const seen = new Set<Variable>();
        for (const c of clauses) {
            for (const v of c.symbols.keys()) seen.add(v);
        }
        return new Formula(Object.freeze(clauses.slice()), Object.freeze([...seen].sort(compareVariables)));
    }

    static readonly EMPTY = Formula.of([]);

    get size(): number { return this.clauses.length; }
    isEmpty(): boolean { return this.clauses.length === 0; }

    hasEmptyClause(): boolean {
        return this.clauses.some(c => c.isEmpty());
    }

    toString(): string {
        return this.clauses.map(c => `(${formatClause(c)})`).join(' ∧ ');
    }
}

// ============================================================================
// 3. STRUCTURAL OPERATIONS
// ============================================================================

/**
 * True iff every clause has a symbol whose assigned sign matches.
 * Unassigned symbols never satisfy a clause.
 */
export function isSatisfied(formula: Formula, assignment: Assignment): boolean {
    for (const clause of formula.clauses) {
        let satisfied = false;
        for (const [v, sign] of clause) {
            if (assignment.get(v) === sign) {
                satisfied = true;
                break;
            }
        }
        if (!satisfied) return false;
    }
    return true;
}

/** First one-symbol clause in clause order, as a literal; `null` if none. */
export function findUnitClause(formula: Formula): SignedLiteral | null {
    for (const clause of formula.clauses) {
        if (clause.size === 1) {
            for (const [variable, sign] of clause) return { variable, sign };
        }
    }
    return null;
}

/**
 * Applies a partial assignment:
 * 1. Clauses containing a literal made true are dropped.
 * 2. Assigned (hence false) literals are removed from the rest.
 *
 * @returns the reduced formula, or `null` as soon as a clause loses all of
 * its literals (contradiction on this branch).
 */
export function simplify(formula: Formula, assignment: Assignment): Formula | null {
    const next: Clause[] = [];
    for (const clause of formula.clauses) {
        let satisfied = false;
        const kept: [Variable, Sign][] = [];
        for (const [v, sign] of clause) {
            const value = assignment.get(v);
            if (value === undefined) {
                kept.push([v, sign]);
            } else if (value === sign) {
                satisfied = true;
                break;
            }
        }
        if (satisfied) continue;
        if (kept.length === 0) return null;
        next.push(kept.length === clause.size ? clause : new Clause(kept));
    }
    return Formula.of(next);
}

// ============================================================================
// 4. FLAT LITERAL REPRESENTATION
// ============================================================================

/**
 * Translates every clause into a `LiteralSet`.
 * `formula.symbols[i]` maps to integer `i + 1` for all clauses alike.
 */
export function toLiteralSets(formula: Formula): LiteralSet[] {
    const ids = new Map<Variable, number>();
    formula.symbols.forEach((s, i) => ids.set(s, i + 1));

    return formula.clauses.map(clause => {
        const lits: number[] = [];
        for (const [v, sign] of clause) {
            const id = ids.get(v);
            if (id !== undefined) lits.push(id * sign);
        }
        return LiteralSet.fromArray(lits);
    });
}
