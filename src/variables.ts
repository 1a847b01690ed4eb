/** Boolean variable name, `x<i>` for DIMACS variable i. */
export type Variable = string;

/** `1`: positive occurrence / true. `-1`: negated occurrence / false. */
export type Sign = 1 | -1;

export function variableName(index: number): Variable {
    return `x${index}`;
}

/** Numeric suffix of a variable name (`x12` -> 12). */
export function variableIndex(v: Variable): number {
    return parseInt(v.slice(1), 10);
}

/**
 * Canonical symbol order: by numeric suffix, so `x2 < x10`.
 * Every sorted symbol list and every assignment uses this comparator.
 */
export function compareVariables(a: Variable, b: Variable): number {
    return variableIndex(a) - variableIndex(b);
}

export function signOf(literal: number): Sign {
    return literal > 0 ? 1 : -1;
}
