/**
 * @module dimacs-sat
 * Davis–Putnam, resolution and DPLL decision procedures for DIMACS CNF.
 */

export { Assignment } from './assignment';
export { ClauseStore } from './clause-store';
export {
    Clause,
    clauseFromLiterals,
    findUnitClause,
    formatClause,
    Formula,
    isSatisfied,
    simplify,
    toLiteralSets,
} from './cnf';
export type { SignedLiteral } from './cnf';
export { clauseToLiterals, formatDimacs, parseDimacs, readDimacsFile } from './dimacs';
export {
    createIoError,
    createParseError,
    isIoError,
    isNotFound,
    isParseError,
    SolverException,
} from './errors';
export type { SolverError, SolverErrorCode } from './errors';
export { LiteralSet } from './literal-set';
export type { Literal } from './literal-set';
export { ALGORITHMS, DEFAULTS, isAlgorithm } from './options';
export type { Algorithm, SolveOptions } from './options';
export { compareSolvers, solve } from './solver';
export type { SolveResult, Verdict } from './solver';
export { davisPutnam, dp } from './solvers/dp';
export { dpll } from './solvers/dpll';
export { resolution, resolve, saturate } from './solvers/resolution';
export { compareVariables, variableIndex, variableName } from './variables';
export type { Sign, Variable } from './variables';
