/**
 * Algorithm selection and timing around the three decision procedures.
 */

import { performance } from 'perf_hooks';
import { Assignment } from './assignment';
import { Formula } from './cnf';
import { ALGORITHMS, Algorithm, DEFAULTS, SolveOptions } from './options';
import { davisPutnam } from './solvers/dp';
import { dpll } from './solvers/dpll';
import { resolution } from './solvers/resolution';

export type Verdict = 'Satisfiable' | 'Unsatisfiable';

export interface SolveResult {
    algorithm: Algorithm;
    verdict: Verdict;
    /** Only DPLL produces a model. */
    assignment?: Assignment;
    /** Wall-clock solve time, parsing excluded. */
    seconds: number;
}

function measure<T>(fn: () => T): { result: T; seconds: number } {
    const start = performance.now();
    const result = fn();
    const end = performance.now();
    return { result, seconds: (end - start) / 1000 };
}

function verdictOf(sat: boolean): Verdict {
    return sat ? 'Satisfiable' : 'Unsatisfiable';
}

export function solve(formula: Formula, options: SolveOptions = {}): SolveResult {
    const algorithm = options.algorithm ?? DEFAULTS.algorithm;

    switch (algorithm) {
        case 'dp': {
            const { result, seconds } = measure(() => davisPutnam(formula));
            return { algorithm, verdict: verdictOf(result), seconds };
        }
        case 'resolution': {
            const { result, seconds } = measure(() => resolution(formula));
            return { algorithm, verdict: verdictOf(result), seconds };
        }
        case 'dpll': {
            const { result, seconds } = measure(() => dpll(formula));
            return result === null
                ? { algorithm, verdict: 'Unsatisfiable', seconds }
                : { algorithm, verdict: 'Satisfiable', assignment: result, seconds };
        }
    }
}

/** Runs every algorithm on the same formula, in `ALGORITHMS` order. */
export function compareSolvers(formula: Formula): SolveResult[] {
    return ALGORITHMS.map(algorithm => solve(formula, { algorithm }));
}
