/**
 * @module dimacs
 * DIMACS CNF reader and writer.
 *
 * ```
 * c comment
 * p cnf <num_vars> <num_clauses>
 * 1 -2 0
 * ```
 */

import { readFileSync } from 'fs';
import { Clause, clauseFromLiterals, Formula } from './cnf';
import { createIoError, createParseError, SolverException } from './errors';
import { variableIndex } from './variables';

const INTEGER = /^[+-]?\d+$/;

function parseInteger(token: string, line: string, lineNumber: number): number {
    if (!INTEGER.test(token)) {
        throw createParseError(`Invalid literal '${token}'`, line, lineNumber);
    }
    return parseInt(token, 10);
}

/**
 * Parses DIMACS text into a `Formula`.
 *
 * The preamble declares `x1..x<nvars>`; the clause count is informational.
 * A clause line keeps every non-zero integer; a line holding only `0` adds
 * no clause.
 *
 * @throws SolverException (PARSE_ERROR) on a malformed or repeated preamble,
 * a non-integer token, or a literal outside the declared range.
 */
export function parseDimacs(text: string): Formula {
    let declared = 0;
    let sawPreamble = false;
    const clauses: Clause[] = [];

    const lines = text.split(/\r?\n/);
    for (let i = 0; i < lines.length; i++) {
        const line = lines[i].trim();
        const lineNumber = i + 1;

        if (line === '' || line.startsWith('c')) continue;

        if (line.startsWith('p')) {
            const parts = line.split(/\s+/);
            if (
                parts.length !== 4 || parts[0] !== 'p' || parts[1] !== 'cnf' ||
                !/^\d+$/.test(parts[2]) || !/^\d+$/.test(parts[3])
            ) {
                throw createParseError('Invalid DIMACS preamble', line, lineNumber);
            }
            if (sawPreamble) {
                throw createParseError('Duplicate DIMACS preamble', line, lineNumber);
            }
            sawPreamble = true;
            declared = parseInt(parts[2], 10);
            continue;
        }

        const literals = line
            .split(/\s+/)
            .map(token => parseInteger(token, line, lineNumber))
            .filter(n => n !== 0);
        if (literals.length === 0) continue;

        try {
            clauses.push(clauseFromLiterals(literals, declared));
        } catch (e) {
            if (e instanceof SolverException) {
                throw createParseError(e.error.message, line, lineNumber, e.error.details);
            }
            throw e;
        }
    }

    return Formula.of(clauses);
}

/**
 * Reads and parses the DIMACS file at `path`.
 * @throws SolverException (IO_ERROR) if the file cannot be read.
 */
export function readDimacsFile(path: string): Formula {
    let text: string;
    try {
        text = readFileSync(path, 'utf8');
    } catch (e) {
        throw createIoError(path, e);
    }
    return parseDimacs(text);
}

/** Signed DIMACS integers of a clause, in the clause's order. */
export function clauseToLiterals(clause: Clause): number[] {
    const res: number[] = [];
    for (const [v, sign] of clause) res.push(variableIndex(v) * sign);
    return res;
}

/**
 * Renders a formula back to DIMACS. The declared variable count is the
 * largest index among the formula's symbols.
 */
export function formatDimacs(formula: Formula): string {
    const symbols = formula.symbols;
    const nvars = symbols.length === 0 ? 0 : variableIndex(symbols[symbols.length - 1]);
    const lines = [`p cnf ${nvars} ${formula.clauses.length}`];
    for (const clause of formula.clauses) {
        lines.push([...clauseToLiterals(clause), 0].join(' '));
    }
    return lines.join('\n') + '\n';
}
