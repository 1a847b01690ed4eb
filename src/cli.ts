#!/usr/bin/env node
import chalk from 'chalk';
import { readDimacsFile } from './dimacs';
import { isNotFound, isParseError } from './errors';
import { Algorithm, ALGORITHMS, DEFAULTS, isAlgorithm } from './options';
import { compareSolvers, solve, SolveResult } from './solver';

const USAGE = `Usage: dimacs-sat [--algorithm=<${ALGORITHMS.join('|')}>] [--all] [--model] <dimacs_input_file>

Options:
  --algorithm=<name>  Decision procedure (default: ${DEFAULTS.algorithm})
  --all               Run every algorithm and report each verdict and time
  --model             Print the satisfying assignment (dpll only)`;

export interface CliIO {
    out: (line: string) => void;
    err: (line: string) => void;
    color: boolean;
}

const defaultIO: CliIO = {
    out: line => console.log(line),
    err: line => console.error(line),
    color: chalk.supportsColor !== false,
};

interface CliArgs {
    algorithm: Algorithm;
    all: boolean;
    model: boolean;
    file: string;
}

function parseArgs(argv: string[]): CliArgs | string {
    let algorithm: string = DEFAULTS.algorithm;
    let all = false;
    let model = false;
    const positional: string[] = [];

    for (let i = 0; i < argv.length; i++) {
        const arg = argv[i];
        if (arg.startsWith('--algorithm=')) {
            algorithm = arg.slice('--algorithm='.length);
        } else if (arg === '--algorithm') {
            if (i + 1 >= argv.length) return USAGE;
            algorithm = argv[++i];
        } else if (arg === '--all') {
            all = true;
        } else if (arg === '--model') {
            model = true;
        } else if (arg.startsWith('-')) {
            return USAGE;
        } else {
            positional.push(arg);
        }
    }

    if (!isAlgorithm(algorithm)) {
        return `Error: Invalid algorithm '${algorithm}'. Valid options are: ${ALGORITHMS.join(', ')}`;
    }
    if (positional.length !== 1) return USAGE;
    return { algorithm, all, model, file: positional[0] };
}

/**
 * Runs the command line and returns the process exit code.
 * Only argument errors are non-zero; input errors are reported and exit 0.
 */
export function runCli(argv: string[], io: CliIO = defaultIO): number {
    const args = parseArgs(argv);
    if (typeof args === 'string') {
        io.err(args);
        return 1;
    }

    const paint = new chalk.Instance({ level: io.color ? 1 : 0 });
    const verdict = (r: SolveResult) =>
        r.verdict === 'Satisfiable' ? paint.green(r.verdict) : paint.red(r.verdict);

    try {
        const formula = readDimacsFile(args.file);

        if (args.all) {
            for (const r of compareSolvers(formula)) {
                io.out(`${r.algorithm}: ${verdict(r)} (${r.seconds.toFixed(4)}s)`);
            }
            return 0;
        }

        const result = solve(formula, { algorithm: args.algorithm });
        io.out(verdict(result));
        if (args.model && result.assignment) {
            io.out(`v ${result.assignment.toString()}`.trimEnd());
        }
        io.out(`Time: ${result.seconds.toFixed(4)}s`);
    } catch (e) {
        if (isNotFound(e)) {
            io.err(`Error: Input file '${args.file}' not found.`);
        } else if (isParseError(e)) {
            io.err(`Error parsing DIMACS file: ${e.message}`);
        } else {
            io.err(`An unexpected error occurred: ${e instanceof Error ? e.message : String(e)}`);
        }
    }
    return 0;
}

if (require.main === module) {
    process.exitCode = runCli(process.argv.slice(2));
}
