/**
 * Structured errors for parsing and input handling.
 *
 * Solver conflicts are not errors: a failed DPLL branch is an ordinary
 * `null` result. Only input problems surface as exceptions.
 */

export type SolverErrorCode =
    | 'PARSE_ERROR'   // Malformed preamble, bad token or undefined variable
    | 'IO_ERROR';     // Input path missing or unreadable

export interface SolverError {
    code: SolverErrorCode;
    message: string;
    /** 1-based line number in the DIMACS input */
    line?: number;
    /** The offending line or path */
    context?: string;
    details?: Record<string, unknown>;
}

export class SolverException extends Error {
    public readonly error: SolverError;

    constructor(error: SolverError, options?: { cause?: unknown }) {
        super(error.message, options);
        this.name = 'SolverException';
        this.error = error;

        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, SolverException);
        }
    }

    get code(): SolverErrorCode { return this.error.code; }

    toJSON(): SolverError {
        return this.error;
    }
}

export function createParseError(
    message: string,
    context?: string,
    line?: number,
    details?: Record<string, unknown>
): SolverException {
    const where = line !== undefined ? ` (line ${line})` : '';
    return new SolverException({
        code: 'PARSE_ERROR',
        message: `${message}${where}`,
        line,
        context,
        details,
    });
}

/**
 * Wraps a filesystem failure. `ENOENT` reads as "not found", anything else
 * as "unreadable"; the original error is kept as `cause`.
 */
export function createIoError(path: string, cause: unknown): SolverException {
    const errno = cause instanceof Error && 'code' in cause ? String(cause.code) : undefined;
    const reason = errno === 'ENOENT' ? 'not found' : 'unreadable';
    return new SolverException(
        {
            code: 'IO_ERROR',
            message: `Input file '${path}' ${reason}`,
            context: path,
            details: errno ? { errno } : undefined,
        },
        { cause }
    );
}

export function isParseError(e: unknown): e is SolverException {
    return e instanceof SolverException && e.code === 'PARSE_ERROR';
}

export function isIoError(e: unknown): e is SolverException {
    return e instanceof SolverException && e.code === 'IO_ERROR';
}

/** ENOENT specifically; the CLI reports it with its own wording. */
export function isNotFound(e: unknown): boolean {
    return isIoError(e) && e.error.details?.errno === 'ENOENT';
}
