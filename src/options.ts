export const ALGORITHMS = ['dp', 'resolution', 'dpll'] as const;

export type Algorithm = typeof ALGORITHMS[number];

export interface SolveOptions {
    algorithm?: Algorithm;
}

export const DEFAULTS = {
    algorithm: 'dpll',
} as const satisfies Required<SolveOptions>;

export function isAlgorithm(name: string): name is Algorithm {
    return (ALGORITHMS as ReadonlyArray<string>).includes(name);
}
