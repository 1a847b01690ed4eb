/**
 * @module hash
 * @description
 * Content hashing and ordering for integer sequences.
 * Shared by `LiteralSet` (hash cached at construction) and `ClauseStore`
 * (open addressing on that hash).
 */

// ============================================================================
// 1. FNV-1a MIXING
// ============================================================================

export const FNV_PRIME = 16777619;
export const FNV_OFFSET = 2166136261;

/**
 * Hashes a 32-bit integer.
 * Bit mixing spreads small signed literals (1, -1, 2, ...) across buckets.
 */
export function hashInt(val: number): number {
    let h = val | 0;
    h = Math.imul((h >> 16) ^ h, 0x45d9f3b);
    h = Math.imul((h >> 16) ^ h, 0x45d9f3b);
    return ((h >> 16) ^ h) >>> 0;
}

/**
 * Order-dependent hash of an integer sequence.
 * Callers pass sorted sequences, so equal sets hash equally.
 */
export function hashSequence(values: ReadonlyArray<number>): number {
    let h = FNV_OFFSET;
    const len = values.length;
    for (let i = 0; i < len; i++) {
        h ^= hashInt(values[i]);
        h = Math.imul(h, FNV_PRIME);
    }
    return h >>> 0;
}

// ============================================================================
// 2. ORDERING
// ============================================================================

/**
 * Literal order: by variable index, negative before positive.
 * `-1 < 1 < -2 < 2 < ...`
 */
export function compareLiterals(a: number, b: number): number {
    const va = a < 0 ? -a : a;
    const vb = b < 0 ? -b : b;
    if (va !== vb) return va - vb;
    return a - b;
}

/** Lexicographic comparison of two sorted literal sequences (shorter first). */
export function compareSequences(a: ReadonlyArray<number>, b: ReadonlyArray<number>): number {
    const len = a.length;
    if (len !== b.length) return len - b.length;
    for (let i = 0; i < len; i++) {
        const diff = compareLiterals(a[i], b[i]);
        if (diff !== 0) return diff;
    }
    return 0;
}
