/**
 * @module literal-set
 * Immutable sorted set of signed integer literals (a flat clause).
 *
 * Contracts:
 * - Literals are non-zero integers: `v` for variable v, `-v` for its negation.
 * - Instances never change after construction, so they can be shared freely
 *   between clause lists and recursive calls.
 * - Equality is by content (`equals`, `compare`, `hashCode`).
 */

import { compareLiterals, compareSequences, hashSequence } from './hash';

export type Literal = number;

export class LiteralSet implements Iterable<Literal> {
    readonly #elements: ReadonlyArray<Literal>;
    readonly hashCode: number;

    private constructor(sorted: Literal[]) {
        this.#elements = Object.freeze(sorted);
        this.hashCode = hashSequence(sorted);
    }

    static readonly EMPTY = new LiteralSet([]);

    /** Builds a set from literals in any order; duplicates collapse. */
    static of(...literals: Literal[]): LiteralSet {
        return LiteralSet.fromArray(literals);
    }

    static fromArray(literals: ReadonlyArray<Literal>): LiteralSet {
        if (literals.length === 0) return LiteralSet.EMPTY;
        const arr = literals.slice().sort(compareLiterals);
        let write = 1;
        for (let read = 1; read < arr.length; read++) {
            if (arr[read] !== arr[write - 1]) arr[write++] = arr[read];
        }
        arr.length = write;
        return new LiteralSet(arr);
    }

    /**
     * Wraps an array that is ALREADY sorted by `compareLiterals` and unique.
     * O(N), no validation.
     */
    static fromSortedUnsafe(sorted: Literal[]): LiteralSet {
        return sorted.length === 0 ? LiteralSet.EMPTY : new LiteralSet(sorted);
    }

    get size(): number { return this.#elements.length; }
    isEmpty(): boolean { return this.#elements.length === 0; }

    /** Elements in ascending literal order. */
    get raw(): ReadonlyArray<Literal> { return this.#elements; }

    has(literal: Literal): boolean {
        const arr = this.#elements;
        let low = 0, high = arr.length - 1;
        while (low <= high) {
            const mid = (low + high) >>> 1;
            const cmp = compareLiterals(arr[mid], literal);
            if (cmp === 0) return true;
            if (cmp < 0) low = mid + 1;
            else high = mid - 1;
        }
        return false;
    }

    /** Copy without `literal` (the receiver itself when absent). */
    without(literal: Literal): LiteralSet {
        if (!this.has(literal)) return this;
        return LiteralSet.fromSortedUnsafe(this.#elements.filter(l => l !== literal));
    }

    /** Union (A ∪ B). Merge of two sorted arrays, O(N + M). */
    union(other: LiteralSet): LiteralSet {
        const arrA = this.#elements;
        const arrB = other.#elements;
        if (arrA.length === 0) return other;
        if (arrB.length === 0) return this;

        const res: Literal[] = [];
        let i = 0, j = 0;
        while (i < arrA.length && j < arrB.length) {
            const cmp = compareLiterals(arrA[i], arrB[j]);
            if (cmp < 0) res.push(arrA[i++]);
            else if (cmp > 0) res.push(arrB[j++]);
            else { res.push(arrA[i++]); j++; }
        }
        while (i < arrA.length) res.push(arrA[i++]);
        while (j < arrB.length) res.push(arrB[j++]);
        return LiteralSet.fromSortedUnsafe(res);
    }

    /** Distinct variable indices, ascending. */
    variables(): number[] {
        const res: number[] = [];
        for (const l of this.#elements) {
            const v = l < 0 ? -l : l;
            if (res.length === 0 || res[res.length - 1] !== v) res.push(v);
        }
        return res;
    }

    compare(other: LiteralSet): number {
        if (this === other) return 0;
        return compareSequences(this.#elements, other.#elements);
    }

    equals(other: LiteralSet): boolean {
        if (this === other) return true;
        if (this.hashCode !== other.hashCode) return false;
        return this.compare(other) === 0;
    }

    *[Symbol.iterator](): Iterator<Literal> { yield* this.#elements; }

    toString(): string {
        if (this.isEmpty()) return '∅';
        return `{${this.#elements.join(', ')}}`;
    }
    [Symbol.for('nodejs.util.inspect.custom')]() { return this.toString(); }
}
