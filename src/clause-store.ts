/**
 * @module clause-store
 * @description
 * Add-only set of `LiteralSet`s with value semantics.
 *
 * Architecture: "Compact Layout" hash table.
 * - Dense array `_clauses` keeps insertion order (iteration O(N)).
 * - Sparse `Uint32Array` of 1-based slots, linear probing.
 * - Hashes come from `LiteralSet.hashCode`, computed once per clause.
 *
 * There is no removal: saturation only ever grows its clause set.
 */

import { LiteralSet } from './literal-set';

export class ClauseStore implements Iterable<LiteralSet> {
    private _clauses: LiteralSet[] = [];
    private _indices: Uint32Array;
    private _bucketCount = 16;
    private _mask = 15;

    constructor(initial?: Iterable<LiteralSet>) {
        this._indices = new Uint32Array(16);
        if (initial) {
            for (const c of initial) this.add(c);
        }
    }

    get size(): number { return this._clauses.length; }
    isEmpty(): boolean { return this._clauses.length === 0; }

    /** Clauses in insertion order. The array is a snapshot. */
    toArray(): LiteralSet[] { return this._clauses.slice(); }

    has(clause: LiteralSet): boolean {
        const h = clause.hashCode;
        let idx = h & this._mask;
        while (true) {
            const entry = this._indices[idx];
            if (entry === 0) return false;
            if (this._clauses[entry - 1].equals(clause)) return true;
            idx = (idx + 1) & this._mask;
        }
    }

    /**
     * Inserts `clause` unless an equal clause is already stored.
     * @returns true when the store grew.
     * @complexity Amortized O(1) plus one O(k) equality check per probe hit.
     */
    add(clause: LiteralSet): boolean {
        if (this._clauses.length >= this._bucketCount * 0.75) this.grow();

        const h = clause.hashCode;
        let idx = h & this._mask;
        while (true) {
            const entry = this._indices[idx];
            if (entry === 0) {
                this._clauses.push(clause);
                this._indices[idx] = this._clauses.length;
                return true;
            }
            if (this._clauses[entry - 1].equals(clause)) return false;
            idx = (idx + 1) & this._mask;
        }
    }

    /** Doubles the slot table and re-inserts; the dense array is untouched. */
    private grow() {
        this._bucketCount *= 2;
        this._mask = this._bucketCount - 1;
        this._indices = new Uint32Array(this._bucketCount);

        const clauses = this._clauses;
        for (let i = 0; i < clauses.length; i++) {
            let idx = clauses[i].hashCode & this._mask;
            while (this._indices[idx] !== 0) idx = (idx + 1) & this._mask;
            this._indices[idx] = i + 1;
        }
    }

    *[Symbol.iterator](): Iterator<LiteralSet> { yield* this._clauses; }

    toString(): string {
        return `{${this._clauses.map(c => c.toString()).join(', ')}}`;
    }
    [Symbol.for('nodejs.util.inspect.custom')]() { return this.toString(); }
}
