/**
 * @module assignment
 * Persistent (possibly partial) truth assignment.
 *
 * Backed by a functional red-black tree: `with()` returns a new assignment
 * sharing structure with the old one, so a search can keep every earlier
 * state for backtracking without copying.
 */

import createTree from 'functional-red-black-tree';
import { compareVariables, Sign, Variable } from './variables';

export class Assignment implements Iterable<[Variable, Sign]> {
    readonly #tree: createTree.Tree<Variable, Sign>;

    private constructor(tree: createTree.Tree<Variable, Sign>) {
        this.#tree = tree;
    }

    static empty(): Assignment {
        return new Assignment(createTree<Variable, Sign>(compareVariables));
    }

    static fromEntries(entries: Iterable<[Variable, Sign]>): Assignment {
        let a = Assignment.empty();
        for (const [v, s] of entries) a = a.with(v, s);
        return a;
    }

    get size(): number { return this.#tree.length; }

    get(v: Variable): Sign | void { return this.#tree.get(v); }
    has(v: Variable): boolean { return this.#tree.get(v) !== undefined; }

    /** New assignment with `v` bound to `sign`; an existing binding is replaced. */
    with(v: Variable, sign: Sign): Assignment {
        const current = this.#tree.get(v);
        if (current === sign) return this;
        const base = current === undefined ? this.#tree : this.#tree.remove(v);
        return new Assignment(base.insert(v, sign));
    }

    /** Variables in canonical order. */
    variables(): Variable[] { return this.#tree.keys; }

    entries(): [Variable, Sign][] {
        const res: [Variable, Sign][] = [];
        this.#tree.forEach((k, v) => { res.push([k, v]); });
        return res;
    }

    *[Symbol.iterator](): Iterator<[Variable, Sign]> { yield* this.entries(); }

    /** `{ x1: 1, x2: -1 }` */
    toRecord(): Record<Variable, Sign> {
        const res: Record<Variable, Sign> = {};
        for (const [k, v] of this.entries()) res[k] = v;
        return res;
    }

    /** DIMACS-style model line body: `x1 -x2 x3`. */
    toString(): string {
        return this.entries().map(([k, v]) => (v === 1 ? k : `-${k}`)).join(' ');
    }
    [Symbol.for('nodejs.util.inspect.custom')]() { return this.toString(); }
}
