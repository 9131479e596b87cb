// src/optics/path.ts
import { InvalidPathElement } from "./errors";

/** One hop from a structure to a field or collection slot. */
export type LensPathElement = number;

/**
 * Describes the location of a lens target relative to its source.
 * Elements are ordered root to leaf; an empty path is the whole structure.
 */
export type LensPath = {
    readonly _tag: "LensPath";
    readonly elements: ReadonlyArray<LensPathElement>;
};

const checkId = (id: number): LensPathElement => {
    if (!Number.isSafeInteger(id) || id < 0) throw new InvalidPathElement(id);
    return id;
};

const make = (elements: LensPathElement[]): LensPath =>
    Object.freeze({ _tag: "LensPath", elements: Object.freeze(elements) });

const EMPTY = make([]);

export const LensPath = {
    empty: (): LensPath => EMPTY,

    single: (id: number): LensPath => make([checkId(id)]),

    of: (id: number): LensPath => LensPath.single(id),

    fromIndex: (index: number): LensPath => make([checkId(index)]),

    fromPair: (id0: number, id1: number): LensPath => make([checkId(id0), checkId(id1)]),

    fromSequence: (ids: Iterable<number>): LensPath => make(Array.from(ids, checkId)),

    concat(lhs: LensPath, rhs: LensPath): LensPath {
        if (lhs.elements.length === 0) return rhs;
        if (rhs.elements.length === 0) return lhs;
        return make([...lhs.elements, ...rhs.elements]);
    },

    equals(a: LensPath, b: LensPath): boolean {
        if (a === b) return true;
        if (a.elements.length !== b.elements.length) return false;
        return a.elements.every((id, i) => id === b.elements[i]);
    },

    // lexicographic; a strict prefix sorts first
    compare(a: LensPath, b: LensPath): -1 | 0 | 1 {
        const n = Math.min(a.elements.length, b.elements.length);
        for (let i = 0; i < n; i++) {
            const x = a.elements[i];
            const y = b.elements[i];
            if (x !== y) return x < y ? -1 : 1;
        }
        if (a.elements.length === b.elements.length) return 0;
        return a.elements.length < b.elements.length ? -1 : 1;
    },

    format: (p: LensPath): string => `[${p.elements.join(", ")}]`,
};
