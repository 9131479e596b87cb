// src/optics/primitives.ts
//
// Hand-written producers of field and element lenses. Generated per-field
// lenses follow the same contract: a stable zero-based id as the path,
// `mutate` + ref access always, value access only for scalar targets.
import type { RefLens, RefValueLens } from "./lens";
import { LensPath } from "./path";
import { IndexOutOfRange } from "./errors";
import { shallowCopy } from "./draft";

export type Scalar = number | bigint | string | boolean | symbol | null | undefined;

/** Keys of `S` whose value type is a scalar. */
export type ScalarKeys<S> = {
    [K in keyof S]-?: S[K] extends Scalar ? K : never;
}[keyof S];

/**
 * Lens over the field `key` of `S`, declared at position `id` among its
 * siblings.
 *
 * @example
 * const street = field<Address>()("street", 0)
 */
export const field =
    <S>() =>
    <K extends keyof S>(key: K, id: number): RefLens<S, S[K]> => ({
        path: LensPath.single(id),
        mutate: (source, target) => {
            source[key] = target;
        },
        getRef: (source) => source[key],
        getMutRef: (source) => {
            const draft = shallowCopy(source[key]);
            source[key] = draft;
            return draft;
        },
    });

/** Like {@link field}, plus `get` for scalar fields. */
export const scalar =
    <S>() =>
    <K extends keyof S & ScalarKeys<S>>(key: K, id: number): RefValueLens<S, S[K]> => ({
        ...field<S>()(key, id),
        get: (source) => source[key],
    });

/**
 * Lens over element `i` of an array. Reads and writes outside the current
 * bounds throw {@link IndexOutOfRange}.
 */
export const index = <T>(i: number): RefLens<T[], T> => {
    const path = LensPath.fromIndex(i);

    const check = (xs: ReadonlyArray<T>) => {
        if (i >= xs.length) throw new IndexOutOfRange(i, xs.length);
    };

    return {
        path,
        mutate: (xs, target) => {
            check(xs);
            xs[i] = target;
        },
        getRef: (xs) => {
            check(xs);
            return xs[i];
        },
        getMutRef: (xs) => {
            check(xs);
            const draft = shallowCopy(xs[i]);
            xs[i] = draft;
            return draft;
        },
    };
};
