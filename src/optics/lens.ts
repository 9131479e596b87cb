// src/optics/lens.ts
import { LensPath } from "./path";
import { boxed, isLens, isRefLens, isValueLens, modify, mutateWithFn, set } from "./ops";
import { field, index, scalar } from "./primitives";
import { compose, composeAll } from "./compose";

/**
 * Identify tier: knows where its target lives and how to write it.
 *
 * `mutate` writes into a draft the caller owns exclusively. It is the
 * primitive behind {@link set}; callers outside the library use `set`.
 */
export type Lens<S, A> = {
    readonly path: LensPath;
    readonly mutate: (source: S, target: A) => void;
};

/** Reference tier: reads the target without copying the source. */
export type RefLens<S, A> = Lens<S, A> & {
    readonly getRef: (source: S) => A;
    /** Copy-on-write: replaces the target slot of a draft with a fresh copy and returns it. */
    readonly getMutRef: (source: S) => A;
};

/** Value tier: returns a copy of the target. Meant for cheap, scalar targets. */
export type ValueLens<S, A> = Lens<S, A> & {
    readonly get: (source: S) => A;
};

export type RefValueLens<S, A> = RefLens<S, A> & ValueLens<S, A>;

/**
 * One lens per field of `S`, plus a `<field>Lenses` group for each field
 * whose value is itself a structure (`Person.address.street`). Groups are
 * produced outside this library; this is the shape they must have.
 */
export type LensGroup<S> = {
    readonly [K in keyof S]: Lens<S, S[K]>;
} & {
    readonly [K in keyof S & string as S[K] extends object ? `${K}Lenses` : never]?: LensGroup<S[K]>;
};

export const Lens = {
    /** Identify-only lens from a path and a draft writer. */
    make<S, A>(path: LensPath, mutate: (source: S, target: A) => void): Lens<S, A> {
        return { path, mutate };
    },

    over<S, A>(ln: RefLens<S, A>, f: (a: A) => A): (s: S) => S {
        return (s) => modify(ln, s, f);
    },

    field,
    scalar,
    index,
    compose,
    composeAll,
    boxed,
    set,
    modify,
    mutateWithFn,
    isLens,
    isRefLens,
    isValueLens,
};
