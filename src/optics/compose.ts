// src/optics/compose.ts
import type { Lens, RefLens, RefValueLens, ValueLens } from "./lens";
import { LensPath } from "./path";
import { CompositionError } from "./errors";
import { isLens, isRefLens, isValueLens } from "./ops";

/**
 * Capability of `outer ∘ inner` given the inner lens `L`: the composed lens
 * can do whatever `L` does, reached through a ref-capable outer lens.
 */
export type Composed<S, L> =
    L extends RefLens<infer M, infer A>
        ? L extends ValueLens<M, A>
            ? RefValueLens<S, A>
            : RefLens<S, A>
        : L extends ValueLens<infer _M, infer A>
          ? ValueLens<S, A>
          : L extends Lens<infer _M, infer A>
            ? Lens<S, A>
            : never;

function composeUnchecked<S, M, A>(outer: RefLens<S, M>, inner: Lens<M, A>): Lens<S, A> {
    const ref = isRefLens(inner) ? inner : undefined;
    const value = isValueLens(inner) ? inner : undefined;

    return {
        path: LensPath.concat(outer.path, inner.path),
        mutate: (source: S, target: A) => inner.mutate(outer.getMutRef(source), target),
        ...(ref
            ? {
                  getRef: (source: S) => ref.getRef(outer.getRef(source)),
                  getMutRef: (source: S) => ref.getMutRef(outer.getMutRef(source)),
              }
            : {}),
        ...(value ? { get: (source: S) => value.get(outer.getRef(source)) } : {}),
    };
}

const ensureComposable = (outer: unknown, inner: unknown, position: string) => {
    if (!isLens(outer) || !isLens(inner)) {
        throw new CompositionError(`cannot compose ${position}: both operands must be lenses`);
    }
    if (!isRefLens(outer)) {
        throw new CompositionError(
            `cannot compose ${position}: outer lens ${LensPath.format(outer.path)} has no reference access`
        );
    }
    return outer;
};

/**
 * Composes `outer: S → M` with `inner: M → A` into a lens `S → A`.
 *
 * The outer lens must give reference access, since both reads and writes
 * have to go through the intermediate value. Only the last lens of a chain
 * may be identify-only.
 */
export function compose<S, M, A>(outer: RefLens<S, M>, inner: RefValueLens<M, A>): RefValueLens<S, A>;
export function compose<S, M, A>(outer: RefLens<S, M>, inner: RefLens<M, A>): RefLens<S, A>;
export function compose<S, M, A>(outer: RefLens<S, M>, inner: ValueLens<M, A>): ValueLens<S, A>;
export function compose<S, M, A>(outer: RefLens<S, M>, inner: Lens<M, A>): Lens<S, A>;
export function compose<S, M, A>(outer: RefLens<S, M>, inner: Lens<M, A>): Lens<S, A> {
    ensureComposable(outer, inner, "lenses");
    return composeUnchecked(outer, inner);
}

/** Right-folds {@link compose} over a chain: `composeAll(a, b, c)` is `compose(a, compose(b, c))`. */
export function composeAll<L extends Lens<never, never>>(l1: L): L;
export function composeAll<S, M1, L extends Lens<M1, never>>(l1: RefLens<S, M1>, l2: L): Composed<S, L>;
export function composeAll<S, M1, M2, L extends Lens<M2, never>>(
    l1: RefLens<S, M1>,
    l2: RefLens<M1, M2>,
    l3: L
): Composed<S, L>;
export function composeAll<S, M1, M2, M3, L extends Lens<M3, never>>(
    l1: RefLens<S, M1>,
    l2: RefLens<M1, M2>,
    l3: RefLens<M2, M3>,
    l4: L
): Composed<S, L>;
export function composeAll<S, M1, M2, M3, M4, L extends Lens<M4, never>>(
    l1: RefLens<S, M1>,
    l2: RefLens<M1, M2>,
    l3: RefLens<M2, M3>,
    l4: RefLens<M3, M4>,
    l5: L
): Composed<S, L>;
export function composeAll<S, M1, M2, M3, M4, M5, L extends Lens<M5, never>>(
    l1: RefLens<S, M1>,
    l2: RefLens<M1, M2>,
    l3: RefLens<M2, M3>,
    l4: RefLens<M3, M4>,
    l5: RefLens<M4, M5>,
    l6: L
): Composed<S, L>;
export function composeAll(...lenses: ReadonlyArray<Lens<never, never>>): Lens<never, never> {
    if (lenses.length === 0) throw new CompositionError("cannot compose an empty chain");

    let acc = lenses[lenses.length - 1];
    for (let i = lenses.length - 2; i >= 0; i--) {
        acc = composeUnchecked(ensureComposable(lenses[i], acc, `chain at position ${i}`), acc);
    }
    return acc;
}
