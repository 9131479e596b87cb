// src/optics/ops.ts
import type { Lens, RefLens, RefValueLens, ValueLens } from "./lens";
import { shallowCopy } from "./draft";

export const isLens = (value: unknown): value is Lens<never, never> =>
    typeof value === "object" &&
    value !== null &&
    "path" in value &&
    "mutate" in value &&
    typeof value.mutate === "function";

export const isRefLens = <S, A>(lens: Lens<S, A>): lens is RefLens<S, A> =>
    "getRef" in lens &&
    typeof lens.getRef === "function" &&
    "getMutRef" in lens &&
    typeof lens.getMutRef === "function";

export const isValueLens = <S, A>(lens: Lens<S, A>): lens is ValueLens<S, A> =>
    "get" in lens && typeof lens.get === "function";

/**
 * Sets the target of the lens and returns the new state of the source.
 * `source` itself is left untouched.
 */
export function set<S, A>(lens: Lens<S, A>, source: S, target: A): S {
    const draft = shallowCopy(source);
    lens.mutate(draft, target);
    return draft;
}

/** In-place modify on a draft the caller already owns. */
export function mutateWithFn<S, A>(lens: RefLens<S, A>, draft: S, f: (a: A) => A): void {
    lens.mutate(draft, f(lens.getRef(draft)));
}

/** Sets the target to `f(current target)` and returns the new source. */
export function modify<S, A>(lens: RefLens<S, A>, source: S, f: (a: A) => A): S {
    const draft = shallowCopy(source);
    mutateWithFn(lens, draft, f);
    return draft;
}

/**
 * Erases the concrete lens behind a plain delegating object, e.g. to keep
 * heterogeneous lenses in one list. Forwards exactly the capabilities the
 * wrapped lens has.
 */
export function boxed<S, A>(lens: RefValueLens<S, A>): RefValueLens<S, A>;
export function boxed<S, A>(lens: RefLens<S, A>): RefLens<S, A>;
export function boxed<S, A>(lens: ValueLens<S, A>): ValueLens<S, A>;
export function boxed<S, A>(lens: Lens<S, A>): Lens<S, A>;
export function boxed<S, A>(lens: Lens<S, A>): Lens<S, A> {
    const ref = isRefLens(lens) ? lens : undefined;
    const value = isValueLens(lens) ? lens : undefined;

    return {
        path: lens.path,
        mutate: (source: S, target: A) => lens.mutate(source, target),
        ...(ref
            ? {
                  getRef: (source: S) => ref.getRef(source),
                  getMutRef: (source: S) => ref.getMutRef(source),
              }
            : {}),
        ...(value ? { get: (source: S) => value.get(source) } : {}),
    };
}
