// src/transform/lensTx.ts
import type { Lens, RefLens } from "../optics/lens";
import { modify, set } from "../optics/ops";
import { IntegerOverflow, NotIntegral } from "../optics/errors";
import { Transform, pipeTx } from "./transform";

/** Sets the lens target to `f(source)`, computed from the whole pre-update source. */
export function setTx<S, A>(lens: Lens<S, A>, f: (source: S) => A): Transform<S, S> {
    return Transform.make((input) => set(lens, input, f(input)));
}

/** Sets the lens target to a fixed value. */
export function setToTx<S, A>(lens: Lens<S, A>, value: A): Transform<S, S> {
    return setTx(lens, () => value);
}

/** Replaces the lens target with `f(target)`. */
export function modTx<S, A>(lens: RefLens<S, A>, f: (target: A) => A): Transform<S, S> {
    return Transform.make((input) => modify(lens, input, f));
}

const stepNumber = (n: number, delta: 1 | -1): number => {
    if (!Number.isInteger(n)) throw new NotIntegral(n);
    const next = n + delta;
    if (!Number.isSafeInteger(n) || !Number.isSafeInteger(next)) throw new IntegerOverflow(n, delta);
    return next;
};

const stepBigInt = (b: bigint, delta: 1 | -1): bigint => b + BigInt(delta);

/**
 * Adds one to a number target. Fails with `NotIntegral` on a fractional
 * value and with `IntegerOverflow` outside `Number.MIN_SAFE_INTEGER ..
 * Number.MAX_SAFE_INTEGER`.
 */
export function incrementTx<S>(lens: RefLens<S, number>): Transform<S, S> {
    return modTx(lens, (n) => stepNumber(n, 1));
}

/** Subtracts one from a number target, failing like {@link incrementTx}. */
export function decrementTx<S>(lens: RefLens<S, number>): Transform<S, S> {
    return modTx(lens, (n) => stepNumber(n, -1));
}

export function incrementBigIntTx<S>(lens: RefLens<S, bigint>): Transform<S, S> {
    return modTx(lens, (b) => stepBigInt(b, 1));
}

export function decrementBigIntTx<S>(lens: RefLens<S, bigint>): Transform<S, S> {
    return modTx(lens, (b) => stepBigInt(b, -1));
}

export function notTx<S>(lens: RefLens<S, boolean>): Transform<S, S> {
    return modTx(lens, (b) => !b);
}

/**
 * Applies a batch of updates in order:
 *
 *     lensSet(person, setToTx(street, "666 Titus Ave"), incrementTx(age))
 */
export function lensSet<S>(source: S, ...updates: ReadonlyArray<Transform<S, S>>): S {
    return pipeTx<S>(...updates).apply(source);
}
