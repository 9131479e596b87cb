// src/transform/transform.ts
//
// A Transform is a reusable, stateless function from a whole structure to
// a whole structure. Built once, applied many times.

export type Transform<I, O> = {
    readonly apply: (input: I) => O;
};

export const Transform = {
    make: <I, O>(apply: (input: I) => O): Transform<I, O> => ({ apply }),
};

/** Composition identity: passes the input through unchanged. */
export function identityTx<X>(): Transform<X, X> {
    return Transform.make((x) => x);
}

/** Lifts a plain function into a transform. */
export function fnTx<X, Y>(f: (x: X) => Y): Transform<X, Y> {
    return Transform.make(f);
}

/** Left to right: `composeTx(t1, t2).apply(x) === t2.apply(t1.apply(x))`. */
export function composeTx<A, B, C>(t1: Transform<A, B>, t2: Transform<B, C>): Transform<A, C> {
    return Transform.make((input) => t2.apply(t1.apply(input)));
}

/** Variadic {@link composeTx}, applied left to right. */
export function pipeTx<A>(): Transform<A, A>;
export function pipeTx<A, B>(t1: Transform<A, B>): Transform<A, B>;
export function pipeTx<A, B, C>(t1: Transform<A, B>, t2: Transform<B, C>): Transform<A, C>;
export function pipeTx<A, B, C, D>(
    t1: Transform<A, B>,
    t2: Transform<B, C>,
    t3: Transform<C, D>
): Transform<A, D>;
export function pipeTx<A, B, C, D, E>(
    t1: Transform<A, B>,
    t2: Transform<B, C>,
    t3: Transform<C, D>,
    t4: Transform<D, E>
): Transform<A, E>;
export function pipeTx<A, B, C, D, E, F>(
    t1: Transform<A, B>,
    t2: Transform<B, C>,
    t3: Transform<C, D>,
    t4: Transform<D, E>,
    t5: Transform<E, F>
): Transform<A, F>;
export function pipeTx<A>(...txs: ReadonlyArray<Transform<A, A>>): Transform<A, A>;
export function pipeTx<A>(...txs: ReadonlyArray<Transform<A, A>>): Transform<A, A> {
    return txs.reduce<Transform<A, A>>((acc, tx) => composeTx(acc, tx), identityTx<A>());
}
