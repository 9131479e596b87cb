// src/core/types/exit.ts
import { isOpticsError, type OpticsError } from "../../optics/errors";

export type Cause<E> =
    | { readonly _tag: "Fail"; readonly error: E }
    | { readonly _tag: "Die"; readonly defect: unknown };

export const Cause = {
    fail: <E>(error: E): Cause<E> => ({ _tag: "Fail", error }),
    die: <E = never>(defect: unknown): Cause<E> => ({ _tag: "Die", defect }),
};

export type Exit<E, A> =
    | { readonly _tag: "Success"; readonly value: A }
    | { readonly _tag: "Failure"; readonly cause: Cause<E> };

export const Exit = {
    succeed: <E = never, A = never>(value: A): Exit<E, A> => ({
        _tag: "Success",
        value,
    }),

    failCause: <E = never, A = never>(cause: Cause<E>): Exit<E, A> => ({
        _tag: "Failure",
        cause,
    }),

    isSuccess: <E, A>(exit: Exit<E, A>): exit is Extract<Exit<E, A>, { _tag: "Success" }> =>
        exit._tag === "Success",

    /** Runs `thunk`; library errors become `Fail`, anything else `Die`. */
    attempt<A>(thunk: () => A): Exit<OpticsError, A> {
        try {
            return Exit.succeed(thunk());
        } catch (e) {
            return Exit.failCause(isOpticsError(e) ? Cause.fail(e) : Cause.die(e));
        }
    },

    /** Unwraps a success or re-throws what the failure carried. */
    getOrThrow<E, A>(exit: Exit<E, A>): A {
        if (exit._tag === "Success") return exit.value;
        throw exit.cause._tag === "Fail" ? exit.cause.error : exit.cause.defect;
    },
};
