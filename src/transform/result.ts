// src/transform/result.ts
import { Exit } from "../core/types/exit";
import type { OpticsError } from "../optics/errors";
import type { Lens } from "../optics/lens";
import { set } from "../optics/ops";
import type { Transform } from "./transform";

/** `set` that reports failure as a value; the source is untouched either way. */
export const trySet = <S, A>(lens: Lens<S, A>, source: S, target: A): Exit<OpticsError, S> =>
    Exit.attempt(() => set(lens, source, target));

export const tryApply = <I, O>(tx: Transform<I, O>, input: I): Exit<OpticsError, O> =>
    Exit.attempt(() => tx.apply(input));
