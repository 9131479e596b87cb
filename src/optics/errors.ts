// src/optics/errors.ts

export type OpticsErrorTag =
    | "IndexOutOfRange"
    | "CompositionError"
    | "InvalidPathElement"
    | "NotIntegral"
    | "IntegerOverflow"
    | "UncopyableValue";

export abstract class OpticsError extends Error {
    abstract readonly _tag: OpticsErrorTag;

    constructor(message: string) {
        super(message);
        this.name = this.constructor.name;
    }
}

/** An indexed accessor was read or written past the bounds of its collection. */
export class IndexOutOfRange extends OpticsError {
    readonly _tag = "IndexOutOfRange" as const;

    constructor(readonly index: number, readonly length: number) {
        super(`index ${index} out of range for collection of length ${length}`);
    }
}

/** Raised while assembling a composed accessor, never when it is used. */
export class CompositionError extends OpticsError {
    readonly _tag = "CompositionError" as const;
}

export class InvalidPathElement extends OpticsError {
    readonly _tag = "InvalidPathElement" as const;

    constructor(readonly id: unknown) {
        super(`path element must be a non-negative safe integer, got ${String(id)}`);
    }
}

export class NotIntegral extends OpticsError {
    readonly _tag = "NotIntegral" as const;

    constructor(readonly value: unknown) {
        super(`expected an integral target, got ${String(value)}`);
    }
}

/** Stepping a number would leave, or already left, the safe integer range. */
export class IntegerOverflow extends OpticsError {
    readonly _tag = "IntegerOverflow" as const;

    constructor(readonly value: number, readonly delta: number) {
        super(`stepping ${value} by ${delta} leaves the safe integer range`);
    }
}

/**
 * A draft needed a copy of a class instance that neither is a known builtin
 * nor implements `[draftCopy]()`.
 */
export class UncopyableValue extends OpticsError {
    readonly _tag = "UncopyableValue" as const;

    constructor(readonly typeName: string) {
        super(`cannot copy an instance of ${typeName}; implement [draftCopy]() on it`);
    }
}

export const isOpticsError = (e: unknown): e is OpticsError => e instanceof OpticsError;
