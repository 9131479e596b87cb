import { describe, expect, it } from "vitest";
import { Cause, Exit } from "./exit";
import { CompositionError, IndexOutOfRange } from "../../optics/errors";

describe("Exit", () => {
    it("attempt captures a value", () => {
        expect(Exit.attempt(() => 42)).toEqual({ _tag: "Success", value: 42 });
    });

    it("attempt maps library errors to Fail", () => {
        const err = new IndexOutOfRange(4, 2);
        const exit = Exit.attempt(() => {
            throw err;
        });

        expect(exit).toEqual(Exit.failCause(Cause.fail(err)));
    });

    it("attempt maps anything else to Die", () => {
        const boom = new TypeError("boom");
        const exit = Exit.attempt(() => {
            throw boom;
        });

        expect(exit).toEqual({ _tag: "Failure", cause: { _tag: "Die", defect: boom } });
    });

    it("getOrThrow unwraps or rethrows", () => {
        expect(Exit.getOrThrow(Exit.succeed(1))).toBe(1);

        const err = new CompositionError("bad chain");
        expect(() => Exit.getOrThrow(Exit.failCause(Cause.fail(err)))).toThrow(err);
        expect(() => Exit.getOrThrow(Exit.failCause(Cause.die(new RangeError("defect"))))).toThrow(RangeError);
    });

    it("isSuccess narrows on the tag", () => {
        expect(Exit.isSuccess(Exit.succeed("ok"))).toBe(true);
        expect(Exit.isSuccess(Exit.failCause(Cause.die(null)))).toBe(false);
    });
});
