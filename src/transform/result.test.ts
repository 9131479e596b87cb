import { describe, expect, it } from "vitest";
import { tryApply, trySet } from "./result";
import { incrementTx } from "./lensTx";
import { index } from "../optics/primitives";
import { Exit } from "../core/types/exit";
import { Struct1Lenses } from "../testing/fixtures";

describe("trySet / tryApply", () => {
    it("wraps a successful set", () => {
        const exit = trySet(Struct1Lenses.int32, { int32: 1, int16: 2 }, 3);
        expect(exit).toEqual({ _tag: "Success", value: { int32: 3, int16: 2 } });
    });

    it("turns IndexOutOfRange into a Fail cause and leaves the source alone", () => {
        const xs = [1, 2, 3];
        const exit = trySet(index<number>(5), xs, 0);

        expect(exit._tag).toBe("Failure");
        expect(exit).toMatchObject({
            cause: { _tag: "Fail", error: { _tag: "IndexOutOfRange", index: 5, length: 3 } },
        });
        expect(xs).toEqual([1, 2, 3]);
    });

    it("wraps transform application", () => {
        const exit = tryApply(incrementTx(Struct1Lenses.int16), { int32: 0, int16: 41 });
        expect(Exit.isSuccess(exit)).toBe(true);
        expect(Exit.getOrThrow(exit)).toEqual({ int32: 0, int16: 42 });
    });
});
