import { describe, expect, it } from "vitest";
import { draftCopy, shallowCopy } from "./draft";
import { UncopyableValue } from "./errors";

describe("shallowCopy", () => {
    it("passes primitives through", () => {
        expect(shallowCopy(7)).toBe(7);
        expect(shallowCopy("x")).toBe("x");
        expect(shallowCopy(null)).toBeNull();
    });

    it("copies arrays and plain objects one level deep", () => {
        const inner = { n: 1 };
        const xs = [inner];
        const o = { inner };

        expect(shallowCopy(xs)).not.toBe(xs);
        expect(shallowCopy(xs)[0]).toBe(inner);
        expect(shallowCopy(o)).not.toBe(o);
        expect(shallowCopy(o).inner).toBe(inner);
    });

    it("keeps a null prototype", () => {
        const o: { k?: number } = Object.create(null);
        o.k = 1;
        const c = shallowCopy(o);

        expect(Object.getPrototypeOf(c)).toBeNull();
        expect(c.k).toBe(1);
    });

    it("copies Map and Set into working instances", () => {
        const m = new Map([["a", 1]]);
        const mc = shallowCopy(m);
        mc.set("a", 2);
        expect(m.get("a")).toBe(1);
        expect(mc.get("a")).toBe(2);

        const s = new Set([1]);
        const sc = shallowCopy(s);
        sc.add(2);
        expect([...s]).toEqual([1]);
        expect([...sc]).toEqual([1, 2]);
    });

    it("keeps Map subclasses", () => {
        class Registry extends Map<string, number> {}
        const r = new Registry([["a", 1]]);
        const c = shallowCopy(r);

        expect(c).toBeInstanceOf(Registry);
        expect(c.get("a")).toBe(1);
    });

    it("copies dates", () => {
        const d = new Date(Date.UTC(2024, 5, 1));
        const c = shallowCopy(d);
        c.setUTCFullYear(2030);

        expect(d.getUTCFullYear()).toBe(2024);
        expect(c.getUTCFullYear()).toBe(2030);
    });

    it("copies binary data", () => {
        const bytes = new Uint8Array([1, 2, 3]);
        const bc = shallowCopy(bytes);
        bc[0] = 9;
        expect(bytes[0]).toBe(1);
        expect([...bc]).toEqual([9, 2, 3]);

        const buf = new Uint8Array([4, 5]).buffer;
        const bufc = shallowCopy(buf);
        new Uint8Array(bufc)[0] = 0;
        expect(new Uint8Array(buf)[0]).toBe(4);

        const view = new DataView(new ArrayBuffer(4), 1, 2);
        const vc = shallowCopy(view);
        vc.setUint8(0, 7);
        expect(view.getUint8(0)).toBe(0);
        expect(vc.getUint8(0)).toBe(7);
        expect(vc.byteOffset).toBe(1);
        expect(vc.byteLength).toBe(2);
    });

    it("delegates to draftCopy", () => {
        class Tally {
            #n: number;

            constructor(n: number) {
                this.#n = n;
            }

            count() {
                return this.#n;
            }

            [draftCopy]() {
                return new Tally(this.#n);
            }
        }

        const t = new Tally(4);
        const c = shallowCopy(t);

        expect(c).not.toBe(t);
        expect(c.count()).toBe(4);
    });

    it("rejects other class instances", () => {
        class Opaque {
            readonly k = 1;
        }

        expect(() => shallowCopy(new Opaque())).toThrow(new UncopyableValue("Opaque"));
    });
});
