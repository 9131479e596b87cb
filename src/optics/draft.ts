// src/optics/draft.ts
//
// Lenses write into drafts: shallow copies owned by the running `set`.
// Only the spine from the root to the target is copied, everything else
// stays shared with the original structure.
import { UncopyableValue } from "./errors";

/**
 * Class instances opt into drafts by returning a shallow copy from this
 * method. Needed for anything holding state outside its own enumerable
 * properties, such as `#private` fields.
 *
 *     class Counter {
 *         #n = 0;
 *         [draftCopy]() { return Counter.from(this.#n); }
 *     }
 */
export const draftCopy: unique symbol = Symbol.for("nested-optics.draftCopy");

export interface DraftCopyable<T> {
    [draftCopy](): T;
}

const typeName = (value: object): string => {
    const ctor: unknown = Reflect.get(value, "constructor");
    return typeof ctor === "function" && ctor.name !== "" ? ctor.name : "anonymous class";
};

/**
 * Shallow copy for a draft. Arrays, plain objects and the builtins with
 * internal slots (Map, Set, Date, ArrayBuffer and its views) are copied
 * directly, subclasses keeping their prototype. Any other class instance
 * must implement `[draftCopy]()`, otherwise `UncopyableValue` is thrown
 * before anything is written.
 */
export function shallowCopy<T>(value: T): T {
    if (typeof value !== "object" || value === null) return value;
    if (Array.isArray(value)) return Object.assign([], value);

    const proto: object | null = Object.getPrototypeOf(value);
    if (proto === Object.prototype || proto === null) return Object.assign(Object.create(proto), value);

    const hook: unknown = Reflect.get(value, draftCopy);
    if (typeof hook === "function") return Reflect.apply(hook, value, []);

    // Reflect.construct with the instance's own constructor as newTarget keeps subclasses intact
    if (value instanceof Map) return Reflect.construct(Map, [value], value.constructor);
    if (value instanceof Set) return Reflect.construct(Set, [value], value.constructor);
    if (value instanceof Date) return Reflect.construct(Date, [value.getTime()], value.constructor);
    if (value instanceof ArrayBuffer) return Reflect.apply(ArrayBuffer.prototype.slice, value, [0]);
    if (value instanceof DataView) {
        return Reflect.construct(
            DataView,
            [value.buffer.slice(0), value.byteOffset, value.byteLength],
            value.constructor
        );
    }
    if (ArrayBuffer.isView(value)) return Reflect.construct(value.constructor, [value]);

    throw new UncopyableValue(typeName(value));
}
