// Hand-written lens groups standing in for generated ones.
import type { LensGroup, RefLens } from "../optics/lens";
import { LensPath } from "../optics/path";
import { shallowCopy } from "../optics/draft";
import { field, scalar } from "../optics/primitives";

export type Struct1 = { int32: number; int16: number };
export type Struct2 = { int32: number; struct1: Struct1 };
export type Struct3 = { int32: number; struct2: Struct2 };
export type Struct4 = { label: string; items: Struct1[] };
export type Flags = { enabled: boolean; hits: bigint };

export const Struct1Lenses = {
    int32: scalar<Struct1>()("int32", 0),
    int16: scalar<Struct1>()("int16", 1),
} satisfies LensGroup<Struct1>;

export const Struct2Lenses = {
    int32: scalar<Struct2>()("int32", 0),
    struct1: field<Struct2>()("struct1", 1),
    struct1Lenses: Struct1Lenses,
} satisfies LensGroup<Struct2>;

export const Struct3Lenses = {
    int32: scalar<Struct3>()("int32", 0),
    struct2: field<Struct3>()("struct2", 1),
    struct2Lenses: Struct2Lenses,
} satisfies LensGroup<Struct3>;

export const Struct4Lenses = {
    label: scalar<Struct4>()("label", 0),
    items: field<Struct4>()("items", 1),
} satisfies LensGroup<Struct4>;

export const FlagsLenses = {
    enabled: scalar<Flags>()("enabled", 0),
    hits: scalar<Flags>()("hits", 1),
} satisfies LensGroup<Flags>;

export const makeStruct3 = (): Struct3 => ({
    int32: 332,
    struct2: {
        int32: 232,
        struct1: { int32: 132, int16: 116 },
    },
});

/** Hand-written lens onto one entry of a string-keyed Map. */
export const entry = <V>(key: string, id: number): RefLens<Map<string, V>, V> => {
    const getRef = (m: Map<string, V>): V => {
        const v = m.get(key);
        if (v === undefined) throw new RangeError(`no entry for ${key}`);
        return v;
    };

    return {
        path: LensPath.single(id),
        mutate: (m, v) => {
            m.set(key, v);
        },
        getRef,
        getMutRef: (m) => {
            const v = shallowCopy(getRef(m));
            m.set(key, v);
            return v;
        },
    };
};
