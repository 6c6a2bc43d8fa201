import { describe, expect, test } from "vitest";
import { GENESIS } from "./Block";
import { BlockStore } from "./BlockStore";
import { childOf } from "./testBlocks";

describe("BlockStore", () => {
    test("keeps the first copy of each block in validation order", () => {
        const store = new BlockStore();
        const a = childOf(GENESIS);
        const b = childOf(a);

        expect(store.intern(b)).toBe(b);
        expect(store.intern(a)).toBe(a);
        expect(store.intern(childOf(GENESIS))).toBe(a);

        expect(store.size).toBe(3);
        expect(store.all().map((blk) => blk.id)).toEqual([GENESIS.id, b.id, a.id]);
        expect(store.get(a.id)).toBe(a);
        expect(store.has("missing")).toBe(false);
    });
});
