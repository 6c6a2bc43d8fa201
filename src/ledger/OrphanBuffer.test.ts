import { describe, expect, test } from "vitest";
import { GENESIS } from "./Block";
import { OrphanBuffer } from "./OrphanBuffer";
import { childOf } from "./testBlocks";

describe("OrphanBuffer", () => {
    const a = childOf(GENESIS);
    const b1 = childOf(a, "n1");
    const b2 = childOf(a, "n2");
    const c = childOf(b1);

    test("groups orphans by missing parent", () => {
        const buffer = new OrphanBuffer();
        expect(buffer.pushBack({ block: b1, sender: "n1", arrivedAt: 1 })).toBe(true);
        expect(buffer.pushBack({ block: b2, sender: "n2", arrivedAt: 2 })).toBe(true);
        expect(buffer.pushBack({ block: c, sender: "n1", arrivedAt: 3 })).toBe(true);
        expect(buffer.len()).toBe(3);
        expect(buffer.missingParents().map(([id, e]) => [id, e.sender])).toEqual([
            [a.id, "n1"],
            [b1.id, "n1"],
        ]);
    });

    test("rejects duplicates", () => {
        const buffer = new OrphanBuffer();
        buffer.pushBack({ block: b1, sender: "n1", arrivedAt: 1 });
        expect(buffer.pushBack({ block: b1, sender: "n2", arrivedAt: 4 })).toBe(false);
        expect(buffer.len()).toBe(1);
    });

    test("release hands back waiting blocks in arrival order", () => {
        const buffer = new OrphanBuffer();
        buffer.pushBack({ block: b2, sender: "n2", arrivedAt: 1 });
        buffer.pushBack({ block: c, sender: "n1", arrivedAt: 2 });
        buffer.pushBack({ block: b1, sender: "n1", arrivedAt: 3 });

        expect(buffer.release(a.id).map((e) => e.block.id)).toEqual([b2.id, b1.id]);
        expect(buffer.has(b1.id)).toBe(false);
        expect(buffer.has(c.id)).toBe(true);
        expect(buffer.release(a.id)).toEqual([]);
        expect(buffer.entries().map((e) => e.block.id)).toEqual([c.id]);
    });

    test("genesis-like blocks without a parent are not buffered", () => {
        const buffer = new OrphanBuffer();
        expect(buffer.pushBack({ block: GENESIS, sender: "n0", arrivedAt: 0 }))
            .toBe(false);
    });
});
