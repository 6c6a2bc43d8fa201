import { describe, expect, test } from "vitest";
import {
    posThreshold,
    powThreshold,
    relativeWeights,
    slotLottery,
} from "./leaderElection";

describe("leader election", () => {
    test("pow threshold scales with hash power and caps at 1", () => {
        expect(powThreshold(2, 0.25)).toBe(0.5);
        expect(powThreshold(10, 0.5)).toBe(1);
        expect(powThreshold(0, 0.5)).toBe(0);
    });

    test("pos threshold follows 1 - (1 - f)^stake", () => {
        expect(posThreshold(0, 0.2)).toBe(0);
        expect(posThreshold(1, 0.2)).toBeCloseTo(0.2, 12);
        expect(posThreshold(0.5, 0.75)).toBeCloseTo(0.5, 12);
        expect(posThreshold(0.3, 1)).toBe(1);
    });

    test("slot lottery is deterministic and in [0, 1)", () => {
        const x = slotLottery("nonce", 7, "n1");
        expect(slotLottery("nonce", 7, "n1")).toBe(x);
        expect(x).toBeGreaterThanOrEqual(0);
        expect(x).toBeLessThan(1);
    });

    test("slot lottery depends on every input", () => {
        const values = new Set([
            slotLottery("nonce", 7, "n1"),
            slotLottery("nonce", 8, "n1"),
            slotLottery("nonce", 7, "n2"),
            slotLottery("other", 7, "n1"),
        ]);
        expect(values.size).toBe(4);
    });

    test("relative weights sum to one", () => {
        const shares = relativeWeights(new Map([["a", 3], ["b", 1], ["c", 0]]));
        expect(shares).toEqual(new Map([["a", 0.75], ["b", 0.25], ["c", 0]]));
    });
});
