import { describe, expect, test } from "vitest";
import { ConfigurationError, DisconnectedTopologyError } from "../../errors";
import { mulberry32 } from "../../utils/rng";
import { buildTopology, type LatencyModel } from "./topology";

const ids = (n: number) => Array.from({ length: n }, (_, i) => `n${i}`);
const unit: LatencyModel = { model: { distribution: "constant", value: 1 } };

describe("buildTopology", () => {
    test("full connects every pair", () => {
        const topo = buildTopology("full", ids(4), {}, unit, mulberry32(1));
        expect(topo.edgeCount).toBe(6);
        for (const id of ids(4)) expect(topo.neighbors(id)).toHaveLength(3);
        expect(topo.diameter()).toBe(1);
    });

    test("ring links each node to its two neighbors", () => {
        const topo = buildTopology("ring", ids(5), {}, unit, mulberry32(1));
        expect(topo.edgeCount).toBe(5);
        expect(topo.neighbors("n0")).toEqual(["n1", "n4"]);
        expect(topo.neighbors("n2")).toEqual(["n1", "n3"]);
        expect(topo.diameter()).toBe(2);
    });

    test("a two-node ring is a single link", () => {
        const topo = buildTopology("ring", ids(2), {}, unit, mulberry32(1));
        expect(topo.edgeCount).toBe(1);
        expect(topo.neighbors("n0")).toEqual(["n1"]);
    });

    test("a single node is trivially connected", () => {
        const topo = buildTopology("ring", ids(1), {}, unit, mulberry32(1));
        expect(topo.edgeCount).toBe(0);
        expect(topo.isConnected()).toBe(true);
    });

    test("star uses the first node as hub", () => {
        const topo = buildTopology("star", ids(5), {}, unit, mulberry32(1));
        expect(topo.neighbors("n0")).toEqual(["n1", "n2", "n3", "n4"]);
        expect(topo.neighbors("n3")).toEqual(["n0"]);
        expect(topo.diameter()).toBe(2);
    });

    test("random with edge probability 1 is complete", () => {
        const topo = buildTopology(
            "random",
            ids(6),
            { edgeProbability: 1 },
            unit,
            mulberry32(3),
        );
        expect(topo.edgeCount).toBe(15);
    });

    test("random with no edges fails as disconnected", () => {
        expect(() =>
            buildTopology("random", ids(3), { edgeProbability: 0 }, unit, mulberry32(3))
        ).toThrow(DisconnectedTopologyError);
    });

    test("disconnected errors are configuration errors", () => {
        try {
            buildTopology("random", ids(3), { edgeProbability: 0 }, unit, mulberry32(3));
            expect.unreachable();
        } catch (err) {
            expect(err).toBeInstanceOf(ConfigurationError);
            expect(err).toMatchObject({ reached: 1, total: 3 });
        }
    });

    test("rejects an edge probability outside [0, 1]", () => {
        expect(() =>
            buildTopology("random", ids(3), { edgeProbability: 1.5 }, unit, mulberry32(3))
        ).toThrow("topology.edgeProbability: edgeProbability must be in [0, 1], got 1.5");
    });

    test("rejects duplicate and missing node ids", () => {
        expect(() => buildTopology("full", ["a", "a"], {}, unit, mulberry32(1)))
            .toThrow(ConfigurationError);
        expect(() => buildTopology("full", [], {}, unit, mulberry32(1)))
            .toThrow(ConfigurationError);
    });
});

describe("Topology latency", () => {
    test("links are symmetric for generated shapes", () => {
        const topo = buildTopology(
            "full",
            ids(4),
            {},
            { model: { distribution: "uniform", min: 1, max: 5 } },
            mulberry32(8),
        );
        for (const a of ids(4)) {
            for (const b of topo.neighbors(a)) {
                expect(topo.latency(a, b)).toBe(topo.latency(b, a));
                expect(topo.latency(a, b)).toBeGreaterThanOrEqual(1);
                expect(topo.latency(a, b)).toBeLessThan(5);
            }
        }
    });

    test("same seed gives the same graph and latencies", () => {
        const build = () =>
            buildTopology(
                "random",
                ids(12),
                { edgeProbability: 0.4 },
                { model: { distribution: "exp", lambda: 2 } },
                mulberry32(77),
            );
        expect(build().neighborMap()).toEqual(build().neighborMap());
    });

    test("fixed latency repeats, jitter resamples", () => {
        const model = { distribution: "uniform", min: 0, max: 10 } as const;
        const fixed = buildTopology("full", ids(2), {}, { model }, mulberry32(5));
        expect(fixed.latency("n0", "n1")).toBe(fixed.latency("n0", "n1"));

        const jittered = buildTopology(
            "full",
            ids(2),
            {},
            { model, jitter: true },
            mulberry32(5),
        );
        const samples = new Set(
            Array.from({ length: 5 }, () => jittered.latency("n0", "n1")),
        );
        expect(samples.size).toBeGreaterThan(1);
    });

    test("a latency function receives the link ends", () => {
        const topo = buildTopology(
            "ring",
            ids(3),
            {},
            { model: (from, to) => Number(from.slice(1)) + Number(to.slice(1)) },
            mulberry32(1),
        );
        expect(topo.latency("n1", "n2")).toBe(3);
        expect(topo.maxLatency()).toBe(3);
    });

    test("asking for a missing link throws", () => {
        const topo = buildTopology("star", ids(3), {}, unit, mulberry32(1));
        expect(() => topo.latency("n1", "n2")).toThrow("No link from n1 to n2");
    });
});

describe("custom topologies", () => {
    test("links are directed and explicit latencies win", () => {
        const topo = buildTopology(
            "custom",
            ["a", "b", "c"],
            {
                links: {
                    a: { b: { latency: 2 } },
                    b: { c: {} },
                    c: { a: { latency: 0.5 } },
                },
            },
            { model: { distribution: "constant", value: 7 } },
            mulberry32(1),
        );
        expect(topo.hasLink("a", "b")).toBe(true);
        expect(topo.hasLink("b", "a")).toBe(false);
        expect(topo.latency("a", "b")).toBe(2);
        expect(topo.latency("b", "c")).toBe(7);
        expect(topo.latency("c", "a")).toBe(0.5);
        expect(topo.edgeCount).toBe(3);
    });

    test("must be strongly connected", () => {
        expect(() =>
            buildTopology(
                "custom",
                ["a", "b"],
                { links: { a: { b: {} }, b: {} } },
                unit,
                mulberry32(1),
            )
        ).toThrow(DisconnectedTopologyError);
    });

    test("unknown neighbors are rejected", () => {
        expect(() =>
            buildTopology(
                "custom",
                ["a", "b"],
                { links: { a: { z: {} }, b: { a: {} } } },
                unit,
                mulberry32(1),
            )
        ).toThrow("link a -> z names an unknown node");
    });
});
