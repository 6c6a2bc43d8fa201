import { describe, expect, test } from "vitest";
import type { SimulationConfig } from "../config/SimulationConfig";
import { type Block, GENESIS, type NodeId } from "../ledger/Block";
import { childOf } from "../ledger/testBlocks";
import type { SimEvent } from "../network/EventQueue";
import { Simulation } from "../simulation/Simulation";
import type { SimulationContext } from "../simulation/SimulationContext";
import { Logger, LogLevel } from "../utils/logger";

const silent = new Logger({ logLevel: LogLevel.NONE });

// Three fully connected nodes; only n0 has hash power and it wins every trial.
function setup(overrides: Partial<SimulationConfig> = {}) {
    const sim = new Simulation({
        topology: { kind: "full" },
        nodeCount: 3,
        consensus: "pow",
        weights: { distribution: "explicit", values: [1, 0, 0] },
        pow: { successRate: 1, attemptInterval: 10 },
        horizon: { maxTime: 100 },
        seed: 1,
        ...overrides,
    }, { logger: silent });
    return sim.context;
}

function arrive(
    ctx: SimulationContext,
    target: NodeId,
    block: Block,
    sender: NodeId,
): void {
    ctx.agent(target).onBlockArrival(ctx, {
        kind: "BlockArrival",
        time: ctx.now,
        seq: 0,
        target,
        sender,
        block,
    });
}

function drain(ctx: SimulationContext): SimEvent[] {
    const events: SimEvent[] = [];
    while (!ctx.queue.isEmpty()) events.push(ctx.queue.popNext());
    return events;
}

describe("NodeAgent", () => {
    test("buffers an orphan until its parent arrives", () => {
        const ctx = setup();
        const n1 = ctx.agent("n1");
        const a = childOf(GENESIS);
        const b = childOf(a);

        arrive(ctx, "n1", b, "n0");
        expect(n1.state).toBe("AwaitingAncestor");
        expect(n1.snapshot().pending).toEqual([b.id]);
        expect(n1.view.has(b.id)).toBe(false);

        arrive(ctx, "n1", a, "n0");
        expect(ctx.trace.records.map((r) => [r.kind, r.blockId])).toEqual([
            ["buffered", b.id],
            ["accepted", a.id],
            ["accepted", b.id],
        ]);
        expect(n1.snapshot()).toEqual({
            nodeId: "n1",
            blocks: [GENESIS.id, a.id, b.id],
            head: b.id,
            headHeight: 2,
            pending: [],
            state: "Idle",
        });
    });

    test("forwards accepted blocks to every neighbor but the sender", () => {
        const ctx = setup();
        const a = childOf(GENESIS);
        arrive(ctx, "n1", a, "n0");

        const events = drain(ctx);
        expect(events).toHaveLength(1);
        expect(events[0]).toMatchObject({
            kind: "BlockArrival",
            target: "n2",
            sender: "n1",
            time: 1,
        });
        expect(ctx.inFlight).toBe(1);
    });

    test("duplicates are ignored", () => {
        const ctx = setup();
        const a = childOf(GENESIS);
        arrive(ctx, "n1", a, "n0");
        arrive(ctx, "n1", a, "n2");
        expect(ctx.trace.length).toBe(1);
        expect(drain(ctx)).toHaveLength(1);
    });

    test("invalid blocks are rejected once and never forwarded", () => {
        const ctx = setup();
        // n1 has no hash power, so a claimed threshold of 1 is a lie.
        const forged = childOf(GENESIS, "n1");
        arrive(ctx, "n0", forged, "n2");
        arrive(ctx, "n0", forged, "n1");

        expect(ctx.trace.records).toEqual([
            {
                kind: "rejected",
                time: 0,
                nodeId: "n0",
                blockId: forged.id,
                parentId: GENESIS.id,
                sender: "n2",
                reason: "failed-trial",
            },
        ]);
        expect(ctx.agent("n0").view.has(forged.id)).toBe(false);
        expect(ctx.queue.isEmpty()).toBe(true);
    });

    test("mines on its head and floods the block", () => {
        const ctx = setup();
        const n0 = ctx.agent("n0");
        n0.startMining(ctx, 0);
        expect(n0.state).toBe("Mining");

        const attempt = ctx.queue.popNext();
        expect(attempt).toMatchObject({ kind: "MineAttempt", target: "n0", time: 0 });
        if (attempt.kind !== "MineAttempt") throw new Error("expected a MineAttempt");
        n0.onMineAttempt(ctx, attempt);

        const [mined] = ctx.trace.ofKind("mined");
        expect(mined).toMatchObject({
            nodeId: "n0",
            parentId: GENESIS.id,
            height: 1,
            weight: 1,
            forged: false,
        });
        expect(mined.resultingHead).toBe(mined.blockId);
        expect(n0.head).toBe(mined.blockId);
        expect(ctx.blocksMined).toBe(1);
        expect(ctx.store.has(mined.blockId)).toBe(true);

        expect(drain(ctx).map((e) => [e.kind, e.target, e.time])).toEqual([
            ["BlockArrival", "n1", 1],
            ["BlockArrival", "n2", 1],
            ["MineAttempt", "n0", 10],
        ]);
    });

    test("attempts past the block horizon do nothing", () => {
        const ctx = setup({ horizon: { maxBlocks: 1 } });
        const n0 = ctx.agent("n0");
        n0.startMining(ctx, 0);

        for (const event of drain(ctx)) {
            if (event.kind === "MineAttempt") n0.onMineAttempt(ctx, event);
        }
        const next = drain(ctx).find((e) => e.kind === "MineAttempt");
        if (next?.kind !== "MineAttempt") throw new Error("expected a MineAttempt");
        n0.onMineAttempt(ctx, next);

        expect(ctx.trace.ofKind("mined")).toHaveLength(1);
        expect(ctx.queue.isEmpty()).toBe(true);
        expect(n0.state).toBe("Idle");
    });

    test("adversaries publish losing trials that honest peers reject", () => {
        const ctx = setup({ adversaries: ["n1"] });
        const n1 = ctx.agent("n1");
        expect(n1.role).toEqual({ weight: 0, miner: true, adversary: true });

        n1.onMineAttempt(ctx, {
            kind: "MineAttempt",
            time: 0,
            seq: 0,
            target: "n1",
            attempt: 0,
        });
        const [mined] = ctx.trace.ofKind("mined");
        expect(mined.forged).toBe(true);

        const block = n1.view.getOrThrow(mined.blockId);
        arrive(ctx, "n0", block, "n1");
        expect(ctx.trace.ofKind("rejected").map((r) => r.reason)).toEqual([
            "failed-trial",
        ]);
    });

    test("fork checks re-request missing parents from the orphan's sender", () => {
        const ctx = setup({ forkCheckInterval: 5 });
        const n0 = ctx.agent("n0");
        const n1 = ctx.agent("n1");

        n0.startMining(ctx, 0);
        const attempt = ctx.queue.popNext();
        if (attempt.kind !== "MineAttempt") throw new Error("expected a MineAttempt");
        n0.onMineAttempt(ctx, attempt);
        drain(ctx);
        const m = n0.view.headBlock;

        // n1 never got m, then hears about its child.
        const c = childOf(m);
        n0.view.insert(c, 0);
        arrive(ctx, "n1", c, "n0");

        ctx.advanceTo(3);
        n1.onForkCheck(ctx, { kind: "ForkCheck", time: 3, seq: 0, target: "n1" });
        expect(ctx.trace.records.slice(-2)).toEqual([
            {
                kind: "fork-check",
                time: 3,
                nodeId: "n1",
                blockId: GENESIS.id,
                parentId: null,
                tips: 1,
                pending: 1,
            },
            {
                kind: "requested",
                time: 3,
                nodeId: "n1",
                blockId: m.id,
                parentId: GENESIS.id,
                from: "n0",
            },
        ]);

        const [reply, recheck] = drain(ctx);
        expect(reply).toMatchObject({
            kind: "BlockArrival",
            target: "n1",
            sender: "n0",
            time: 5,
            requested: true,
        });
        expect(recheck).toMatchObject({ kind: "ForkCheck", target: "n1", time: 8 });

        if (reply.kind !== "BlockArrival") throw new Error("expected a BlockArrival");
        ctx.advanceTo(5);
        n1.onBlockArrival(ctx, reply);
        expect(n1.head).toBe(c.id);
        expect(n1.state).toBe("Idle");
    });
});
