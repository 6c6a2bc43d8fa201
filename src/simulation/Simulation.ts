import {
    resolveConfig,
    type ResolvedConfig,
    resolveWeights,
    type SimulationConfig,
} from "../config/SimulationConfig";
import {
    type ConsensusEngine,
    createConsensusEngine,
} from "../consensus";
import { type Block, type NodeId, shortId } from "../ledger/Block";
import type { SimEvent } from "../network/EventQueue";
import { buildTopology, type Topology } from "../network/topology/topology";
import { NodeAgent, type NodeSnapshot } from "../node/NodeAgent";
import { logger as defaultLogger, type LoggerLike } from "../utils/logger";
import { createRngStreams, uniformBetween } from "../utils/rng";
import { SimulationContext } from "./SimulationContext";
import type { TraceRecord } from "./trace";

export type StopReason = "queue-empty" | "max-time" | "max-blocks";

export interface SimulationOptions {
    logger?: LoggerLike;
}

export interface SimulationResult {
    trace: readonly TraceRecord[];
    snapshots: Map<NodeId, NodeSnapshot>;
    /** Every validated block, in the order it was first validated. */
    blocks: Block[];
    stoppedAt: number;
    reason: StopReason;
    weights: Map<NodeId, number>;
}

export class Simulation {
    readonly config: ResolvedConfig;
    readonly topology: Topology;
    readonly engine: ConsensusEngine;
    readonly weights: Map<NodeId, number>;
    readonly context: SimulationContext;
    private readonly log: LoggerLike;
    private result: SimulationResult | undefined;

    constructor(config: SimulationConfig, options: SimulationOptions = {}) {
        this.config = resolveConfig(config);
        const rng = createRngStreams(this.config.seed);
        this.log = (options.logger ?? defaultLogger).child("simulation");

        this.weights = resolveWeights(this.config, rng.network);
        const { topology } = this.config;
        this.topology = buildTopology(
            topology.kind,
            this.config.nodeIds,
            {
                edgeProbability: topology.edgeProbability,
                links: topology.nodes
                    ? Object.fromEntries(
                        Object.entries(topology.nodes).map((
                            [id, node],
                        ) => [id, node.neighbors]),
                    )
                    : undefined,
            },
            this.config.latency,
            rng.network,
        );
        this.engine = createConsensusEngine(this.config.consensus, {
            weights: this.weights,
            pow: this.config.pow,
            pos: this.config.pos,
        });
        this.context = new SimulationContext(
            this.config,
            this.topology,
            this.engine,
            rng,
            options.logger ?? defaultLogger,
        );

        const miners = this.config.miners ? new Set(this.config.miners) : undefined;
        const adversaries = new Set(this.config.adversaries);
        for (const id of this.config.nodeIds) {
            const weight = this.weights.get(id) ?? 0;
            const adversary = adversaries.has(id);
            const miner = adversary ||
                (miners ? miners.has(id) : weight > 0);
            this.context.agents.set(
                id,
                new NodeAgent(
                    id,
                    { weight, miner, adversary },
                    this.context.logger,
                ),
            );
        }
    }

    get agents(): ReadonlyMap<NodeId, NodeAgent> {
        return this.context.agents;
    }

    /** Runs to a terminal condition. Calling it again returns the same result. */
    run(): SimulationResult {
        if (this.result) return this.result;
        const ctx = this.context;
        const { horizon, startJitter, forkCheckInterval } = this.config;

        this.log.info(
            `starting ${this.config.consensus} run: ${this.config.nodeIds.length} nodes, ${this.topology.kind} topology, ${this.topology.edgeCount} links, seed ${this.config.seed}`,
        );
        this.warnShortHorizon();

        for (const agent of ctx.agents.values()) {
            const start = startJitter > 0
                ? uniformBetween(ctx.rng.mining, 0, startJitter)
                : 0;
            agent.startMining(ctx, start);
        }
        if (forkCheckInterval !== undefined) {
            for (const id of this.config.nodeIds) {
                ctx.queue.schedule(
                    { kind: "ForkCheck", target: id },
                    forkCheckInterval,
                );
            }
        }

        let reason: StopReason;
        for (;;) {
            const next = ctx.queue.peek();
            if (next === undefined) {
                reason = "queue-empty";
                break;
            }
            if (horizon.maxTime !== undefined && next.time > horizon.maxTime) {
                reason = "max-time";
                break;
            }
            if (!ctx.miningOpen && ctx.inFlight === 0) {
                reason = "max-blocks";
                break;
            }
            const event = ctx.queue.popNext();
            ctx.advanceTo(event.time);
            this.dispatch(event);
        }

        this.reportUnresolvedOrphans();
        const result: SimulationResult = {
            trace: ctx.trace.records,
            snapshots: new Map(
                [...ctx.agents].map(([id, agent]) => [id, agent.snapshot()]),
            ),
            blocks: ctx.store.all(),
            stoppedAt: ctx.now,
            reason,
            weights: new Map(this.weights),
        };
        this.log.info(
            `stopped at t=${ctx.now} (${reason}): ${ctx.blocksMined} blocks mined, ${ctx.trace.length} trace records`,
        );
        this.result = result;
        return result;
    }

    private dispatch(event: SimEvent): void {
        const agent = this.context.agent(event.target);
        switch (event.kind) {
            case "MineAttempt":
                agent.onMineAttempt(this.context, event);
                return;
            case "BlockArrival":
                this.context.inFlight--;
                agent.onBlockArrival(this.context, event);
                return;
            case "ForkCheck":
                agent.onForkCheck(this.context, event);
                return;
        }
    }

    // OrphanBlockTimeout: whatever is still buffered at halt is reported, not thrown.
    private reportUnresolvedOrphans(): void {
        const ctx = this.context;
        for (const agent of ctx.agents.values()) {
            for (const orphan of agent.unresolvedOrphans()) {
                ctx.trace.record({
                    kind: "orphan-unresolved",
                    time: ctx.now,
                    nodeId: agent.id,
                    blockId: orphan.block.id,
                    parentId: orphan.block.parentId,
                    bufferedAt: orphan.arrivedAt,
                });
                this.log.orphan(
                    `${agent.id} still holds ${shortId(orphan.block.id)} without its parent`,
                );
            }
        }
    }

    private warnShortHorizon(): void {
        const { maxTime } = this.config.horizon;
        if (maxTime === undefined) return;
        const spread = this.topology.diameter() * this.topology.maxLatency();
        if (maxTime < spread) {
            this.log.warn(
                `maxTime ${maxTime} is shorter than diameter x max latency (${spread}); blocks may not reach every node`,
            );
        }
    }
}
