import type { ResolvedConfig } from "../config/SimulationConfig";
import type { ConsensusEngine } from "../consensus/ConsensusEngine";
import type { Block, NodeId } from "../ledger/Block";
import { BlockStore } from "../ledger/BlockStore";
import { EventQueue } from "../network/EventQueue";
import type { Topology } from "../network/topology/topology";
import type { NodeAgent } from "../node/NodeAgent";
import type { LoggerLike } from "../utils/logger";
import type { RngStreams } from "../utils/rng";
import { TraceRecorder } from "./trace";

export interface SendOptions {
    /** Extra delay on top of the link latency. */
    extraDelay?: number;
    requested?: boolean;
}

/**
 * Everything one run shares, passed explicitly to every handler: the clock,
 * the pending events, the random streams, the block arena and the trace.
 */
export class SimulationContext {
    private _now = 0;
    readonly queue = new EventQueue();
    readonly store = new BlockStore();
    readonly trace = new TraceRecorder();
    readonly agents = new Map<NodeId, NodeAgent>();
    /** Blocks produced so far by any node, forged ones included. */
    blocksMined = 0;
    /** Scheduled BlockArrival events not yet dispatched. */
    inFlight = 0;

    constructor(
        readonly config: ResolvedConfig,
        readonly topology: Topology,
        readonly engine: ConsensusEngine,
        readonly rng: RngStreams,
        readonly logger: LoggerLike,
    ) {}

    get now(): number {
        return this._now;
    }

    advanceTo(time: number): void {
        if (time < this._now) {
            throw new RangeError(`Clock cannot move back from ${this._now} to ${time}`);
        }
        this._now = time;
    }

    /** False once `horizon.maxBlocks` blocks exist. */
    get miningOpen(): boolean {
        const { maxBlocks } = this.config.horizon;
        return maxBlocks === undefined || this.blocksMined < maxBlocks;
    }

    agent(id: NodeId): NodeAgent {
        const agent = this.agents.get(id);
        if (!agent) throw new Error(`Unknown node ${id}`);
        return agent;
    }

    /**
     * Schedules delivery of `block` from `from` to `to` after the link
     * latency, unless the message is lost.
     */
    sendBlock(
        from: NodeId,
        to: NodeId,
        block: Block,
        options: SendOptions = {},
    ): void {
        if (
            this.config.dropRate > 0 && this.rng.drops() < this.config.dropRate
        ) {
            this.trace.record({
                kind: "dropped",
                time: this._now,
                nodeId: from,
                blockId: block.id,
                parentId: block.parentId,
                to,
            });
            return;
        }
        const at = this._now + (options.extraDelay ?? 0) +
            this.topology.latency(from, to);
        this.queue.schedule(
            options.requested
                ? { kind: "BlockArrival", target: to, sender: from, block, requested: true }
                : { kind: "BlockArrival", target: to, sender: from, block },
            at,
        );
        this.inFlight++;
    }
}
