import {
    type Block,
    type BlockId,
    createBlock,
    type NodeId,
    shortId,
} from "../ledger/Block";
import { LedgerView } from "../ledger/LedgerView";
import { OrphanBuffer, type OrphanEntry } from "../ledger/OrphanBuffer";
import type {
    BlockArrivalEvent,
    ForkCheckEvent,
    MineAttemptEvent,
} from "../network/EventQueue";
import type { SimulationContext } from "../simulation/SimulationContext";
import type { LoggerLike } from "../utils/logger";

export type NodeState = "Idle" | "Mining" | "AwaitingAncestor";

export interface NodeSnapshot {
    nodeId: NodeId;
    /** Held blocks in the order this node received them, genesis first. */
    blocks: BlockId[];
    head: BlockId;
    headHeight: number;
    /** Blocks still waiting for a parent. */
    pending: BlockId[];
    state: NodeState;
}

export interface NodeRole {
    /** Hash power (pow, ghost) or stake (pos). */
    weight: number;
    miner: boolean;
    /** Publishes a block on every attempt, won or not. */
    adversary: boolean;
}

/**
 * One peer: reacts to the events addressed to it, keeps its own view of the
 * block tree and floods what it accepts.
 */
export class NodeAgent {
    readonly view: LedgerView;
    readonly orphans = new OrphanBuffer();
    private readonly forwarded = new Set<BlockId>();
    private readonly rejected = new Set<BlockId>();
    private mining = false;
    private firstAttemptAt = 0;
    private readonly log: LoggerLike;

    constructor(
        readonly id: NodeId,
        readonly role: NodeRole,
        logger: LoggerLike,
    ) {
        this.view = new LedgerView(id);
        this.log = logger.child(id);
    }

    get state(): NodeState {
        if (this.orphans.len() > 0) return "AwaitingAncestor";
        return this.mining ? "Mining" : "Idle";
    }

    get head(): BlockId {
        return this.view.head;
    }

    /** Schedules attempt 0; later attempts schedule themselves. */
    startMining(ctx: SimulationContext, start: number): void {
        if (!this.role.miner) return;
        this.mining = true;
        this.firstAttemptAt = start;
        ctx.queue.schedule(
            { kind: "MineAttempt", target: this.id, attempt: 0 },
            ctx.engine.attemptTime(0, start),
        );
    }

    onMineAttempt(ctx: SimulationContext, event: MineAttemptEvent): void {
        if (!ctx.miningOpen) {
            this.mining = false;
            return;
        }

        const { engine } = ctx;
        const trial = engine.tryProduce(
            this.id,
            ctx.now,
            event.attempt,
            ctx.rng.mining,
        );
        if (trial.success || this.role.adversary) {
            const parent = engine.parentFor(this.view, event.attempt);
            const block = createBlock({
                parentId: parent.id,
                creator: this.id,
                timestamp: ctx.now,
                height: parent.height + 1,
                weight: engine.weightOf({ creator: this.id }),
                proof: trial.proof,
                payload: `${this.id}#${event.attempt}`,
            });
            this.publish(ctx, block, !trial.success);
        }

        ctx.queue.schedule(
            { kind: "MineAttempt", target: this.id, attempt: event.attempt + 1 },
            engine.attemptTime(event.attempt + 1, this.firstAttemptAt),
        );
    }

    private publish(ctx: SimulationContext, block: Block, forged: boolean): void {
        ctx.blocksMined++;
        ctx.store.intern(block);
        this.view.insert(block, ctx.now);
        const head = this.updateHead(ctx);

        ctx.trace.record({
            kind: "mined",
            time: ctx.now,
            nodeId: this.id,
            blockId: block.id,
            parentId: block.parentId,
            height: block.height,
            weight: block.weight,
            forged,
            resultingHead: head,
        });
        this.log.debug(
            `mined ${shortId(block.id)} at height ${block.height}${
                forged ? " (forged)" : ""
            }`,
        );

        this.forwarded.add(block.id);
        for (const neighbor of ctx.topology.neighbors(this.id)) {
            ctx.sendBlock(this.id, neighbor, block);
        }
    }

    onBlockArrival(ctx: SimulationContext, event: BlockArrivalEvent): void {
        const { block, sender } = event;
        if (
            this.view.has(block.id) ||
            this.orphans.has(block.id) ||
            this.rejected.has(block.id)
        ) return;

        if (block.parentId !== null && !this.view.has(block.parentId)) {
            this.orphans.pushBack({ block, sender, arrivedAt: ctx.now });
            ctx.trace.record({
                kind: "buffered",
                time: ctx.now,
                nodeId: this.id,
                blockId: block.id,
                parentId: block.parentId,
                sender,
            });
            this.log.orphan(
                `buffered ${shortId(block.id)} from ${sender}, missing parent ${
                    shortId(block.parentId)
                }`,
            );
            return;
        }

        this.accept(ctx, block, sender);
    }

    private accept(ctx: SimulationContext, block: Block, sender: NodeId): void {
        const result = ctx.engine.validate(block, this.view);
        if (!result.valid) {
            this.rejected.add(block.id);
            ctx.trace.record({
                kind: "rejected",
                time: ctx.now,
                nodeId: this.id,
                blockId: block.id,
                parentId: block.parentId,
                sender,
                reason: result.reason,
            });
            this.log.debug(
                `rejected ${shortId(block.id)} from ${sender}: ${result.reason}`,
            );
            return;
        }

        ctx.store.intern(block);
        this.view.insert(block, ctx.now);
        const head = this.updateHead(ctx);
        ctx.trace.record({
            kind: "accepted",
            time: ctx.now,
            nodeId: this.id,
            blockId: block.id,
            parentId: block.parentId,
            sender,
            height: block.height,
            arrivalTime: ctx.now,
            resultingHead: head,
        });

        if (!this.forwarded.has(block.id)) {
            this.forwarded.add(block.id);
            for (const neighbor of ctx.topology.neighbors(this.id)) {
                if (neighbor !== sender) ctx.sendBlock(this.id, neighbor, block);
            }
        }

        for (const orphan of this.orphans.release(block.id)) {
            this.log.orphan(`released ${shortId(orphan.block.id)}`);
            this.accept(ctx, orphan.block, orphan.sender);
        }
    }

    /** Recomputes and commits the head; logs when it moves to another branch. */
    private updateHead(ctx: SimulationContext): BlockId {
        const previous = this.view.head;
        const next = ctx.engine.selectHead(this.view);
        if (next === previous) return next;
        this.view.setHead(next);
        if (!this.view.isAncestor(previous, next)) {
            this.log.fork(
                `switched head ${shortId(previous)} -> ${shortId(next)}`,
            );
        }
        return next;
    }

    onForkCheck(ctx: SimulationContext, _event: ForkCheckEvent): void {
        const head = this.updateHead(ctx);
        ctx.trace.record({
            kind: "fork-check",
            time: ctx.now,
            nodeId: this.id,
            blockId: head,
            parentId: this.view.headBlock.parentId,
            tips: this.view.tips().length,
            pending: this.orphans.len(),
        });

        for (const [missing, orphan] of this.orphans.missingParents()) {
            const holder = ctx.agent(orphan.sender);
            const parent = holder.view.get(missing);
            if (!parent) continue;
            ctx.trace.record({
                kind: "requested",
                time: ctx.now,
                nodeId: this.id,
                blockId: missing,
                parentId: parent.parentId,
                from: orphan.sender,
            });
            this.log.orphan(
                `requesting ${shortId(missing)} from ${orphan.sender}`,
            );
            // The request travels back over the reverse link when there is one.
            const requestDelay = ctx.topology.hasLink(this.id, orphan.sender)
                ? ctx.topology.latency(this.id, orphan.sender)
                : ctx.topology.latency(orphan.sender, this.id);
            ctx.sendBlock(orphan.sender, this.id, parent, {
                extraDelay: requestDelay,
                requested: true,
            });
        }

        const interval = ctx.config.forkCheckInterval;
        if (interval !== undefined && (ctx.miningOpen || ctx.inFlight > 0)) {
            ctx.queue.schedule(
                { kind: "ForkCheck", target: this.id },
                ctx.now + interval,
            );
        }
    }

    /** Blocks that never found their parent. */
    unresolvedOrphans(): OrphanEntry[] {
        return this.orphans.entries();
    }

    snapshot(): NodeSnapshot {
        return {
            nodeId: this.id,
            blocks: this.view.blockIds(),
            head: this.view.head,
            headHeight: this.view.headBlock.height,
            pending: this.orphans.entries().map((e) => e.block.id),
            state: this.state,
        };
    }
}
