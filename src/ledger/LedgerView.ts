import { MissingParentError } from "../errors";
import { type Block, type BlockId, GENESIS, type NodeId } from "./Block";

export interface Arrival {
    readonly time: number;
    /** Per-view insertion counter; orders arrivals that share a timestamp. */
    readonly seq: number;
}

/**
 * One node's subset of the block tree plus its canonical head.
 *
 * Keeps a children index and cumulative subtree weights up to date on every
 * insert so that fork choice never has to rescan the whole view.
 */
export class LedgerView {
    private readonly blocks = new Map<BlockId, Block>();
    private readonly children = new Map<BlockId, BlockId[]>();
    private readonly arrivals = new Map<BlockId, Arrival>();
    private readonly subtreeWeights = new Map<BlockId, number>();
    private readonly tipIds = new Set<BlockId>();
    private _head: BlockId;
    private nextSeq = 0;
    readonly genesisId: BlockId;

    constructor(readonly owner: NodeId, genesis: Block = GENESIS) {
        this.blocks.set(genesis.id, genesis);
        this.children.set(genesis.id, []);
        this.arrivals.set(genesis.id, { time: 0, seq: this.nextSeq++ });
        this.subtreeWeights.set(genesis.id, genesis.weight);
        this.tipIds.add(genesis.id);
        this._head = genesis.id;
        this.genesisId = genesis.id;
    }

    get head(): BlockId {
        return this._head;
    }

    get headBlock(): Block {
        return this.getOrThrow(this._head);
    }

    get size(): number {
        return this.blocks.size;
    }

    has(id: BlockId): boolean {
        return this.blocks.has(id);
    }

    get(id: BlockId): Block | undefined {
        return this.blocks.get(id);
    }

    getOrThrow(id: BlockId): Block {
        const block = this.blocks.get(id);
        if (!block) throw new Error(`Block ${id} not in ledger of ${this.owner}`);
        return block;
    }

    childrenOf(id: BlockId): readonly BlockId[] {
        return this.children.get(id) ?? [];
    }

    arrivalOf(id: BlockId): Arrival | undefined {
        return this.arrivals.get(id);
    }

    /** Sum of weights of `id` and every descendant held in this view. */
    subtreeWeight(id: BlockId): number {
        return this.subtreeWeights.get(id) ?? 0;
    }

    /** Blocks without children in this view. */
    tips(): BlockId[] {
        return [...this.tipIds];
    }

    /** Ids in the order this view received them, genesis first. */
    blockIds(): BlockId[] {
        return [...this.blocks.keys()];
    }

    /**
     * Adds a validated block. The parent must already be present; returns
     * false when the block is already held.
     */
    insert(block: Block, arrivalTime: number): boolean {
        if (this.blocks.has(block.id)) return false;
        const parentId = block.parentId;
        if (parentId === null || !this.blocks.has(parentId)) {
            throw new MissingParentError(
                this.owner,
                block.id,
                parentId ?? "<none>",
            );
        }

        this.blocks.set(block.id, block);
        this.children.set(block.id, []);
        this.arrivals.set(block.id, { time: arrivalTime, seq: this.nextSeq++ });
        this.subtreeWeights.set(block.id, block.weight);
        this.children.get(parentId)?.push(block.id);
        this.tipIds.delete(parentId);
        this.tipIds.add(block.id);

        let cursor: BlockId | null = parentId;
        while (cursor !== null) {
            this.subtreeWeights.set(
                cursor,
                (this.subtreeWeights.get(cursor) ?? 0) + block.weight,
            );
            cursor = this.getOrThrow(cursor).parentId;
        }
        return true;
    }

    /** Commits a head chosen by the consensus engine. */
    setHead(id: BlockId): void {
        if (!this.blocks.has(id)) {
            throw new Error(`Cannot set head of ${this.owner} to unknown block ${id}`);
        }
        this._head = id;
    }

    /** `id` and its ancestors, nearest first, ending at genesis. */
    chainOf(id: BlockId): Block[] {
        const chain: Block[] = [];
        let cursor: BlockId | null = id;
        while (cursor !== null) {
            const block = this.getOrThrow(cursor);
            chain.push(block);
            cursor = block.parentId;
        }
        return chain;
    }

    isAncestor(ancestor: BlockId, of: BlockId): boolean {
        let cursor: BlockId | null = of;
        while (cursor !== null) {
            if (cursor === ancestor) return true;
            cursor = this.getOrThrow(cursor).parentId;
        }
        return false;
    }
}
