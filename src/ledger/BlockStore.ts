import { type Block, type BlockId, GENESIS } from "./Block";

/**
 * Append-only arena of validated blocks shared by every node of one run.
 * Node views hold ids into it and never copy block content.
 */
export class BlockStore {
    private readonly blocks = new Map<BlockId, Block>();

    constructor() {
        this.blocks.set(GENESIS.id, GENESIS);
    }

    /** Records `block` the first time any node validates it; later calls are no-ops. */
    intern(block: Block): Block {
        const existing = this.blocks.get(block.id);
        if (existing) return existing;
        this.blocks.set(block.id, block);
        return block;
    }

    get(id: BlockId): Block | undefined {
        return this.blocks.get(id);
    }

    has(id: BlockId): boolean {
        return this.blocks.has(id);
    }

    get size(): number {
        return this.blocks.size;
    }

    /** Blocks in the order they were first validated. */
    all(): Block[] {
        return [...this.blocks.values()];
    }
}
