import type { Block, BlockId, NodeId } from "./Block";

export interface OrphanEntry {
    readonly block: Block;
    readonly sender: NodeId;
    readonly arrivedAt: number;
}

// Blocks held back until their parent shows up, keyed by the missing parent.
export class OrphanBuffer {
    private byParent = new Map<BlockId, OrphanEntry[]>();
    private ids = new Set<BlockId>();

    constructor() {}

    pushBack(entry: OrphanEntry): boolean {
        if (this.ids.has(entry.block.id)) return false;
        const parentId = entry.block.parentId;
        if (parentId === null) return false;
        this.ids.add(entry.block.id);
        const waiting = this.byParent.get(parentId);
        if (waiting) waiting.push(entry);
        else this.byParent.set(parentId, [entry]);
        return true;
    }

    len(): number {
        return this.ids.size;
    }

    has(id: BlockId): boolean {
        return this.ids.has(id);
    }

    /** Removes and returns the orphans whose parent is `parentId`, in arrival order. */
    release(parentId: BlockId): OrphanEntry[] {
        const waiting = this.byParent.get(parentId);
        if (!waiting) return [];
        this.byParent.delete(parentId);
        for (const entry of waiting) this.ids.delete(entry.block.id);
        return waiting;
    }

    /** Parent ids still missing, each with the first orphan waiting on it. */
    missingParents(): Array<[BlockId, OrphanEntry]> {
        return [...this.byParent.entries()].map((
            [parentId, entries],
        ) => [parentId, entries[0]]);
    }

    entries(): OrphanEntry[] {
        return [...this.byParent.values()].flat();
    }
}
