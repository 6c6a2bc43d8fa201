import { type Block, createBlock, type NodeId } from "./Block";

/** Child of `parent` with a pow proof that always verifies at threshold 1. */
export function childOf(
    parent: Block,
    creator: NodeId = "n0",
    opts: { weight?: number; timestamp?: number; payload?: string } = {},
): Block {
    return createBlock({
        parentId: parent.id,
        creator,
        timestamp: opts.timestamp ?? parent.timestamp + 1,
        height: parent.height + 1,
        weight: opts.weight ?? 1,
        proof: { kind: "pow", draw: 0.5, threshold: 1 },
        payload: opts.payload ?? `${creator}@${parent.height + 1}`,
    });
}
